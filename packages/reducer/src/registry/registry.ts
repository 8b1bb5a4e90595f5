import type { ConstantStore } from "./store";
import type { SenseBucket } from "../types";
import { ConstantStatus, foldDiacritics, logger, type SemanticConstant } from "@glossa/core";
import { ConstantNotFoundError, ReductionError, RegistryUnavailableError } from "../errors";
import { normalizeGloss, surfaceTokens } from "../stages/01_normalize";
import { jaccard, quantize } from "../stages/02_score";
import { witnessKey } from "../types";

export const DEFAULT_MATCH_THRESHOLD = 0.85;
export const FALLBACK_CONSTANT_ID = "CONCEPT";

export interface RegistryOptions {
  /** Jaccard floor for `findMatch`. The same for every clustering mode. */
  matchThreshold?: number;
  /** Leading content words used to derive a provisional id. */
  idWords?: number;
  clock?: () => Date;
}

export interface ConstantMatch {
  constant: SemanticConstant;
  score: number;
}

/** Comparison tokens, or every surface token when the text is only stop-words. */
function matchTokens(text: string): readonly string[] {
  const tokens = normalizeGloss(text).tokens;
  return tokens.length ? tokens : surfaceTokens(text);
}

function constantTokens(constant: SemanticConstant) {
  const tokens = normalizeGloss(`${constant.canonicalLabel} ${constant.description}`).tokens;
  return tokens.length ? tokens : surfaceTokens(constant.description);
}

/**
 * Best constant at or above `threshold`; among equal scores the earliest
 * `createdAt` wins, then the smaller id. `constants` must already be in
 * store order.
 */
export function bestMatch(displayGloss: string, constants: readonly SemanticConstant[], threshold: number): ConstantMatch | null {
  const tokens = matchTokens(displayGloss);
  let best: ConstantMatch | null = null;
  for (const constant of constants) {
    // Punctuation-only glosses have no tokens at all and match on their text.
    const score = tokens.length
      ? quantize(jaccard(tokens, constantTokens(constant)))
      : Number(constant.description === displayGloss);
    if (score >= threshold && (best === null || score > best.score)) {
      best = { constant, score };
    }
  }
  return best;
}

/** Leading content words of a gloss, as they appear after normalization. */
export function leadingContentWords(gloss: string, count: number): string[] {
  return normalizeGloss(gloss).tokens
    .filter(token => foldDiacritics(token).replace(/[^a-z0-9]/gi, "").length > 1)
    .slice(0, count);
}

/**
 * `"Śiva, the deity"` → `SIVA_DEITY`. Falls back to `CONCEPT` when the gloss
 * has no usable content word.
 */
export function deriveConstantId(gloss: string, count = 2): string {
  const words = leadingContentWords(gloss, count)
    .map(word => foldDiacritics(word).toUpperCase().replace(/[^A-Z0-9]/g, ""));
  return words.length ? words.join("_") : FALLBACK_CONSTANT_ID;
}

export function disambiguateId(base: string, taken: ReadonlySet<string>): string {
  if (!taken.has(base)) return base;
  let suffix = 2;
  while (taken.has(`${base}_${suffix}`)) suffix++;
  return `${base}_${suffix}`;
}

/**
 * Match-or-create registry of language-agnostic concept ids, shared by every
 * reduction run. All writes go through the store's exclusive section; store
 * failures surface as `RegistryUnavailableError`.
 */
export class SemanticConstantRegistry {
  private readonly matchThreshold: number;
  private readonly idWords: number;
  private readonly clock: () => Date;

  constructor(
    private readonly store: ConstantStore,
    options: RegistryOptions = {},
  ) {
    this.matchThreshold = options.matchThreshold ?? DEFAULT_MATCH_THRESHOLD;
    this.idWords = options.idWords ?? 2;
    this.clock = options.clock ?? (() => new Date());
  }

  async list(): Promise<SemanticConstant[]> {
    return this.guard("list", () => this.store.list());
  }

  async findMatch(bucket: SenseBucket): Promise<string | null> {
    const constants = await this.guard("findMatch", () => this.store.list());
    return bestMatch(bucket.displayGloss, constants, this.matchThreshold)?.constant.constantId ?? null;
  }

  async createProvisional(bucket: SenseBucket): Promise<string> {
    return this.guard("createProvisional", () =>
      this.store.exclusive(async (store) => {
        const constants = await store.list();
        return this.insertProvisional(store, bucket, constants);
      }),
    );
  }

  /**
   * Match-then-create as one atomic step, so concurrent runs that meet the
   * same new concept converge on one constant.
   */
  async assign(bucket: SenseBucket): Promise<string> {
    return this.guard("assign", () =>
      this.store.exclusive(async (store) => {
        const constants = await store.list();
        const match = bestMatch(bucket.displayGloss, constants, this.matchThreshold);
        if (match) return match.constant.constantId;
        return this.insertProvisional(store, bucket, constants);
      }),
    );
  }

  /**
   * One-way `provisional → curated`. Promoting a constant that is already
   * curated succeeds without touching it, so `curatedAt` keeps its first
   * value. An unknown id throws `ConstantNotFoundError`.
   */
  async promote(constantId: string): Promise<SemanticConstant> {
    return this.guard("promote", () =>
      this.store.exclusive(async (store) => {
        const existing = await store.get(constantId);
        if (!existing) throw new ConstantNotFoundError(constantId);
        if (existing.status === ConstantStatus.Curated) return existing;

        await store.markCurated(constantId, this.clock());
        const promoted = await store.get(constantId);
        if (!promoted) throw new ConstantNotFoundError(constantId);
        logger.info(`Promoted semantic constant ${constantId}`);
        return promoted;
      }),
    );
  }

  private async insertProvisional(store: ConstantStore, bucket: SenseBucket, constants: readonly SemanticConstant[]) {
    const taken = new Set(constants.map(c => c.constantId));
    const constantId = disambiguateId(deriveConstantId(bucket.centroid.glossRaw, this.idWords), taken);
    const label = leadingContentWords(bucket.centroid.glossRaw, this.idWords).join(" ");

    await store.insert({
      constantId,
      canonicalLabel: label || bucket.displayGloss,
      description: bucket.displayGloss,
      domains: [...bucket.domains],
      status: ConstantStatus.Provisional,
      createdFrom: bucket.witnesses.map(wsu => ({ source: wsu.source, senseRef: wsu.senseRef })),
      createdAt: this.clock(),
      curatedAt: null,
    });

    logger.debug(`Minted provisional constant ${constantId} from ${bucket.witnesses.map(witnessKey).join(", ")}`);
    return constantId;
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    }
    catch (error) {
      if (error instanceof ReductionError) throw error;
      throw new RegistryUnavailableError(operation, { cause: error });
    }
  }
}
