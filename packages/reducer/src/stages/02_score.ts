import type { Language } from "@glossa/core";
import type { GlossCache } from "./01_normalize";
import type { Mode, ModeProfile } from "../mode";
import type { EntityType, SignalName, SimilarityResult, WitnessSenseUnit } from "../types";
import { isPrimarySource } from "@glossa/core";
import { MODE_PROFILES } from "../mode";
import { surfaceTokens } from "./01_normalize";

export const SIGNALS = {
  domainBonus: 0.2,
  domainCap: 0.4,
  registerBonus: 0.15,
  registerCap: 0.3,
  metadataCap: 0.4,
  entityMatch: 0.3,
  entityMismatch: -0.1,
  primaryBoth: 0.25,
  primaryOne: 0.1,
} as const;

/**
 * Rounds to six decimals so that scores compare and serialize identically
 * across runs regardless of floating-point summation noise.
 */
export function quantize(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function countShared(a: readonly string[], b: readonly string[]) {
  if (a.length === 0 || b.length === 0) return 0;
  const setB = new Set(b);
  let shared = 0;
  for (const item of new Set(a)) {
    if (setB.has(item)) shared++;
  }
  return shared;
}

/** |A∩B| / |A∪B| over the token sets; 0 when either side is empty. */
export function jaccard(a: readonly string[], b: readonly string[]): number {
  const sizeA = new Set(a).size;
  const sizeB = new Set(b).size;
  if (sizeA === 0 || sizeB === 0) return 0;
  const shared = countShared(a, b);
  return shared / (sizeA + sizeB - shared);
}

export function metadataOverlap(a: WitnessSenseUnit, b: WitnessSenseUnit): number {
  const domains = Math.min(SIGNALS.domainCap, SIGNALS.domainBonus * countShared(a.domains, b.domains));
  const register = Math.min(SIGNALS.registerCap, SIGNALS.registerBonus * countShared(a.register, b.register));
  return Math.min(SIGNALS.metadataCap, domains + register);
}

export function entityAgreement(a: EntityType | null, b: EntityType | null): number {
  if (a === null || b === null) return 0;
  return a === b ? SIGNALS.entityMatch : SIGNALS.entityMismatch;
}

export function primarySourceAgreement(aPrimary: boolean, bPrimary: boolean): number {
  if (aPrimary && bPrimary) return SIGNALS.primaryBoth;
  if (aPrimary || bPrimary) return SIGNALS.primaryOne;
  return 0;
}

export function negationPenalty(aNegated: boolean, bNegated: boolean, profile: ModeProfile): number {
  return aNegated !== bNegated ? -profile.negationPenalty : 0;
}

/**
 * Weighted blend of the raw signals. Each signal is scaled by its own
 * maximum so a profile whose weights sum to 1 peaks at exactly 1.0; the
 * negation penalty is added afterwards.
 */
export function combineSignals(components: Record<SignalName, number>, profile: ModeProfile): number {
  const { weights } = profile;

  let blended: number;
  if (components.tokenOverlap === 1) {
    // Identical normalized statements from different witnesses.
    blended = 1;
  }
  else {
    blended = weights.tokenOverlap * components.tokenOverlap
      + weights.metadataOverlap * (components.metadataOverlap / SIGNALS.metadataCap)
      + weights.entityAgreement * (components.entityAgreement / SIGNALS.entityMatch)
      + weights.primarySource * (components.primarySource / SIGNALS.primaryBoth);
  }

  return quantize(clamp01(blended + components.negationPenalty));
}

export class SimilarityScorer {
  constructor(private readonly glosses: GlossCache) {}

  get language(): Language {
    return this.glosses.language;
  }

  /**
   * Pure and symmetric: every signal is computed from an unordered pair, so
   * `score(a, b, mode)` and `score(b, a, mode)` are bit-identical.
   */
  score(a: WitnessSenseUnit, b: WitnessSenseUnit, mode: Mode): SimilarityResult {
    const profile = MODE_PROFILES[mode];
    const glossA = this.glosses.get(a);
    const glossB = this.glosses.get(b);

    const components: Record<SignalName, number> = {
      tokenOverlap: quantize(this.tokenOverlap(a, b)),
      metadataOverlap: quantize(metadataOverlap(a, b)),
      entityAgreement: entityAgreement(glossA.entityType, glossB.entityType),
      primarySource: primarySourceAgreement(
        isPrimarySource(a.source, this.language),
        isPrimarySource(b.source, this.language),
      ),
      negationPenalty: negationPenalty(glossA.negated, glossB.negated, profile),
    };

    return { value: combineSignals(components, profile), components };
  }

  /**
   * Jaccard of the comparison tokens. Two glosses made only of stop-words
   * ("to be") are compared on their surface tokens instead.
   */
  tokenOverlap(a: WitnessSenseUnit, b: WitnessSenseUnit): number {
    const tokensA = this.glosses.get(a).tokens;
    const tokensB = this.glosses.get(b).tokens;
    if (tokensA.length === 0 && tokensB.length === 0) {
      return jaccard(surfaceTokens(a.glossRaw, this.language), surfaceTokens(b.glossRaw, this.language));
    }
    return jaccard(tokensA, tokensB);
  }

  /** Token sets share nothing and neither does the metadata. */
  isDisjoint(a: WitnessSenseUnit, b: WitnessSenseUnit): boolean {
    return this.tokenOverlap(a, b) === 0
      && countShared(a.domains, b.domains) === 0
      && countShared(a.register, b.register) === 0;
  }
}
