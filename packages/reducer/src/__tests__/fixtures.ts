import type { ConstantStore } from "../registry/store";
import type { SenseBucket, SimilarityResult, WitnessSenseUnit } from "../types";
import { createWitness, type WitnessInput, WitnessInputSchema } from "../witness";

export function witness(source: string, senseRef: string, glossRaw: string, extra: Partial<WitnessInput> = {}): WitnessSenseUnit {
  return createWitness(WitnessInputSchema.parse({ source, sense_ref: senseRef, gloss_raw: glossRaw, ...extra }));
}

/** The three Sanskrit witnesses for one lemma, in input order. */
export const auspiciousInput = [
  { source: "mw", sense_ref: "217497", gloss_raw: "auspicious; benign; favorable" },
  { source: "mw", sense_ref: "217501", gloss_raw: "Śiva, the deity" },
  { source: "ap90", sense_ref: "27998:1", gloss_raw: "auspicious; lucky" },
];

export function bucketOf(witnesses: WitnessSenseUnit[], senseId = "B1"): SenseBucket {
  return {
    senseId,
    witnesses,
    centroid: witnesses[0],
    displayGloss: witnesses[0].glossRaw,
    confidence: 1,
    semanticConstant: null,
    domains: [...new Set(witnesses.flatMap(w => w.domains))],
    register: [...new Set(witnesses.flatMap(w => w.register))],
  };
}

export function fixedResult(value: number): SimilarityResult {
  return {
    value,
    components: {
      tokenOverlap: 0,
      metadataOverlap: 0,
      entityAgreement: 0,
      primarySource: 0,
      negationPenalty: 0,
    },
  };
}

export function fixedClock(...isoDates: string[]) {
  let i = 0;
  return () => new Date(isoDates[Math.min(i++, isoDates.length - 1)]);
}

/** A store whose backend is down. */
export class UnreachableStore implements ConstantStore {
  readonly failure = new Error("connection refused");

  async list(): Promise<never> {
    throw this.failure;
  }

  async get(): Promise<never> {
    throw this.failure;
  }

  async insert(): Promise<never> {
    throw this.failure;
  }

  async markCurated(): Promise<never> {
    throw this.failure;
  }

  async exclusive<T>(fn: (store: ConstantStore) => Promise<T>): Promise<T> {
    return fn(this);
  }
}
