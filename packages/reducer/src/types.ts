import type { Language, Source } from "@glossa/core";
import type { Mode } from "./mode";

/**
 * One atomic sense statement from one source. Frozen once admitted;
 * `(source, senseRef)` identifies it within a reduction run.
 */
export interface WitnessSenseUnit {
  readonly source: Source;
  readonly senseRef: string;
  /** Untouched source text, the only thing ever shown to a reader. */
  readonly glossRaw: string;
  readonly domains: readonly string[];
  readonly register: readonly string[];
  /** Original rank within its source. Only ever used as a tie-break. */
  readonly ordering?: number;
}

export type WitnessKey = `${Source}:${string}`;

export function witnessKey(wsu: Pick<WitnessSenseUnit, "source" | "senseRef">): WitnessKey {
  return `${wsu.source}:${wsu.senseRef}`;
}

export enum EntityType {
  PersonOrDeity = "PERSON_OR_DEITY",
  Place = "PLACE",
  Abstract = "ABSTRACT",
  Object = "OBJECT",
}

export interface NormalizedGloss {
  /** Comparison tokens in first-occurrence order, without duplicates or stop-words. */
  readonly tokens: readonly string[];
  readonly negated: boolean;
  readonly entityType: EntityType | null;
}

export type SignalName
  = | "tokenOverlap"
    | "metadataOverlap"
    | "entityAgreement"
    | "primarySource"
    | "negationPenalty";

export interface SimilarityResult {
  value: number;
  components: Record<SignalName, number>;
}

export interface SimilarityEdge {
  i: number;
  j: number;
  result: SimilarityResult;
}

export interface SenseBucket {
  senseId: string;
  witnesses: WitnessSenseUnit[];
  centroid: WitnessSenseUnit;
  displayGloss: string;
  confidence: number;
  semanticConstant: string | null;
  domains: string[];
  register: string[];
}

export interface ReducedSenseSet {
  lemma: string;
  language: Language;
  mode: Mode;
  buckets: SenseBucket[];
  warnings: string[];
}
