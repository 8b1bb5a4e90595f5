import type { Source } from "@glossa/core";
import type { ReducedSenseSet, SenseBucket, WitnessSenseUnit } from "./types";
import { clipText } from "@glossa/core";

export const SUMMARY_GLOSS_CHARS = 60;

export interface WitnessOutput {
  source: Source;
  sense_ref: string;
  gloss_raw: string;
}

export interface SenseBucketOutput {
  sense_id: string;
  display_gloss: string;
  confidence: number;
  semantic_constant: string | null;
  witnesses?: WitnessOutput[];
}

export interface SenseSetOutput {
  lemma: string;
  language: string;
  mode: string;
  buckets: SenseBucketOutput[];
  warnings: string[];
}

export interface OutputOptions {
  /** Include the raw witnesses behind each bucket. */
  evidence?: boolean;
}

function toWitnessOutput(wsu: WitnessSenseUnit): WitnessOutput {
  return { source: wsu.source, sense_ref: wsu.senseRef, gloss_raw: wsu.glossRaw };
}

function toBucketOutput(bucket: SenseBucket, evidence: boolean): SenseBucketOutput {
  return {
    sense_id: bucket.senseId,
    display_gloss: bucket.displayGloss,
    confidence: bucket.confidence,
    semantic_constant: bucket.semanticConstant,
    ...(evidence ? { witnesses: bucket.witnesses.map(toWitnessOutput) } : {}),
  };
}

export function toSenseSetOutput(set: ReducedSenseSet, options: OutputOptions = {}): SenseSetOutput {
  return {
    lemma: set.lemma,
    language: set.language,
    mode: set.mode,
    buckets: set.buckets.map(bucket => toBucketOutput(bucket, options.evidence ?? false)),
    warnings: [...set.warnings],
  };
}

export interface WitnessSummary {
  count: number;
  sources: Source[];
  domains: string[];
}

/** Sources and domains in first-seen order. */
export function summarizeWitnesses(wsus: readonly WitnessSenseUnit[]): WitnessSummary {
  return {
    count: wsus.length,
    sources: [...new Set(wsus.map(wsu => wsu.source))],
    domains: [...new Set(wsus.flatMap(wsu => wsu.domains))],
  };
}

export interface BucketSummary {
  sense_id: string;
  display_gloss: string;
  witness_count: number;
  sources: Source[];
  confidence: number;
}

export function summarizeBuckets(buckets: readonly SenseBucket[]): BucketSummary[] {
  return buckets.map(bucket => ({
    sense_id: bucket.senseId,
    display_gloss: clipText(bucket.displayGloss, SUMMARY_GLOSS_CHARS),
    witness_count: bucket.witnesses.length,
    sources: [...new Set(bucket.witnesses.map(wsu => wsu.source))],
    confidence: bucket.confidence,
  }));
}
