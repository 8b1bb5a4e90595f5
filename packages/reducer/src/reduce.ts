import type { Language } from "@glossa/core";
import type { SemanticConstantRegistry } from "./registry/registry";
import type { ReducedSenseSet } from "./types";
import { logger } from "@glossa/core";
import { EmptyEvidenceError, MissingWitnessListError } from "./errors";
import { parseLanguage } from "./lexicon";
import { type Mode, MODE_PROFILES, parseMode } from "./mode";
import { GlossCache } from "./stages/01_normalize";
import { SimilarityScorer } from "./stages/02_score";
import { buildSimilarityGraph, type GraphOptions } from "./stages/03_graph";
import { clusterWitnesses } from "./stages/04_cluster";
import { assignConstants } from "./stages/05_assign";
import { admitWitnesses, sortWitnesses } from "./witness";

export interface ReduceOptions {
  /** Without a registry every bucket keeps `semanticConstant: null`. */
  registry?: SemanticConstantRegistry;
  /**
   * Set when the adapters reported hits for the lemma. An empty witness list,
   * or one in which no witness survives validation, then means evidence was
   * lost on the way and the run fails instead of returning no buckets.
   */
  expectResults?: boolean;
  graph?: GraphOptions;
}

/**
 * Reduces the witnesses for one lemma to ranked sense buckets.
 *
 * Hard failures: an unknown mode or language, a missing witness list, and
 * no admissible witness under `expectResults`. Malformed and duplicate
 * witnesses are dropped, invalid optional fields are ignored, and an
 * unreachable registry leaves every constant null; each of those is
 * reported in `warnings`.
 */
export async function reduce(
  lemma: string,
  language: Language,
  wsus: readonly unknown[] | null | undefined,
  mode: Mode,
  options: ReduceOptions = {},
): Promise<ReducedSenseSet> {
  const runMode = parseMode(mode);
  const runLanguage = parseLanguage(language);
  if (!wsus || !Array.isArray(wsus)) {
    throw new MissingWitnessListError(lemma);
  }
  if (wsus.length === 0) {
    if (options.expectResults) throw new EmptyEvidenceError(lemma);
    return { lemma, language: runLanguage, mode: runMode, buckets: [], warnings: [] };
  }

  const started = performance.now();
  const warnings: string[] = [];

  const { witnesses, rejected } = admitWitnesses(wsus);
  for (const error of rejected) {
    logger.warn(`${lemma}: ${error.message}`);
    warnings.push(error.toWarning());
  }
  if (witnesses.length === 0 && options.expectResults) {
    throw new EmptyEvidenceError(lemma);
  }

  const sorted = sortWitnesses(witnesses);
  const glosses = new GlossCache(runLanguage);
  for (const wsu of sorted) glosses.get(wsu);

  const graph = buildSimilarityGraph(sorted, new SimilarityScorer(glosses), runMode, options.graph);
  const clustered = clusterWitnesses(sorted, graph, runMode, runLanguage);
  const assigned = await assignConstants(clustered, options.registry);
  warnings.push(...assigned.warnings);

  if (logger.isDebugEnabled()) {
    logger.debug(
      `Reduced ${lemma} (${runLanguage}, ${runMode}): ${sorted.length} witnesses, `
      + `${graph.similarPairs(MODE_PROFILES[runMode].threshold).length} pairs at threshold -> ${assigned.buckets.length} buckets `
      + `in ${(performance.now() - started).toFixed(1)}ms`,
    );
  }

  return {
    lemma,
    language: runLanguage,
    mode: runMode,
    buckets: assigned.buckets,
    warnings,
  };
}
