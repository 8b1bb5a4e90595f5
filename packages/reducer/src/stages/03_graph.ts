import type { SimilarityScorer } from "./02_score";
import type { Mode } from "../mode";
import type { SimilarityEdge, SimilarityResult, WitnessKey, WitnessSenseUnit } from "../types";
import { logger } from "@glossa/core";
import { witnessKey } from "../types";

export const DEFAULT_GRAPH_CUTOFF = 100;

export interface GraphOptions {
  /**
   * Largest witness count for which every pair is scored. Above it, pairs
   * whose token sets are disjoint and whose domains and registers share
   * nothing are skipped and read as 0.
   *
   * Such a pair can still collect entity and primary-source agreement, at
   * most 0.55 under open and 0.58 under skeptic, so neither current
   * threshold is reachable. A profile whose entity and primary weights
   * together exceed its threshold would lose real edges here.
   */
  cutoff?: number;
}

export interface Neighbor {
  index: number;
  value: number;
}

/**
 * Symmetric score lookup over all unordered witness pairs. Only the upper
 * triangle is stored, packed row by row.
 */
export class SimilarityGraph {
  private readonly index = new Map<WitnessKey, number>();

  constructor(
    public readonly witnesses: readonly WitnessSenseUnit[],
    private readonly results: readonly (SimilarityResult | null)[],
    public readonly mode: Mode,
    public readonly prunedPairs = 0,
  ) {
    witnesses.forEach((wsu, i) => this.index.set(witnessKey(wsu), i));
  }

  get size() {
    return this.witnesses.length;
  }

  indexOf(wsu: WitnessSenseUnit): number {
    const i = this.index.get(witnessKey(wsu));
    if (i === undefined) {
      throw new Error(`Witness ${witnessKey(wsu)} is not part of this similarity graph`);
    }
    return i;
  }

  private offset(i: number, j: number) {
    const [lo, hi] = i < j ? [i, j] : [j, i];
    return (lo * (2 * this.size - lo - 1)) / 2 + (hi - lo - 1);
  }

  /** `null` on the diagonal and for pruned pairs. */
  resultAt(i: number, j: number): SimilarityResult | null {
    if (i === j) return null;
    return this.results[this.offset(i, j)] ?? null;
  }

  scoreAt(i: number, j: number): number {
    if (i === j) return 1;
    return this.resultAt(i, j)?.value ?? 0;
  }

  score(a: WitnessSenseUnit, b: WitnessSenseUnit): number {
    return this.scoreAt(this.indexOf(a), this.indexOf(b));
  }

  result(a: WitnessSenseUnit, b: WitnessSenseUnit): SimilarityResult | null {
    return this.resultAt(this.indexOf(a), this.indexOf(b));
  }

  /** Scored pairs in row-major upper-triangle order. */
  edges(): SimilarityEdge[] {
    const edges: SimilarityEdge[] = [];
    for (let i = 0; i < this.size; i++) {
      for (let j = i + 1; j < this.size; j++) {
        const result = this.resultAt(i, j);
        if (result) edges.push({ i, j, result });
      }
    }
    return edges;
  }

  neighbors(i: number, threshold: number): Neighbor[] {
    const neighbors: Neighbor[] = [];
    for (let j = 0; j < this.size; j++) {
      if (j === i) continue;
      const value = this.scoreAt(i, j);
      if (value >= threshold) neighbors.push({ index: j, value });
    }
    return neighbors.sort((a, b) => b.value - a.value || a.index - b.index);
  }

  similarPairs(threshold: number): SimilarityEdge[] {
    return this.edges()
      .filter(edge => edge.result.value >= threshold)
      .sort((a, b) => b.result.value - a.result.value || a.i - b.i || a.j - b.j);
  }
}

export function buildSimilarityGraph(
  witnesses: readonly WitnessSenseUnit[],
  scorer: SimilarityScorer,
  mode: Mode,
  options: GraphOptions = {},
): SimilarityGraph {
  const cutoff = options.cutoff ?? DEFAULT_GRAPH_CUTOFF;
  const prune = witnesses.length > cutoff;
  const results: (SimilarityResult | null)[] = [];
  let prunedPairs = 0;

  for (let i = 0; i < witnesses.length; i++) {
    for (let j = i + 1; j < witnesses.length; j++) {
      if (prune && scorer.isDisjoint(witnesses[i], witnesses[j])) {
        results.push(null);
        prunedPairs++;
        continue;
      }
      results.push(scorer.score(witnesses[i], witnesses[j], mode));
    }
  }

  if (prune) {
    logger.debug(`Similarity graph: ${witnesses.length} witnesses over cutoff ${cutoff}, pruned ${prunedPairs} pairs`);
  }

  return new SimilarityGraph(witnesses, results, mode, prunedPairs);
}
