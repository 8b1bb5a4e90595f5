import type { Language } from "@glossa/core";
import type { SimilarityGraph } from "./03_graph";
import type { SenseBucket, WitnessSenseUnit } from "../types";
import { type Mode, MODE_PROFILES } from "../mode";
import { hasPrimaryWitness, sortWitnesses } from "../witness";
import { quantize } from "./02_score";

interface Group {
  /** Positions in the sorted witness list, ascending. */
  members: number[];
  hasPrimary: boolean;
}

function unionTags(witnesses: readonly WitnessSenseUnit[], pick: (wsu: WitnessSenseUnit) => readonly string[]) {
  return [...new Set(witnesses.flatMap(pick))];
}

/**
 * Mean similarity over every member pair; 1.0 for a singleton. Pruned
 * pairs count as 0.
 */
export function bucketCoherence(graphIndices: readonly number[], graph: SimilarityGraph): number {
  if (graphIndices.length < 2) return 1;
  let sum = 0;
  let pairs = 0;
  for (let a = 0; a < graphIndices.length; a++) {
    for (let b = a + 1; b < graphIndices.length; b++) {
      sum += graph.scoreAt(graphIndices[a], graphIndices[b]);
      pairs++;
    }
  }
  return quantize(sum / pairs);
}

/**
 * Deterministic greedy agglomeration.
 *
 * Witnesses are taken in `compareWitnesses` order. Each unassigned witness
 * seeds a bucket, and any unassigned witness reaching the mode threshold
 * against a current member joins it, until no member has such a neighbour.
 * Nothing is ever moved between buckets afterwards; this is not an optimal
 * clustering, and a witness with no neighbour simply stays a singleton.
 *
 * Because every bucket is closed under threshold edges, the result is the
 * set of connected components of the threshold graph, independent of which
 * member happened to seed it.
 */
export function clusterWitnesses(
  wsus: readonly WitnessSenseUnit[],
  graph: SimilarityGraph,
  mode: Mode,
  language: Language,
): SenseBucket[] {
  const { threshold } = MODE_PROFILES[mode];
  const sorted = sortWitnesses(wsus);
  const graphIndices = sorted.map(wsu => graph.indexOf(wsu));
  const positions = new Map(graphIndices.map((graphIndex, position) => [graphIndex, position]));
  const assigned = sorted.map(() => false);
  const groups: Group[] = [];

  for (let seed = 0; seed < sorted.length; seed++) {
    if (assigned[seed]) continue;
    assigned[seed] = true;
    const members = [seed];

    // Every member's neighbours at the threshold join; the bucket is closed
    // once no member has an unassigned neighbour left.
    for (let next = 0; next < members.length; next++) {
      for (const neighbor of graph.neighbors(graphIndices[members[next]], threshold)) {
        const k = positions.get(neighbor.index);
        if (k === undefined || assigned[k]) continue;
        assigned[k] = true;
        members.push(k);
      }
    }

    members.sort((a, b) => a - b);
    groups.push({
      members,
      hasPrimary: hasPrimaryWitness(members.map(m => sorted[m]), language),
    });
  }

  groups.sort((a, b) =>
    b.members.length - a.members.length
    || Number(b.hasPrimary) - Number(a.hasPrimary)
    || a.members[0] - b.members[0],
  );

  return groups.map((group, rank) => {
    const witnesses = group.members.map(m => sorted[m]);
    const centroid = witnesses[0];
    return {
      senseId: `B${rank + 1}`,
      witnesses,
      centroid,
      displayGloss: centroid.glossRaw,
      confidence: bucketCoherence(group.members.map(m => graphIndices[m]), graph),
      semanticConstant: null,
      domains: unionTags(witnesses, wsu => wsu.domains),
      register: unionTags(witnesses, wsu => wsu.register),
    };
  });
}
