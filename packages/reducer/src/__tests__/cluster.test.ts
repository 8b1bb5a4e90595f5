import { Language } from "@glossa/core";
import { describe, expect, it, vi } from "vitest";
import { Mode } from "../mode";
import { GlossCache } from "../stages/01_normalize";
import { SimilarityScorer } from "../stages/02_score";
import { buildSimilarityGraph, SimilarityGraph } from "../stages/03_graph";
import { bucketCoherence, clusterWitnesses } from "../stages/04_cluster";
import { witnessKey, type WitnessSenseUnit } from "../types";
import { auspiciousInput, fixedResult, witness } from "./fixtures";

const sanskrit = auspiciousInput.map(input => witness(input.source, input.sense_ref, input.gloss_raw));

function cluster(wsus: WitnessSenseUnit[], language: Language, mode: Mode) {
  const graph = buildSimilarityGraph(wsus, new SimilarityScorer(new GlossCache(language)), mode);
  return clusterWitnesses(wsus, graph, mode, language);
}

const keys = (wsus: readonly WitnessSenseUnit[]) => wsus.map(witnessKey);

describe("clusterWitnesses", () => {
  it("groups shared qualities apart from the deity", () => {
    const buckets = cluster(sanskrit, Language.Sanskrit, Mode.Open);
    expect(buckets.map(b => [b.senseId, keys(b.witnesses), b.displayGloss, b.confidence])).toEqual([
      ["B1", ["mw:217497", "ap90:27998:1"], "auspicious; benign; favorable", 0.65],
      ["B2", ["mw:217501"], "Śiva, the deity", 1],
    ]);
    expect(buckets[0].centroid).toBe(buckets[0].witnesses[0]);
  });

  it("leaves every witness alone when skeptic", () => {
    const buckets = cluster(sanskrit, Language.Sanskrit, Mode.Skeptic);
    expect(buckets.map(b => keys(b.witnesses))).toEqual([
      ["mw:217497"],
      ["mw:217501"],
      ["ap90:27998:1"],
    ]);
  });

  it("ranks a bucket with a primary witness ahead of an equal-sized one", () => {
    const buckets = cluster([
      witness("mw", "1", "a table"),
      witness("lewis_short", "1", "a river"),
    ], Language.Latin, Mode.Open);
    expect(buckets.map(b => [b.senseId, keys(b.witnesses)])).toEqual([
      ["B1", ["lewis_short:1"]],
      ["B2", ["mw:1"]],
    ]);
  });

  it("merges the tags of its members", () => {
    const buckets = cluster([
      witness("lsj", "1", "a drinking cup", { metadata: { domains: ["feast"], register: ["epic"] } }),
      witness("cltk", "1", "a drinking cup", { metadata: { domains: ["ritual", "feast"] } }),
    ], Language.Greek, Mode.Open);
    expect(buckets).toHaveLength(1);
    expect(buckets[0].domains).toEqual(["feast", "ritual"]);
    expect(buckets[0].register).toEqual(["epic"]);
  });

  it("keeps growing a bucket until a pass adds nothing", () => {
    const [a, b, c] = ["1", "2", "3"].map(ref => witness("lsj", ref, `gloss ${ref}`));
    // b only reaches the bucket through c, which is scanned after it.
    const graph = new SimilarityGraph([a, b, c], [fixedResult(0.1), fixedResult(0.7), fixedResult(0.7)], Mode.Open);
    const buckets = clusterWitnesses([c, b, a], graph, Mode.Open, Language.Greek);
    expect(buckets.map(bucket => keys(bucket.witnesses))).toEqual([["lsj:1", "lsj:2", "lsj:3"]]);
    expect(buckets[0].confidence).toBe(0.5);
  });

  it("walks the graph through neighbours at the mode threshold", () => {
    const [a, b, c] = ["1", "2", "3"].map(ref => witness("lsj", ref, `gloss ${ref}`));
    const graph = new SimilarityGraph([a, b, c], [fixedResult(0.1), fixedResult(0.7), fixedResult(0.7)], Mode.Open);
    const neighbors = vi.spyOn(graph, "neighbors");
    clusterWitnesses([a, b, c], graph, Mode.Open, Language.Greek);
    expect(neighbors.mock.calls).toEqual([[0, 0.62], [2, 0.62], [1, 0.62]]);
  });

  it("puts every witness in exactly one bucket", () => {
    const wsus = [
      ...sanskrit,
      witness("heritage", "4", "auspicious; lucky"),
      witness("cdsl", "9", "name of a river"),
    ];
    for (const mode of [Mode.Open, Mode.Skeptic]) {
      const seen = cluster(wsus, Language.Sanskrit, mode).flatMap(bucket => keys(bucket.witnesses));
      expect([...seen].sort()).toEqual(keys(wsus).sort());
    }
  });
});

describe("bucketCoherence", () => {
  it("is 1 for a singleton", () => {
    const graph = new SimilarityGraph([sanskrit[0]], [], Mode.Open);
    expect(bucketCoherence([0], graph)).toBe(1);
  });
});
