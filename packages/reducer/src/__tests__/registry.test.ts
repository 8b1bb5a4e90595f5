import { ConstantStatus, type SemanticConstant, Source } from "@glossa/core";
import { describe, expect, it } from "vitest";
import { ConstantNotFoundError, RegistryUnavailableError } from "../errors";
import { MemoryConstantStore } from "../registry/memory";
import { deriveConstantId, disambiguateId, SemanticConstantRegistry } from "../registry/registry";
import { bucketOf, fixedClock, UnreachableStore, witness } from "./fixtures";

const benign = bucketOf([
  witness("mw", "217497", "auspicious; benign; favorable"),
  witness("ap90", "27998:1", "auspicious; lucky"),
]);
const siva = bucketOf([witness("mw", "217501", "Śiva, the deity")], "B2");

function constant(constantId: string, description: string, createdAt: string): SemanticConstant {
  return {
    constantId,
    canonicalLabel: description,
    description,
    domains: [],
    status: ConstantStatus.Provisional,
    createdFrom: [],
    createdAt: new Date(createdAt),
    curatedAt: null,
  };
}

describe("deriveConstantId", () => {
  it("joins the first two content words", () => {
    expect(deriveConstantId("auspicious; benign; favorable")).toBe("AUSPICIOUS_BENIGN");
    expect(deriveConstantId("x, y: lucky star")).toBe("LUCKY_STAR");
  });

  it("folds diacritics", () => {
    expect(deriveConstantId("Śiva, the deity")).toBe("SIVA_DEITY");
  });

  it("falls back when no content word is left", () => {
    expect(deriveConstantId("of the; a")).toBe("CONCEPT");
  });
});

describe("disambiguateId", () => {
  it("numbers collisions from 2", () => {
    expect(disambiguateId("LUCKY", new Set())).toBe("LUCKY");
    expect(disambiguateId("LUCKY", new Set(["LUCKY", "LUCKY_2"]))).toBe("LUCKY_3");
  });
});

describe("SemanticConstantRegistry", () => {
  it("creates a provisional constant from a bucket", async () => {
    const store = new MemoryConstantStore();
    const registry = new SemanticConstantRegistry(store, { clock: fixedClock("2024-05-01T00:00:00Z") });

    expect(await registry.assign(benign)).toBe("AUSPICIOUS_BENIGN");
    expect(await store.list()).toEqual([{
      constantId: "AUSPICIOUS_BENIGN",
      canonicalLabel: "auspicious benign",
      description: "auspicious; benign; favorable",
      domains: [],
      status: ConstantStatus.Provisional,
      createdFrom: [
        { source: Source.MonierWilliams, senseRef: "217497" },
        { source: Source.Apte, senseRef: "27998:1" },
      ],
      createdAt: new Date("2024-05-01T00:00:00Z"),
      curatedAt: null,
    }]);
  });

  it("returns the same id for the same bucket on later runs", async () => {
    const registry = new SemanticConstantRegistry(new MemoryConstantStore());
    const first = await registry.assign(benign);
    expect(await registry.assign(benign)).toBe(first);
    expect(await registry.findMatch(benign)).toBe(first);
    expect(await registry.assign(siva)).toBe("SIVA_DEITY");
    expect((await registry.list()).map(c => c.constantId)).toEqual(["AUSPICIOUS_BENIGN", "SIVA_DEITY"].sort());
  });

  it("gives an unrelated bucket with the same leading words a new id", async () => {
    const registry = new SemanticConstantRegistry(new MemoryConstantStore());
    await registry.assign(benign);
    const omen = bucketOf([witness("mw", "1", "auspicious benign omen rites")]);
    expect(await registry.findMatch(omen)).toBeNull();
    expect(await registry.createProvisional(omen)).toBe("AUSPICIOUS_BENIGN_2");
  });

  it("converges on one constant for glosses without content words", async () => {
    const store = new MemoryConstantStore();
    const registry = new SemanticConstantRegistry(store);
    const toBe = bucketOf([witness("lewis_short", "sum-1", "to be")]);
    expect(await registry.assign(toBe)).toBe("CONCEPT");
    expect(await registry.assign(toBe)).toBe("CONCEPT");
    expect(await registry.findMatch(bucketOf([witness("whitakers", "1", "To  be")]))).toBe("CONCEPT");

    const dash = bucketOf([witness("cltk", "1", "—")]);
    expect(await registry.assign(dash)).toBe("CONCEPT_2");
    expect(await registry.assign(dash)).toBe("CONCEPT_2");
    expect(await store.list()).toHaveLength(2);
  });

  it("creates one constant for concurrent identical buckets", async () => {
    const store = new MemoryConstantStore();
    const registry = new SemanticConstantRegistry(store);
    const ids = await Promise.all(Array.from({ length: 5 }, () => registry.assign(benign)));
    expect(new Set(ids)).toEqual(new Set(["AUSPICIOUS_BENIGN"]));
    expect(await store.list()).toHaveLength(1);
  });

  it("prefers the oldest constant among equal matches", async () => {
    const store = new MemoryConstantStore([
      constant("LATER", "auspicious; benign; favorable", "2024-02-01T00:00:00Z"),
      constant("EARLIER", "auspicious; benign; favorable", "2024-01-01T00:00:00Z"),
    ]);
    const registry = new SemanticConstantRegistry(store);
    expect(await registry.findMatch(benign)).toBe("EARLIER");
  });

  it("honors a custom match threshold", async () => {
    const store = new MemoryConstantStore([constant("LUCKY", "auspicious; lucky", "2024-01-01T00:00:00Z")]);
    const lucky = bucketOf([witness("ap90", "1", "auspicious; lucky; fortunate")]);
    expect(await new SemanticConstantRegistry(store).findMatch(lucky)).toBeNull();
    expect(await new SemanticConstantRegistry(store, { matchThreshold: 0.6 }).findMatch(lucky)).toBe("LUCKY");
  });

  it("promotes once and keeps the first curation time", async () => {
    const store = new MemoryConstantStore();
    const registry = new SemanticConstantRegistry(store, {
      clock: fixedClock("2024-05-01T00:00:00Z", "2024-05-02T00:00:00Z", "2024-05-03T00:00:00Z"),
    });
    const id = await registry.assign(benign);

    const promoted = await registry.promote(id);
    expect(promoted.status).toBe(ConstantStatus.Curated);
    expect(promoted.curatedAt).toEqual(new Date("2024-05-02T00:00:00Z"));

    const again = await registry.promote(id);
    expect(again.curatedAt).toEqual(new Date("2024-05-02T00:00:00Z"));
  });

  it("refuses to promote an unknown id", async () => {
    const registry = new SemanticConstantRegistry(new MemoryConstantStore());
    await expect(registry.promote("NOPE")).rejects.toThrow(ConstantNotFoundError);
  });

  it("reports an unreachable store", async () => {
    const store = new UnreachableStore();
    const registry = new SemanticConstantRegistry(store);
    const failure = registry.assign(benign);
    await expect(failure).rejects.toThrow(RegistryUnavailableError);
    await expect(failure).rejects.toThrow("semantic constant registry unavailable during assign: connection refused");
    await expect(failure).rejects.toHaveProperty("cause", store.failure);
  });
});
