import { Language } from "@glossa/core";
import { describe, expect, it } from "vitest";
import { InvalidLanguageError } from "../errors";
import { loadLexicon, parseLanguage } from "../lexicon";
import { expandAbbreviations, GlossCache, normalizeGloss, tokenize } from "../stages/01_normalize";
import { EntityType } from "../types";
import { witness } from "./fixtures";

describe("expandAbbreviations", () => {
  const sanskrit = loadLexicon(Language.Sanskrit);

  it("prefers the longest key at a position", () => {
    expect(expandAbbreviations("n. of a sage", sanskrit)).toBe("name of a sage");
  });

  it("only matches between word boundaries", () => {
    expect(expandAbbreviations("ram.", sanskrit)).toBe("ram.");
    expect(expandAbbreviations("m. a deity", sanskrit)).toBe("masculine a deity");
  });

  it("never re-scans expanded text", () => {
    expect(expandAbbreviations("e.g. cf.", loadLexicon())).toBe("for example compare");
  });
});

describe("tokenize", () => {
  it("splits on anything that is not a letter, mark or digit", () => {
    expect(tokenize("auspicious; benign, 2-fold")).toEqual(["auspicious", "benign", "2", "fold"]);
  });
});

describe("normalizeGloss", () => {
  it("lowercases, drops stop-words and keeps first occurrences", () => {
    expect(normalizeGloss("The lucky, the  lucky one", Language.Latin)).toEqual({
      tokens: ["lucky"],
      negated: false,
      entityType: null,
    });
  });

  it("tags qualities through abstract suffixes", () => {
    expect(normalizeGloss("auspicious; benign; favorable", Language.Sanskrit)).toEqual({
      tokens: ["auspicious", "benign", "favorable"],
      negated: false,
      entityType: EntityType.Abstract,
    });
  });

  it("recognizes deities with or without diacritics", () => {
    expect(normalizeGloss("Śiva, the deity", Language.Sanskrit)).toEqual({
      tokens: ["śiva", "deity"],
      negated: false,
      entityType: EntityType.PersonOrDeity,
    });
    expect(normalizeGloss("Śiva", Language.Sanskrit).tokens).toEqual(["śiva"]);
  });

  it("expands abbreviations before tagging", () => {
    expect(normalizeGloss("n. of Indra", Language.Sanskrit)).toEqual({
      tokens: ["name", "indra"],
      negated: false,
      entityType: EntityType.PersonOrDeity,
    });
  });

  it("treats a capitalized word after the first as a proper name", () => {
    expect(normalizeGloss("belonging to Marcus", Language.Latin).entityType).toBe(EntityType.PersonOrDeity);
  });

  it("tags places and objects", () => {
    expect(normalizeGloss("the city of Rome", Language.Latin).entityType).toBe(EntityType.Place);
    expect(normalizeGloss("a kind of vessel", Language.Latin)).toEqual({
      tokens: ["kind", "vessel"],
      negated: false,
      entityType: EntityType.Object,
    });
  });

  it("keeps negation markers as tokens", () => {
    expect(normalizeGloss("not accompanied")).toEqual({
      tokens: ["not", "accompanied"],
      negated: true,
      entityType: null,
    });
    expect(normalizeGloss("without a name").tokens).toEqual(["without", "name"]);
  });

  it("detects language-specific negation phrases", () => {
    expect(normalizeGloss("free from care", Language.Latin)).toEqual({
      tokens: ["free", "care"],
      negated: true,
      entityType: null,
    });
    expect(normalizeGloss("free from care").negated).toBe(false);
  });

  it("returns the same result for the same input", () => {
    expect(normalizeGloss("auspicious; lucky", Language.Sanskrit))
      .toEqual(normalizeGloss("auspicious; lucky", Language.Sanskrit));
  });
});

describe("GlossCache", () => {
  it("normalizes each witness once", () => {
    const cache = new GlossCache(Language.Sanskrit);
    const wsu = witness("mw", "217497", "auspicious; benign; favorable");
    const first = cache.get(wsu);
    expect(cache.get(wsu)).toBe(first);
    expect(cache.size).toBe(1);
  });
});

describe("parseLanguage", () => {
  it("accepts language codes in any case", () => {
    expect(parseLanguage(" SAN ")).toBe(Language.Sanskrit);
    expect(parseLanguage("grc")).toBe(Language.Greek);
  });

  it("rejects anything else", () => {
    expect(() => parseLanguage("eng")).toThrow(InvalidLanguageError);
  });
});
