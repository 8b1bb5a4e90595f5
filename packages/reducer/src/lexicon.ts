import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { foldDiacritics, Language } from "@glossa/core";
import { z } from "zod";
import { InvalidLanguageError } from "./errors";

const lexiconDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../data/lexicon");

const LexiconFileSchema = z.object({
  abbreviations: z.record(z.string()),
  stopwords: z.array(z.string()),
  negation: z.array(z.string()),
  deities: z.array(z.string()),
  places: z.array(z.string()),
  markers: z.object({
    person: z.array(z.string()),
    place: z.array(z.string()),
    object: z.array(z.string()),
    abstract: z.array(z.string()),
  }),
  abstractSuffixes: z.array(z.string()),
});

type LexiconFile = z.infer<typeof LexiconFileSchema>;

/**
 * Comparison data for one language, merged over the common English gloss
 * data. All entries are NFC-normalized and lowercased; name lists are also
 * diacritic-folded so `Siva` and `Śiva` resolve to the same deity.
 */
export interface Lexicon {
  /** Abbreviation keys ordered longest first, ties in file order. */
  abbreviations: ReadonlyArray<readonly [string, string]>;
  stopwords: ReadonlySet<string>;
  negationWords: ReadonlySet<string>;
  negationPhrases: readonly string[];
  deities: ReadonlySet<string>;
  places: ReadonlySet<string>;
  personMarkers: readonly string[];
  placeMarkers: readonly string[];
  objectMarkers: readonly string[];
  abstractMarkers: readonly string[];
  abstractSuffixes: readonly string[];
}

const cache = new Map<string, Lexicon>();

function readLexiconFile(name: string): LexiconFile {
  const content = fs.readFileSync(path.join(lexiconDir, `${name}.json`), "utf8");
  return LexiconFileSchema.parse(JSON.parse(content));
}

const canon = (s: string) => s.normalize("NFC").toLowerCase().replace(/\s+/g, " ").trim();

export function loadLexicon(language?: Language): Lexicon {
  const key = language ?? "common";
  const cached = cache.get(key);
  if (cached) return cached;

  const files = language ? [readLexiconFile("common"), readLexiconFile(language)] : [readLexiconFile("common")];

  // Later files override earlier ones on the same abbreviation key.
  const abbreviationMap = new Map<string, string>();
  for (const file of files) {
    for (const [abbr, expansion] of Object.entries(file.abbreviations)) {
      abbreviationMap.set(canon(abbr), canon(expansion));
    }
  }
  const abbreviations = [...abbreviationMap.entries()]
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => b.entry[0].length - a.entry[0].length || a.index - b.index)
    .map(({ entry }) => entry);

  const negation = files.flatMap(f => f.negation).map(canon);
  const negationWords = new Set(negation.filter(n => !n.includes(" ")));
  const stopwords = new Set(files.flatMap(f => f.stopwords).map(canon).filter(w => !negationWords.has(w)));

  const lexicon: Lexicon = {
    abbreviations,
    stopwords,
    negationWords,
    negationPhrases: negation.filter(n => n.includes(" ")),
    deities: new Set(files.flatMap(f => f.deities).map(name => foldDiacritics(canon(name)))),
    places: new Set(files.flatMap(f => f.places).map(name => foldDiacritics(canon(name)))),
    personMarkers: files.flatMap(f => f.markers.person).map(canon),
    placeMarkers: files.flatMap(f => f.markers.place).map(canon),
    objectMarkers: files.flatMap(f => f.markers.object).map(canon),
    abstractMarkers: files.flatMap(f => f.markers.abstract).map(canon),
    abstractSuffixes: files.flatMap(f => f.abstractSuffixes).map(canon),
  };

  cache.set(key, lexicon);
  return lexicon;
}

const LANGUAGES = new Set<string>(Object.values(Language));

function isLanguage(value: unknown): value is Language {
  return typeof value === "string" && LANGUAGES.has(value);
}

export function parseLanguage(value: unknown): Language {
  const candidate = typeof value === "string" ? value.trim().toLowerCase() : value;
  if (isLanguage(candidate)) return candidate;
  throw new InvalidLanguageError(value);
}
