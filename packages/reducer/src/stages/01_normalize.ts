import type { Language } from "@glossa/core";
import type { Lexicon } from "../lexicon";
import type { NormalizedGloss, WitnessKey, WitnessSenseUnit } from "../types";
import { foldDiacritics } from "@glossa/core";
import { loadLexicon } from "../lexicon";
import { EntityType, witnessKey } from "../types";

const TOKEN_SPLIT = /[^\p{L}\p{M}\p{N}]+/u;

const abbreviationPatterns = new WeakMap<Lexicon, { pattern: RegExp; expansions: Map<string, string> } | null>();

function escapeRegExp(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Single left-to-right pass: at each position the longest abbreviation wins,
 * and expanded text is never re-scanned. Keys only match between
 * non-alphanumeric boundaries, so `m.` never fires inside `ram.`.
 */
export function expandAbbreviations(text: string, lexicon: Lexicon): string {
  let compiled = abbreviationPatterns.get(lexicon);
  if (compiled === undefined) {
    compiled = lexicon.abbreviations.length === 0
      ? null
      : {
          pattern: new RegExp(
            `(?<![\\p{L}\\p{N}])(?:${lexicon.abbreviations.map(([abbr]) => escapeRegExp(abbr)).join("|")})(?![\\p{L}\\p{N}])`,
            "gu",
          ),
          expansions: new Map(lexicon.abbreviations),
        };
    abbreviationPatterns.set(lexicon, compiled);
  }
  if (!compiled) return text;

  const { pattern, expansions } = compiled;
  return text.replace(pattern, match => expansions.get(match) ?? match);
}

export function tokenize(text: string): string[] {
  return text.split(TOKEN_SPLIT).filter(token => token.length > 0);
}

function containsPhrase(paddedText: string, phrases: readonly string[]) {
  return phrases.some(phrase => paddedText.includes(` ${phrase} `));
}

function hasProperName(nfc: string, lexicon: Lexicon) {
  const rawTokens = tokenize(nfc);
  for (let i = 1; i < rawTokens.length; i++) {
    const token = rawTokens[i];
    if (!/^\p{Lu}\p{Ll}/u.test(token)) continue;
    const abbreviation = `${token.toLowerCase()}.`;
    if (lexicon.abbreviations.some(([abbr]) => abbr === abbreviation)) continue;
    return true;
  }
  return false;
}

function detectEntityType(nfc: string, tokens: readonly string[], lexicon: Lexicon): EntityType | null {
  const padded = ` ${tokens.join(" ")} `;
  const folded = tokens.map(foldDiacritics);

  if (folded.some(t => lexicon.deities.has(t)) || containsPhrase(padded, lexicon.personMarkers)) {
    return EntityType.PersonOrDeity;
  }
  if (folded.some(t => lexicon.places.has(t)) || containsPhrase(padded, lexicon.placeMarkers)) {
    return EntityType.Place;
  }
  if (hasProperName(nfc, lexicon)) {
    return EntityType.PersonOrDeity;
  }
  if (containsPhrase(padded, lexicon.objectMarkers)) {
    return EntityType.Object;
  }
  if (
    containsPhrase(padded, lexicon.abstractMarkers)
    || tokens.some(t => lexicon.abstractSuffixes.some(suffix => t.length > suffix.length + 2 && t.endsWith(suffix)))
  ) {
    return EntityType.Abstract;
  }
  return null;
}

/**
 * Every token of the gloss after abbreviation expansion, stop-words included.
 * Compared in place of `tokens` when a gloss consists of stop-words only.
 */
export function surfaceTokens(glossRaw: string, language?: Language): string[] {
  const collapsed = glossRaw.normalize("NFC").toLowerCase().replace(/\s+/g, " ").trim();
  return tokenize(expandAbbreviations(collapsed, loadLexicon(language)));
}

/**
 * Canonical comparison view of a gloss. Never used for display.
 *
 * Steps run in a fixed order: NFC, lowercase, whitespace collapse,
 * abbreviation expansion, tokenization, negation and entity detection on the
 * full token list, then stop-word removal and de-duplication. There is no
 * stemming. Lowercasing uses `toLowerCase`, which ignores the host locale.
 */
export function normalizeGloss(glossRaw: string, language?: Language): NormalizedGloss {
  const lexicon = loadLexicon(language);

  const nfc = glossRaw.normalize("NFC");
  const allTokens = surfaceTokens(glossRaw, language);

  const padded = ` ${allTokens.join(" ")} `;
  const negated = allTokens.some(t => lexicon.negationWords.has(t))
    || containsPhrase(padded, lexicon.negationPhrases);
  const entityType = detectEntityType(nfc, allTokens, lexicon);

  const seen = new Set<string>();
  const tokens: string[] = [];
  for (const token of allTokens) {
    if (lexicon.stopwords.has(token) || seen.has(token)) continue;
    seen.add(token);
    tokens.push(token);
  }

  return Object.freeze({
    tokens: Object.freeze(tokens),
    negated,
    entityType,
  });
}

/** Per-run cache so each witness is normalized exactly once. */
export class GlossCache {
  private readonly entries = new Map<WitnessKey, NormalizedGloss>();

  constructor(public readonly language: Language) {}

  get(wsu: WitnessSenseUnit): NormalizedGloss {
    const key = witnessKey(wsu);
    let gloss = this.entries.get(key);
    if (!gloss) {
      gloss = normalizeGloss(wsu.glossRaw, this.language);
      this.entries.set(key, gloss);
    }
    return gloss;
  }

  get size() {
    return this.entries.size;
  }
}
