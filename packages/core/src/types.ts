export enum Language {
  Latin = "lat",
  Greek = "grc",
  Sanskrit = "san",
}

/**
 * Lexicographic and morphological sources that produce witness sense units.
 * Adapters must map their backend onto one of these; free-form source names
 * are rejected at the input boundary.
 */
export enum Source {
  MonierWilliams = "mw",
  Apte = "ap90",
  Heritage = "heritage",
  LSJ = "lsj",
  LewisShort = "lewis_short",
  Whitakers = "whitakers",
  Diogenes = "diogenes",
  CLTK = "cltk",
  CDSL = "cdsl",
}

export const SOURCE_PRIORITY: Readonly<Record<Source, number>> = {
  [Source.MonierWilliams]: 1,
  [Source.Apte]: 2,
  [Source.Heritage]: 3,
  [Source.LSJ]: 4,
  [Source.LewisShort]: 5,
  [Source.Whitakers]: 6,
  [Source.Diogenes]: 7,
  [Source.CLTK]: 8,
  [Source.CDSL]: 9,
};

export const PRIMARY_SOURCES: Readonly<Record<Language, readonly Source[]>> = {
  [Language.Sanskrit]: [Source.MonierWilliams, Source.Apte],
  [Language.Latin]: [Source.LewisShort],
  [Language.Greek]: [Source.LSJ],
};

export function isPrimarySource(source: Source, language: Language): boolean {
  return PRIMARY_SOURCES[language].includes(source);
}

export enum ConstantStatus {
  Provisional = "provisional",
  Curated = "curated",
}

export interface WitnessRef {
  source: Source;
  senseRef: string;
}

export interface SemanticConstant {
  constantId: string;
  canonicalLabel: string;
  description: string;
  domains: string[];
  status: ConstantStatus;
  createdFrom: WitnessRef[];
  createdAt: Date;
  curatedAt: Date | null;
}
