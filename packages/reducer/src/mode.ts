import { InvalidModeError } from "./errors";

export enum Mode {
  Open = "open",
  Skeptic = "skeptic",
}

export interface SignalWeights {
  tokenOverlap: number;
  metadataOverlap: number;
  entityAgreement: number;
  primarySource: number;
}

export interface ModeProfile {
  /** Minimum similarity for a witness to join a bucket. */
  threshold: number;
  /** Shares of the blended score; each profile's weights sum to 1. */
  weights: SignalWeights;
  /** Subtracted after weighting when exactly one gloss is negated. */
  negationPenalty: number;
}

// Every skeptic profile may move a pair by at most 0.12 relative to open
// (token share -0.12, metadata +0.09, entity +0.02, primary +0.01), which is
// less than the 0.16 gap between the thresholds. A pair that clears 0.78 in
// skeptic therefore always clears 0.62 in open.
export const MODE_PROFILES: Readonly<Record<Mode, ModeProfile>> = {
  [Mode.Open]: {
    threshold: 0.62,
    weights: {
      tokenOverlap: 0.4,
      metadataOverlap: 0.05,
      entityAgreement: 0.3,
      primarySource: 0.25,
    },
    negationPenalty: 0.4,
  },
  [Mode.Skeptic]: {
    threshold: 0.78,
    weights: {
      tokenOverlap: 0.28,
      metadataOverlap: 0.14,
      entityAgreement: 0.32,
      primarySource: 0.26,
    },
    negationPenalty: 0.6,
  },
};

const MODES = new Set<string>(Object.values(Mode));

export function isMode(value: unknown): value is Mode {
  return typeof value === "string" && MODES.has(value);
}

export function parseMode(value: unknown): Mode {
  const candidate = typeof value === "string" ? value.trim().toLowerCase() : value;
  if (isMode(candidate)) return candidate;
  throw new InvalidModeError(value);
}
