import process from "node:process";
import { z } from "zod";
import { parseMode } from "./mode";
import { DEFAULT_MATCH_THRESHOLD } from "./registry/registry";
import { DEFAULT_GRAPH_CUTOFF } from "./stages/03_graph";

// A variable that is set but blank counts as unset.
const unsetIfBlank = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const ReducerEnvSchema = z.object({
  GLOSSA_MODE: z.preprocess(unsetIfBlank, z.string().optional().transform(value => parseMode(value ?? "open"))),
  GLOSSA_MATCH_THRESHOLD: z.preprocess(unsetIfBlank, z.coerce.number().min(0).max(1).default(DEFAULT_MATCH_THRESHOLD)),
  GLOSSA_GRAPH_CUTOFF: z.preprocess(unsetIfBlank, z.coerce.number().int().positive().default(DEFAULT_GRAPH_CUTOFF)),
});

export function loadReducerConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = ReducerEnvSchema.parse(env);
  return {
    defaultMode: parsed.GLOSSA_MODE,
    matchThreshold: parsed.GLOSSA_MATCH_THRESHOLD,
    graphCutoff: parsed.GLOSSA_GRAPH_CUTOFF,
  };
}

export type ReducerConfig = ReturnType<typeof loadReducerConfig>;

export type StoreKind = "postgres" | "memory";

/**
 * Registry backend for a CLI run. Postgres unless `memory` is asked for,
 * which is a dry run whose constants are gone when the process exits.
 */
export function parseStoreKind(value: string | undefined): StoreKind {
  const kind = value?.trim().toLowerCase() || "postgres";
  if (kind === "postgres" || kind === "memory") return kind;
  throw new Error(`Unknown store "${value}"; expected postgres or memory`);
}
