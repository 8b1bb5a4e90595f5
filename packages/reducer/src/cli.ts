import fs from "node:fs/promises";
import process from "node:process";
import { assertEnv, ConstantStatus, dedent, logger } from "@glossa/core";
import { db, POSTGRES_ENV_VARS } from "@glossa/db";
import { z } from "zod";
import { loadReducerConfig, parseStoreKind } from "./config";
import { ReductionError } from "./errors";
import { parseLanguage } from "./lexicon";
import { parseMode } from "./mode";
import { summarizeBuckets, summarizeWitnesses, toSenseSetOutput } from "./output";
import { reduce } from "./reduce";
import { MemoryConstantStore } from "./registry/memory";
import { KyselyConstantStore } from "./registry/postgres";
import { SemanticConstantRegistry } from "./registry/registry";
import type { ConstantStore } from "./registry/store";
import "colors";

type Cmd = "reduce" | "constants" | "promote";

const usage = dedent`
  Usage:
    tsx src/cli.ts reduce <input.json> [--mode open|skeptic] [--evidence] [--summary] [--store postgres|memory]
    tsx src/cli.ts constants
    tsx src/cli.ts promote <CONSTANT_ID>
`;

const InputFileSchema = z.object({
  lemma: z.string().min(1),
  language: z.string(),
  witnesses: z.array(z.unknown()),
  expect_results: z.boolean().optional(),
});

const argv = process.argv.slice(2);
const cmd = argv[0] ?? "";
const positional = argv.slice(1).filter((arg, i, args) => !arg.startsWith("--") && !args[i - 1]?.match(/^--(mode|store)$/));
const flags = new Set(argv.slice(1).filter(arg => arg.startsWith("--")));

function flagValue(name: string) {
  const i = argv.indexOf(name);
  return i === -1 ? undefined : argv[i + 1];
}

function isCmd(value: string): value is Cmd {
  return value === "reduce" || value === "constants" || value === "promote";
}

function postgresStore(): ConstantStore {
  assertEnv(POSTGRES_ENV_VARS);
  return KyselyConstantStore.fromClient(db);
}

async function runReduce(config: ReturnType<typeof loadReducerConfig>) {
  const inputPath = positional[0];
  if (!inputPath) throw new Error(`Missing input file.\n${usage}`);

  const input = InputFileSchema.parse(JSON.parse(await fs.readFile(inputPath, "utf8")));
  const mode = parseMode(flagValue("--mode") ?? config.defaultMode);
  const storeKind = parseStoreKind(flagValue("--store"));
  const store = storeKind === "postgres" ? postgresStore() : new MemoryConstantStore();
  const registry = new SemanticConstantRegistry(store, { matchThreshold: config.matchThreshold });

  const set = await reduce(
    input.lemma,
    parseLanguage(input.language),
    input.witnesses,
    mode,
    { registry, expectResults: input.expect_results, graph: { cutoff: config.graphCutoff } },
  );

  if (flags.has("--summary")) {
    const witnesses = summarizeWitnesses(set.buckets.flatMap(bucket => bucket.witnesses));
    process.stderr.write(`${set.lemma.bold} (${set.language}, ${set.mode}): ${witnesses.count} witnesses from ${witnesses.sources.join(", ")}\n`);
    for (const bucket of summarizeBuckets(set.buckets)) {
      process.stderr.write(
        `  ${bucket.sense_id.cyan} ${bucket.display_gloss} `
        + `${`[${bucket.witness_count} · ${bucket.sources.join(", ")} · ${bucket.confidence}]`.gray}\n`,
      );
    }
    for (const warning of set.warnings) {
      process.stderr.write(`  ${warning.yellow}\n`);
    }
  }

  process.stdout.write(`${JSON.stringify(toSenseSetOutput(set, { evidence: flags.has("--evidence") }), null, 2)}\n`);
}

async function runConstants() {
  const registry = new SemanticConstantRegistry(postgresStore());
  for (const constant of await registry.list()) {
    const status = constant.status === ConstantStatus.Curated ? constant.status.green : constant.status.yellow;
    process.stdout.write(`${constant.constantId.bold} ${status} ${constant.description}\n`);
  }
}

async function runPromote() {
  const constantId = positional[0];
  if (!constantId) throw new Error(`Missing constant id.\n${usage}`);
  const registry = new SemanticConstantRegistry(postgresStore());
  const constant = await registry.promote(constantId);
  process.stdout.write(`${constant.constantId.bold} ${constant.status.green} ${constant.curatedAt?.toISOString() ?? ""}\n`);
}

if (!isCmd(cmd)) {
  process.stderr.write(`${usage}\n`);
  process.exit(1);
}

try {
  const config = loadReducerConfig();
  if (cmd === "reduce") {
    await runReduce(config);
  }
  else if (cmd === "constants") {
    await runConstants();
  }
  else {
    await runPromote();
  }
}
catch (error) {
  if (error instanceof ReductionError) {
    logger.error(error.toWarning());
  }
  else {
    logger.error(error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
}
finally {
  await db.close();
}
