import { ConstantStatus } from "@glossa/core";
import { type Kysely, sql } from "kysely";
import { REGISTRY_LOCK_KEY } from "../constants";
import type { DB, NewSemanticConstantRow, SemanticConstantRow } from "../tables";

type Executor = Kysely<DB>;

export async function listSemanticConstants(executor: Executor): Promise<SemanticConstantRow[]> {
  return executor
    .selectFrom("semantic_constant")
    .selectAll()
    .orderBy("created_at", "asc")
    .orderBy("constant_id", "asc")
    .execute();
}

export async function getSemanticConstant(executor: Executor, constantId: string) {
  return executor
    .selectFrom("semantic_constant")
    .selectAll()
    .where("constant_id", "=", constantId)
    .executeTakeFirst();
}

export async function insertSemanticConstant(executor: Executor, row: NewSemanticConstantRow) {
  await executor
    .insertInto("semantic_constant")
    .values(row)
    .execute();
}

/**
 * Flips a provisional constant to curated. Rows that are already curated are
 * left untouched, so `curated_at` keeps its first value.
 */
export async function markSemanticConstantCurated(executor: Executor, constantId: string, curatedAt: Date) {
  const result = await executor
    .updateTable("semantic_constant")
    .set({ status: ConstantStatus.Curated, curated_at: curatedAt })
    .where("constant_id", "=", constantId)
    .where("status", "=", ConstantStatus.Provisional)
    .executeTakeFirst();

  return Number(result.numUpdatedRows) > 0;
}

/**
 * Takes the registry's advisory lock for the rest of the surrounding
 * transaction. Must be called on a transaction, never on the pool.
 */
export async function lockSemanticConstants(executor: Executor) {
  await sql`SELECT pg_advisory_xact_lock(${REGISTRY_LOCK_KEY})`.execute(executor);
}
