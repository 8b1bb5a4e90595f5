import type { SemanticConstant } from "@glossa/core";
import type { DatabaseClient, DB, NewSemanticConstantRow, SemanticConstantRow } from "@glossa/db";
import type { Kysely } from "kysely";
import type { ConstantStore } from "./store";
import {
  getSemanticConstant,
  insertSemanticConstant,
  listSemanticConstants,
  lockSemanticConstants,
  markSemanticConstantCurated,
} from "@glossa/db";

export function fromRow(row: SemanticConstantRow): SemanticConstant {
  return {
    constantId: row.constant_id,
    canonicalLabel: row.canonical_label,
    description: row.description,
    domains: row.domains,
    status: row.status,
    createdFrom: row.created_from.map(ref => ({ source: ref.source, senseRef: ref.sense_ref })),
    createdAt: row.created_at,
    curatedAt: row.curated_at,
  };
}

export function toRow(constant: SemanticConstant): NewSemanticConstantRow {
  return {
    constant_id: constant.constantId,
    canonical_label: constant.canonicalLabel,
    description: constant.description,
    domains: constant.domains,
    status: constant.status,
    created_from: JSON.stringify(constant.createdFrom.map(ref => ({ source: ref.source, sense_ref: ref.senseRef }))),
    created_at: constant.createdAt,
    curated_at: constant.curatedAt,
  };
}

/**
 * Postgres-backed store. `exclusive` opens a transaction and takes a
 * transaction-scoped advisory lock, so match-then-insert is atomic across
 * processes sharing the database.
 */
export class KyselyConstantStore implements ConstantStore {
  constructor(
    private readonly executor: Kysely<DB>,
    private readonly inTransaction = false,
  ) {}

  static fromClient(client: DatabaseClient) {
    return new KyselyConstantStore(client.kysely);
  }

  async list() {
    const rows = await listSemanticConstants(this.executor);
    return rows.map(fromRow);
  }

  async get(constantId: string) {
    const row = await getSemanticConstant(this.executor, constantId);
    return row ? fromRow(row) : undefined;
  }

  async insert(constant: SemanticConstant) {
    await insertSemanticConstant(this.executor, toRow(constant));
  }

  async markCurated(constantId: string, curatedAt: Date) {
    return markSemanticConstantCurated(this.executor, constantId, curatedAt);
  }

  async exclusive<T>(fn: (store: ConstantStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) return fn(this);
    return this.executor.transaction().execute(async (tx) => {
      await lockSemanticConstants(tx);
      return fn(new KyselyConstantStore(tx, true));
    });
  }
}
