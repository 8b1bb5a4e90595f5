import type { ConstantStatus, Source } from "@glossa/core";
import type { ColumnType, Insertable, Selectable, Updateable } from "kysely";
import type { Default } from "./shared";

export interface WitnessRefJSON {
  source: Source;
  sense_ref: string;
}

/**
 * `created_from` is a JSONB column. pg would serialize a JS array as a
 * Postgres array, so writes go through `JSON.stringify`.
 */
export type CreatedFromColumn = ColumnType<WitnessRefJSON[], string, string>;

export interface SemanticConstantTable {
  constant_id: string;
  canonical_label: string;
  description: string;
  domains: Default<string[]>;
  status: Default<ConstantStatus>;
  created_from: CreatedFromColumn;
  created_at: Default<Date>;
  curated_at: Date | null;
}

export type SemanticConstantRow = Selectable<SemanticConstantTable>;
export type NewSemanticConstantRow = Insertable<SemanticConstantTable>;
export type SemanticConstantRowUpdate = Updateable<SemanticConstantTable>;
