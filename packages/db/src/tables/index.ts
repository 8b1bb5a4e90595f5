import type { SemanticConstantTable } from "./semantic_constant";

export * from "./semantic_constant";
export * from "./shared";

export interface DB {
  semantic_constant: SemanticConstantTable;
}
