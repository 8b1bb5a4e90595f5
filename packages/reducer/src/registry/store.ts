import type { SemanticConstant } from "@glossa/core";

/**
 * Persistence seam of the semantic constant registry. Implementations must
 * return constants ordered by `createdAt`, then `constantId`.
 */
export interface ConstantStore {
  list(): Promise<SemanticConstant[]>;
  get(constantId: string): Promise<SemanticConstant | undefined>;
  insert(constant: SemanticConstant): Promise<void>;
  /** Returns false when the constant was missing or already curated. */
  markCurated(constantId: string, curatedAt: Date): Promise<boolean>;
  /**
   * Runs `fn` as the only writer: no other `exclusive` section of the same
   * store interleaves with it. `fn` must use the store it is handed.
   */
  exclusive<T>(fn: (store: ConstantStore) => Promise<T>): Promise<T>;
}

export function compareConstants(a: SemanticConstant, b: SemanticConstant) {
  return a.createdAt.getTime() - b.createdAt.getTime()
    || (a.constantId < b.constantId ? -1 : a.constantId > b.constantId ? 1 : 0);
}
