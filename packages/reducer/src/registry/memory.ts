import { ConstantStatus, type SemanticConstant } from "@glossa/core";
import { compareConstants, type ConstantStore } from "./store";

class MemoryConstantTable implements ConstantStore {
  constructor(private readonly rows: Map<string, SemanticConstant>) {}

  async list() {
    return [...this.rows.values()].map(row => structuredClone(row)).sort(compareConstants);
  }

  async get(constantId: string) {
    const row = this.rows.get(constantId);
    return row ? structuredClone(row) : undefined;
  }

  async insert(constant: SemanticConstant) {
    if (this.rows.has(constant.constantId)) {
      throw new Error(`Duplicate semantic constant id ${constant.constantId}`);
    }
    this.rows.set(constant.constantId, structuredClone(constant));
  }

  async markCurated(constantId: string, curatedAt: Date) {
    const row = this.rows.get(constantId);
    if (!row || row.status === ConstantStatus.Curated) return false;
    row.status = ConstantStatus.Curated;
    row.curatedAt = new Date(curatedAt);
    return true;
  }

  // Already inside the owning store's lock.
  async exclusive<T>(fn: (store: ConstantStore) => Promise<T>): Promise<T> {
    return fn(this);
  }
}

/**
 * Process-local store. Exclusive sections are chained on a promise so a
 * check-then-insert can never interleave with another one.
 */
export class MemoryConstantStore implements ConstantStore {
  private readonly table: MemoryConstantTable;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(seed: readonly SemanticConstant[] = []) {
    this.table = new MemoryConstantTable(new Map(seed.map(c => [c.constantId, structuredClone(c)])));
  }

  list() {
    return this.table.list();
  }

  get(constantId: string) {
    return this.table.get(constantId);
  }

  insert(constant: SemanticConstant) {
    return this.exclusive(store => store.insert(constant));
  }

  markCurated(constantId: string, curatedAt: Date) {
    return this.exclusive(store => store.markCurated(constantId, curatedAt));
  }

  exclusive<T>(fn: (store: ConstantStore) => Promise<T>): Promise<T> {
    const run = this.tail.then(() => fn(this.table));
    // The chain only orders sections; the caller still receives `run`'s rejection.
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }
}
