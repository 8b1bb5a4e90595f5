import type { SemanticConstantRegistry } from "../registry/registry";
import type { SenseBucket } from "../types";
import { logger } from "@glossa/core";
import { RegistryUnavailableError } from "../errors";

export interface AssignResult {
  buckets: SenseBucket[];
  warnings: string[];
}

/**
 * Attaches a constant to every bucket in rank order. If the registry cannot
 * be reached, no bucket keeps a constant and the run carries a warning.
 */
export async function assignConstants(
  buckets: readonly SenseBucket[],
  registry: SemanticConstantRegistry | undefined,
): Promise<AssignResult> {
  const unassigned = buckets.map(bucket => ({ ...bucket, semanticConstant: null }));
  if (!registry) {
    return { buckets: unassigned, warnings: [] };
  }

  const assigned: SenseBucket[] = [];
  try {
    for (const bucket of buckets) {
      assigned.push({ ...bucket, semanticConstant: await registry.assign(bucket) });
    }
  }
  catch (error) {
    if (!(error instanceof RegistryUnavailableError)) throw error;
    logger.warn(error.message);
    return { buckets: unassigned, warnings: [error.toWarning()] };
  }

  return { buckets: assigned, warnings: [] };
}
