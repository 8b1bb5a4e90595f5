import { isPrimarySource, type Language, Source, SOURCE_PRIORITY } from "@glossa/core";
import { z } from "zod";
import { DuplicateWitnessError, IgnoredFieldError, MalformedWSUError, type ReductionError } from "./errors";
import { type WitnessKey, witnessKey, type WitnessSenseUnit } from "./types";

const nonBlank = (field: string) => z.string().refine(s => s.trim().length > 0, `${field} is empty`);

const TagListSchema = z
  .array(z.string())
  .optional()
  .transform(tags => uniqueTags(tags ?? []));

/**
 * Input contract for adapters: snake_case keys as they come off the wire.
 * `sense_ref` and `gloss_raw` are kept byte-for-byte; only the tags are
 * canonicalized.
 */
export const WitnessInputSchema = z.object({
  source: z.nativeEnum(Source),
  sense_ref: nonBlank("sense_ref"),
  gloss_raw: nonBlank("gloss_raw"),
  metadata: z
    .object({
      domains: TagListSchema,
      register: TagListSchema,
    })
    .nullish(),
  ordering: z.number().int().nonnegative().optional(),
});

export type WitnessInput = z.input<typeof WitnessInputSchema>;

function uniqueTags(tags: readonly string[]) {
  const seen = new Set<string>();
  for (const tag of tags) {
    const t = tag.trim().toLowerCase();
    if (t) seen.add(t);
  }
  return [...seen];
}

export function createWitness(input: z.output<typeof WitnessInputSchema>): WitnessSenseUnit {
  return Object.freeze({
    source: input.source,
    senseRef: input.sense_ref,
    glossRaw: input.gloss_raw,
    domains: Object.freeze([...(input.metadata?.domains ?? [])]),
    register: Object.freeze([...(input.metadata?.register ?? [])]),
    ...(input.ordering !== undefined ? { ordering: input.ordering } : {}),
  });
}

/** Fields a witness can lose without losing its evidence. */
const OPTIONAL_FIELDS = new Set(["metadata", "ordering"]);

export interface AdmittedWitnesses {
  witnesses: WitnessSenseUnit[];
  /** Reports for dropped witnesses and for ignored optional fields, in input order. */
  rejected: ReductionError[];
}

function describeIssues(error: z.ZodError) {
  return error.issues.map(issue =>
    issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

/**
 * Validates adapter output one witness at a time. A witness missing a
 * required field or repeating a `(source, sense_ref)` is dropped and
 * reported. A witness whose only problems are in optional fields is kept
 * without them. The rest of the list is still admitted in input order.
 */
export function admitWitnesses(inputs: readonly unknown[]): AdmittedWitnesses {
  const witnesses: WitnessSenseUnit[] = [];
  const rejected: ReductionError[] = [];
  const seen = new Set<WitnessKey>();

  inputs.forEach((input, index) => {
    let parsed = WitnessInputSchema.safeParse(input);
    if (!parsed.success) {
      const issues = describeIssues(parsed.error);
      const fields = [...new Set(parsed.error.issues.map(issue => String(issue.path[0])))];
      if (typeof input !== "object" || input === null || !fields.every(field => OPTIONAL_FIELDS.has(field))) {
        rejected.push(new MalformedWSUError(index, issues));
        return;
      }

      const stripped: Record<string, unknown> = { ...input };
      for (const field of fields) delete stripped[field];
      parsed = WitnessInputSchema.safeParse(stripped);
      if (!parsed.success) {
        rejected.push(new MalformedWSUError(index, describeIssues(parsed.error)));
        return;
      }
      rejected.push(new IgnoredFieldError(index, fields, issues));
    }

    const wsu = createWitness(parsed.data);
    const key = witnessKey(wsu);
    if (seen.has(key)) {
      rejected.push(new DuplicateWitnessError(index, key));
      return;
    }
    seen.add(key);
    witnesses.push(wsu);
  });

  return { witnesses, rejected };
}

function compareCodeUnits(a: string, b: string) {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * The one ordering every tie-break derives from: source priority, then
 * `senseRef` by UTF-16 code units (never locale collation), then the
 * source's own ordering.
 */
export function compareWitnesses(a: WitnessSenseUnit, b: WitnessSenseUnit): number {
  return SOURCE_PRIORITY[a.source] - SOURCE_PRIORITY[b.source]
    || compareCodeUnits(a.senseRef, b.senseRef)
    || (a.ordering ?? 0) - (b.ordering ?? 0);
}

export function sortWitnesses(wsus: readonly WitnessSenseUnit[]): WitnessSenseUnit[] {
  return [...wsus].sort(compareWitnesses);
}

export function hasPrimaryWitness(wsus: readonly WitnessSenseUnit[], language: Language): boolean {
  return wsus.some(wsu => isPrimarySource(wsu.source, language));
}
