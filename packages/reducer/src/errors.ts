export class ReductionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Form used in `ReducedSenseSet.warnings`. */
  toWarning() {
    return `${this.name}: ${this.message}`;
  }
}

export class InvalidModeError extends ReductionError {
  constructor(public readonly value: unknown) {
    super(`Unrecognized mode ${JSON.stringify(value) ?? String(value)}; expected "open" or "skeptic"`);
  }
}

export class InvalidLanguageError extends ReductionError {
  constructor(public readonly value: unknown) {
    super(`Unsupported language ${JSON.stringify(value) ?? String(value)}; expected "lat", "grc" or "san"`);
  }
}

export class MissingWitnessListError extends ReductionError {
  constructor(lemma: string) {
    super(`No witness list was supplied for "${lemma}"`);
  }
}

export class EmptyEvidenceError extends ReductionError {
  constructor(lemma: string) {
    super(`Adapters reported results for "${lemma}" but supplied no witnesses`);
  }
}

export class MalformedWSUError extends ReductionError {
  constructor(
    public readonly index: number,
    public readonly issues: string[],
  ) {
    super(`witness #${index} dropped: ${issues.join("; ")}`);
  }
}

export class IgnoredFieldError extends ReductionError {
  constructor(
    public readonly index: number,
    public readonly fields: string[],
    public readonly issues: string[],
  ) {
    super(`witness #${index} kept without ${fields.join(", ")}: ${issues.join("; ")}`);
  }
}

export class DuplicateWitnessError extends ReductionError {
  constructor(
    public readonly index: number,
    public readonly key: string,
  ) {
    super(`witness #${index} dropped: ${key} was already supplied`);
  }
}

export class RegistryUnavailableError extends ReductionError {
  constructor(operation: string, options?: ErrorOptions) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`semantic constant registry unavailable during ${operation}${reason}`, options);
  }
}

export class ConstantNotFoundError extends ReductionError {
  constructor(public readonly constantId: string) {
    super(`No semantic constant with id ${constantId}`);
  }
}
