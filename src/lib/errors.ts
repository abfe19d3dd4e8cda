export type NormalizationErrorReason =
  | "MissingRequiredField"
  | "UnmappedVocabularyValue"
  | "OutOfRangeValue"
  | "UnitMismatch";

/**
 * One raw record failed to normalize. Always names exactly one field.
 */
export class NormalizationError extends Error {
  readonly field: string;
  readonly reason: NormalizationErrorReason;
  readonly value: unknown;

  constructor(field: string, reason: NormalizationErrorReason, detail: string, value?: unknown) {
    super(`${reason} on "${field}": ${detail}`);
    this.name = "NormalizationError";
    this.field = field;
    this.reason = reason;
    this.value = value;
  }
}

export class DuplicateKeyError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`Shaft already exists: ${key}`);
    this.name = "DuplicateKeyError";
    this.key = key;
  }
}

export class NotFoundError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`Shaft not found: ${key}`);
    this.name = "NotFoundError";
    this.key = key;
  }
}

export class InvalidComparisonSizeError extends Error {
  readonly count: number;

  constructor(count: number) {
    super(`Comparison needs 2 to 4 shafts, got ${count}`);
    this.name = "InvalidComparisonSizeError";
    this.count = count;
  }
}

export class InvalidFilterError extends Error {
  readonly param: string;
  readonly value: string;

  constructor(param: string, value: string) {
    super(`Invalid value for filter "${param}": ${value}`);
    this.name = "InvalidFilterError";
    this.param = param;
    this.value = value;
  }
}

export class VocabularyError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Vocabulary is invalid (${issues.length} issue(s)): ${issues.join("; ")}`);
    this.name = "VocabularyError";
    this.issues = issues;
  }
}
