export class ReportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when a numeric field cannot be rendered (negative, NaN, infinite).
 * `field` is the slash-separated path of the value inside the result tree,
 * e.g. `raw/1024/veloxloop/rps`.
 */
export class FormatError extends ReportError {
  readonly field: string;
  readonly value: number;

  constructor(field: string, value: number) {
    super(`Cannot format ${field}: ${String(value)}`);
    this.field = field;
    this.value = value;
  }
}

export class SchemaError extends ReportError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.length > 0 ? issues.join("; ") : "Unknown validation error");
    this.issues = issues;
  }
}
