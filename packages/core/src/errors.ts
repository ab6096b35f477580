export type ErrorCode =
  | "required_anchor_missing"
  | "invalid_processor"
  | "invalid_layout"
  | "invalid_expression"
  | "missing_field";

export class LayoutRulesError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class RequiredAnchorError extends LayoutRulesError {
  readonly anchor: string;

  constructor(anchor: string) {
    super("required_anchor_missing", `Required anchor '${anchor}' not found in document`);
    this.anchor = anchor;
  }
}

export class ProcessorSpecError extends LayoutRulesError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("invalid_processor", `Invalid processor: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class LayoutInputError extends LayoutRulesError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("invalid_layout", `Invalid layout: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/** Raised by the formula and predicate parsers; `position` is a character offset into the source. */
export class ExpressionError extends LayoutRulesError {
  readonly position: number;

  constructor(message: string, position: number) {
    super("invalid_expression", message);
    this.position = position;
  }
}

export class MissingFieldError extends LayoutRulesError {
  readonly path: string;

  constructor(path: string) {
    super("missing_field", `Missing field '${path}'`);
    this.path = path;
  }
}
