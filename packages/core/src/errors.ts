/**
 * Errors raised by the document model. Lookups never throw; they return null.
 */

export class BragError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A checkbox held something other than X, O or blank. */
export class ParseError extends BragError {
  readonly line: number | null;
  readonly text: string;

  constructor(message: string, text: string, line: number | null = null) {
    super(line == null ? message : `Line ${line}: ${message}`);
    this.line = line;
    this.text = text;
  }
}

/** A `#` header with no user name after it. */
export class MalformedHeaderError extends BragError {
  readonly line: number;

  constructor(line: number) {
    super(`Line ${line}: user header has no name`);
    this.line = line;
  }
}

/** Not enough distinct session dates to answer a current/last query. */
export class InsufficientHistoryError extends BragError {
  readonly required: number;
  readonly available: number;

  constructor(required: number, available: number) {
    super(`Need at least ${required} dated session(s), found ${available}`);
    this.required = required;
    this.available = available;
  }
}
