/**
 * Ledger load errors
 *
 * Every failure while loading a ledger surfaces as a LoadError (or one of its
 * subclasses). None of them leave a partial ledger behind.
 */

export class LoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LoadError";
  }
}

export class SourceNotFoundError extends LoadError {
  constructor(public readonly source: string) {
    super(`Sales source not found: ${source}`);
    this.name = "SourceNotFoundError";
  }
}

export class ParseError extends LoadError {
  constructor(reason: string) {
    super(`Sales source is not a readable table: ${reason}`);
    this.name = "ParseError";
  }
}

export class SchemaError extends LoadError {
  constructor(public readonly missing_fields: string[]) {
    super(
      `Sales source is missing required field(s): ${missing_fields.join(", ")}`,
    );
    this.name = "SchemaError";
  }
}

export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
  }
}
