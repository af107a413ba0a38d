/**
 * Failures that end an extraction run. Anything that is not an
 * `ExtractionError` is a bug and is rethrown by the CLI.
 */
export class ExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Wrong number of positional arguments or a malformed option value. */
export class UsageError extends ExtractionError {}

/**
 * Invalid source text. `line` is 1-based; `column` is 1-based in the
 * parser's encoding units, so it can run ahead of the character count on
 * lines with non-ASCII text.
 */
export class ParseError extends ExtractionError {
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, location?: { line: number; column: number }) {
    super(message);
    this.line = location?.line;
    this.column = location?.column;
  }
}

export class SourceReadError extends ExtractionError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`cannot read ${path}: ${reason}`, { cause });
    this.path = path;
  }
}
