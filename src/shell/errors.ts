export class ParseError extends Error {
  /** Offset into the source being parsed when the error was raised. */
  readonly position: number;

  constructor(message: string, position: number) {
    super(message);
    this.name = "ParseError";
    this.position = position;
  }
}

/** Ceiling on nested constructs, counted across substitutions and sub-parsers. */
export const MAX_NESTING = 100;

export function nestingError(position: number): ParseError {
  return new ParseError("maximum nesting depth exceeded", position);
}
