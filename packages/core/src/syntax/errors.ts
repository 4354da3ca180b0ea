/**
 * Error types and formatting for the CDDL front end
 */

/** Source location for error reporting */
export interface SourceLocation {
  line: number;
  column: number;
  offset: number;
}

/** Source span (start to end) */
export interface SourceSpan {
  start: SourceLocation;
  end: SourceLocation;
}

export type ErrorCode =
  | "LEX_ERROR"
  | "UNEXPECTED_TOKEN"
  | "ILLEGAL_TOKEN"
  | "EXPECTED_ASSIGNMENT"
  | "UNRECOGNIZED_TYPE2"
  | "UNIMPLEMENTED"
  | "TREE_OVERWRITE";

interface ErrorOptions {
  location?: SourceLocation;
  span?: SourceSpan;
  source?: string;
}

/** Base error class for everything the parser and the parent index raise */
export class CddlError extends Error {
  readonly code: ErrorCode;
  readonly location?: SourceLocation;
  readonly span?: SourceSpan;
  readonly source?: string;
  /** Fatal errors stop the whole parse instead of the current rule */
  readonly fatal: boolean;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions & { fatal?: boolean }) {
    super(message);
    this.name = "CddlError";
    this.code = code;
    this.location = options?.location ?? options?.span?.start;
    this.span = options?.span;
    this.source = options?.source;
    this.fatal = options?.fatal ?? false;
  }

  /** Format error with source context */
  format(): string {
    const lines: string[] = [];

    const loc = this.location;
    if (loc) {
      lines.push(`Error [${this.code}] at line ${loc.line}, column ${loc.column}:`);
    } else {
      lines.push(`Error [${this.code}]:`);
    }

    lines.push(`  ${this.message}`);

    if (this.source && loc) {
      const sourceLines = this.source.split("\n");
      const lineIdx = loc.line - 1;

      if (lineIdx >= 0 && lineIdx < sourceLines.length) {
        lines.push("");
        lines.push(`  ${loc.line} | ${sourceLines[lineIdx]}`);

        const padding = " ".repeat(String(loc.line).length + 3);
        const pointer = `${" ".repeat(Math.max(loc.column - 1, 0))}^`;
        lines.push(`  ${padding}${pointer}`);
      }
    }

    return lines.join("\n");
  }
}

/** Tokenization error; always fatal */
export class LexError extends CddlError {
  constructor(message: string, options?: Omit<ErrorOptions, "span">) {
    super("LEX_ERROR", message, { ...options, fatal: true });
    this.name = "LexError";
  }
}

export type ParseErrorCode = Extract<
  ErrorCode,
  "UNEXPECTED_TOKEN" | "ILLEGAL_TOKEN" | "EXPECTED_ASSIGNMENT" | "UNRECOGNIZED_TYPE2"
>;

/** Grammar mismatch between what a production needs and the token found */
export class ParseError extends CddlError {
  readonly expected: string;
  readonly found: string;

  constructor(
    code: ParseErrorCode,
    expected: string,
    found: string,
    options?: ErrorOptions
  ) {
    super(code, `Expected ${expected} but got ${found}`, options);
    this.name = "ParseError";
    this.expected = expected;
    this.found = found;
  }
}

/** A grammar path that is recognized but deliberately not handled */
export class UnimplementedError extends CddlError {
  constructor(message: string, options?: ErrorOptions) {
    super("UNIMPLEMENTED", message, { ...options, fatal: true });
    this.name = "UnimplementedError";
  }
}

/** Parent index invariant violation */
export class TreeError extends CddlError {
  constructor(message = "attempt to overwrite existing tree node") {
    super("TREE_OVERWRITE", message);
    this.name = "TreeError";
  }
}

/** Create a source location from line, column, offset */
export function loc(line: number, column: number, offset: number): SourceLocation {
  return { line, column, offset };
}

/** Create a source span from start and end locations */
export function span(start: SourceLocation, end: SourceLocation): SourceSpan {
  return { start, end };
}

/** Format multiple errors */
export function formatErrors(errors: CddlError[]): string {
  return errors.map((e) => e.format()).join("\n\n");
}
