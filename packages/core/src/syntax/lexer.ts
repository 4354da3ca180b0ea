/**
 * Pull-based tokenizer for CDDL source text
 */

import type { Value } from "./ast.js";
import { LexError, type SourceLocation, loc } from "./errors.js";

// =============================================================================
// TOKEN TYPES
// =============================================================================

export type SimpleTokenType =
  | "EOF"
  | "IDENT"
  | "RANGEOP" // .. or ...
  | "CONTROL" // .size, .bits, ... (value keeps the dot)
  | "HASH" // #
  // Assignment
  | "ASSIGN" // =
  | "TCHOICEALT" // /=
  | "GCHOICEALT" // //=
  // Choices
  | "TCHOICE" // /
  | "GCHOICE" // //
  // Brackets
  | "LPAREN" // (
  | "RPAREN" // )
  | "LBRACE" // {
  | "RBRACE" // }
  | "LBRACKET" // [
  | "RBRACKET" // ]
  | "LANGLEBRACKET" // <
  | "RANGLEBRACKET" // >
  // Punctuation
  | "COMMA" // ,
  | "COLON" // :
  | "ARROWMAP" // =>
  | "CUT" // ^
  | "OPTIONAL" // ?
  | "ASTERISK" // *
  | "ONEORMORE" // +
  | "UNWRAP" // ~
  | "GTOCHOICE"; // &

interface TokenBase {
  /** Source text of the token */
  value: string;
  location: SourceLocation;
}

export interface SimpleToken extends TokenBase {
  type: SimpleTokenType;
}

/** Literal value (number, text or byte string) */
export interface ValueToken extends TokenBase {
  type: "VALUE";
  literal: Value;
}

/** Numeric range lexed as one token: `1..10` (inclusive) or `0...5` (exclusive) */
export interface RangeToken extends TokenBase {
  type: "RANGE";
  lower: Value;
  upper: Value;
  inclusive: boolean;
}

/** Major type prefix: `#6.32`, `#7`, `#1.5` */
export interface TagToken extends TokenBase {
  type: "TAG";
  major: number;
  tag?: bigint;
}

export type Token = SimpleToken | ValueToken | RangeToken | TagToken;

export type TokenType = Token["type"];

/** Anything the parser can pull tokens from */
export interface TokenSource {
  nextToken(): Token;
}

const PUNCTUATION: Record<string, SimpleTokenType> = {
  "(": "LPAREN",
  ")": "RPAREN",
  "{": "LBRACE",
  "}": "RBRACE",
  "[": "LBRACKET",
  "]": "RBRACKET",
  "<": "LANGLEBRACKET",
  ">": "RANGLEBRACKET",
  ",": "COMMA",
  ":": "COLON",
  "^": "CUT",
  "?": "OPTIONAL",
  "*": "ASTERISK",
  "+": "ONEORMORE",
  "~": "UNWRAP",
  "&": "GTOCHOICE",
};

function isAlpha(char: string): boolean {
  return /^[A-Za-z@_$]$/.test(char);
}

function isDigit(char: string): boolean {
  return /^[0-9]$/.test(char);
}

function isIdentChar(char: string): boolean {
  return isAlpha(char) || isDigit(char);
}

// =============================================================================
// LEXER CLASS
// =============================================================================

export class Lexer implements TokenSource {
  private readonly source: string;
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(source: string) {
    this.source = source;
  }

  /** Scan and return the next token; EOF repeats once the input is exhausted */
  nextToken(): Token {
    this.skipTrivia();

    const start = this.location();
    if (this.pos >= this.source.length) {
      return { type: "EOF", value: "", location: start };
    }

    const char = this.current();

    if (char === '"') return this.scanText(start);
    if (char === "'") return this.scanBytes(start, "utf8", 0);
    if (char === "h" && this.peek() === "'") return this.scanBytes(start, "b16", 1);
    if (this.source.startsWith("b64'", this.pos)) return this.scanBytes(start, "b64", 3);

    if (isDigit(char) || (char === "-" && isDigit(this.peek()))) {
      return this.scanNumberOrRange(start);
    }

    if (isAlpha(char)) return this.scanIdentifier(start);

    switch (char) {
      case "=":
        if (this.peek() === ">") return this.symbol("ARROWMAP", 2, start);
        return this.symbol("ASSIGN", 1, start);
      case "/":
        if (this.source.startsWith("//=", this.pos)) return this.symbol("GCHOICEALT", 3, start);
        if (this.peek() === "/") return this.symbol("GCHOICE", 2, start);
        if (this.peek() === "=") return this.symbol("TCHOICEALT", 2, start);
        return this.symbol("TCHOICE", 1, start);
      case ".":
        return this.scanDot(start);
      case "#":
        return this.scanHash(start);
    }

    const punctuation = PUNCTUATION[char];
    if (punctuation) {
      return this.symbol(punctuation, 1, start);
    }

    throw new LexError(`Unexpected character '${char}'`, {
      location: start,
      source: this.source,
    });
  }

  /** Get current character */
  private current(): string {
    return this.source[this.pos] ?? "";
  }

  /** Peek at next character */
  private peek(offset = 1): string {
    return this.source[this.pos + offset] ?? "";
  }

  /** Advance position and update line/column tracking */
  private advance(): string {
    const char = this.current();
    this.pos++;
    if (char === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private location(): SourceLocation {
    return loc(this.line, this.column, this.pos);
  }

  private text(start: SourceLocation): string {
    return this.source.slice(start.offset, this.pos);
  }

  /** Skip whitespace and `;` comments */
  private skipTrivia(): void {
    while (this.pos < this.source.length) {
      const char = this.current();
      if (char === " " || char === "\t" || char === "\r" || char === "\n") {
        this.advance();
      } else if (char === ";") {
        while (this.pos < this.source.length && this.current() !== "\n") {
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  private symbol(type: SimpleTokenType, length: number, start: SourceLocation): SimpleToken {
    for (let i = 0; i < length; i++) this.advance();
    return { type, value: this.text(start), location: start };
  }

  /** id = EALPHA *(*("-" / ".") (EALPHA / DIGIT)) */
  private scanIdentifier(start: SourceLocation): SimpleToken {
    this.advance();

    while (this.pos < this.source.length) {
      if (isIdentChar(this.current())) {
        this.advance();
        continue;
      }

      let run = 0;
      while (this.peek(run) === "-" || this.peek(run) === ".") run++;
      if (run > 0 && isIdentChar(this.peek(run))) {
        for (let i = 0; i <= run; i++) this.advance();
        continue;
      }
      break;
    }

    return { type: "IDENT", value: this.text(start), location: start };
  }

  private scanDot(start: SourceLocation): SimpleToken {
    if (this.source.startsWith("...", this.pos)) return this.symbol("RANGEOP", 3, start);
    if (this.peek() === ".") return this.symbol("RANGEOP", 2, start);

    if (isAlpha(this.peek())) {
      this.advance();
      this.scanIdentifier(this.location());
      return { type: "CONTROL", value: this.text(start), location: start };
    }

    throw new LexError("Expected control operator name or range operator after '.'", {
      location: start,
      source: this.source,
    });
  }

  private scanHash(start: SourceLocation): Token {
    this.advance();
    if (!isDigit(this.current())) {
      return { type: "HASH", value: "#", location: start };
    }

    const major = Number(this.scanDigits());
    let tag: bigint | undefined;
    if (this.current() === "." && isDigit(this.peek())) {
      this.advance();
      tag = BigInt(this.scanDigits());
    }

    return { type: "TAG", value: this.text(start), major, tag, location: start };
  }

  private scanDigits(): string {
    let digits = "";
    while (isDigit(this.current())) {
      digits += this.advance();
    }
    return digits;
  }

  private scanNumber(): Value {
    const start = this.pos;
    const negative = this.current() === "-";
    if (negative) this.advance();

    if (this.current() === "0" && (this.peek() === "x" || this.peek() === "b")) {
      const radix = this.peek() === "x" ? 16 : 2;
      this.advance();
      this.advance();
      const pattern = radix === 16 ? /^[0-9a-fA-F]$/ : /^[01]$/;
      let digits = "";
      while (pattern.test(this.current())) {
        digits += this.advance();
      }
      if (digits.length === 0) {
        throw new LexError("Expected digits after radix prefix", {
          location: this.location(),
          source: this.source,
        });
      }
      const magnitude = BigInt(`${radix === 16 ? "0x" : "0b"}${digits}`);
      return negative
        ? { kind: "value", type: "int", value: -magnitude }
        : { kind: "value", type: "uint", value: magnitude };
    }

    this.scanDigits();
    let isFloat = false;

    // A second '.' means a range operator, not a fraction
    if (this.current() === "." && isDigit(this.peek())) {
      isFloat = true;
      this.advance();
      this.scanDigits();
    }

    if (
      (this.current() === "e" || this.current() === "E") &&
      (isDigit(this.peek()) || ((this.peek() === "+" || this.peek() === "-") && isDigit(this.peek(2))))
    ) {
      isFloat = true;
      this.advance();
      if (this.current() === "+" || this.current() === "-") this.advance();
      this.scanDigits();
    }

    const text = this.source.slice(start, this.pos);
    if (isFloat) return { kind: "value", type: "float", value: Number(text) };
    const value = BigInt(text);
    return negative ? { kind: "value", type: "int", value } : { kind: "value", type: "uint", value };
  }

  private scanNumberOrRange(start: SourceLocation): ValueToken | RangeToken {
    const lower = this.scanNumber();

    if (this.current() === ".") {
      const opLength = this.source.startsWith("...", this.pos) ? 3 : this.peek() === "." ? 2 : 0;
      const next = this.peek(opLength);
      if (opLength > 0 && (isDigit(next) || (next === "-" && isDigit(this.peek(opLength + 1))))) {
        for (let i = 0; i < opLength; i++) this.advance();
        const upper = this.scanNumber();
        return {
          type: "RANGE",
          value: this.text(start),
          lower,
          upper,
          inclusive: opLength === 2,
          location: start,
        };
      }
    }

    return { type: "VALUE", value: this.text(start), literal: lower, location: start };
  }

  private scanText(start: SourceLocation): ValueToken {
    this.advance(); // opening quote
    let content = "";

    while (this.current() !== '"') {
      if (this.pos >= this.source.length) {
        throw new LexError("Unterminated text string", { location: start, source: this.source });
      }

      const char = this.advance();
      if (char !== "\\") {
        content += char;
        continue;
      }

      const escaped = this.advance();
      switch (escaped) {
        case "n":
          content += "\n";
          break;
        case "t":
          content += "\t";
          break;
        case "r":
          content += "\r";
          break;
        case "":
          throw new LexError("Unterminated text string", { location: start, source: this.source });
        default:
          content += escaped;
      }
    }

    this.advance(); // closing quote
    return {
      type: "VALUE",
      value: this.text(start),
      literal: { kind: "value", type: "text", value: content },
      location: start,
    };
  }

  private scanBytes(
    start: SourceLocation,
    encoding: "utf8" | "b16" | "b64",
    prefixLength: number
  ): ValueToken {
    for (let i = 0; i < prefixLength; i++) this.advance();
    this.advance(); // opening quote

    let content = "";
    while (this.current() !== "'") {
      if (this.pos >= this.source.length) {
        throw new LexError("Unterminated byte string", { location: start, source: this.source });
      }
      const char = this.advance();
      if (char === "\\" && this.current() === "'") {
        content += this.advance();
      } else if (encoding !== "b16" || !/\s/.test(char)) {
        // h'' may spread its hex digits over whitespace
        content += char;
      }
    }

    this.advance(); // closing quote

    if (encoding === "b16" && !/^[0-9a-fA-F]*$/.test(content)) {
      throw new LexError(`Invalid hex byte string '${content}'`, {
        location: start,
        source: this.source,
      });
    }

    return {
      type: "VALUE",
      value: this.text(start),
      literal: { kind: "value", type: "bytes", encoding, value: content },
      location: start,
    };
  }
}

/** Token source over an already tokenized array */
export class ArrayTokenSource implements TokenSource {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  nextToken(): Token {
    const token = this.tokens[this.pos];
    if (token === undefined) {
      const last = this.tokens[this.tokens.length - 1];
      return { type: "EOF", value: "", location: last?.location ?? loc(1, 1, 0) };
    }
    this.pos++;
    return token;
  }
}

/** Tokenize an entire source, ending with a single EOF token */
export function tokenize(source: string): Token[] {
  const lexer = new Lexer(source);
  const tokens: Token[] = [];

  for (;;) {
    const token = lexer.nextToken();
    tokens.push(token);
    if (token.type === "EOF") return tokens;
  }
}
