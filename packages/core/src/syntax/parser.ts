/**
 * Recursive descent parser for CDDL
 *
 * Pulls tokens from a TokenSource with two tokens of lookahead and builds the
 * AST in ./ast.ts. Grammar errors abort the current rule and are collected;
 * the parser then resumes at the next rule. Lexer failures and unimplemented
 * grammar paths stop the parse.
 */

import {
  type CDDL,
  type GenericArg,
  type GenericArgs,
  type GenericParam,
  type GenericParams,
  type Group,
  type GroupChoice,
  type GroupChoiceEntry,
  type GroupEntry,
  type GroupRule,
  type Identifier,
  type MemberKey,
  type NonMemberKey,
  type Occur,
  type Occurrence,
  type Rule,
  type Type,
  type Type1,
  type Type2,
  type TypeChoice,
  type TypeRule,
  type2Value,
  valueToType2,
} from "./ast.js";
import {
  CddlError,
  ParseError,
  type ParseErrorCode,
  type SourceLocation,
  type SourceSpan,
  UnimplementedError,
  span,
} from "./errors.js";
import { Lexer, type Token, type TokenSource, type TokenType } from "./lexer.js";

export type ParseResult =
  | { success: true; cddl: CDDL; errors: CddlError[] }
  | { success: false; errors: CddlError[] };

const ASSIGNMENTS = ["ASSIGN", "TCHOICEALT", "GCHOICEALT"] as const;

type AssignmentType = (typeof ASSIGNMENTS)[number];

const GROUP_END: ReadonlySet<TokenType> = new Set<TokenType>(["RPAREN", "RBRACE", "RBRACKET", "GCHOICE", "EOF"]);

/** End location of a single-line token */
function tokenEnd(token: Token): SourceLocation {
  const { line, column, offset } = token.location;
  return { line, column: column + token.value.length, offset: offset + token.value.length };
}

function describeToken(token: Token): string {
  return token.type === "EOF" ? "end of input" : `${token.type} '${token.value}'`;
}

function isAssignment(type: TokenType): type is AssignmentType {
  return ASSIGNMENTS.some((assignment) => assignment === type);
}

// =============================================================================
// PARSER CLASS
// =============================================================================

export class Parser {
  private readonly tokens: TokenSource;
  private readonly source: string;
  private curToken: Token;
  private peekToken: Token;
  private lastEnd: SourceLocation;

  /** Non-fatal errors collected while parsing */
  readonly errors: CddlError[] = [];

  constructor(tokens: TokenSource, source = "") {
    this.tokens = tokens;
    this.source = source;
    this.curToken = tokens.nextToken();
    this.peekToken = tokens.nextToken();
    this.lastEnd = this.curToken.location;
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  /** Shift peek into current and pull a new peek token */
  private advance(): Token {
    const token = this.curToken;
    this.lastEnd = tokenEnd(token);
    this.curToken = this.peekToken;
    this.peekToken = this.tokens.nextToken();
    return token;
  }

  private check(type: TokenType): boolean {
    return this.curToken.type === type;
  }

  private error(code: ParseErrorCode, expected: string, token: Token = this.curToken): ParseError {
    return new ParseError(code, expected, describeToken(token), {
      location: token.location,
      source: this.source,
    });
  }

  /** Expect and consume a specific token */
  private expect(type: TokenType, expected: string): Token {
    if (!this.check(type)) {
      throw this.error("UNEXPECTED_TOKEN", expected);
    }
    return this.advance();
  }

  /** Span from a start location to the end of the last consumed token */
  private makeSpan(start: SourceLocation): SourceSpan {
    return span(start, this.lastEnd);
  }

  private identifier(token: Token): Identifier {
    const tokenSpan = span(token.location, tokenEnd(token));
    if (token.value.startsWith("$$")) {
      return { kind: "identifier", ident: token.value.slice(2), socket: "$$", span: tokenSpan };
    }
    if (token.value.startsWith("$")) {
      return { kind: "identifier", ident: token.value.slice(1), socket: "$", span: tokenSpan };
    }
    return { kind: "identifier", ident: token.value, span: tokenSpan };
  }

  private atRuleStart(): boolean {
    return (
      this.check("IDENT") &&
      (isAssignment(this.peekToken.type) || this.peekToken.type === "LANGLEBRACKET")
    );
  }

  /**
   * Skip ahead to the next token pair that looks like the start of a rule.
   * `failedAt` is the offset where the failed rule began; the rule start found
   * must lie past it so that the parse always makes progress.
   */
  private synchronize(failedAt: number): void {
    while (!this.check("EOF")) {
      if (this.atRuleStart() && this.curToken.location.offset > failedAt) {
        return;
      }
      this.advance();
    }
  }

  // ===========================================================================
  // RULES
  // ===========================================================================

  /** Parse rules until end of input */
  parseDocument(): CDDL {
    const start = this.curToken.location;
    const rules: Rule[] = [];

    while (!this.check("EOF")) {
      const ruleStart = this.curToken.location.offset;
      try {
        rules.push(this.parseRule());
      } catch (error) {
        if (!(error instanceof CddlError) || error.fatal) throw error;
        this.errors.push(error);
        this.synchronize(ruleStart);
      }
    }

    return { kind: "cddl", rules, span: this.makeSpan(start) };
  }

  /** name [genericparm] assignment (type | grpent) */
  parseRule(): Rule {
    const start = this.curToken.location;
    if (!this.check("IDENT")) {
      throw this.error("UNEXPECTED_TOKEN", "rule name");
    }

    const name = this.identifier(this.advance());

    let genericParams: GenericParams | undefined;
    if (this.check("LANGLEBRACKET")) {
      genericParams = this.parseGenericParams();
    }

    const assignment = this.curToken.type;
    if (!isAssignment(assignment)) {
      throw this.error("EXPECTED_ASSIGNMENT", "'=', '/=' or '//='");
    }
    this.advance();

    if (this.check("LPAREN")) {
      throw new UnimplementedError("Parenthesized group entries as rule bodies are not supported", {
        location: this.curToken.location,
        source: this.source,
      });
    }

    if (assignment === "GCHOICEALT" || (assignment === "ASSIGN" && this.startsGroupEntry())) {
      const entry = this.parseGroupEntry();
      const rule: GroupRule = {
        kind: "group_rule",
        name,
        genericParams,
        isGroupChoiceAlternate: assignment === "GCHOICEALT",
        entry,
        span: this.makeSpan(start),
      };
      return { kind: "rule", rule, span: rule.span };
    }

    const value = this.parseType();
    const rule: TypeRule = {
      kind: "type_rule",
      name,
      genericParams,
      isTypeChoiceAlternate: assignment === "TCHOICEALT",
      value,
      span: this.makeSpan(start),
    };
    return { kind: "rule", rule, span: rule.span };
  }

  /** Whether the rule body can only be read as a group entry */
  private startsGroupEntry(): boolean {
    switch (this.curToken.type) {
      case "OPTIONAL":
      case "ASTERISK":
      case "ONEORMORE":
        return true;
      case "VALUE":
        if (this.peekToken.type === "ASTERISK") return true;
        break;
    }
    const next = this.peekToken.type;
    return next === "COLON" || next === "ARROWMAP" || next === "CUT";
  }

  // ===========================================================================
  // GENERICS
  // ===========================================================================

  /** "<" id *("," id) ">" */
  parseGenericParams(): GenericParams {
    const start = this.expect("LANGLEBRACKET", "'<'").location;
    const params: GenericParam[] = [];

    for (;;) {
      if (!this.check("IDENT")) {
        throw this.error("ILLEGAL_TOKEN", "generic parameter name");
      }
      const token = this.advance();
      const param = this.identifier(token);
      params.push({ kind: "generic_param", param, span: param.span });

      if (this.check("COMMA")) {
        this.advance();
      } else if (this.check("RANGLEBRACKET")) {
        break;
      } else {
        throw this.error("ILLEGAL_TOKEN", "',' or '>'");
      }
    }

    this.advance();
    return { kind: "generic_params", params, span: this.makeSpan(start) };
  }

  /** "<" type1 *("," type1) ">" */
  parseGenericArgs(): GenericArgs {
    const start = this.expect("LANGLEBRACKET", "'<'").location;
    const args: GenericArg[] = [];

    for (;;) {
      const arg = this.parseType1();
      args.push({ kind: "generic_arg", arg, span: arg.span });

      if (this.check("COMMA")) {
        this.advance();
      } else if (this.check("RANGLEBRACKET")) {
        break;
      } else {
        throw this.error("ILLEGAL_TOKEN", "',' or '>'");
      }
    }

    this.advance();
    return { kind: "generic_args", args, span: this.makeSpan(start) };
  }

  // ===========================================================================
  // TYPES
  // ===========================================================================

  /** type1 *("/" type1) */
  parseType(): Type {
    const start = this.curToken.location;
    const typeChoices: TypeChoice[] = [];

    const first = this.parseType1();
    typeChoices.push({ kind: "type_choice", type1: first, span: first.span });

    while (this.check("TCHOICE")) {
      this.advance();
      const type1 = this.parseType1();
      typeChoices.push({ kind: "type_choice", type1, span: type1.span });
    }

    return { kind: "type", typeChoices, span: this.makeSpan(start) };
  }

  /** type2 [rangeop-or-ctlop type2], or a numeric range token */
  parseType1(): Type1 {
    const token = this.curToken;

    if (token.type === "RANGE") {
      this.advance();
      const { line, column, offset } = token.location;
      const opIndex = token.value.indexOf("..");
      const upperIndex = opIndex + (token.inclusive ? 2 : 3);
      const lowerSpan: SourceSpan = {
        start: token.location,
        end: { line, column: column + opIndex, offset: offset + opIndex },
      };
      const upperSpan: SourceSpan = {
        start: { line, column: column + upperIndex, offset: offset + upperIndex },
        end: this.lastEnd,
      };
      return {
        kind: "type1",
        type2: valueToType2(token.lower, lowerSpan),
        operator: {
          kind: "operator",
          operator: { kind: "range", inclusive: token.inclusive },
          type2: valueToType2(token.upper, upperSpan),
          span: { start: lowerSpan.end, end: this.lastEnd },
        },
        span: this.makeSpan(token.location),
      };
    }

    const type2 = this.parseType2();

    const op = this.curToken;
    if (op.type === "RANGEOP" || op.type === "CONTROL") {
      this.advance();
      const operand = this.parseType2();
      return {
        kind: "type1",
        type2,
        operator: {
          kind: "operator",
          operator:
            op.type === "RANGEOP"
              ? { kind: "range", inclusive: op.value === ".." }
              : { kind: "control", name: op.value.slice(1) },
          type2: operand,
          span: this.makeSpan(op.location),
        },
        span: this.makeSpan(token.location),
      };
    }

    return { kind: "type1", type2, span: this.makeSpan(token.location) };
  }

  parseType2(): Type2 {
    const token = this.curToken;
    const start = token.location;

    switch (token.type) {
      case "VALUE": {
        this.advance();
        return valueToType2(token.literal, this.makeSpan(start));
      }

      case "IDENT": {
        this.advance();
        const ident = this.identifier(token);
        if (this.check("LANGLEBRACKET")) {
          const genericArgs = this.parseGenericArgs();
          return { kind: "typename", ident, genericArgs, span: this.makeSpan(start) };
        }
        return { kind: "typename", ident, span: this.makeSpan(start) };
      }

      case "LPAREN": {
        this.advance();
        const pt = this.parseType();
        this.expect("RPAREN", "')'");
        return { kind: "parenthesized_type", pt, span: this.makeSpan(start) };
      }

      case "LBRACE": {
        this.advance();
        const group = this.parseGroup();
        this.expect("RBRACE", "'}'");
        return { kind: "map", group, span: this.makeSpan(start) };
      }

      case "LBRACKET": {
        this.advance();
        const group = this.parseGroup();
        this.expect("RBRACKET", "']'");
        return { kind: "array", group, span: this.makeSpan(start) };
      }

      case "UNWRAP": {
        this.advance();
        const ident = this.identifier(this.expect("IDENT", "type name after '~'"));
        const genericArgs = this.check("LANGLEBRACKET") ? this.parseGenericArgs() : undefined;
        return { kind: "unwrap", ident, genericArgs, span: this.makeSpan(start) };
      }

      case "GTOCHOICE": {
        this.advance();
        if (this.check("LPAREN")) {
          this.advance();
          const group = this.parseGroup();
          this.expect("RPAREN", "')'");
          return { kind: "choice_from_inline_group", group, span: this.makeSpan(start) };
        }
        const ident = this.identifier(this.expect("IDENT", "group name or '(' after '&'"));
        const genericArgs = this.check("LANGLEBRACKET") ? this.parseGenericArgs() : undefined;
        return { kind: "choice_from_group", ident, genericArgs, span: this.makeSpan(start) };
      }

      case "TAG": {
        if (token.major > 7) {
          throw this.error("UNRECOGNIZED_TYPE2", "major type 0 to 7");
        }
        this.advance();
        if (token.major !== 6 || !this.check("LPAREN")) {
          return { kind: "data_major_type", mt: token.major, constraint: token.tag, span: this.makeSpan(start) };
        }
        this.advance();
        const t = this.parseType();
        this.expect("RPAREN", "')'");
        return { kind: "tagged_data", tag: token.tag, t, span: this.makeSpan(start) };
      }

      case "HASH":
        this.advance();
        return { kind: "any", span: this.makeSpan(start) };

      default:
        throw this.error("UNRECOGNIZED_TYPE2", "type expression");
    }
  }

  // ===========================================================================
  // GROUPS
  // ===========================================================================

  /** grpchoice *("//" grpchoice) */
  parseGroup(): Group {
    const start = this.curToken.location;
    const groupChoices: GroupChoice[] = [this.parseGroupChoice()];

    while (this.check("GCHOICE")) {
      this.advance();
      groupChoices.push(this.parseGroupChoice());
    }

    return { kind: "group", groupChoices, span: this.makeSpan(start) };
  }

  /** *(grpent [","]) */
  parseGroupChoice(): GroupChoice {
    const start = this.curToken.location;
    const groupEntries: GroupChoiceEntry[] = [];

    while (!GROUP_END.has(this.curToken.type)) {
      const entry = this.parseGroupEntry();
      let trailingComma = false;
      if (this.check("COMMA")) {
        this.advance();
        trailingComma = true;
      }
      groupEntries.push({ entry, trailingComma });
    }

    return { kind: "group_choice", groupEntries, span: this.makeSpan(start) };
  }

  /**
   * [occur] [memberkey] type
   * [occur] groupname [genericarg]
   * [occur] "(" group ")"
   */
  parseGroupEntry(): GroupEntry {
    const start = this.curToken.location;
    const occur = this.parseOccurrence();

    if (this.check("LPAREN")) {
      this.advance();
      const group = this.parseGroup();
      this.expect("RPAREN", "')'");

      if (!this.check("ARROWMAP") && !this.check("CUT")) {
        return { kind: "inline_group", occur, group, span: this.makeSpan(start) };
      }

      const keySpan = group.span;
      this.consumeArrow();
      const memberKey: MemberKey = {
        kind: "non_member_key",
        nonMemberKey: this.nonMemberKey(group),
        span: keySpan,
      };
      const entryType = this.parseType();
      return this.valueMemberKeyEntry(start, occur, memberKey, entryType);
    }

    const t1 = this.parseType1();

    if (this.check("COLON")) {
      const memberKey = this.colonMemberKey(t1);
      this.advance();
      return this.valueMemberKeyEntry(start, occur, memberKey, this.parseType());
    }

    if (this.check("ARROWMAP") || this.check("CUT")) {
      const isCut = this.consumeArrow();
      const memberKey: MemberKey = { kind: "type1", t1, isCut, span: this.makeSpan(t1.span?.start ?? start) };
      return this.valueMemberKeyEntry(start, occur, memberKey, this.parseType());
    }

    if (t1.type2.kind === "typename" && !t1.operator && !this.check("TCHOICE")) {
      return {
        kind: "type_groupname",
        ge: {
          kind: "type_groupname_entry",
          occur,
          name: t1.type2.ident,
          genericArgs: t1.type2.genericArgs,
          span: this.makeSpan(start),
        },
        span: this.makeSpan(start),
      };
    }

    const typeChoices: TypeChoice[] = [{ kind: "type_choice", type1: t1, span: t1.span }];
    while (this.check("TCHOICE")) {
      this.advance();
      const type1 = this.parseType1();
      typeChoices.push({ kind: "type_choice", type1, span: type1.span });
    }
    const entryType: Type = {
      kind: "type",
      typeChoices,
      span: this.makeSpan(t1.span?.start ?? start),
    };
    return this.valueMemberKeyEntry(start, occur, undefined, entryType);
  }

  /** "?" / "*" / "+" / [uint] "*" [uint] */
  parseOccurrence(): Occurrence | undefined {
    const token = this.curToken;
    let occur: Occur | undefined;

    switch (token.type) {
      case "OPTIONAL":
        this.advance();
        occur = { kind: "optional" };
        break;
      case "ONEORMORE":
        this.advance();
        occur = { kind: "one_or_more" };
        break;
      case "ASTERISK": {
        this.advance();
        const upper = this.adjacentUint(token);
        occur = upper === undefined ? { kind: "zero_or_more" } : { kind: "exact", upper };
        break;
      }
      case "VALUE": {
        if (token.literal.type !== "uint" || this.peekToken.type !== "ASTERISK") {
          return undefined;
        }
        this.advance();
        const star = this.advance();
        occur = { kind: "exact", lower: token.literal.value, upper: this.adjacentUint(star) };
        break;
      }
      default:
        return undefined;
    }

    return { kind: "occurrence", occur, span: this.makeSpan(token.location) };
  }

  /** Consume an unsigned integer written directly after `previous` */
  private adjacentUint(previous: Token): bigint | undefined {
    const token = this.curToken;
    if (
      token.type === "VALUE" &&
      token.literal.type === "uint" &&
      token.location.offset === tokenEnd(previous).offset
    ) {
      this.advance();
      return token.literal.value;
    }
    return undefined;
  }

  /** ["^"] "=>"; returns whether a cut was present */
  private consumeArrow(): boolean {
    const isCut = this.check("CUT");
    if (isCut) this.advance();
    this.expect("ARROWMAP", "'=>'");
    return isCut;
  }

  /** bareword ":" or value ":" */
  private colonMemberKey(t1: Type1): MemberKey {
    const type2 = t1.type2;
    if (!t1.operator) {
      if (type2.kind === "typename" && !type2.genericArgs) {
        return { kind: "bareword", ident: type2.ident, span: type2.span };
      }
      const value = type2Value(type2);
      if (value) {
        return { kind: "value", value, span: type2.span };
      }
    }
    throw this.error("UNEXPECTED_TOKEN", "bareword or value before ':'");
  }

  /**
   * A parenthesized key is read as a type when it holds a single keyless
   * entry, and as a group otherwise.
   */
  private nonMemberKey(group: Group): NonMemberKey {
    const [choice] = group.groupChoices;
    if (group.groupChoices.length === 1 && choice && choice.groupEntries.length === 1) {
      const entry = choice.groupEntries[0]?.entry;
      if (entry?.kind === "value_member_key" && !entry.ge.memberKey && !entry.ge.occur) {
        return { kind: "type", type: entry.ge.entryType, span: group.span };
      }
      if (entry?.kind === "type_groupname" && !entry.ge.occur) {
        const type1: Type1 = {
          kind: "type1",
          type2: {
            kind: "typename",
            ident: entry.ge.name,
            genericArgs: entry.ge.genericArgs,
            span: entry.ge.span,
          },
          span: entry.ge.span,
        };
        return {
          kind: "type",
          type: {
            kind: "type",
            typeChoices: [{ kind: "type_choice", type1, span: entry.ge.span }],
            span: entry.ge.span,
          },
          span: group.span,
        };
      }
    }
    return { kind: "group", group, span: group.span };
  }

  private valueMemberKeyEntry(
    start: SourceLocation,
    occur: Occurrence | undefined,
    memberKey: MemberKey | undefined,
    entryType: Type
  ): GroupEntry {
    const span = this.makeSpan(start);
    return {
      kind: "value_member_key",
      ge: { kind: "value_member_key_entry", occur, memberKey, entryType, span },
      span,
    };
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Parse CDDL source text (or a token source) into a document. Errors from
 * every rule are reported together.
 */
export function parse(input: string | TokenSource, source?: string): ParseResult {
  const text = typeof input === "string" ? input : (source ?? "");
  let parser: Parser | undefined;

  try {
    parser = new Parser(typeof input === "string" ? new Lexer(input) : input, text);
    const cddl = parser.parseDocument();
    if (parser.errors.length > 0) {
      return { success: false, errors: [...parser.errors] };
    }
    return { success: true, cddl, errors: [] };
  } catch (error) {
    if (!(error instanceof CddlError)) throw error;
    return { success: false, errors: [...(parser?.errors ?? []), error] };
  }
}

/** Parse and throw the first error, for callers that only want the tree */
export function parseOrThrow(source: string): CDDL {
  const result = parse(source);
  if (!result.success) {
    throw result.errors[0] ?? new Error("Parse failed");
  }
  return result.cddl;
}
