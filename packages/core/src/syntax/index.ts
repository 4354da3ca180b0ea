/**
 * CDDL syntax: tokens, AST, parser and text rendering
 */

export * from "./errors.js";
export * from "./lexer.js";
export * from "./ast.js";
export * from "./format.js";
export { Parser, parse, parseOrThrow, type ParseResult } from "./parser.js";
