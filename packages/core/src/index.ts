/**
 * @cddl-tree/core
 * CDDL parser, AST visitor and parent index
 */

// Syntax
export * from "./syntax/index.js";

// Visitor and parent tracking
export * from "./visitor/index.js";
