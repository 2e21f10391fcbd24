/**
 * Expression module - the immutable predicate AST
 */

export * from "./types.js";
export * from "./builders.js";
export * from "./analysis.js";
export * from "./printer.js";
