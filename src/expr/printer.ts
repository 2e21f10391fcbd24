/**
 * Pretty-printer for expressions and patterns
 *
 * Used in diagnostics; the output is meant for humans, not for re-parsing.
 */

import type { Exp, Pat, Scalar } from "./types.js";

export function prettyPrint(e: Exp): string {
  switch (e.tag) {
    case "lit":
      return showScalar(e.value);
    case "var":
      return e.name;
    case "apply":
      return `${e.fn}(${e.args.map(prettyPrint).join(", ")})`;
    case "and":
      return `${operand(e.left, "and")} andalso ${operand(e.right, "and")}`;
    case "or":
      return `${operand(e.left, "or")} orelse ${operand(e.right, "or")}`;
    case "not":
      return `not ${operand(e.operand, "not")}`;
    case "cmp":
      return `${operand(e.left, "cmp")} ${e.op} ${operand(e.right, "cmp")}`;
    case "elem":
      return `${operand(e.value, "cmp")} elem ${operand(e.collection, "cmp")}`;
    case "exists":
      return `exists ${e.vars.join(", ")} where ${prettyPrint(e.body)}`;
    case "tuple":
      return `(${e.items.map(prettyPrint).join(", ")})`;
    case "record":
      return `{${e.fields.map((f) => `${f.name} = ${prettyPrint(f.value)}`).join(", ")}}`;
    case "field":
      return `${operand(e.target, "cmp")}.${e.key}`;
    case "list":
      return `[${e.items.map(prettyPrint).join(", ")}]`;
    case "from": {
      const scans = e.scans
        .map((s) => `${printPat(s.pat)} in ${operand(s.exp, "scan")}`)
        .join(", ");
      const where = e.where ? ` where ${prettyPrint(e.where)}` : "";
      return `from ${scans}${where} yield ${prettyPrint(e.yield)}`;
    }
    case "lambda":
      return `fn ${e.param} => ${prettyPrint(e.body)}`;
  }
}

type Context = "and" | "or" | "not" | "cmp" | "scan";

/**
 * Print a sub-expression, parenthesized where the surrounding operator
 * would otherwise bind it differently
 */
function operand(e: Exp, context: Context): string {
  const text = prettyPrint(e);
  return needsParens(e, context) ? `(${text})` : text;
}

function needsParens(e: Exp, context: Context): boolean {
  switch (e.tag) {
    case "exists":
    case "from":
    case "lambda":
      return true;
    case "or":
      return context !== "or";
    case "and":
      return context !== "and" && context !== "or";
    case "not":
    case "cmp":
    case "elem":
      return context === "cmp" || context === "not";
    default:
      return false;
  }
}

export function printPat(p: Pat): string {
  switch (p.tag) {
    case "id":
      return p.name;
    case "wild":
      return "_";
    case "lit":
      return showScalar(p.value);
    case "tuple":
      return `(${p.items.map(printPat).join(", ")})`;
  }
}

function showScalar(value: Scalar): string {
  if (typeof value === "string") return JSON.stringify(value);
  return String(value);
}
