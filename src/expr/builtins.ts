/**
 * Names of the built-in functions shared by the inverter and the evaluator
 */

export const BUILTIN = {
  /** iterate(seed, step): least fixpoint of repeated step application */
  ITERATE: "iterate",
  /** union(c1, ..., cn): deduplicated concatenation, in argument order */
  UNION: "union",
  DISTINCT: "distinct",
  /** range(lo, hi): integers lo..hi inclusive */
  RANGE: "range",
  /** prefixes(s): every prefix of s, shortest first, including "" and s */
  PREFIXES: "prefixes",
  IS_PREFIX: "isPrefix",
  SIZE: "size",
} as const;

export type BuiltinName = (typeof BUILTIN)[keyof typeof BUILTIN];

const NAMES: ReadonlySet<string> = new Set(Object.values(BUILTIN));

export function isBuiltin(name: string): name is BuiltinName {
  return NAMES.has(name);
}
