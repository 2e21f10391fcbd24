/**
 * Runtime values
 *
 * Tuples and collections are both arrays at run time; records are plain
 * objects. Equality is structural and goes through a canonical key.
 */

import type { Exp, Scalar } from "../expr/types.js";
import { listExp, litExp, recordExp } from "../expr/builders.js";
import { EvaluationError } from "../errors.js";

export type Value = Scalar | readonly Value[] | ValueRecord;

export interface ValueRecord {
  readonly [key: string]: Value;
}

export function isRecord(v: Value): v is ValueRecord {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function isArray(v: Value): v is readonly Value[] {
  return Array.isArray(v);
}

/**
 * Canonical string for a value; equal values have equal keys.
 * Record keys are sorted so field order does not matter.
 */
export function valueKey(v: Value): string {
  if (isArray(v)) return `[${v.map(valueKey).join(",")}]`;
  if (isRecord(v)) {
    const keys = Object.keys(v).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${valueKey(v[k])}`).join(",")}}`;
  }
  return JSON.stringify(v);
}

export function valuesEqual(a: Value, b: Value): boolean {
  return valueKey(a) === valueKey(b);
}

/**
 * Remove duplicates, keeping the first occurrence of each value
 */
export function distinctValues(values: readonly Value[]): Value[] {
  const seen = new Set<string>();
  const result: Value[] = [];
  for (const v of values) {
    const key = valueKey(v);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(v);
  }
  return result;
}

/**
 * Order two numbers or two strings
 */
export function compareValues(a: Value, b: Value): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  throw new EvaluationError({
    code: "TYPE_MISMATCH",
    message: `Cannot order ${showValue(a)} and ${showValue(b)}`,
  });
}

export function showValue(v: Value): string {
  if (isArray(v)) return `(${v.map(showValue).join(", ")})`;
  if (isRecord(v)) {
    return `{${Object.keys(v)
      .map((k) => `${k} = ${showValue(v[k])}`)
      .join(", ")}}`;
  }
  if (typeof v === "string") return JSON.stringify(v);
  return String(v);
}

/**
 * Literal expression denoting the value. Arrays become list literals,
 * which evaluate back to the same array.
 */
export function valueToExp(v: Value): Exp {
  if (isArray(v)) return listExp(...v.map(valueToExp));
  if (isRecord(v)) {
    const fields: Record<string, Exp> = {};
    for (const k of Object.keys(v)) fields[k] = valueToExp(v[k]);
    return recordExp(fields);
  }
  return litExp(v);
}
