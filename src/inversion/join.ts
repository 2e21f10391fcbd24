/**
 * Dependent join
 *
 * A conjunction inverts to one generator; the conjuncts it did not pick
 * come back as remaining filters. Goal variables the generator leaves
 * unbound can often be generated from those filters once the satisfied
 * variables are in scope, one scan after another.
 */

import type { Exp, Scan } from "../expr/types.js";
import { conjunction, varExp } from "../expr/builders.js";
import { analyze } from "./dispatcher.js";
import type { InversionResult, InvertOptions } from "./types.js";

export interface JoinedScans {
  /** Scans in dependency order; later scans may refer to earlier variables */
  scans: Scan[];
  satisfied: string[];
  /** Goal variables no scan binds */
  missing: string[];
  filters: Exp[];
  logs: string[];
}

/**
 * Extend `result` with scans for the goal variables it leaves unbound,
 * drawn from its remaining filters
 */
export function joinRemaining(
  result: InversionResult,
  goal: readonly string[],
  options: InvertOptions
): JoinedScans {
  const scans: Scan[] = [{ pat: result.generator.pat, exp: result.generator.exp }];
  const satisfied = [...result.satisfiedPats];
  const logs: string[] = [];
  let filters = [...result.remainingFilters];
  let missing = goal.filter((v) => !satisfied.includes(v));

  while (missing.length > 0 && filters.length > 0) {
    const bound = new Map<string, Exp>(options.bound);
    for (const v of satisfied) bound.set(v, varExp(v));
    const next = analyze(conjunction(filters), missing, { ...options, bound });
    logs.push(...next.logs);
    if (!next.result) break;
    scans.push({ pat: next.result.generator.pat, exp: next.result.generator.exp });
    satisfied.push(...next.result.satisfiedPats);
    filters = [...next.result.remainingFilters];
    missing = goal.filter((v) => !satisfied.includes(v));
  }

  return { scans, satisfied, missing, filters, logs };
}
