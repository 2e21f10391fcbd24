/**
 * Query engine with exhaustive fallback
 *
 * Runs the inverter and evaluates its generator. When inversion fails, the
 * only safe answer is to enumerate the supplied domains and filter by the
 * original predicate.
 */

import type { Exp, Scan } from "../expr/types.js";
import { conjunction, fromExp, idPat, varsTuple } from "../expr/builders.js";
import type { Environment } from "../env/environment.js";
import { EvaluationError } from "../errors.js";
import { Evaluator, type EvaluationStats } from "../eval/evaluator.js";
import { distinctValues, valueToExp, type Value } from "../eval/values.js";
import { analyze } from "../inversion/dispatcher.js";
import { joinRemaining } from "../inversion/join.js";
import type { InversionFailure, InversionResult } from "../inversion/types.js";

export interface SolveOptions {
  env: Environment;
  /** Finite domains for goal variables no generator binds */
  domains?: Readonly<Record<string, readonly Value[]>>;
  maxInlineDepth?: number;
  memoize?: boolean;
  maxIterations?: number;
  verbose?: boolean;
}

export interface SolveResult {
  strategy: "generator" | "exhaustive";
  /** Distinct goal tuples (bare values for a one-variable goal) */
  rows: Value[];
  logs: string[];
  result?: InversionResult;
  failure?: InversionFailure;
  stats: EvaluationStats;
}

/**
 * Enumerate every binding of `goal` that satisfies `exp`
 */
export function solve(exp: Exp, goal: readonly string[], options: SolveOptions): SolveResult {
  const logs: string[] = [];
  const log = (msg: string) => {
    logs.push(msg);
    if (options.verbose) console.log(msg);
  };
  const inversion = {
    env: options.env,
    maxInlineDepth: options.maxInlineDepth,
    memoize: options.memoize,
    verbose: options.verbose,
  };
  const evaluator = new Evaluator(options.env, {
    maxIterations: options.maxIterations,
    maxInlineDepth: options.maxInlineDepth,
    verbose: options.verbose,
  });

  const domainScan = (v: string): Scan => {
    const domain = options.domains?.[v];
    if (!domain) {
      throw new EvaluationError({
        code: "NO_DOMAIN",
        message: `No domain supplied for ${v}`,
        details: { variable: v },
      });
    }
    return { pat: idPat(v), exp: valueToExp([...domain]) };
  };

  const report = analyze(exp, goal, inversion);
  logs.push(...report.logs);

  if (!report.result) {
    log(`[Solve] falling back to exhaustive enumeration: ${report.failure?.message ?? "no generator"}`);
    const query = fromExp(goal.map(domainScan), varsTuple(goal), exp);
    const rows = distinctValues(evaluator.collection(query));
    log(`[Solve] ${rows.length} rows (exhaustive)`);
    return { strategy: "exhaustive", rows, logs, failure: report.failure, stats: evaluator.stats };
  }

  const { result } = report;
  const joined = joinRemaining(result, goal, inversion);
  logs.push(...joined.logs);
  const scans = [...joined.scans, ...joined.missing.map(domainScan)];
  const { filters } = joined;

  const query = fromExp(scans, varsTuple(goal), filters.length === 0 ? undefined : conjunction(filters));
  const rows = distinctValues(evaluator.collection(query));
  log(`[Solve] ${rows.length} rows (generator)`);
  return { strategy: "generator", rows, logs, result, stats: evaluator.stats };
}
