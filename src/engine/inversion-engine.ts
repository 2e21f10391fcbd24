/**
 * InversionEngine - holds an environment and configuration, and runs
 * inversion, evaluation and solving against them
 */

import type { Exp, FunctionDef } from "../expr/types.js";
import { MapEnvironment } from "../env/environment.js";
import { DEFAULT_CONFIG, loadConfig, type Config } from "../config.js";
import { Evaluator } from "../eval/evaluator.js";
import type { Value } from "../eval/values.js";
import { analyze } from "../inversion/dispatcher.js";
import type { InversionReport, InversionResult } from "../inversion/types.js";
import type { RelationStore } from "../persistence/relation-store.js";
import { solve, type SolveResult } from "./query.js";

export class InversionEngine {
  readonly env = new MapEnvironment();

  constructor(readonly config: Config = DEFAULT_CONFIG) {}

  defineFunction(def: FunctionDef): this {
    this.env.defineFunction(def);
    return this;
  }

  defineRelation(name: string, rows: readonly Value[]): this {
    this.env.defineRelation(name, rows);
    return this;
  }

  /**
   * Declare an unbounded domain, optionally with a finite sample the
   * exhaustive fallback may enumerate
   */
  defineExtent(name: string, domain?: readonly Value[]): this {
    this.env.defineExtent(name, domain);
    return this;
  }

  /**
   * Bind every relation in the store
   */
  loadRelations(store: RelationStore): this {
    store.bindInto(this.env);
    if (this.config.verbose) {
      console.log(`[Engine] Loaded relations: ${store.relationNames().join(", ")}`);
    }
    return this;
  }

  analyze(exp: Exp, goal: readonly string[], bound?: ReadonlyMap<string, Exp>): InversionReport {
    return analyze(exp, goal, {
      env: this.env,
      bound,
      maxInlineDepth: this.config.inversion.maxInlineDepth,
      memoize: this.config.inversion.memoize,
      verbose: this.config.verbose,
    });
  }

  invert(exp: Exp, goal: readonly string[], bound?: ReadonlyMap<string, Exp>): InversionResult | null {
    return this.analyze(exp, goal, bound).result;
  }

  solve(exp: Exp, goal: readonly string[], domains?: Record<string, readonly Value[]>): SolveResult {
    return solve(exp, goal, {
      env: this.env,
      domains,
      maxInlineDepth: this.config.inversion.maxInlineDepth,
      memoize: this.config.inversion.memoize,
      maxIterations: this.config.evaluation.maxIterations,
      verbose: this.config.verbose,
    });
  }

  evaluate(exp: Exp): Value {
    const evaluator = new Evaluator(this.env, {
      maxIterations: this.config.evaluation.maxIterations,
      maxInlineDepth: this.config.inversion.maxInlineDepth,
      verbose: this.config.verbose,
    });
    return evaluator.evaluate(exp);
  }
}

/**
 * Create an engine configured from a config file (defaults when absent)
 */
export async function createEngine(configPath?: string): Promise<InversionEngine> {
  return new InversionEngine(await loadConfig(configPath));
}
