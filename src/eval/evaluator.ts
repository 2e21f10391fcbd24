/**
 * Reference Evaluator
 *
 * Runs the expressions the inverter produces: comprehensions, the `iterate`
 * fixpoint primitive and the other built-ins. Collections are arrays and
 * comprehensions keep duplicates; `union`, `distinct` and `iterate`
 * deduplicate.
 */

import type { ApplyExp, ExistsExp, Exp, FromExp, FunctionDef, LambdaExp, Pat } from "../expr/types.js";
import { applyExp, conjunction, fromExp, litExp, varExp } from "../expr/builders.js";
import { BUILTIN, isBuiltin } from "../expr/builtins.js";
import { lookupFunction, type Environment } from "../env/environment.js";
import { EvaluationError } from "../errors.js";
import { analyze } from "../inversion/dispatcher.js";
import { isClosureShaped } from "../inversion/closure.js";
import { toQuery } from "../inversion/generator.js";
import { joinRemaining } from "../inversion/join.js";
import {
  compareValues,
  distinctValues,
  isArray,
  isRecord,
  showValue,
  valueKey,
  valueToExp,
  valuesEqual,
  type Value,
} from "./values.js";

export type Scope = ReadonlyMap<string, Value>;

export interface EvaluatorOptions {
  /** Rounds a single iterate call may run */
  maxIterations?: number;
  /** Passed to the inverter for exists and tabled calls */
  maxInlineDepth?: number;
  verbose?: boolean;
}

export interface EvaluationStats {
  /** Step rounds that derived at least one new tuple */
  iterations: number;
  stepCalls: number;
}

export const DEFAULT_MAX_ITERATIONS = 10000;

export class Evaluator {
  readonly stats: EvaluationStats = { iterations: 0, stepCalls: 0 };
  /** Materialized closure-shaped predicates; null when not invertible */
  private readonly tables = new Map<string, ReadonlySet<string> | null>();
  /** Untabled closure calls being evaluated, by name and arguments */
  private readonly active = new Set<string>();
  private readonly maxIterations: number;

  constructor(
    private readonly env: Environment,
    private readonly options: EvaluatorOptions = {}
  ) {
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  }

  evaluate(e: Exp, scope: Scope = new Map()): Value {
    switch (e.tag) {
      case "lit":
        return e.value;

      case "var":
        return this.lookup(e.name, scope);

      case "apply":
        return this.call(e, scope);

      case "and":
        return this.truth(e.left, scope) && this.truth(e.right, scope);

      case "or":
        return this.truth(e.left, scope) || this.truth(e.right, scope);

      case "not":
        return !this.truth(e.operand, scope);

      case "cmp": {
        const left = this.evaluate(e.left, scope);
        const right = this.evaluate(e.right, scope);
        switch (e.op) {
          case "=":
            return valuesEqual(left, right);
          case "<>":
            return !valuesEqual(left, right);
          case "<":
            return compareValues(left, right) < 0;
          case "<=":
            return compareValues(left, right) <= 0;
          case ">":
            return compareValues(left, right) > 0;
          case ">=":
            return compareValues(left, right) >= 0;
        }
      }

      case "elem": {
        const value = valueKey(this.evaluate(e.value, scope));
        return this.collection(e.collection, scope).some((v) => valueKey(v) === value);
      }

      case "exists":
        return this.exists(e, scope);

      case "tuple":
      case "list":
        return e.items.map((item) => this.evaluate(item, scope));

      case "record": {
        const record: { [key: string]: Value } = {};
        for (const field of e.fields) record[field.name] = this.evaluate(field.value, scope);
        return record;
      }

      case "field":
        return this.project(this.evaluate(e.target, scope), e.key);

      case "from":
        return this.comprehension(e, scope);

      case "lambda":
        throw new EvaluationError({
          code: "TYPE_MISMATCH",
          message: "A function value cannot be used as data",
        });
    }
  }

  /**
   * Evaluate an expression that must produce a collection
   */
  collection(e: Exp, scope: Scope = new Map()): readonly Value[] {
    const value = this.evaluate(e, scope);
    if (!isArray(value)) {
      throw new EvaluationError({
        code: "TYPE_MISMATCH",
        message: `Expected a collection, got ${showValue(value)}`,
      });
    }
    return value;
  }

  private truth(e: Exp, scope: Scope): boolean {
    const value = this.evaluate(e, scope);
    if (typeof value !== "boolean") {
      throw new EvaluationError({
        code: "TYPE_MISMATCH",
        message: `Expected a boolean, got ${showValue(value)}`,
      });
    }
    return value;
  }

  private lookup(name: string, scope: Scope): Value {
    const local = scope.get(name);
    if (local !== undefined) return local;

    const binding = this.env.lookup(name);
    if (!binding) {
      throw new EvaluationError({
        code: "UNBOUND_VARIABLE",
        message: `Unbound variable: ${name}`,
      });
    }
    switch (binding.tag) {
      case "relation":
        return binding.rows;
      case "value":
        return binding.value;
      case "extent":
        if (binding.domain) return binding.domain;
        throw new EvaluationError({
          code: "NO_DOMAIN",
          message: `Extent ${name} has no finite domain to enumerate`,
        });
      case "function":
        throw new EvaluationError({
          code: "TYPE_MISMATCH",
          message: `Function ${name} used as a value`,
        });
    }
  }

  private project(target: Value, key: number | string): Value {
    if (typeof key === "number" && isArray(target) && key >= 0 && key < target.length) {
      return target[key];
    }
    if (typeof key === "string" && isRecord(target) && key in target) {
      return target[key];
    }
    throw new EvaluationError({
      code: "TYPE_MISMATCH",
      message: `Cannot project ${JSON.stringify(key)} from ${showValue(target)}`,
    });
  }

  private comprehension(e: FromExp, scope: Scope): Value[] {
    const out: Value[] = [];
    const scan = (i: number, current: Scope): void => {
      if (i === e.scans.length) {
        if (!e.where || this.truth(e.where, current)) out.push(this.evaluate(e.yield, current));
        return;
      }
      const { pat, exp } = e.scans[i];
      for (const item of this.collection(exp, current)) {
        const next = matchPat(pat, item, current);
        if (next) scan(i + 1, next);
      }
    };
    scan(0, scope);
    return out;
  }

  /**
   * exists vs where body: enumerate vs through the inverter, joining
   * generators until every vs is bound
   */
  private exists(e: ExistsExp, scope: Scope): boolean {
    const outer = new Map(scope);
    e.vars.forEach((v) => outer.delete(v));
    const bound = new Map([...outer].map(([name, value]): [string, Exp] => [name, valueToExp(value)]));

    const options = {
      env: this.env,
      bound,
      maxInlineDepth: this.options.maxInlineDepth,
      verbose: this.options.verbose,
    };
    const report = analyze(e.body, e.vars, options);
    const joined = report.result ? joinRemaining(report.result, e.vars, options) : null;
    if (!joined || joined.missing.length > 0) {
      throw new EvaluationError({
        code: "NO_DOMAIN",
        message: `No finite domain for ${e.vars.join(", ")}`,
        details: { reason: report.failure?.message ?? "existential variables left unbound" },
      });
    }
    const where = joined.filters.length === 0 ? undefined : conjunction(joined.filters);
    return this.collection(fromExp(joined.scans, litExp(true), where), outer).length > 0;
  }

  private call(e: ApplyExp, scope: Scope): Value {
    const def = lookupFunction(this.env, e.fn);
    if (def) {
      const args = e.args.map((a) => this.evaluate(a, scope));
      if (args.length !== def.params.length) {
        throw new EvaluationError({
          code: "TYPE_MISMATCH",
          message: `${def.name} expects ${def.params.length} arguments, got ${args.length}`,
        });
      }
      const locals = new Map(def.params.map((p, i): [string, Value] => [p, args[i]]));
      if (!isClosureShaped(def)) return this.evaluate(def.body, locals);

      const key = valueKey(args.length === 1 ? args[0] : args);
      const table = this.table(def);
      if (table) return table.has(key);
      // Untabled closure: a call that re-enters itself adds no new derivation
      const active = `${def.name}${key}`;
      if (this.active.has(active)) return false;
      this.active.add(active);
      try {
        return this.evaluate(def.body, locals);
      } finally {
        this.active.delete(active);
      }
    }
    if (isBuiltin(e.fn)) return this.builtin(e, scope);
    throw new EvaluationError({ code: "UNKNOWN_FUNCTION", message: `Unknown function: ${e.fn}` });
  }

  /**
   * Materialize a closure-shaped predicate once, so that calls on cyclic
   * relations terminate
   */
  private table(def: FunctionDef): ReadonlySet<string> | null {
    const cached = this.tables.get(def.name);
    if (cached !== undefined) return cached;

    const report = analyze(applyExp(def.name, ...def.params.map(varExp)), def.params, {
      env: this.env,
      maxInlineDepth: this.options.maxInlineDepth,
      verbose: this.options.verbose,
    });
    const result = report.result;
    const table =
      result && result.satisfiedPats.length === def.params.length
        ? new Set(this.collection(toQuery(result)).map(valueKey))
        : null;
    this.tables.set(def.name, table);
    return table;
  }

  private builtin(e: ApplyExp, scope: Scope): Value {
    const arity = (n: number): void => {
      if (e.args.length !== n) {
        throw new EvaluationError({
          code: "TYPE_MISMATCH",
          message: `${e.fn} expects ${n} arguments, got ${e.args.length}`,
        });
      }
    };

    switch (e.fn) {
      case BUILTIN.ITERATE: {
        arity(2);
        const step = e.args[1];
        if (step.tag !== "lambda") {
          throw new EvaluationError({ code: "TYPE_MISMATCH", message: "iterate expects a step function" });
        }
        return this.iterate(this.collection(e.args[0], scope), step, scope);
      }

      case BUILTIN.UNION:
        return distinctValues(e.args.flatMap((a) => this.collection(a, scope)));

      case BUILTIN.DISTINCT:
        arity(1);
        return distinctValues(this.collection(e.args[0], scope));

      case BUILTIN.RANGE: {
        arity(2);
        const lo = this.integer(e.args[0], scope);
        const hi = this.integer(e.args[1], scope);
        const out: number[] = [];
        for (let i = lo; i <= hi; i++) out.push(i);
        return out;
      }

      case BUILTIN.PREFIXES: {
        arity(1);
        const s = this.string(e.args[0], scope);
        const out: string[] = [];
        for (let i = 0; i <= s.length; i++) out.push(s.slice(0, i));
        return out;
      }

      case BUILTIN.IS_PREFIX: {
        arity(2);
        const prefix = this.string(e.args[0], scope);
        return this.string(e.args[1], scope).startsWith(prefix);
      }

      case BUILTIN.SIZE: {
        arity(1);
        const value = this.evaluate(e.args[0], scope);
        if (isArray(value) || typeof value === "string") return value.length;
        throw new EvaluationError({ code: "TYPE_MISMATCH", message: `size of ${showValue(value)}` });
      }

      default:
        throw new EvaluationError({ code: "UNKNOWN_FUNCTION", message: `Unknown function: ${e.fn}` });
    }
  }

  /**
   * Semi-naive fixpoint: each round the step sees only the tuples the
   * previous round added
   */
  private iterate(seed: readonly Value[], step: LambdaExp, scope: Scope): Value[] {
    const all = distinctValues(seed);
    const seen = new Set(all.map(valueKey));
    let delta: readonly Value[] = all;
    let rounds = 0;

    while (delta.length > 0) {
      if (rounds >= this.maxIterations) {
        throw new EvaluationError({
          code: "ITERATION_LIMIT",
          message: `iterate did not reach a fixpoint within ${this.maxIterations} rounds`,
          details: { size: all.length },
        });
      }
      rounds++;
      this.stats.stepCalls++;

      const produced = this.collection(step.body, new Map(scope).set(step.param, delta));
      const added: Value[] = [];
      for (const v of produced) {
        const key = valueKey(v);
        if (seen.has(key)) continue;
        seen.add(key);
        added.push(v);
        all.push(v);
      }
      if (added.length > 0) this.stats.iterations++;
      delta = added;
    }
    return all;
  }

  private integer(e: Exp, scope: Scope): number {
    const value = this.evaluate(e, scope);
    if (typeof value !== "number" || !Number.isInteger(value)) {
      throw new EvaluationError({ code: "TYPE_MISMATCH", message: `Expected an integer, got ${showValue(value)}` });
    }
    return value;
  }

  private string(e: Exp, scope: Scope): string {
    const value = this.evaluate(e, scope);
    if (typeof value !== "string") {
      throw new EvaluationError({ code: "TYPE_MISMATCH", message: `Expected a string, got ${showValue(value)}` });
    }
    return value;
  }
}

/**
 * Match a value against a pattern, extending the scope; null on mismatch
 */
export function matchPat(pat: Pat, value: Value, scope: Scope): Scope | null {
  switch (pat.tag) {
    case "id":
      return new Map(scope).set(pat.name, value);
    case "wild":
      return scope;
    case "lit":
      return valuesEqual(value, pat.value) ? scope : null;
    case "tuple": {
      if (!isArray(value) || value.length !== pat.items.length) return null;
      let current: Scope | null = scope;
      for (let i = 0; i < pat.items.length && current; i++) {
        current = matchPat(pat.items[i], value[i], current);
      }
      return current;
    }
  }
}

