/**
 * Generator helpers: static finiteness, element patterns and projection
 */

import type { Exp, Pat } from "../expr/types.js";
import {
  conjunction,
  eqExp,
  fromExp,
  idPat,
  litPat,
  tuplePat,
  varExp,
  varsPat,
  varsTuple,
} from "../expr/builders.js";
import { patEquals } from "../expr/analysis.js";
import { BUILTIN } from "../expr/builtins.js";
import type { Environment } from "../env/environment.js";
import type {
  Attempt,
  Cardinality,
  FailureKind,
  Generator,
  InversionResult,
} from "./types.js";

interface FinitenessScope {
  readonly env: Environment;
  readonly bound: ReadonlyMap<string, Exp>;
}

/**
 * Is the collection statically known to be finite?
 *
 * Conservative: anything not recognized is INFINITE.
 */
export function cardinalityOf(collection: Exp, scope: FinitenessScope): Cardinality {
  const all = (exps: readonly Exp[]): Cardinality =>
    exps.every((x) => cardinalityOf(x, scope) === "FINITE") ? "FINITE" : "INFINITE";

  switch (collection.tag) {
    case "list":
      return "FINITE";

    case "var": {
      const binding = scope.bound.get(collection.name);
      if (binding) {
        // Drop the name so a self-referential binding cannot loop
        const rest = new Map(scope.bound);
        rest.delete(collection.name);
        return cardinalityOf(binding, { env: scope.env, bound: rest });
      }
      const global = scope.env.lookup(collection.name);
      if (global?.tag === "relation") return "FINITE";
      if (global?.tag === "value" && Array.isArray(global.value)) return "FINITE";
      return "INFINITE";
    }

    case "from":
      return all(collection.scans.map((s) => s.exp));

    case "apply":
      switch (collection.fn) {
        case BUILTIN.ITERATE:
          return collection.args.length === 2 ? all([collection.args[0]]) : "INFINITE";
        case BUILTIN.UNION:
        case BUILTIN.DISTINCT:
          return all(collection.args);
        case BUILTIN.RANGE:
        case BUILTIN.PREFIXES:
          return "FINITE";
        default:
          return "INFINITE";
      }

    default:
      return "INFINITE";
  }
}

/**
 * How a membership value destructures an element
 */
export interface ElementShape {
  pat: Pat;
  /** Equalities tying fresh pattern variables to the value's sub-expressions */
  eqs: Exp[];
  /** Goal variables bound by the pattern, in pattern order */
  bound: string[];
  fresh: string[];
}

/**
 * Convert a membership value into a pattern over the goal variables.
 *
 * The first occurrence of a goal variable binds it; literals match
 * themselves; anything else gets a fresh name and an equality.
 */
export function elementPattern(
  value: Exp,
  goal: ReadonlySet<string>,
  fresh: (base: string) => string
): ElementShape {
  const shape: ElementShape = { pat: idPat(""), eqs: [], bound: [], fresh: [] };

  const walk = (e: Exp): Pat => {
    if (e.tag === "var" && goal.has(e.name) && !shape.bound.includes(e.name)) {
      shape.bound.push(e.name);
      return idPat(e.name);
    }
    if (e.tag === "lit") return litPat(e.value);
    if (e.tag === "tuple") return tuplePat(...e.items.map(walk));
    const name = fresh(e.tag === "var" ? e.name : "v");
    shape.fresh.push(name);
    shape.eqs.push(eqExp(varExp(name), e));
    return idPat(name);
  };

  shape.pat = walk(value);
  return shape;
}

/**
 * Embed filters into a generator and project it onto `vars`.
 * Returns the generator unchanged when there is nothing to do.
 */
export function restrict(gen: Generator, filters: readonly Exp[], vars: readonly string[]): Generator {
  const pat = varsPat(vars);
  if (filters.length === 0 && patEquals(gen.pat, pat)) return gen;
  return {
    cardinality: gen.cardinality,
    exp: fromExp(
      [{ pat: gen.pat, exp: gen.exp }],
      varsTuple(vars),
      filters.length === 0 ? undefined : conjunction(filters)
    ),
    pat,
    bound: [...vars],
  };
}

/**
 * Build a frozen result; satisfiedPats follows goal order.
 */
export function makeResult(
  generator: Generator,
  goal: readonly string[],
  remainingFilters: readonly Exp[],
  mayHaveDuplicates: boolean
): InversionResult {
  return Object.freeze({
    generator: Object.freeze({ ...generator, bound: Object.freeze([...generator.bound]) }),
    mayHaveDuplicates,
    isSupersetOfSolution: remainingFilters.length > 0,
    satisfiedPats: Object.freeze(goal.filter((v) => generator.bound.includes(v))),
    remainingFilters: Object.freeze([...remainingFilters]),
  });
}

/**
 * The comprehension a consumer runs to enumerate the solutions:
 * `from <pat> in <generator> where <filters> yield <satisfied vars>`
 */
export function toQuery(result: InversionResult): Exp {
  const { generator, remainingFilters, satisfiedPats } = result;
  return fromExp(
    [{ pat: generator.pat, exp: generator.exp }],
    varsTuple(satisfiedPats),
    remainingFilters.length === 0 ? undefined : conjunction(remainingFilters)
  );
}

export const succeed = (result: InversionResult): Attempt => ({ success: true, result });

export const fail = (kind: FailureKind, message: string): Attempt => ({
  success: false,
  failure: { kind, message },
});
