/**
 * Disjunction flattening and union of finite generators
 */

import type { Exp } from "../expr/types.js";
import { applyExp, varsPat } from "../expr/builders.js";
import { freeVars } from "../expr/analysis.js";
import { BUILTIN } from "../expr/builtins.js";
import { InversionError } from "../errors.js";
import { fail, makeResult, restrict, succeed } from "./generator.js";
import type { Attempt, Generator, InversionContext, InversionResult } from "./types.js";

/**
 * The non-`or` leaves of a disjunction chain, left to right.
 * Walks the left spine iteratively, since canonical chains grow to the left.
 */
export function flatten(e: Exp): Exp[] {
  const rights: Exp[] = [];
  let node = e;
  while (node.tag === "or") {
    rights.push(node.right);
    node = node.left;
  }
  const result: Exp[] = [node];
  for (let i = rights.length - 1; i >= 0; i--) {
    result.push(...flatten(rights[i]));
  }
  return result;
}

const sameVars = (a: readonly string[], b: readonly string[]): boolean =>
  a.length === b.length && a.every((v) => b.includes(v));

/**
 * Merge finite generators over the same variables into one generator
 * enumerating their deduplicated concatenation, in input order.
 */
export function unionFinite(generators: readonly Generator[]): Generator {
  if (generators.length === 0) {
    throw new InversionError({
      code: "CONTRACT_VIOLATION",
      message: "unionFinite requires at least one generator",
    });
  }
  const infinite = generators.findIndex((g) => g.cardinality !== "FINITE");
  if (infinite >= 0) {
    throw new InversionError({
      code: "CONTRACT_VIOLATION",
      message: "unionFinite requires finite generators",
      details: { index: infinite },
    });
  }
  const vars = generators[0].bound;
  const mismatch = generators.findIndex((g) => !sameVars(g.bound, vars));
  if (mismatch >= 0) {
    throw new InversionError({
      code: "CONTRACT_VIOLATION",
      message: "unionFinite requires generators over the same variables",
      details: { expected: [...vars], actual: [...generators[mismatch].bound] },
    });
  }

  return {
    cardinality: "FINITE",
    exp: applyExp(BUILTIN.UNION, ...generators.map((g) => restrict(g, [], vars).exp)),
    pat: varsPat(vars),
    bound: [...vars],
  };
}

/**
 * Invert each branch of a non-recursive disjunction and union them.
 *
 * Every branch must be finite and bind the same goal variables. Branch
 * filters are embedded before the union; a filter that needs a variable
 * the branch does not bind is dropped from the generator, and the whole
 * disjunction is then kept as a remaining filter.
 */
export function invertDisjunction(e: Exp, goal: readonly string[], ctx: InversionContext): Attempt {
  const branches = flatten(e);
  const { invert, log } = ctx.session;
  const results: InversionResult[] = [];

  for (const [i, branch] of branches.entries()) {
    const attempt = invert(branch, goal, ctx);
    if (!attempt.success) {
      return fail(
        attempt.failure.kind,
        `branch ${i + 1} of ${branches.length}: ${attempt.failure.message}`
      );
    }
    if (attempt.result.generator.cardinality !== "FINITE") {
      return fail("UnsupportedShape", `branch ${i + 1} of ${branches.length} is not finite`);
    }
    results.push(attempt.result);
  }

  if (results.length === 1) return succeed(results[0]);

  const vars = results[0].satisfiedPats;
  if (!results.every((r) => sameVars(r.satisfiedPats, vars))) {
    return fail("UnsupportedShape", "disjunction branches bind different variables");
  }

  let exact = true;
  const generators = results.map((r) => {
    const embeddable = r.remainingFilters.filter((f) =>
      [...freeVars(f)].every((v) => !goal.includes(v) || vars.includes(v))
    );
    if (embeddable.length < r.remainingFilters.length) exact = false;
    return restrict(r.generator, embeddable, vars);
  });

  log(`[Union] ${branches.length} branches over (${vars.join(", ")})`);
  return succeed(makeResult(unionFinite(generators), goal, exact ? [] : [e], false));
}
