/**
 * Transitive-Closure Synthesizer
 *
 * Turns the body of a linearly self-recursive predicate,
 *
 *   base ∨ (exists vs where ... ∧ self(args) ∧ edge ...)
 *
 * into a fixpoint generator `iterate(seed, step)`. The seed enumerates the
 * base case; the step joins the tuples derived in the previous round with
 * the edge condition once.
 */

import type { ExistsExp, Exp, FunctionDef, OrExp } from "../expr/types.js";
import {
  applyExp,
  conjunction,
  fromExp,
  lambdaExp,
  tupleExp,
  varExp,
  varsPat,
  varsTuple,
} from "../expr/builders.js";
import { conjuncts, containsCall, countCalls, freeVars, mentions, substitute } from "../expr/analysis.js";
import { prettyPrint } from "../expr/printer.js";
import { BUILTIN } from "../expr/builtins.js";
import { isGlobalData } from "../env/environment.js";
import { elementPattern, fail, makeResult, restrict, succeed } from "./generator.js";
import type { Attempt, InversionContext } from "./types.js";

/**
 * A body is closure-shaped when it is a disjunction that calls its own function
 */
export function isClosureShaped(def: FunctionDef): boolean {
  return def.body.tag === "or" && containsCall(def.body, def.name);
}

/**
 * Split `base ∨ recursive`, accepting either order.
 * A multi-branch base is the left spine of a left-folded chain.
 */
function splitCases(body: OrExp, fn: string): { base: Exp; recursive: Exp } | string {
  const leftCalls = countCalls(body.left, fn);
  const rightCalls = countCalls(body.right, fn);
  if (leftCalls > 0 && rightCalls > 0) return "self-call in more than one disjunct";
  return leftCalls === 0
    ? { base: body.left, recursive: body.right }
    : { base: body.right, recursive: body.left };
}

/**
 * Rename existential variables that collide with the given names
 */
function freshenExists(e: ExistsExp, avoid: readonly string[], ctx: InversionContext): ExistsExp {
  const renames = new Map<string, Exp>();
  const vars = e.vars.map((v) => {
    if (!avoid.includes(v)) return v;
    const name = ctx.session.fresh(v);
    renames.set(v, varExp(name));
    return name;
  });
  return renames.size === 0 ? e : { tag: "exists", vars, body: substitute(e.body, renames) };
}

/**
 * Synthesize a fixpoint generator for a closure-shaped body over `signature`.
 *
 * `ctx` is the context the body is dispatched in: `fn` is on the active set
 * and the bound context is empty.
 */
export function synthesizeClosure(
  body: OrExp,
  signature: readonly string[],
  fn: string,
  ctx: InversionContext
): Attempt {
  const { invert, log } = ctx.session;

  const cases = splitCases(body, fn);
  if (typeof cases === "string") return fail("UnsupportedRecursion", `${fn}: ${cases}`);
  const { base, recursive } = cases;

  const calls = countCalls(recursive, fn);
  if (calls !== 1) {
    return fail("UnsupportedRecursion", `${fn}: expected exactly one self-call, found ${calls}`);
  }

  // Base case: must be finite and independent of the recursion
  const baseCtx: InversionContext = {
    ...ctx,
    bound: new Map(),
    active: ctx.active.filter((name) => name !== fn),
  };
  const baseAttempt = invert(base, signature, baseCtx);
  if (!baseAttempt.success) {
    return fail("UnboundedBase", `${fn}: base case not invertible: ${baseAttempt.failure.message}`);
  }
  const baseResult = baseAttempt.result;
  if (baseResult.generator.cardinality !== "FINITE") {
    return fail("UnboundedBase", `${fn}: base case is not finite`);
  }
  if (baseResult.satisfiedPats.length < signature.length) {
    const missing = signature.filter((v) => !baseResult.satisfiedPats.includes(v));
    return fail("UnboundedBase", `${fn}: base case does not bind ${missing.join(", ")}`);
  }
  const seed = restrict(baseResult.generator, baseResult.remainingFilters, signature);
  log(`[Closure] ${fn} seed: ${prettyPrint(seed.exp)}`);

  // Recursive case: exists vs where ... self(args) ... edge ...
  if (recursive.tag !== "exists") {
    return fail("UnsupportedShape", `${fn}: recursive case must be an existential`);
  }
  const rec = freshenExists(recursive, signature, ctx);
  const parts = conjuncts(rec.body);
  const selfIndex = parts.findIndex((p) => p.tag === "apply" && p.fn === fn);
  const selfCall = parts[selfIndex];
  if (selfIndex < 0 || selfCall.tag !== "apply") {
    return fail("UnsupportedShape", `${fn}: self-call must be a top-level conjunct`);
  }
  if (selfCall.args.length !== signature.length) {
    return fail("UnsupportedShape", `${fn}: self-call has ${selfCall.args.length} arguments`);
  }
  const edges = parts.filter((_, i) => i !== selfIndex);
  if (!edges.some((c) => mentions(c, rec.vars))) {
    return fail("UnsupportedShape", `${fn}: no edge condition relates an intermediate variable`);
  }

  // Pattern over the tuples derived in the previous round
  const known = new Set([...signature, ...rec.vars]);
  const element = selfCall.args.length === 1 ? selfCall.args[0] : tupleExp(...selfCall.args);
  const acc = elementPattern(element, known, ctx.session.fresh);
  const remaining = [...known].filter((v) => !acc.bound.includes(v));
  if (remaining.length === 0) {
    return fail("UnsupportedShape", `${fn}: edge condition binds nothing new`);
  }

  // Edge condition: enumerate what the self-call does not bind
  const edgeCtx: InversionContext = {
    ...ctx,
    bound: new Map(acc.bound.map((v): [string, Exp] => [v, varExp(v)])),
  };
  const edgeAttempt = invert(conjunction(edges), remaining, edgeCtx);
  if (!edgeAttempt.success) {
    return fail(edgeAttempt.failure.kind, `${fn}: edge condition: ${edgeAttempt.failure.message}`);
  }
  const edge = edgeAttempt.result;
  if (edge.generator.cardinality !== "FINITE" || edge.satisfiedPats.length < remaining.length) {
    return fail("UnsupportedShape", `${fn}: edge condition has no finite generator for ${remaining.join(", ")}`);
  }

  const accName = ctx.session.fresh("acc");
  const where = [...acc.eqs, ...edge.remainingFilters];
  const step = lambdaExp(
    accName,
    fromExp(
      [
        { pat: acc.pat, exp: varExp(accName) },
        { pat: edge.generator.pat, exp: edge.generator.exp },
      ],
      varsTuple(signature),
      where.length === 0 ? undefined : conjunction(where)
    )
  );

  const stray = [...freeVars(step)].filter((v) => !isGlobalData(ctx.env, v));
  if (stray.length > 0) {
    return fail("UnsupportedShape", `${fn}: step refers to unbound ${stray.join(", ")}`);
  }
  log(`[Closure] ${fn} step: ${prettyPrint(step)}`);

  return succeed(
    makeResult(
      {
        cardinality: "FINITE",
        exp: applyExp(BUILTIN.ITERATE, seed.exp, step),
        pat: varsPat(signature),
        bound: [...signature],
      },
      signature,
      [],
      true
    )
  );
}
