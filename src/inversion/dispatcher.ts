/**
 * Inversion Dispatcher
 *
 * Classifies a predicate by shape and either converts it to a generator
 * directly (membership), delegates (conjunction, disjunction, closure
 * synthesis, built-ins), or inlines a user-defined function body.
 *
 * Every failure is a value. `invert` collapses failures to null; `analyze`
 * keeps the failure kind and the log for diagnostics.
 */

import type { AndExp, ApplyExp, ElemExp, ExistsExp, Exp, FunctionDef, OrExp } from "../expr/types.js";
import { eqExp, varExp } from "../expr/builders.js";
import { conjuncts, containsCall, freeVars, mentions, substitute } from "../expr/analysis.js";
import { prettyPrint } from "../expr/printer.js";
import { isBuiltin } from "../expr/builtins.js";
import { lookupFunction } from "../env/environment.js";
import { InversionError } from "../errors.js";
import { cardinalityOf, elementPattern, fail, makeResult, restrict, succeed } from "./generator.js";
import { invertDisjunction } from "./disjunction.js";
import { isClosureShaped, synthesizeClosure } from "./closure.js";
import { invertBuiltin } from "./inverters.js";
import type {
  Attempt,
  FailureKind,
  InversionContext,
  InversionFailure,
  InversionReport,
  InversionResult,
  InvertOptions,
  Session,
} from "./types.js";

export const DEFAULT_MAX_INLINE_DEPTH = 32;

/**
 * Invert a predicate, returning a finite generator or null
 */
export function invert(
  exp: Exp,
  goal: readonly string[],
  options: InvertOptions
): InversionResult | null {
  return analyze(exp, goal, options).result;
}

/**
 * Invert a predicate and report how it went
 */
export function analyze(
  exp: Exp,
  goal: readonly string[],
  options: InvertOptions
): InversionReport {
  validateGoal(goal);

  const logs: string[] = [];
  const log = (msg: string) => {
    logs.push(msg);
    if (options.verbose) console.log(msg);
  };

  let counter = 0;
  const session: Session = {
    maxInlineDepth: options.maxInlineDepth ?? DEFAULT_MAX_INLINE_DEPTH,
    memo: options.memoize === false ? null : new Map(),
    log,
    invert: dispatch,
    fresh: (base) => `${base}$${++counter}`,
  };
  const ctx: InversionContext = {
    env: options.env,
    bound: options.bound ?? new Map(),
    active: [],
    depth: 0,
    session,
  };

  log(`[Invert] ${prettyPrint(exp)} for (${goal.join(", ")})`);
  const attempt = dispatch(exp, goal, ctx);

  if (!attempt.success) {
    log(`[Invert] ${attempt.failure.kind}: ${attempt.failure.message}`);
    return { success: false, result: null, failure: attempt.failure, logs };
  }
  if (attempt.result.generator.cardinality !== "FINITE") {
    const failure: InversionFailure = {
      kind: "UnsupportedShape",
      message: "only an infinite generator was found",
    };
    log(`[Invert] ${failure.kind}: ${failure.message}`);
    return { success: false, result: null, failure, logs };
  }

  log(`[Invert] generator: ${prettyPrint(attempt.result.generator.exp)}`);
  return { success: true, result: attempt.result, logs };
}

function validateGoal(goal: readonly string[]): void {
  if (goal.length === 0) {
    throw new InversionError({ code: "INVALID_GOAL", message: "Goal pattern is empty" });
  }
  const seen = new Set<string>();
  for (const v of goal) {
    if (seen.has(v)) {
      throw new InversionError({
        code: "INVALID_GOAL",
        message: `Variable ${v} appears more than once in the goal`,
        details: { goal: [...goal] },
      });
    }
    seen.add(v);
  }
}

/**
 * Memoizing entry point for every recursive step
 */
function dispatch(exp: Exp, goal: readonly string[], ctx: InversionContext): Attempt {
  const memo = ctx.session.memo;
  if (!memo) return dispatchShape(exp, goal, ctx);

  const key = JSON.stringify([goal, ctx.active, ctx.depth, [...ctx.bound]]);
  let entries = memo.get(exp);
  const cached = entries?.get(key);
  if (cached) return cached;

  const attempt = dispatchShape(exp, goal, ctx);
  if (!entries) {
    entries = new Map();
    memo.set(exp, entries);
  }
  entries.set(key, attempt);
  return attempt;
}

function dispatchShape(exp: Exp, goal: readonly string[], ctx: InversionContext): Attempt {
  switch (exp.tag) {
    case "elem":
      return invertElem(exp, goal, ctx);
    case "and":
      return invertConjunction(exp, goal, ctx);
    case "or":
      return invertOr(exp, goal, ctx);
    case "exists":
      return invertExists(exp, goal, ctx);
    case "apply":
      return invertApply(exp, goal, ctx);
    case "cmp":
    case "not":
    case "lit":
    case "var":
      return fail("UnsupportedShape", `${prettyPrint(exp)} is only usable as a filter`);
    case "tuple":
    case "record":
    case "field":
    case "list":
    case "from":
    case "lambda":
      return fail("UnsupportedShape", `${exp.tag} expression is not a predicate`);
  }
}

/**
 * v ∈ C
 */
function invertElem(e: ElemExp, goal: readonly string[], ctx: InversionContext): Attempt {
  if (mentions(e.collection, goal)) {
    return fail("UnsupportedShape", `collection ${prettyPrint(e.collection)} depends on a goal variable`);
  }
  const goalSet = new Set(goal);
  const shape = elementPattern(e.value, goalSet, ctx.session.fresh);
  if (shape.bound.length === 0) {
    return fail("UnsupportedShape", `${prettyPrint(e)} binds no goal variable`);
  }

  // An equality over a goal variable the pattern does not bind cannot be
  // checked inside the generator; keep the membership itself as a filter
  const embedded = shape.eqs.filter((eq) =>
    [...freeVars(eq)].every((v) => !goalSet.has(v) || shape.bound.includes(v))
  );
  const exact = embedded.length === shape.eqs.length;

  const generator = restrict(
    { cardinality: cardinalityOf(e.collection, ctx), exp: e.collection, pat: shape.pat, bound: shape.bound },
    embedded,
    shape.bound
  );
  return succeed(makeResult(generator, goal, exact ? [] : [e], shape.fresh.length > 0));
}

/**
 * c1 ∧ ... ∧ cn: the finite conjunct binding the most goal variables
 * generates, everything else filters
 */
function invertConjunction(e: AndExp, goal: readonly string[], ctx: InversionContext): Attempt {
  const parts = conjuncts(e);
  const attempts = parts.map((p) => ctx.session.invert(p, goal, ctx));

  let primary = -1;
  let best = -1;
  attempts.forEach((a, i) => {
    if (!a.success || a.result.generator.cardinality !== "FINITE") return;
    if (a.result.satisfiedPats.length > best) {
      primary = i;
      best = a.result.satisfiedPats.length;
    }
  });

  // A conjunct re-entering a function being inlined cannot be a filter either
  const recursion = attempts.find((a) => !a.success && a.failure.kind === "UnsupportedRecursion");
  if (recursion && !recursion.success) return recursion;

  if (primary < 0) {
    for (const a of attempts) {
      if (!a.success && a.failure.kind !== "UnsupportedShape") {
        return fail(a.failure.kind, a.failure.message);
      }
    }
    return fail("UnsupportedShape", "no conjunct has a finite generator");
  }

  const chosen = attempts[primary];
  if (!chosen.success) return fail("UnsupportedShape", "no conjunct has a finite generator");
  const { result } = chosen;
  ctx.session.log(`[Invert] conjunct ${primary + 1} of ${parts.length} generates`);
  const filters = [...parts.filter((_, i) => i !== primary), ...result.remainingFilters];
  return succeed(makeResult(result.generator, goal, filters, result.mayHaveDuplicates));
}

/**
 * A disjunction that calls a function being inlined is only supported as
 * a closure-shaped body, which invertCall handles
 */
function invertOr(e: OrExp, goal: readonly string[], ctx: InversionContext): Attempt {
  const recursive = ctx.active.find((fn) => containsCall(e, fn));
  if (recursive !== undefined) {
    const current = ctx.active[ctx.active.length - 1];
    return recursive === current
      ? fail("UnsupportedRecursion", `self-call to ${recursive} inside a nested disjunction`)
      : fail("UnsupportedRecursion", `mutual recursion between ${current} and ${recursive}`);
  }
  return invertDisjunction(e, goal, ctx);
}

/**
 * exists vs where body: invert for goal ++ vs, then project
 */
function invertExists(e: ExistsExp, goal: readonly string[], ctx: InversionContext): Attempt {
  const taken = new Set([...goal, ...ctx.bound.keys()]);
  const renames = new Map<string, Exp>();
  const locals = e.vars.map((v) => {
    if (!taken.has(v)) return v;
    const name = ctx.session.fresh(v);
    renames.set(v, varExp(name));
    return name;
  });
  const body = renames.size === 0 ? e.body : substitute(e.body, renames);
  const inner = [...goal, ...locals];

  const attempt = ctx.session.invert(body, inner, ctx);
  if (!attempt.success) return attempt;
  const { result } = attempt;
  if (result.generator.cardinality !== "FINITE") {
    return fail("UnsupportedShape", "existential body has no finite generator");
  }

  const satisfied = goal.filter((v) => result.satisfiedPats.includes(v));
  if (satisfied.length === 0) {
    return fail("UnsupportedShape", "existential binds no goal variable");
  }
  const embedded = result.remainingFilters.filter((f) =>
    [...freeVars(f)].every((v) => !inner.includes(v) || result.satisfiedPats.includes(v))
  );
  const exact = embedded.length === result.remainingFilters.length;

  const generator = restrict(result.generator, embedded, satisfied);
  return succeed(makeResult(generator, goal, exact ? [] : [e], true));
}

function invertApply(e: ApplyExp, goal: readonly string[], ctx: InversionContext): Attempt {
  const def = lookupFunction(ctx.env, e.fn);
  if (def) return invertCall(def, e, goal, ctx);
  if (isBuiltin(e.fn)) return invertBuiltin(e, goal, ctx);
  return fail("UnsupportedShape", `unknown function ${e.fn}`);
}

/**
 * Inline a user-defined function call
 */
function invertCall(def: FunctionDef, call: ApplyExp, goal: readonly string[], ctx: InversionContext): Attempt {
  if (ctx.active.includes(def.name)) {
    const kind: FailureKind = "UnsupportedRecursion";
    const last = ctx.active[ctx.active.length - 1];
    return def.name === last
      ? fail(kind, `self-call to ${def.name} outside a closure-shaped body`)
      : fail(kind, `mutual recursion between ${def.name} and ${last}`);
  }
  if (def.params.length !== call.args.length) {
    return fail(
      "UnsupportedShape",
      `${def.name} expects ${def.params.length} arguments, got ${call.args.length}`
    );
  }
  if (ctx.depth + 1 > ctx.session.maxInlineDepth) {
    return fail("DepthExceeded", `inlining ${def.name} exceeds depth ${ctx.session.maxInlineDepth}`);
  }

  const inner: InversionContext = {
    ...ctx,
    active: [...ctx.active, def.name],
    depth: ctx.depth + 1,
  };
  ctx.session.log(`[Invert] inline ${def.name} at depth ${inner.depth}`);

  if (!isClosureShaped(def)) {
    const subst = new Map(def.params.map((p, i): [string, Exp] => [p, call.args[i]]));
    return ctx.session.invert(substitute(def.body, subst), goal, inner);
  }

  // Closure-shaped: synthesize over signature variables, then adapt the call site
  const signature: string[] = [];
  const eqs: Exp[] = [];
  call.args.forEach((arg) => {
    if (arg.tag === "var" && goal.includes(arg.name) && !signature.includes(arg.name)) {
      signature.push(arg.name);
      return;
    }
    const name = ctx.session.fresh(arg.tag === "var" ? arg.name : "arg");
    signature.push(name);
    eqs.push(eqExp(varExp(name), arg));
  });

  const rename = new Map(def.params.map((p, i): [string, Exp] => [p, varExp(signature[i])]));
  const body = substitute(def.body, rename);
  if (body.tag !== "or") return fail("UnsupportedShape", `${def.name} body is not a disjunction`);

  const attempt = synthesizeClosure(body, signature, def.name, { ...inner, bound: new Map() });
  if (!attempt.success) return attempt;

  const vars = goal.filter((v) => signature.includes(v));
  if (vars.length === 0) return fail("UnsupportedShape", `${prettyPrint(call)} binds no goal variable`);

  // As for membership: an argument over an unbound goal variable leaves the call as a filter
  const embedded = eqs.filter((eq) => [...freeVars(eq)].every((v) => !goal.includes(v) || vars.includes(v)));
  const exact = embedded.length === eqs.length;
  const generator = restrict(attempt.result.generator, embedded, vars);
  return succeed(makeResult(generator, goal, exact ? [] : [call], true));
}
