/**
 * Structural analysis of expressions
 *
 * Free variables, capture-avoiding substitution, call counting and
 * structural equality. Everything here is pure.
 */

import type { Exp, FromExp, Pat, Scan } from "./types.js";
import { varExp } from "./builders.js";

/**
 * Get the immediate sub-expressions of an expression
 */
export function children(e: Exp): Exp[] {
  switch (e.tag) {
    case "lit":
    case "var":
      return [];
    case "apply":
      return [...e.args];
    case "tuple":
    case "list":
      return [...e.items];
    case "and":
    case "or":
    case "cmp":
      return [e.left, e.right];
    case "not":
      return [e.operand];
    case "elem":
      return [e.value, e.collection];
    case "exists":
      return [e.body];
    case "record":
      return e.fields.map((f) => f.value);
    case "field":
      return [e.target];
    case "from": {
      const result = e.scans.map((s) => s.exp);
      if (e.where) result.push(e.where);
      result.push(e.yield);
      return result;
    }
    case "lambda":
      return [e.body];
  }
}

/**
 * Variables bound by a pattern, left to right
 */
export function patVars(p: Pat): string[] {
  switch (p.tag) {
    case "id":
      return [p.name];
    case "wild":
    case "lit":
      return [];
    case "tuple":
      return p.items.flatMap(patVars);
  }
}

/**
 * Free variables of an expression
 */
export function freeVars(e: Exp): Set<string> {
  const result = new Set<string>();
  collectFree(e, new Set(), result);
  return result;
}

function collectFree(e: Exp, bound: ReadonlySet<string>, out: Set<string>): void {
  switch (e.tag) {
    case "var":
      if (!bound.has(e.name)) out.add(e.name);
      return;
    case "exists":
      collectFree(e.body, new Set([...bound, ...e.vars]), out);
      return;
    case "lambda":
      collectFree(e.body, new Set([...bound, e.param]), out);
      return;
    case "from": {
      const inner = new Set(bound);
      for (const scan of e.scans) {
        collectFree(scan.exp, inner, out);
        for (const v of patVars(scan.pat)) inner.add(v);
      }
      if (e.where) collectFree(e.where, inner, out);
      collectFree(e.yield, inner, out);
      return;
    }
    default:
      for (const c of children(e)) collectFree(c, bound, out);
  }
}

/**
 * Every variable name mentioned anywhere, bound or free
 */
export function allNames(e: Exp): Set<string> {
  const names = new Set<string>();
  const visit = (x: Exp): void => {
    switch (x.tag) {
      case "var":
        names.add(x.name);
        break;
      case "exists":
        x.vars.forEach((v) => names.add(v));
        break;
      case "lambda":
        names.add(x.param);
        break;
      case "from":
        x.scans.forEach((s) => patVars(s.pat).forEach((v) => names.add(v)));
        break;
      default:
        break;
    }
    children(x).forEach(visit);
  };
  visit(e);
  return names;
}

/**
 * Pick a name based on `base` that is not in `avoid`
 */
export function freshName(base: string, avoid: ReadonlySet<string>): string {
  if (!avoid.has(base)) return base;
  let i = 1;
  while (avoid.has(`${base}_${i}`)) i++;
  return `${base}_${i}`;
}

/**
 * Capture-avoiding substitution of variables by expressions
 */
export function substitute(e: Exp, subst: ReadonlyMap<string, Exp>): Exp {
  if (subst.size === 0) return e;
  switch (e.tag) {
    case "lit":
      return e;
    case "var":
      return subst.get(e.name) ?? e;
    case "apply":
      return { ...e, args: e.args.map((a) => substitute(a, subst)) };
    case "tuple":
      return { ...e, items: e.items.map((a) => substitute(a, subst)) };
    case "list":
      return { ...e, items: e.items.map((a) => substitute(a, subst)) };
    case "and":
    case "or":
    case "cmp":
      return {
        ...e,
        left: substitute(e.left, subst),
        right: substitute(e.right, subst),
      };
    case "not":
      return { ...e, operand: substitute(e.operand, subst) };
    case "elem":
      return {
        ...e,
        value: substitute(e.value, subst),
        collection: substitute(e.collection, subst),
      };
    case "record":
      return {
        ...e,
        fields: e.fields.map((f) => ({ name: f.name, value: substitute(f.value, subst) })),
      };
    case "field":
      return { ...e, target: substitute(e.target, subst) };
    case "exists": {
      const scope = enterScope(e.vars, subst, e);
      return { ...e, vars: scope.names, body: substitute(e.body, scope.subst) };
    }
    case "lambda": {
      const scope = enterScope([e.param], subst, e);
      return { ...e, param: scope.names[0], body: substitute(e.body, scope.subst) };
    }
    case "from": {
      let current = subst;
      const scans: Scan[] = [];
      for (const scan of e.scans) {
        const exp = substitute(scan.exp, current);
        const scope = enterScope(patVars(scan.pat), current, e);
        scans.push({ pat: renamePat(scan.pat, scope.renames), exp });
        current = scope.subst;
      }
      const yieldExp = substitute(e.yield, current);
      const result: FromExp = e.where
        ? { tag: "from", scans, where: substitute(e.where, current), yield: yieldExp }
        : { tag: "from", scans, yield: yieldExp };
      return result;
    }
  }
}

interface Scope {
  names: string[];
  subst: Map<string, Exp>;
  renames: Map<string, string>;
}

/**
 * Enter a binder: shadowed names leave the substitution, and binders that
 * would capture a free variable of a replacement are renamed.
 */
function enterScope(
  binders: readonly string[],
  subst: ReadonlyMap<string, Exp>,
  owner: Exp
): Scope {
  const inner = new Map(subst);
  binders.forEach((b) => inner.delete(b));

  const captured = new Set<string>();
  for (const replacement of inner.values()) {
    for (const v of freeVars(replacement)) captured.add(v);
  }

  const avoid = new Set([...allNames(owner), ...captured, ...inner.keys()]);
  const renames = new Map<string, string>();
  const names = binders.map((b) => {
    if (!captured.has(b)) return b;
    const fresh = freshName(b, avoid);
    avoid.add(fresh);
    renames.set(b, fresh);
    inner.set(b, varExp(fresh));
    return fresh;
  });
  return { names, subst: inner, renames };
}

function renamePat(p: Pat, renames: ReadonlyMap<string, string>): Pat {
  if (renames.size === 0) return p;
  switch (p.tag) {
    case "id":
      return { tag: "id", name: renames.get(p.name) ?? p.name };
    case "wild":
    case "lit":
      return p;
    case "tuple":
      return { tag: "tuple", items: p.items.map((i) => renamePat(i, renames)) };
  }
}

/**
 * Count calls to the named function anywhere in the expression
 */
export function countCalls(e: Exp, fn: string): number {
  const own = e.tag === "apply" && e.fn === fn ? 1 : 0;
  return children(e).reduce((n, c) => n + countCalls(c, fn), own);
}

export function containsCall(e: Exp, fn: string): boolean {
  return countCalls(e, fn) > 0;
}

/**
 * Decompose a conjunction chain into its conjuncts, left to right
 */
export function conjuncts(e: Exp): Exp[] {
  if (e.tag !== "and") return [e];
  return [...conjuncts(e.left), ...conjuncts(e.right)];
}

/**
 * Does the expression reference any of the given names freely?
 */
export function mentions(e: Exp, names: Iterable<string>): boolean {
  const free = freeVars(e);
  for (const n of names) {
    if (free.has(n)) return true;
  }
  return false;
}

/**
 * Structural equality
 */
export function expEquals(a: Exp, b: Exp): boolean {
  switch (a.tag) {
    case "lit":
      return b.tag === "lit" && a.value === b.value;
    case "var":
      return b.tag === "var" && a.name === b.name;
    case "apply":
      return b.tag === "apply" && a.fn === b.fn && allEqual(a.args, b.args, expEquals);
    case "and":
      return b.tag === "and" && expEquals(a.left, b.left) && expEquals(a.right, b.right);
    case "or":
      return b.tag === "or" && expEquals(a.left, b.left) && expEquals(a.right, b.right);
    case "not":
      return b.tag === "not" && expEquals(a.operand, b.operand);
    case "cmp":
      return b.tag === "cmp" && a.op === b.op && expEquals(a.left, b.left) && expEquals(a.right, b.right);
    case "elem":
      return b.tag === "elem" && expEquals(a.value, b.value) && expEquals(a.collection, b.collection);
    case "exists":
      return b.tag === "exists" && allEqual(a.vars, b.vars, (p, q) => p === q) && expEquals(a.body, b.body);
    case "tuple":
      return b.tag === "tuple" && allEqual(a.items, b.items, expEquals);
    case "list":
      return b.tag === "list" && allEqual(a.items, b.items, expEquals);
    case "record":
      return (
        b.tag === "record" &&
        allEqual(a.fields, b.fields, (p, q) => p.name === q.name && expEquals(p.value, q.value))
      );
    case "field":
      return b.tag === "field" && a.key === b.key && expEquals(a.target, b.target);
    case "from":
      return (
        b.tag === "from" &&
        allEqual(a.scans, b.scans, (p, q) => patEquals(p.pat, q.pat) && expEquals(p.exp, q.exp)) &&
        (a.where && b.where ? expEquals(a.where, b.where) : a.where === b.where) &&
        expEquals(a.yield, b.yield)
      );
    case "lambda":
      return b.tag === "lambda" && a.param === b.param && expEquals(a.body, b.body);
  }
}

export function patEquals(a: Pat, b: Pat): boolean {
  switch (a.tag) {
    case "id":
      return b.tag === "id" && a.name === b.name;
    case "wild":
      return b.tag === "wild";
    case "lit":
      return b.tag === "lit" && a.value === b.value;
    case "tuple":
      return b.tag === "tuple" && allEqual(a.items, b.items, patEquals);
  }
}

function allEqual<T>(a: readonly T[], b: readonly T[], eq: (p: T, q: T) => boolean): boolean {
  return a.length === b.length && a.every((item, i) => eq(item, b[i]));
}
