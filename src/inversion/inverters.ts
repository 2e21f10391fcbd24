/**
 * Built-in Inverter Registry
 *
 * A built-in predicate is invertible in one argument position when it is
 * equivalent to membership of that argument in a finite collection computed
 * from the other arguments.
 */

import type { ApplyExp, Exp } from "../expr/types.js";
import { applyExp, elemExp } from "../expr/builders.js";
import { mentions } from "../expr/analysis.js";
import { BUILTIN } from "../expr/builtins.js";
import { fail } from "./generator.js";
import type { Attempt, InversionContext } from "./types.js";

export interface BuiltinInverter {
  fn: string;
  arity: number;
  /** Argument the inverter enumerates */
  position: number;
  /** Collection of every value that satisfies the predicate at `position` */
  collection: (args: readonly Exp[]) => Exp;
}

const INVERTERS: readonly BuiltinInverter[] = [
  {
    // isPrefix(p, s) holds exactly when p is one of the prefixes of s
    fn: BUILTIN.IS_PREFIX,
    arity: 2,
    position: 0,
    collection: (args) => applyExp(BUILTIN.PREFIXES, args[1]),
  },
];

export function invertersFor(fn: string): BuiltinInverter[] {
  return INVERTERS.filter((inv) => inv.fn === fn);
}

export function invertBuiltin(e: ApplyExp, goal: readonly string[], ctx: InversionContext): Attempt {
  for (const inv of invertersFor(e.fn)) {
    if (inv.arity !== e.args.length) continue;
    const others = e.args.filter((_, i) => i !== inv.position);
    if (others.some((a) => mentions(a, goal))) continue;
    ctx.session.log(`[Invert] ${e.fn} argument ${inv.position + 1} via membership`);
    return ctx.session.invert(elemExp(e.args[inv.position], inv.collection(e.args)), goal, ctx);
  }
  return fail("UnsupportedShape", `no inverter for built-in ${e.fn}/${e.args.length} with this binding`);
}
