/**
 * Expression builders
 *
 * Small constructors used by callers that elaborate predicates, and by the
 * engine when it synthesizes new expressions.
 */

import type {
  AndExp,
  ApplyExp,
  CmpExp,
  CmpOp,
  ElemExp,
  ExistsExp,
  Exp,
  FieldExp,
  FromExp,
  FunctionDef,
  LambdaExp,
  ListExp,
  LitExp,
  NotExp,
  OrExp,
  Pat,
  RecordExp,
  Scalar,
  Scan,
  TupleExp,
  VarExp,
} from "./types.js";

export const litExp = (value: Scalar): LitExp => ({ tag: "lit", value });

export const varExp = (name: string): VarExp => ({ tag: "var", name });

export const applyExp = (fn: string, ...args: Exp[]): ApplyExp => ({
  tag: "apply",
  fn,
  args,
});

export const andExp = (left: Exp, right: Exp): AndExp => ({
  tag: "and",
  left,
  right,
});

export const orExp = (left: Exp, right: Exp): OrExp => ({
  tag: "or",
  left,
  right,
});

export const notExp = (operand: Exp): NotExp => ({ tag: "not", operand });

export const cmpExp = (op: CmpOp, left: Exp, right: Exp): CmpExp => ({
  tag: "cmp",
  op,
  left,
  right,
});

export const eqExp = (left: Exp, right: Exp): CmpExp => cmpExp("=", left, right);

export const elemExp = (value: Exp, collection: Exp): ElemExp => ({
  tag: "elem",
  value,
  collection,
});

export const existsExp = (vars: string[], body: Exp): ExistsExp => ({
  tag: "exists",
  vars,
  body,
});

export const tupleExp = (...items: Exp[]): TupleExp => ({ tag: "tuple", items });

export const recordExp = (fields: Record<string, Exp>): RecordExp => ({
  tag: "record",
  fields: Object.entries(fields).map(([name, value]) => ({ name, value })),
});

export const fieldExp = (target: Exp, key: number | string): FieldExp => ({
  tag: "field",
  target,
  key,
});

export const listExp = (...items: Exp[]): ListExp => ({ tag: "list", items });

export const fromExp = (scans: Scan[], yieldExp: Exp, where?: Exp): FromExp =>
  where === undefined
    ? { tag: "from", scans, yield: yieldExp }
    : { tag: "from", scans, where, yield: yieldExp };

export const lambdaExp = (param: string, body: Exp): LambdaExp => ({
  tag: "lambda",
  param,
  body,
});

/**
 * Left-fold a list of conjuncts: [a, b, c] => ((a and b) and c).
 * The empty conjunction is `true`.
 */
export function conjunction(exps: readonly Exp[]): Exp {
  if (exps.length === 0) return litExp(true);
  return exps.slice(1).reduce<Exp>((acc, e) => andExp(acc, e), exps[0]);
}

/**
 * Left-fold a list of disjuncts. The empty disjunction is `false`.
 */
export function disjunction(exps: readonly Exp[]): Exp {
  if (exps.length === 0) return litExp(false);
  return exps.slice(1).reduce<Exp>((acc, e) => orExp(acc, e), exps[0]);
}

// Patterns

export const idPat = (name: string): Pat => ({ tag: "id", name });

export const wildPat = (): Pat => ({ tag: "wild" });

export const litPat = (value: Scalar): Pat => ({ tag: "lit", value });

export const tuplePat = (...items: Pat[]): Pat => ({ tag: "tuple", items });

/**
 * Pattern binding the given variables: a bare id for one variable,
 * a tuple otherwise.
 */
export function varsPat(names: readonly string[]): Pat {
  return names.length === 1 ? idPat(names[0]) : tuplePat(...names.map(idPat));
}

/**
 * Expression producing the value `varsPat(names)` destructures.
 */
export function varsTuple(names: readonly string[]): Exp {
  return names.length === 1 ? varExp(names[0]) : tupleExp(...names.map(varExp));
}

export function defineFunction(
  name: string,
  params: string[],
  body: Exp
): FunctionDef {
  return { name, params, body };
}
