/**
 * Expression Model
 *
 * The typed, already-elaborated predicate trees the inverter works on.
 * Trees are immutable: the engine never mutates a node it was given and
 * only ever builds new nodes (step functions, comprehensions, iterate calls).
 */

/**
 * Scalar literal values
 */
export type Scalar = number | string | boolean | null;

/**
 * Comparison operators
 */
export type CmpOp = "=" | "<>" | "<" | "<=" | ">" | ">=";

/**
 * Exp - the abstract syntax tree for predicate and collection expressions
 */
export type Exp =
  | LitExp
  | VarExp
  | ApplyExp
  | AndExp
  | OrExp
  | NotExp
  | CmpExp
  | ElemExp
  | ExistsExp
  | TupleExp
  | RecordExp
  | FieldExp
  | ListExp
  | FromExp
  | LambdaExp;

export interface LitExp {
  readonly tag: "lit";
  readonly value: Scalar;
}

export interface VarExp {
  readonly tag: "var";
  readonly name: string;
}

/**
 * Function application. `fn` names either a user-defined function
 * (resolved through the environment) or a built-in.
 */
export interface ApplyExp {
  readonly tag: "apply";
  readonly fn: string;
  readonly args: readonly Exp[];
}

/**
 * n-ary conjunctions are left folds: ((a and b) and c)
 */
export interface AndExp {
  readonly tag: "and";
  readonly left: Exp;
  readonly right: Exp;
}

export interface OrExp {
  readonly tag: "or";
  readonly left: Exp;
  readonly right: Exp;
}

export interface NotExp {
  readonly tag: "not";
  readonly operand: Exp;
}

export interface CmpExp {
  readonly tag: "cmp";
  readonly op: CmpOp;
  readonly left: Exp;
  readonly right: Exp;
}

/**
 * value ∈ collection
 */
export interface ElemExp {
  readonly tag: "elem";
  readonly value: Exp;
  readonly collection: Exp;
}

/**
 * exists v1, ..., vn where body
 */
export interface ExistsExp {
  readonly tag: "exists";
  readonly vars: readonly string[];
  readonly body: Exp;
}

export interface TupleExp {
  readonly tag: "tuple";
  readonly items: readonly Exp[];
}

export interface RecordField {
  readonly name: string;
  readonly value: Exp;
}

export interface RecordExp {
  readonly tag: "record";
  readonly fields: readonly RecordField[];
}

/**
 * Projection: #2 t (0-based index) or r.name
 */
export interface FieldExp {
  readonly tag: "field";
  readonly target: Exp;
  readonly key: number | string;
}

/**
 * Literal finite collection
 */
export interface ListExp {
  readonly tag: "list";
  readonly items: readonly Exp[];
}

export interface Scan {
  readonly pat: Pat;
  readonly exp: Exp;
}

/**
 * from p1 in e1, ..., pn in en where cond yield result
 */
export interface FromExp {
  readonly tag: "from";
  readonly scans: readonly Scan[];
  readonly where?: Exp;
  readonly yield: Exp;
}

export interface LambdaExp {
  readonly tag: "lambda";
  readonly param: string;
  readonly body: Exp;
}

/**
 * Pat - how an enumerated element binds variables
 */
export type Pat =
  | { readonly tag: "id"; readonly name: string }
  | { readonly tag: "wild" }
  | { readonly tag: "lit"; readonly value: Scalar }
  | { readonly tag: "tuple"; readonly items: readonly Pat[] };

/**
 * A user-defined (possibly self-recursive) boolean function
 */
export interface FunctionDef {
  readonly name: string;
  readonly params: readonly string[];
  readonly body: Exp;
}
