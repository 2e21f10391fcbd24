/**
 * Type definitions for predicate inversion
 */

import type { Exp, Pat } from "../expr/types.js";
import type { Environment } from "../env/environment.js";

export type Cardinality = "FINITE" | "INFINITE";

/**
 * How to enumerate candidate bindings: enumerate `exp`, match each element
 * against `pat`, and the variables in `bound` are bound.
 */
export interface Generator {
  readonly cardinality: Cardinality;
  readonly exp: Exp;
  readonly pat: Pat;
  readonly bound: readonly string[];
}

export interface InversionResult {
  /** Always FINITE once returned from `invert` */
  readonly generator: Generator;
  readonly mayHaveDuplicates: boolean;
  /** True when remainingFilters must still be applied */
  readonly isSupersetOfSolution: boolean;
  /** Goal variables bound by the generator, in goal order */
  readonly satisfiedPats: readonly string[];
  /** Conditions the caller must still apply per candidate */
  readonly remainingFilters: readonly Exp[];
}

export type FailureKind =
  | "UnsupportedShape"
  | "UnboundedBase"
  | "UnsupportedRecursion"
  | "DepthExceeded";

export interface InversionFailure {
  readonly kind: FailureKind;
  readonly message: string;
}

/**
 * Outcome of one dispatch step. Unlike the public result, a successful
 * attempt may still carry an INFINITE generator.
 */
export type Attempt =
  | { success: true; result: InversionResult }
  | { success: false; failure: InversionFailure };

export interface InvertOptions {
  env: Environment;
  /** Variables already available from the enclosing scope */
  bound?: ReadonlyMap<string, Exp>;
  maxInlineDepth?: number;
  memoize?: boolean;
  verbose?: boolean;
}

export interface InversionReport {
  success: boolean;
  result: InversionResult | null;
  failure?: InversionFailure;
  logs: string[];
}

export type InvertFn = (exp: Exp, goal: readonly string[], ctx: InversionContext) => Attempt;

/**
 * State owned by one top-level inversion call
 */
export interface Session {
  readonly maxInlineDepth: number;
  readonly memo: Map<Exp, Map<string, Attempt>> | null;
  readonly log: (msg: string) => void;
  /** Re-enter the dispatcher */
  readonly invert: InvertFn;
  /** A variable name not used anywhere else in this call */
  readonly fresh: (base: string) => string;
}

/**
 * Immutable context threaded through every dispatch call
 */
export interface InversionContext {
  readonly env: Environment;
  readonly bound: ReadonlyMap<string, Exp>;
  /** Names of user functions being inlined, outermost first */
  readonly active: readonly string[];
  readonly depth: number;
  readonly session: Session;
}
