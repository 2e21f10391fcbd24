/**
 * Structured errors
 *
 * Inversion failures are ordinary values (see inversion/types.ts); these
 * exceptions are for programming errors and for evaluation problems.
 */

export type InversionErrorCode =
  | "INVALID_GOAL"          // Empty goal or a variable listed twice
  | "CONTRACT_VIOLATION";   // e.g. union of zero or infinite generators

export type EvaluationErrorCode =
  | "UNBOUND_VARIABLE"      // Name not in scope nor in the environment
  | "UNKNOWN_FUNCTION"      // Call to an undefined function
  | "TYPE_MISMATCH"         // Operation applied to the wrong kind of value
  | "ITERATION_LIMIT"       // iterate exceeded the configured round limit
  | "NO_DOMAIN";            // Nothing finite to enumerate a variable from

export interface ErrorInfo<C extends string> {
  code: C;
  message: string;
  details?: Record<string, unknown>;
}

export class InversionError extends Error {
  public readonly error: ErrorInfo<InversionErrorCode>;

  constructor(error: ErrorInfo<InversionErrorCode>) {
    super(error.message);
    this.name = "InversionError";
    this.error = error;
  }

  get code(): InversionErrorCode {
    return this.error.code;
  }

  toJSON(): ErrorInfo<InversionErrorCode> {
    return this.error;
  }
}

export class EvaluationError extends Error {
  public readonly error: ErrorInfo<EvaluationErrorCode>;

  constructor(error: ErrorInfo<EvaluationErrorCode>) {
    super(error.message);
    this.name = "EvaluationError";
    this.error = error;
  }

  get code(): EvaluationErrorCode {
    return this.error.code;
  }

  toJSON(): ErrorInfo<EvaluationErrorCode> {
    return this.error;
  }
}
