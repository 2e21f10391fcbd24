export {
  Evaluator,
  matchPat,
  DEFAULT_MAX_ITERATIONS,
  type EvaluationStats,
  type EvaluatorOptions,
  type Scope,
} from "./evaluator.js";
export {
  compareValues,
  distinctValues,
  isArray,
  isRecord,
  showValue,
  valueKey,
  valuesEqual,
  valueToExp,
  type Value,
  type ValueRecord,
} from "./values.js";
