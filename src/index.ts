/**
 * Predicate inversion library entry point
 *
 * This module exports the public API for programmatic use.
 */

// Expression model
export * from "./expr/index.js";
export { BUILTIN, isBuiltin, type BuiltinName } from "./expr/builtins.js";

// Environment
export {
  MapEnvironment,
  lookupFunction,
  isGlobalData,
  type Binding,
  type Environment,
} from "./env/environment.js";

// Inversion
export * from "./inversion/index.js";

// Evaluation
export * from "./eval/index.js";

// Solving and the engine object
export * from "./engine/index.js";

// Relation storage
export { RelationStore, parseValue } from "./persistence/relation-store.js";

// Configuration
export {
  loadConfig,
  parseConfig,
  DEFAULT_CONFIG,
  CONFIG_FILE,
  type Config,
  type InversionConfig,
  type EvaluationConfig,
} from "./config.js";

// Errors
export {
  InversionError,
  EvaluationError,
  type ErrorInfo,
  type InversionErrorCode,
  type EvaluationErrorCode,
} from "./errors.js";
