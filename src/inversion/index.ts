/**
 * Predicate inversion - public surface
 */

export * from "./types.js";
export { analyze, invert, DEFAULT_MAX_INLINE_DEPTH } from "./dispatcher.js";
export { flatten, unionFinite, invertDisjunction } from "./disjunction.js";
export { synthesizeClosure, isClosureShaped } from "./closure.js";
export { cardinalityOf, elementPattern, restrict, toQuery } from "./generator.js";
export { joinRemaining, type JoinedScans } from "./join.js";
export { invertersFor, type BuiltinInverter } from "./inverters.js";
