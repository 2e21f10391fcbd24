/**
 * Engine Module
 *
 * Solving with exhaustive fallback, and an engine object that carries an
 * environment and configuration.
 */

export { InversionEngine, createEngine } from "./inversion-engine.js";
export { solve, type SolveOptions, type SolveResult } from "./query.js";
