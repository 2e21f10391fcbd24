/**
 * Environment - resolves names to their definitions
 *
 * Function bodies for inlining, finite relations the inverter may enumerate,
 * and extents: unbounded domains that may carry a finite sample used only
 * by the exhaustive fallback.
 */

import type { FunctionDef } from "../expr/types.js";
import type { Value } from "../eval/values.js";

export type Binding =
  | { tag: "function"; def: FunctionDef }
  | { tag: "relation"; name: string; rows: readonly Value[] }
  | { tag: "extent"; name: string; domain?: readonly Value[] }
  | { tag: "value"; name: string; value: Value };

export interface Environment {
  lookup(name: string): Binding | undefined;
}

/**
 * Map-backed environment, optionally chained to a parent
 */
export class MapEnvironment implements Environment {
  private readonly bindings = new Map<string, Binding>();

  constructor(private readonly parent?: Environment) {}

  defineFunction(def: FunctionDef): this {
    this.bindings.set(def.name, { tag: "function", def });
    return this;
  }

  defineRelation(name: string, rows: readonly Value[]): this {
    this.bindings.set(name, { tag: "relation", name, rows });
    return this;
  }

  defineExtent(name: string, domain?: readonly Value[]): this {
    this.bindings.set(
      name,
      domain === undefined ? { tag: "extent", name } : { tag: "extent", name, domain }
    );
    return this;
  }

  defineValue(name: string, value: Value): this {
    this.bindings.set(name, { tag: "value", name, value });
    return this;
  }

  lookup(name: string): Binding | undefined {
    return this.bindings.get(name) ?? this.parent?.lookup(name);
  }

  names(): string[] {
    return [...this.bindings.keys()];
  }
}

export function lookupFunction(env: Environment, name: string): FunctionDef | undefined {
  const binding = env.lookup(name);
  return binding?.tag === "function" ? binding.def : undefined;
}

/**
 * Is the name bound to data (relation, extent or value) rather than a function?
 */
export function isGlobalData(env: Environment, name: string): boolean {
  const binding = env.lookup(name);
  return binding !== undefined && binding.tag !== "function";
}
