import { readFile } from "fs/promises";
import { resolve } from "path";

/**
 * Configuration file types
 *
 * The file may set any subset of the fields; missing ones come from
 * DEFAULT_CONFIG.
 */

export interface InversionConfig {
  /** Maximum nesting of inlined function calls */
  maxInlineDepth: number;
  /** Memoize sub-expression results within one inversion */
  memoize: boolean;
}

export interface EvaluationConfig {
  /** Rounds an iterate call may run before giving up */
  maxIterations: number;
}

export interface Config {
  inversion: InversionConfig;
  evaluation: EvaluationConfig;
  verbose: boolean;
}

export const CONFIG_FILE = "inversion.config.json";

export const DEFAULT_CONFIG: Config = {
  inversion: {
    maxInlineDepth: 32,
    memoize: true,
  },
  evaluation: {
    maxIterations: 10000,
  },
  verbose: false,
};

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: JsonObject, name: string): JsonObject {
  const value = raw[name];
  if (value === undefined) return {};
  if (!isObject(value)) throw new Error(`Config: "${name}" must be an object`);
  return value;
}

function positiveInt(raw: JsonObject, key: string, fallback: number): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new Error(`Config: "${key}" must be a positive integer`);
  }
  return value;
}

function flag(raw: JsonObject, key: string, fallback: boolean): boolean {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") throw new Error(`Config: "${key}" must be a boolean`);
  return value;
}

/**
 * Merge a parsed config file over the defaults, rejecting malformed values
 */
export function parseConfig(raw: unknown): Config {
  if (!isObject(raw)) throw new Error("Config: expected a JSON object");
  const inversion = section(raw, "inversion");
  const evaluation = section(raw, "evaluation");

  return {
    inversion: {
      maxInlineDepth: positiveInt(inversion, "maxInlineDepth", DEFAULT_CONFIG.inversion.maxInlineDepth),
      memoize: flag(inversion, "memoize", DEFAULT_CONFIG.inversion.memoize),
    },
    evaluation: {
      maxIterations: positiveInt(evaluation, "maxIterations", DEFAULT_CONFIG.evaluation.maxIterations),
    },
    verbose: flag(raw, "verbose", DEFAULT_CONFIG.verbose),
  };
}

export async function loadConfig(configPath?: string): Promise<Config> {
  const path = configPath || resolve(process.cwd(), CONFIG_FILE);

  try {
    const content = await readFile(path, "utf-8");
    return parseConfig(JSON.parse(content));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      // Config file not found, use defaults
      return DEFAULT_CONFIG;
    }
    throw error;
  }
}
