/**
 * Shared utilities
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { ConfigurationError } from "../core/errors.js";
import {
  HarvestConfigSchema,
  formatZodError,
  safeValidate,
  type HarvestConfig,
  type HarvestConfigInput,
} from "./validation.js";

export * from "./logger.js";
export * from "./fs.js";
export * from "./async.js";
export * from "./validation.js";

// =============================================================================
// Configuration
// =============================================================================

export const CONFIG_FILE = "rtl-harvest.config.json";

export function getConfigPath(projectRoot: string = process.cwd()): string {
  return path.join(projectRoot, CONFIG_FILE);
}

function readJsonFile(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${filePath}`, [], { cause: String(error) });
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${filePath}`, [String(error)]);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Settings taken from the environment.
 *
 * YOSYS_BINARY names the oracle binary, RTL_HARVEST_OUTPUT_DIR the output directory.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): HarvestConfigInput {
  const fromEnv: HarvestConfigInput = {};
  if (env.YOSYS_BINARY) {
    fromEnv.oracle = { binary: env.YOSYS_BINARY };
  }
  if (env.RTL_HARVEST_OUTPUT_DIR) {
    fromEnv.outputDirectory = env.RTL_HARVEST_OUTPUT_DIR;
  }
  return fromEnv;
}

/**
 * Merge config layers; later layers win, `oracle` is merged key by key.
 */
export function mergeConfigLayers(...layers: Record<string, unknown>[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const previous = merged[key];
      merged[key] = key === "oracle" && isRecord(previous) && isRecord(value)
        ? { ...previous, ...value }
        : value;
    }
  }
  return merged;
}

export interface LoadConfigOptions {
  /** Directory holding rtl-harvest.config.json (default: cwd) */
  projectRoot?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence values, usually CLI flags */
  overrides?: HarvestConfigInput;
}

/**
 * Load configuration: file, then environment, then overrides.
 *
 * @throws ConfigurationError when the file is unreadable or a value is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): HarvestConfig {
  const { projectRoot = process.cwd(), env = process.env, overrides = {} } = options;

  const configPath = getConfigPath(projectRoot);
  let fromFile: Record<string, unknown> = {};
  if (fs.existsSync(configPath)) {
    const parsed = readJsonFile(configPath);
    if (!isRecord(parsed)) {
      throw new ConfigurationError(`${configPath} must contain a JSON object`);
    }
    fromFile = parsed;
  }

  const merged = mergeConfigLayers(fromFile, { ...configFromEnv(env) }, { ...overrides });
  const result = safeValidate(HarvestConfigSchema, merged);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
