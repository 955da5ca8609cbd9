/**
 * Helpers shared by the CLI commands
 */

import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import { ConfigurationError } from "../../core/errors.js";
import { isSourceKind, type ExtractionOutcome, type SourceKind } from "../../types/index.js";
import { loadConfig, setDefaultLogFile } from "../../utils/index.js";
import type { HarvestConfig, HarvestConfigInput } from "../../utils/validation.js";

/**
 * Flags common to the commands that run the pipeline
 */
export interface PipelineFlags {
  output?: string;
  kinds?: string;
  timeout?: number;
  passes?: number;
  logFile?: string;
  console?: boolean;
}

/**
 * Parse a comma-separated kind list, e.g. "systemverilog,verilog".
 *
 * @throws ConfigurationError on an unknown kind
 */
export function parseKinds(value: string): SourceKind[] {
  const kinds: SourceKind[] = [];
  for (const raw of value.split(",")) {
    const kind = raw.trim();
    if (!kind) continue;
    if (!isSourceKind(kind)) {
      throw new ConfigurationError(`Unknown source kind "${kind}"`, [`sourceKinds: ${kind}`]);
    }
    if (!kinds.includes(kind)) kinds.push(kind);
  }
  return kinds;
}

/**
 * commander argument parser for non-negative integers
 */
export function parseNonNegativeInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}".`);
  }
  return parsed;
}

/**
 * Load config with CLI flags as the top layer and route logging.
 */
export function configureRun(flags: PipelineFlags, extra: HarvestConfigInput = {}): HarvestConfig {
  const overrides: HarvestConfigInput = { ...extra };
  if (flags.output) overrides.outputDirectory = flags.output;
  if (flags.kinds) overrides.sourceKinds = parseKinds(flags.kinds);
  if (flags.timeout !== undefined) overrides.oracle = { timeoutMs: flags.timeout };
  if (flags.passes !== undefined) overrides.maxIncludePasses = flags.passes;
  if (flags.logFile) overrides.logFile = flags.logFile;
  if (flags.console) overrides.logFile = null;

  const config = loadConfig({ overrides });
  setDefaultLogFile(config.logFile);
  return config;
}

/**
 * One-line rendering of an extraction outcome
 */
export function formatOutcome(outcome: ExtractionOutcome): string {
  if (outcome.status === "accepted") {
    return `${chalk.green("✓")} ${outcome.candidate.path} ${chalk.dim("→")} ${outcome.outputPath}`;
  }
  const detail = outcome.detail ? chalk.dim(` (${outcome.detail})`) : "";
  return `${chalk.red("✗")} ${outcome.candidate.path} ${chalk.yellow(outcome.reason)}${detail}`;
}

/**
 * Format duration in human readable format
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  return `${minutes}m ${remainingSeconds.toFixed(0)}s`;
}
