/**
 * Yosys Oracle
 *
 * Runs yosys once per classification and reads the top module out of its
 * output. Every tool failure becomes an Err result; only a binary that
 * cannot be spawned is thrown.
 *
 * @module
 */

import { spawn } from "node:child_process";
import * as fs from "node:fs";
import * as path from "node:path";
import type { IOracle } from "../interfaces/IOracle.js";
import type { ClassificationResult } from "../../types/index.js";
import { isSourceKind } from "../../types/index.js";
import { err } from "../../types/result.js";
import { ErrorCode, OracleError } from "../errors.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import { RECIPES } from "./recipes.js";
import { findTopModule, outputLines } from "./signals.js";

// =============================================================================
// Types
// =============================================================================

export interface YosysOracleOptions {
  /** Path or PATH-resolvable name of the binary */
  binary: string;
  /** Wall-clock limit per invocation; the process is killed after it */
  timeoutMs: number;
  logger?: Logger;
}

export interface ProcessOutcome {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

// =============================================================================
// Process Runner
// =============================================================================

/**
 * Run a binary to completion or until the timeout kills it.
 *
 * @throws OracleError when the process cannot be spawned
 */
export function runProcess(
  binary: string,
  args: readonly string[],
  timeoutMs: number
): Promise<ProcessOutcome> {
  return new Promise((resolve, reject) => {
    const child = spawn(binary, [...args], { stdio: ["ignore", "pipe", "pipe"] });

    let stdout = "";
    let stderr = "";
    let settled = false;

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      child.kill("SIGKILL");
      resolve({ exitCode: null, signal: "SIGKILL", stdout, stderr, timedOut: true });
    }, timeoutMs);

    child.on("error", (error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(
        new OracleError(`Cannot start oracle binary "${binary}": ${error.message}`, ErrorCode.ORACLE_SPAWN_FAILED, {
          binary,
          cause: error.message,
        })
      );
    });

    child.on("close", (exitCode, signal) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({ exitCode, signal, stdout, stderr, timedOut: false });
    });
  });
}

/**
 * Resolve a binary the way a shell would: paths as given, bare names via PATH.
 * Returns null when no executable file is found.
 */
export async function resolveBinary(
  binary: string,
  envPath: string = process.env.PATH ?? ""
): Promise<string | null> {
  const isExecutable = async (candidate: string): Promise<boolean> => {
    try {
      const stats = await fs.promises.stat(candidate);
      if (!stats.isFile()) return false;
      await fs.promises.access(candidate, fs.constants.X_OK);
      return true;
    } catch {
      return false;
    }
  };

  if (binary.includes("/") || binary.includes(path.sep)) {
    const absolute = path.resolve(binary);
    return (await isExecutable(absolute)) ? absolute : null;
  }

  for (const dir of envPath.split(path.delimiter)) {
    if (!dir.trim()) continue;
    const candidate = path.join(dir.trim(), binary);
    if (await isExecutable(candidate)) return candidate;
  }
  return null;
}

// =============================================================================
// Oracle
// =============================================================================

export class YosysOracle implements IOracle {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: YosysOracleOptions) {
    this.binary = options.binary;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? createLogger("oracle");
  }

  async ensureAvailable(): Promise<void> {
    const resolved = await resolveBinary(this.binary);
    if (!resolved) {
      throw new OracleError(
        `Oracle binary "${this.binary}" not found or not executable (set YOSYS_BINARY)`,
        ErrorCode.ORACLE_UNAVAILABLE,
        { binary: this.binary }
      );
    }
    this.logger.debug({ binary: resolved }, "Oracle available");
  }

  async classify(inputs: readonly string[], kind: string): Promise<ClassificationResult> {
    if (!isSourceKind(kind)) {
      this.logger.debug({ kind, inputs }, "Unsupported source kind");
      return err({ reason: "UnsupportedKind", detail: kind });
    }
    if (inputs.length === 0) {
      return err({ reason: "NoTopModuleFound", detail: "no input files" });
    }

    const args = RECIPES[kind].buildArgs(inputs);
    this.logger.trace({ binary: this.binary, args }, "Invoking oracle");

    const outcome = await runProcess(this.binary, args, this.timeoutMs);

    if (outcome.timedOut) {
      this.logger.debug({ inputs, timeoutMs: this.timeoutMs }, "TIMEOUT");
      return err({ reason: "Timeout", detail: `exceeded ${this.timeoutMs}ms` });
    }

    if (outcome.exitCode !== 0) {
      const detail = outcome.exitCode === null
        ? `killed by ${outcome.signal ?? "signal"}`
        : `exit code ${outcome.exitCode}`;
      this.logger.debug({ inputs, detail }, "Yosys exited unexpectedly");
      return err({ reason: "ToolFailure", detail });
    }

    const result = findTopModule(outputLines(outcome.stdout, outcome.stderr));
    if (!result.ok) {
      this.logger.debug({ inputs, detail: result.error.detail }, "Top module not found");
    }
    return result;
  }
}

/**
 * Creates the production oracle.
 */
export function createOracle(options: YosysOracleOptions): IOracle {
  return new YosysOracle(options);
}
