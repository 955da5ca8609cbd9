/**
 * Logger Module
 * Structured logging using pino with file and console output
 */

import pino, { type Logger as PinoLogger } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  /** Append to this file instead of writing to stdout */
  logFile?: string;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (process.env.NODE_ENV === "test") return "silent";
  return isDevelopment() ? "debug" : "info";
}

let defaultLogFile: string | null = null;

// Shared destination so every component logger appends to the same run log
let fileDestination: { file: string; stream: pino.DestinationStream } | null = null;

function getFileDestination(logFile: string): pino.DestinationStream {
  const resolved = path.resolve(logFile);
  if (fileDestination?.file === resolved) {
    return fileDestination.stream;
  }
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  const stream = pino.destination({ dest: resolved, sync: true, append: false });
  fileDestination = { file: resolved, stream };
  return stream;
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "oracle", "scanner", "cli")
 *
 * @example
 * ```typescript
 * const logger = createLogger("oracle");
 * logger.debug({ files }, "Invoking oracle");
 * logger.error({ err }, "Oracle unavailable");
 * ```
 */
export function createLogger(
  component: string,
  options: LoggerOptions = {}
): PinoLogger {
  const { level = getLogLevel(), logFile = defaultLogFile ?? undefined } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (logFile) {
    return pino(baseOptions, getFileDestination(logFile));
  }

  if (isDevelopment()) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(baseOptions);
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(
  parent: PinoLogger,
  bindings: Record<string, unknown>
): PinoLogger {
  return parent.child(bindings);
}

export type Logger = PinoLogger;

/**
 * Route loggers created from now on to a run log file.
 * The CLI calls this once, before building any component.
 */
export function setDefaultLogFile(logFile: string | null): void {
  defaultLogFile = logFile;
}
