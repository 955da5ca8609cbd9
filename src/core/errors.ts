/**
 * Error Classes for rtl-harvest
 * Structured error handling with error codes
 *
 * Only run-level and repository-level failures are thrown. Per-candidate
 * failures travel as data (see ClassificationFailure and ExtractionOutcome).
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Oracle errors (1xxx)
  ORACLE_UNAVAILABLE = "E1000",
  ORACLE_SPAWN_FAILED = "E1001",

  // Extraction errors (2xxx)
  EXTRACTION_FAILED = "E2000",
  EXTRACTION_WRITE_FAILED = "E2001",
  EXTRACTION_NAME_EXHAUSTED = "E2002",

  // Repository errors (3xxx)
  REPOSITORY_ENUMERATION_FAILED = "E3000",
  REPOSITORY_FETCH_FAILED = "E3001",
  REPOSITORY_INVALID_IDENTIFIER = "E3002",
  REPOSITORY_LIST_UNREADABLE = "E3003",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all rtl-harvest errors
 */
export class HarvestError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "HarvestError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * The synthesis oracle cannot be reached at all. Fatal for the whole run.
 */
export class OracleError extends HarvestError {
  public readonly binary?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.ORACLE_UNAVAILABLE,
    context?: Record<string, unknown> & { binary?: string }
  ) {
    super(message, code, context);
    this.name = "OracleError";
    this.binary = context?.binary;
  }
}

/**
 * Extraction errors raised inside the output layer
 */
export class ExtractionError extends HarvestError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.EXTRACTION_FAILED,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "ExtractionError";
    this.filePath = context?.filePath;
  }

  toString(): string {
    const location = this.filePath ? ` at ${this.filePath}` : "";
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * Repository-level errors. Fatal for one repository, never for the run.
 */
export class RepositoryError extends HarvestError {
  public readonly repository?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.REPOSITORY_ENUMERATION_FAILED,
    context?: Record<string, unknown> & { repository?: string }
  ) {
    super(message, code, context);
    this.name = "RepositoryError";
    this.repository = context?.repository;
  }
}

/**
 * Invalid or unreadable configuration
 */
export class ConfigurationError extends HarvestError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Check if an error is a HarvestError
 */
export function isHarvestError(error: unknown): error is HarvestError {
  return error instanceof HarvestError;
}

/**
 * Check if an error is a Node.js system error carrying a code (ENOENT, EEXIST, ...)
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

/**
 * Wrap an unknown error in a HarvestError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): HarvestError {
  if (isHarvestError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new HarvestError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new HarvestError(
    typeof error === "string" ? error : defaultMessage,
    code
  );
}
