/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration at runtime.
 * Provides type-safe validation with automatic TypeScript type inference.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Source Kind Schema
// =============================================================================

export const SourceKindSchema = z.enum(["systemverilog", "verilog"]);

// =============================================================================
// Harvest Configuration Schema
// =============================================================================

/**
 * Oracle (synthesis tool) settings
 */
export const OracleConfigSchema = z.object({
  /** Path or PATH-resolvable name of the yosys binary */
  binary: z.string().min(1).default("yosys"),
  /** Wall-clock limit for one invocation */
  timeoutMs: z.number().int().positive().default(1_000_000),
});

export type OracleConfig = z.infer<typeof OracleConfigSchema>;

export const HarvestConfigSchema = z.object({
  /** Flat directory accumulating accepted modules */
  outputDirectory: z.string().min(1).default("rtl"),

  /** Where repositories are cloned */
  workDirectory: z.string().min(1).default("."),

  /** Repository list, one `owner/name` per line */
  repositoriesFile: z.string().min(1).default("repos.txt"),

  oracle: OracleConfigSchema.default({}),

  /** Bound on include resolution passes */
  maxIncludePasses: z.number().int().nonnegative().default(5),

  /** Letters in the random prefix used on name collisions */
  prefixLength: z.number().int().min(1).max(32).default(5),

  sourceKinds: z.array(SourceKindSchema).min(1).default(["systemverilog", "verilog"]),

  /** Keep cloned repositories after scanning */
  keepClones: z.boolean().default(false),

  /** Run log; null logs to the console */
  logFile: z.string().min(1).nullable().default("collector.log"),
});

export type HarvestConfig = z.infer<typeof HarvestConfigSchema>;

/**
 * Input accepted before defaults are applied
 */
export type HarvestConfigInput = z.input<typeof HarvestConfigSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<Output, Input>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  data: unknown
): ValidationResult<Output> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
