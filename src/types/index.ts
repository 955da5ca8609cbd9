/**
 * Shared types for rtl-harvest
 */

import type { Result } from "./result.js";

export * from "./result.js";

// =============================================================================
// Source Kinds
// =============================================================================

/**
 * Recognized hardware-description dialects
 */
export type SourceKind = "systemverilog" | "verilog";

export const SOURCE_KINDS: readonly SourceKind[] = ["systemverilog", "verilog"];

/**
 * File extension searched for each source kind
 */
export const SOURCE_KIND_EXTENSIONS: Record<SourceKind, string> = {
  systemverilog: ".sv",
  verilog: ".v",
};

export function isSourceKind(value: string): value is SourceKind {
  return SOURCE_KINDS.some((kind) => kind === value);
}

// =============================================================================
// Candidates
// =============================================================================

/**
 * One file considered for extraction
 */
export interface Candidate {
  /** Absolute file path */
  readonly path: string;
  /** Dialect the file was enumerated as */
  readonly kind: SourceKind;
}

// =============================================================================
// Classification
// =============================================================================

/**
 * Why the oracle did not accept a set of files
 */
export type NotSynthesizableReason =
  | "ToolFailure"
  | "Timeout"
  | "NoTopModuleFound"
  | "UnsupportedKind";

/**
 * Which oracle output line announced the top module
 */
export type TopModuleSignal = "elaboration-top" | "auto-selected-top";

export interface TopModule {
  moduleName: string;
  signal: TopModuleSignal;
}

export interface ClassificationFailure {
  reason: NotSynthesizableReason;
  /** Free-form detail (exit code, malformed line, ...) for the log */
  detail?: string;
}

/**
 * Ok is "synthesizable as moduleName", Err is "not synthesizable".
 */
export type ClassificationResult = Result<TopModule, ClassificationFailure>;

// =============================================================================
// Extraction
// =============================================================================

export type ExtractionStage = "classify" | "flatten" | "write" | "validate";

export type RejectionReason =
  | NotSynthesizableReason
  | "FlattenFailed"
  | "WriteFailed"
  | "ValidationFailed";

export type ExtractionOutcome =
  | {
      status: "accepted";
      candidate: Candidate;
      moduleName: string;
      outputPath: string;
    }
  | {
      status: "rejected";
      candidate: Candidate;
      stage: ExtractionStage;
      reason: RejectionReason;
      detail?: string;
    };

/**
 * Extracted/total counts for one repository scan
 */
export interface ExtractionTally {
  extracted: number;
  total: number;
  byKind: Record<SourceKind, { extracted: number; total: number }>;
}

/**
 * Run-level sum over all repositories
 */
export interface HarvestSummary {
  extracted: number;
  total: number;
  repositories: number;
  failedRepositories: string[];
}
