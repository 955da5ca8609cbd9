/**
 * File Extraction Step
 *
 * Takes one candidate file to zero or one validated standalone module on
 * disk:
 *
 *   Candidate -> Classified -> Flattened -> Validated -> Accepted | Rejected
 *
 * The candidate is classified on its own first, so files the oracle rejects
 * never reach flattening or the output directory. The flattened artifact is
 * then classified again from disk; an artifact the oracle no longer accepts
 * is deleted before the step returns and does not count as extracted.
 *
 * @module
 */

import * as path from "node:path";
import type { IOracle } from "../interfaces/IOracle.js";
import type { IncludeResolver } from "../flattener/include-resolver.js";
import type { OutputNamer } from "../output/output-namer.js";
import type { Candidate, ExtractionOutcome } from "../../types/index.js";
import { fromPromiseWith } from "../../types/result.js";
import { createLogger, type Logger } from "../../utils/logger.js";

export interface ExtractionStepOptions {
  oracle: IOracle;
  resolver: IncludeResolver;
  namer: OutputNamer;
  logger?: Logger;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ExtractionStep {
  private readonly oracle: IOracle;
  private readonly resolver: IncludeResolver;
  private readonly namer: OutputNamer;
  private readonly logger: Logger;

  constructor(options: ExtractionStepOptions) {
    this.oracle = options.oracle;
    this.resolver = options.resolver;
    this.namer = options.namer;
    this.logger = options.logger ?? createLogger("extraction");
  }

  /**
   * Run the step for one candidate.
   *
   * Resolves with a rejected outcome for every per-candidate failure.
   * Rejects only with an OracleError, when the oracle cannot be started.
   */
  async extract(candidate: Candidate): Promise<ExtractionOutcome> {
    // Candidate -> Classified
    const classified = await this.oracle.classify([candidate.path], candidate.kind);
    if (!classified.ok) {
      this.logger.debug(
        { file: candidate.path, reason: classified.error.reason, detail: classified.error.detail },
        "Drop candidate"
      );
      return {
        status: "rejected",
        candidate,
        stage: "classify",
        reason: classified.error.reason,
        detail: classified.error.detail,
      };
    }
    const { moduleName } = classified.value;

    // Classified -> Flattened
    const flattened = await fromPromiseWith(this.resolver.flatten(candidate.path), describeError);
    if (!flattened.ok) {
      this.logger.error({ file: candidate.path, reason: "FlattenFailed", detail: flattened.error }, "Failed to flatten");
      return { status: "rejected", candidate, stage: "flatten", reason: "FlattenFailed", detail: flattened.error };
    }

    const fileName = moduleName + path.extname(candidate.path);
    const written = await fromPromiseWith(this.namer.write(fileName, flattened.value.text), describeError);
    if (!written.ok) {
      this.logger.error({ file: candidate.path, reason: "WriteFailed", detail: written.error }, "Failed to write artifact");
      return { status: "rejected", candidate, stage: "write", reason: "WriteFailed", detail: written.error };
    }
    const outputPath = written.value;

    // Flattened -> Validated
    const validated = await this.oracle.classify([outputPath], candidate.kind).catch(async (error: unknown) => {
      // Leave no artifact behind when the run is about to abort
      await this.namer.remove(outputPath);
      throw error;
    });

    if (!validated.ok) {
      await this.namer.remove(outputPath);
      this.logger.error(
        {
          file: candidate.path,
          reason: "ValidationFailed",
          oracleReason: validated.error.reason,
          unresolvedIncludes: flattened.value.unresolved,
        },
        `Failed to replace the \`include directive in ${candidate.path}`
      );
      return {
        status: "rejected",
        candidate,
        stage: "validate",
        reason: "ValidationFailed",
        detail: validated.error.reason,
      };
    }

    this.logger.info({ file: candidate.path, module: moduleName, output: outputPath }, "Extracted module");
    return { status: "accepted", candidate, moduleName, outputPath };
  }
}

/**
 * Creates an ExtractionStep instance.
 */
export function createExtractionStep(options: ExtractionStepOptions): ExtractionStep {
  return new ExtractionStep(options);
}
