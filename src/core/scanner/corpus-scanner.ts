/**
 * Corpus Scanner
 *
 * Walks one repository tree, runs the extraction step on every file of each
 * enabled source kind and tallies the results. Candidates are processed one
 * at a time: each oracle call is an expensive external process.
 *
 * @module
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import type { IOracle } from "../interfaces/IOracle.js";
import type { OutputNamer } from "../output/output-namer.js";
import { IncludeResolver, DEFAULT_MAX_PASSES } from "../flattener/include-resolver.js";
import { ExtractionStep } from "../extraction/extraction-step.js";
import { ErrorCode, RepositoryError } from "../errors.js";
import {
  SOURCE_KINDS,
  SOURCE_KIND_EXTENSIONS,
  type Candidate,
  type ExtractionOutcome,
  type ExtractionTally,
  type SourceKind,
} from "../../types/index.js";
import { findFiles, isWithin } from "../../utils/fs.js";
import { createChildLogger, createLogger, type Logger } from "../../utils/logger.js";

// =============================================================================
// Types
// =============================================================================

export interface ScanProgressEvent {
  kind: SourceKind;
  /** 1-based position within the kind */
  processed: number;
  total: number;
  outcome: ExtractionOutcome;
}

export interface CorpusScannerOptions {
  oracle: IOracle;
  namer: OutputNamer;
  /** Kinds to enumerate (default: all) */
  sourceKinds?: readonly SourceKind[];
  maxIncludePasses?: number;
  onProgress?: (event: ScanProgressEvent) => void;
  logger?: Logger;
}

export function emptyTally(): ExtractionTally {
  return {
    extracted: 0,
    total: 0,
    byKind: {
      systemverilog: { extracted: 0, total: 0 },
      verilog: { extracted: 0, total: 0 },
    },
  };
}

// =============================================================================
// Corpus Scanner Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const scanner = new CorpusScanner({ oracle, namer });
 * const tally = await scanner.scan("/work/picorv32");
 * console.log(`${tally.extracted}/${tally.total}`);
 * ```
 */
export class CorpusScanner {
  private readonly oracle: IOracle;
  private readonly namer: OutputNamer;
  private readonly sourceKinds: readonly SourceKind[];
  private readonly maxIncludePasses: number;
  private readonly onProgress?: (event: ScanProgressEvent) => void;
  private readonly logger: Logger;

  constructor(options: CorpusScannerOptions) {
    this.oracle = options.oracle;
    this.namer = options.namer;
    this.sourceKinds = options.sourceKinds ?? SOURCE_KINDS;
    this.maxIncludePasses = options.maxIncludePasses ?? DEFAULT_MAX_PASSES;
    this.onProgress = options.onProgress;
    this.logger = options.logger ?? createLogger("scanner");
  }

  /**
   * Enumerate the candidates of one kind under a root, sorted by path.
   */
  async listCandidates(root: string, kind: SourceKind): Promise<Candidate[]> {
    // The corpus being written is never a candidate itself
    const ignore = isWithin(root, this.namer.directory) && path.resolve(root) !== this.namer.directory
      ? [`${path.relative(path.resolve(root), this.namer.directory).split(path.sep).join("/")}/**`]
      : [];

    const files = await findFiles({
      patterns: [`**/*${SOURCE_KIND_EXTENSIONS[kind]}`],
      ignore,
      cwd: root,
      absolute: true,
    });
    return files.map((file) => ({ path: file, kind }));
  }

  /**
   * Scan a repository root.
   *
   * @throws RepositoryError when the root cannot be enumerated
   * @throws OracleError when the oracle cannot be started
   */
  async scan(repositoryRoot: string): Promise<ExtractionTally> {
    const root = path.resolve(repositoryRoot);
    await this.assertEnumerable(root);

    const logger = createChildLogger(this.logger, { repository: path.basename(root) });
    logger.info({ root }, `Start analyzing [ ${path.basename(root)} ]`);

    const step = new ExtractionStep({
      oracle: this.oracle,
      namer: this.namer,
      resolver: new IncludeResolver({
        maxPasses: this.maxIncludePasses,
        boundary: root,
        logger,
      }),
      logger,
    });

    const tally = emptyTally();

    for (const kind of this.sourceKinds) {
      const candidates = await this.listCandidates(root, kind);
      const perKind = tally.byKind[kind];
      perKind.total = candidates.length;

      for (const [index, candidate] of candidates.entries()) {
        const outcome = await step.extract(candidate);
        if (outcome.status === "accepted") {
          perKind.extracted++;
        }
        this.onProgress?.({ kind, processed: index + 1, total: candidates.length, outcome });
      }

      tally.extracted += perKind.extracted;
      tally.total += perKind.total;
    }

    logger.info(
      { extracted: tally.extracted, total: tally.total },
      `Extracted ${tally.extracted} standalone modules out of ${tally.total} files.`
    );
    return tally;
  }

  private async assertEnumerable(root: string): Promise<void> {
    try {
      const stats = await fsPromises.stat(root);
      if (!stats.isDirectory()) {
        throw new RepositoryError(`${root} is not a directory`, ErrorCode.REPOSITORY_ENUMERATION_FAILED, {
          repository: root,
        });
      }
      await fsPromises.readdir(root);
    } catch (error) {
      if (error instanceof RepositoryError) throw error;
      throw new RepositoryError(
        `Cannot enumerate ${root}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.REPOSITORY_ENUMERATION_FAILED,
        { repository: root }
      );
    }
  }
}

/**
 * Creates a CorpusScanner instance.
 */
export function createCorpusScanner(options: CorpusScannerOptions): CorpusScanner {
  return new CorpusScanner(options);
}
