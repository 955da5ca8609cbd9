/**
 * Harvest Runner
 *
 * Drives a whole run: for each repository identifier, fetch it, scan it,
 * remove the checkout, and add its tally to the run summary. Repositories
 * are processed one at a time so the output directory only ever has one
 * writer.
 *
 * A repository that cannot be fetched or enumerated is skipped. An oracle
 * that cannot be started aborts the run.
 *
 * @module
 */

import type { IRepositoryFetcher } from "../interfaces/IRepositoryFetcher.js";
import type { ExtractionTally, HarvestSummary } from "../../types/index.js";
import { ErrorCode, OracleError, RepositoryError, wrapError } from "../errors.js";
import { isWithin } from "../../utils/fs.js";
import { createLogger, type Logger } from "../../utils/logger.js";

export interface RepositoryScanner {
  scan(repositoryRoot: string): Promise<ExtractionTally>;
}

export type RepositoryEvent =
  | { type: "start"; identifier: string; index: number; count: number }
  | { type: "done"; identifier: string; tally: ExtractionTally }
  | { type: "failed"; identifier: string; error: string };

export interface HarvestRunnerOptions {
  scanner: RepositoryScanner;
  fetcher: IRepositoryFetcher;
  workDirectory: string;
  keepClones?: boolean;
  /** Corpus directory; a checkout at or above it is refused and never cleaned up */
  outputDirectory?: string;
  onRepository?: (event: RepositoryEvent) => void;
  logger?: Logger;
}

export class HarvestRunner {
  private readonly scanner: RepositoryScanner;
  private readonly fetcher: IRepositoryFetcher;
  private readonly workDirectory: string;
  private readonly keepClones: boolean;
  private readonly outputDirectory?: string;
  private readonly onRepository?: (event: RepositoryEvent) => void;
  private readonly logger: Logger;

  constructor(options: HarvestRunnerOptions) {
    this.scanner = options.scanner;
    this.fetcher = options.fetcher;
    this.workDirectory = options.workDirectory;
    this.keepClones = options.keepClones ?? false;
    this.outputDirectory = options.outputDirectory;
    this.onRepository = options.onRepository;
    this.logger = options.logger ?? createLogger("harvest");
  }

  async run(identifiers: readonly string[]): Promise<HarvestSummary> {
    const summary: HarvestSummary = {
      extracted: 0,
      total: 0,
      repositories: 0,
      failedRepositories: [],
    };

    for (const [index, identifier] of identifiers.entries()) {
      this.onRepository?.({ type: "start", identifier, index, count: identifiers.length });

      let tally: ExtractionTally;
      try {
        tally = await this.harvestOne(identifier);
      } catch (error) {
        if (error instanceof OracleError) {
          this.logger.fatal({ err: error, repository: identifier }, "Oracle unavailable; aborting run");
          throw error;
        }
        const wrapped = wrapError(error, `Failed to process ${identifier}`);
        this.logger.error({ err: wrapped, repository: identifier }, "Repository skipped");
        summary.failedRepositories.push(identifier);
        this.onRepository?.({ type: "failed", identifier, error: wrapped.message });
        continue;
      }

      summary.extracted += tally.extracted;
      summary.total += tally.total;
      summary.repositories++;
      this.onRepository?.({ type: "done", identifier, tally });
    }

    this.logger.info({ ...summary }, `Summary: ${summary.extracted}/${summary.total}`);
    return summary;
  }

  private async harvestOne(identifier: string): Promise<ExtractionTally> {
    const localPath = await this.fetcher.fetch(identifier, this.workDirectory);
    if (this.outputDirectory !== undefined && isWithin(localPath, this.outputDirectory)) {
      throw new RepositoryError(
        `Checkout ${localPath} would contain the output directory ${this.outputDirectory}`,
        ErrorCode.REPOSITORY_FETCH_FAILED,
        { repository: identifier }
      );
    }
    try {
      return await this.scanner.scan(localPath);
    } finally {
      if (!this.keepClones) {
        await this.fetcher.cleanup(localPath);
      }
    }
  }
}

export function createHarvestRunner(options: HarvestRunnerOptions): HarvestRunner {
  return new HarvestRunner(options);
}
