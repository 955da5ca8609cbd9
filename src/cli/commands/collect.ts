/**
 * collect command - Clone, scan and clean up every repository in a list
 */

import chalk from "chalk";
import ora from "ora";
import * as path from "node:path";
import { buildPipeline } from "../../core/harvest/pipeline.js";
import { HarvestRunner, type RepositoryEvent } from "../../core/harvest/harvest-runner.js";
import { GitRepositoryFetcher } from "../../core/repository/git-fetcher.js";
import { readRepositoryList } from "../../core/repository/repository-list.js";
import type { ScanProgressEvent } from "../../core/scanner/corpus-scanner.js";
import { createLogger } from "../../utils/index.js";
import { configureRun, formatDuration, type PipelineFlags } from "./shared.js";

export interface CollectOptions extends PipelineFlags {
  workDir?: string;
  keepClones?: boolean;
}

/**
 * Run the harvest over a repository list file
 */
export async function collectCommand(listFile: string | undefined, options: CollectOptions): Promise<void> {
  const config = configureRun(options, {
    ...(listFile ? { repositoriesFile: listFile } : {}),
    ...(options.workDir ? { workDirectory: options.workDir } : {}),
    ...(options.keepClones ? { keepClones: true } : {}),
  });
  const logger = createLogger("collect");
  logger.info({ config }, "Starting collection");

  const identifiers = await readRepositoryList(config.repositoriesFile);
  if (identifiers.length === 0) {
    console.log(chalk.yellow(`No repositories listed in ${config.repositoriesFile}`));
    return;
  }

  console.log();
  console.log(chalk.cyan.bold("Collecting Modules"));
  console.log(chalk.dim("─".repeat(40)));
  console.log();

  const spinner = ora("Checking oracle...").start();
  const startTime = Date.now();
  let current = "";

  const { oracle, namer, scanner } = buildPipeline(config, {
    onProgress: (event: ScanProgressEvent) => {
      spinner.text = `${current} ${chalk.dim(`[${event.kind} ${event.processed}/${event.total}]`)}`;
    },
  });

  try {
    await oracle.ensureAvailable();
    await namer.initialize();

    const runner = new HarvestRunner({
      scanner,
      fetcher: new GitRepositoryFetcher(),
      workDirectory: path.resolve(config.workDirectory),
      keepClones: config.keepClones,
      outputDirectory: namer.directory,
      onRepository: (event: RepositoryEvent) => {
        switch (event.type) {
          case "start":
            current = `(${event.index + 1}/${event.count}) ${event.identifier}`;
            spinner.text = `${current} cloning...`;
            break;
          case "done":
            spinner.succeed(`${event.identifier}: ${event.tally.extracted}/${event.tally.total}`);
            spinner.start();
            break;
          case "failed":
            spinner.fail(`${event.identifier}: ${chalk.red(event.error)}`);
            spinner.start();
            break;
        }
      },
    });

    const summary = await runner.run(identifiers);
    const duration = (Date.now() - startTime) / 1000;
    spinner.succeed(chalk.green("Collection complete!"));

    console.log();
    console.log(chalk.white.bold("Summary"));
    console.log(`  Extracted:             ${summary.extracted}/${summary.total}`);
    console.log(`  Repositories scanned:  ${summary.repositories}`);
    console.log(`  Repositories skipped:  ${summary.failedRepositories.length}`);
    console.log(`  Output directory:      ${namer.directory}`);
    console.log(`  Duration:              ${formatDuration(duration)}`);
    console.log();
  } catch (error) {
    spinner.fail(chalk.red("Collection failed"));
    logger.error({ err: error }, "Collection failed");
    throw error;
  }
}
