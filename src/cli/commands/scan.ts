/**
 * scan command - Extract modules from a local directory tree
 */

import chalk from "chalk";
import ora from "ora";
import { buildPipeline } from "../../core/harvest/pipeline.js";
import type { ScanProgressEvent } from "../../core/scanner/corpus-scanner.js";
import { SOURCE_KINDS } from "../../types/index.js";
import { createLogger } from "../../utils/index.js";
import { configureRun, formatDuration, formatOutcome, type PipelineFlags } from "./shared.js";

export interface ScanOptions extends PipelineFlags {
  verbose?: boolean;
}

export async function scanCommand(directory: string, options: ScanOptions): Promise<void> {
  const config = configureRun(options);
  const logger = createLogger("scan");

  const spinner = ora("Checking oracle...").start();
  const startTime = Date.now();
  const outcomes: string[] = [];

  const { oracle, namer, scanner } = buildPipeline(config, {
    onProgress: (event: ScanProgressEvent) => {
      spinner.text = `${event.kind} ${event.processed}/${event.total}`;
      if (options.verbose) outcomes.push(formatOutcome(event.outcome));
    },
  });

  try {
    await oracle.ensureAvailable();
    await namer.initialize();
    spinner.text = `Scanning ${directory}...`;

    const tally = await scanner.scan(directory);
    const duration = (Date.now() - startTime) / 1000;
    spinner.succeed(chalk.green("Scan complete!"));

    if (outcomes.length > 0) {
      console.log();
      for (const line of outcomes) console.log(`  ${line}`);
    }

    console.log();
    console.log(chalk.white.bold("Results"));
    for (const kind of SOURCE_KINDS) {
      const counts = tally.byKind[kind];
      if (counts.total === 0) continue;
      console.log(`  ${kind.padEnd(22)} ${counts.extracted}/${counts.total}`);
    }
    console.log(`  ${"Extracted".padEnd(22)} ${tally.extracted}/${tally.total}`);
    console.log(`  ${"Output directory".padEnd(22)} ${namer.directory}`);
    console.log(`  ${"Duration".padEnd(22)} ${formatDuration(duration)}`);
    console.log();

    logger.info({ tally }, `Summary: ${tally.extracted}/${tally.total}`);
  } catch (error) {
    spinner.fail(chalk.red("Scan failed"));
    logger.error({ err: error }, "Scan failed");
    throw error;
  }
}
