#!/usr/bin/env node

/**
 * rtl-harvest CLI
 * Collects standalone synthesizable modules from HDL repositories
 */

import { Command } from "commander";
import chalk from "chalk";
import { collectCommand } from "./commands/collect.js";
import { scanCommand } from "./commands/scan.js";
import { classifyCommand } from "./commands/classify.js";
import { flattenCommand } from "./commands/flatten.js";
import { parseNonNegativeInt } from "./commands/shared.js";
import { ConfigurationError, isHarvestError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const program = new Command();

program
  .name("rtl-harvest")
  .description("Extract standalone synthesizable Verilog/SystemVerilog modules from repositories")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("collect")
  .description("Clone every repository in a list, extract its modules, then delete the clone")
  .argument("[list]", "Repository list, one owner/name per line (default: repos.txt)")
  .option("-o, --output <dir>", "Output directory for extracted modules")
  .option("-w, --work-dir <dir>", "Directory repositories are cloned into")
  .option("-k, --kinds <kinds>", "Comma-separated source kinds (systemverilog,verilog)")
  .option("-t, --timeout <ms>", "Oracle timeout per invocation in milliseconds", parseNonNegativeInt)
  .option("--passes <n>", "Maximum include resolution passes", parseNonNegativeInt)
  .option("--keep-clones", "Keep cloned repositories after scanning")
  .option("--log-file <file>", "Write the run log to this file")
  .option("--console", "Log to the console instead of a file")
  .action(collectCommand);

program
  .command("scan")
  .description("Extract modules from a local directory tree")
  .argument("<dir>", "Directory to scan")
  .option("-o, --output <dir>", "Output directory for extracted modules")
  .option("-k, --kinds <kinds>", "Comma-separated source kinds (systemverilog,verilog)")
  .option("-t, --timeout <ms>", "Oracle timeout per invocation in milliseconds", parseNonNegativeInt)
  .option("--passes <n>", "Maximum include resolution passes", parseNonNegativeInt)
  .option("-v, --verbose", "List every candidate with its outcome")
  .option("--log-file <file>", "Write the run log to this file")
  .option("--console", "Log to the console instead of a file")
  .action(scanCommand);

program
  .command("classify")
  .description("Ask the oracle whether files elaborate to a top module")
  .argument("<files...>", "Files of one source kind")
  .option("--kind <kind>", "Source kind (default: from the first file's extension)")
  .option("-t, --timeout <ms>", "Oracle timeout in milliseconds", parseNonNegativeInt)
  .option("--log-file <file>", "Write the log to this file")
  .option("--console", "Log to the console instead of a file")
  .action(classifyCommand);

program
  .command("flatten")
  .description("Print a file with its `include directives inlined")
  .argument("<file>", "Root file")
  .option("--passes <n>", "Maximum include resolution passes", parseNonNegativeInt)
  .option("--log-file <file>", "Write the log to this file")
  .option("--console", "Log to the console instead of a file")
  .action(flattenCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  const logger = createLogger("cli");
  if (error instanceof ConfigurationError) {
    console.error(chalk.red(`\nConfiguration error: ${error.message}`));
  } else if (isHarvestError(error)) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.toString()}`));
  } else if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  handleError(reason);
});

// =============================================================================
// Signal Handlers
// =============================================================================

function shutdown(signal: string): void {
  console.log(chalk.dim(`\nReceived ${signal}, stopping`));
  process.exit(130);
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
