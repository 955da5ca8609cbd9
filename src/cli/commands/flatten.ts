/**
 * flatten command - Print a file with its includes inlined
 */

import chalk from "chalk";
import { IncludeResolver } from "../../core/flattener/include-resolver.js";
import { SOURCE_ENCODING } from "../../utils/fs.js";
import { configureRun, type PipelineFlags } from "./shared.js";

export type FlattenOptions = Pick<PipelineFlags, "passes" | "logFile" | "console">;

export async function flattenCommand(file: string, options: FlattenOptions): Promise<void> {
  const config = configureRun(options);
  const resolver = new IncludeResolver({ maxPasses: config.maxIncludePasses });

  const result = await resolver.flatten(file);
  process.stdout.write(Buffer.from(result.text, SOURCE_ENCODING));

  for (const target of result.missing) {
    process.stderr.write(chalk.yellow(`dropped missing include: ${target}\n`));
  }
  if (result.unresolved > 0) {
    process.stderr.write(
      chalk.yellow(`${result.unresolved} include directive(s) left after ${result.passes} passes\n`)
    );
  }
}
