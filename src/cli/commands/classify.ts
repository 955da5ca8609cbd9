/**
 * classify command - Ask the oracle about one or more files
 */

import chalk from "chalk";
import * as path from "node:path";
import { createOracle } from "../../core/oracle/yosys-oracle.js";
import { SOURCE_KIND_EXTENSIONS, SOURCE_KINDS, type SourceKind } from "../../types/index.js";
import { configureRun, type PipelineFlags } from "./shared.js";

export interface ClassifyOptions extends Pick<PipelineFlags, "timeout" | "logFile" | "console"> {
  kind?: string;
}

/**
 * Kind implied by a file extension, if any
 */
export function kindOfFile(filePath: string): SourceKind | null {
  const extension = path.extname(filePath);
  return SOURCE_KINDS.find((kind) => SOURCE_KIND_EXTENSIONS[kind] === extension) ?? null;
}

export async function classifyCommand(files: string[], options: ClassifyOptions): Promise<void> {
  const config = configureRun(options);
  const inputs = files.map((file) => path.resolve(file));
  const firstInput = inputs[0];
  const kind = options.kind ?? (firstInput ? kindOfFile(firstInput) : null) ?? "unknown";

  const oracle = createOracle({ binary: config.oracle.binary, timeoutMs: config.oracle.timeoutMs });
  await oracle.ensureAvailable();

  const result = await oracle.classify(inputs, kind);
  if (result.ok) {
    console.log(`${chalk.green("synthesizable")} ${chalk.bold(result.value.moduleName)} ${chalk.dim(`(${result.value.signal})`)}`);
    return;
  }

  const detail = result.error.detail ? chalk.dim(` (${result.error.detail})`) : "";
  console.log(`${chalk.red("not synthesizable")} ${chalk.yellow(result.error.reason)}${detail}`);
  process.exitCode = 2;
}
