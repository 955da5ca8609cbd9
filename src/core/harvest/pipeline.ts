/**
 * Wires the pipeline components from a loaded configuration.
 *
 * @module
 */

import * as path from "node:path";
import type { IOracle } from "../interfaces/IOracle.js";
import { createOracle } from "../oracle/yosys-oracle.js";
import { OutputNamer } from "../output/output-namer.js";
import { CorpusScanner, type ScanProgressEvent } from "../scanner/corpus-scanner.js";
import type { HarvestConfig } from "../../utils/validation.js";

export interface Pipeline {
  oracle: IOracle;
  namer: OutputNamer;
  scanner: CorpusScanner;
}

export interface BuildPipelineOptions {
  /** Replaces the yosys oracle */
  oracle?: IOracle;
  onProgress?: (event: ScanProgressEvent) => void;
  /** Base for relative directories in the config (default: cwd) */
  cwd?: string;
}

export function buildPipeline(config: HarvestConfig, options: BuildPipelineOptions = {}): Pipeline {
  const cwd = options.cwd ?? process.cwd();
  const oracle = options.oracle ?? createOracle({
    binary: config.oracle.binary,
    timeoutMs: config.oracle.timeoutMs,
  });
  const namer = new OutputNamer({
    directory: path.resolve(cwd, config.outputDirectory),
    prefixLength: config.prefixLength,
  });
  const scanner = new CorpusScanner({
    oracle,
    namer,
    sourceKinds: config.sourceKinds,
    maxIncludePasses: config.maxIncludePasses,
    onProgress: options.onProgress,
  });
  return { oracle, namer, scanner };
}
