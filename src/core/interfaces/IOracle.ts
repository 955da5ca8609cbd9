/**
 * IOracle - Synthesizability classification interface
 *
 * Black box that decides whether a set of HDL files elaborates to a
 * top-level module. The production implementation drives yosys; tests
 * substitute a scripted stub.
 *
 * @module
 */

import type { ClassificationResult } from "../../types/index.js";

/**
 * Oracle interface for classification.
 *
 * @example
 * ```typescript
 * const oracle = createOracle({ binary: "yosys", timeoutMs: 60_000 });
 * await oracle.ensureAvailable();
 *
 * const result = await oracle.classify(["/repo/rtl/alu.sv"], "systemverilog");
 * if (result.ok) {
 *   console.log(result.value.moduleName);
 * } else {
 *   console.log(result.error.reason);
 * }
 * ```
 */
export interface IOracle {
  /**
   * Classify an ordered, non-empty list of files of one kind.
   *
   * Tool crashes, timeouts and missing top modules resolve to an Err result.
   * Only an oracle that cannot be started at all rejects, with an OracleError.
   */
  classify(inputs: readonly string[], kind: string): Promise<ClassificationResult>;

  /**
   * Fail fast before a run when the oracle cannot be invoked.
   *
   * @throws OracleError
   */
  ensureAvailable(): Promise<void>;
}
