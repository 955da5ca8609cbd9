/**
 * Oracle invocation recipes, one per source kind.
 *
 * @module
 */

import type { SourceKind } from "../../types/index.js";

export interface InvocationRecipe {
  kind: SourceKind;
  /** Command-line arguments passed to the oracle binary */
  buildArgs(inputs: readonly string[]): string[];
}

/**
 * Quote file paths for a yosys script line.
 */
export function joinFilePaths(inputs: readonly string[]): string {
  return inputs.map((file) => `"${file}"`).join(" ");
}

/**
 * SystemVerilog goes through the Surelog/UHDM plugin, which reports the
 * elaborated top with an `[NTE:EL0503]` note even under `-qq`.
 */
export const SYSTEMVERILOG_RECIPE: InvocationRecipe = {
  kind: "systemverilog",
  buildArgs: (inputs) => [
    "-qq",
    "-p",
    `plugin -i systemverilog; read_systemverilog -synth ${joinFilePaths(inputs)}`,
  ],
};

/**
 * Plain Verilog uses the built-in frontend. The log must stay on so that
 * `hierarchy -auto-top` can announce the top module it picked.
 */
export const VERILOG_RECIPE: InvocationRecipe = {
  kind: "verilog",
  buildArgs: (inputs) => [
    "-p",
    `read_verilog ${joinFilePaths(inputs)}; synth -auto-top`,
  ],
};

export const RECIPES: Readonly<Record<SourceKind, InvocationRecipe>> = {
  systemverilog: SYSTEMVERILOG_RECIPE,
  verilog: VERILOG_RECIPE,
};
