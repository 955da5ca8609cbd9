/**
 * rtl-harvest
 *
 * Extracts standalone synthesizable Verilog/SystemVerilog modules from
 * repository trees into a flat corpus directory.
 */

export * from "./core/index.js";
export { loadConfig, type LoadConfigOptions } from "./utils/index.js";
export type { HarvestConfig, HarvestConfigInput } from "./utils/validation.js";
