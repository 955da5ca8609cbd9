/**
 * Oracle Module
 *
 * Synthesizability classification through an external synthesis tool.
 *
 * @module
 */

export * from "./yosys-oracle.js";
export * from "./recipes.js";
export * from "./signals.js";
