/**
 * Harvest Module
 *
 * @module
 */

export * from "./harvest-runner.js";
export * from "./pipeline.js";
