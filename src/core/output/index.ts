/**
 * Output Module
 *
 * @module
 */

export * from "./output-namer.js";
