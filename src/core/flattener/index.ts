/**
 * Flattener Module
 *
 * @module
 */

export * from "./include-resolver.js";
