/**
 * Scanner Module
 *
 * @module
 */

export * from "./corpus-scanner.js";
