/**
 * Extraction Module
 *
 * The per-candidate classify / flatten / re-validate step.
 *
 * @module
 */

export * from "./extraction-step.js";
