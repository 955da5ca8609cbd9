/**
 * Core Interfaces Module
 *
 * Seams between the pipeline and the outside world. Tests substitute
 * scripted implementations for both.
 *
 * @module
 */

export type { IOracle } from "./IOracle.js";
export type { IRepositoryFetcher } from "./IRepositoryFetcher.js";
