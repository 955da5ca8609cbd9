/**
 * Core module - extraction pipeline shared by the CLI and library users
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./oracle/index.js";
export * from "./flattener/index.js";
export * from "./output/index.js";
export * from "./extraction/index.js";
export * from "./scanner/index.js";
export * from "./repository/index.js";
export * from "./harvest/index.js";
export type { IOracle, IRepositoryFetcher } from "./interfaces/index.js";

// Re-export types
export * from "../types/index.js";
