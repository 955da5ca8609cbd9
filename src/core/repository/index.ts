/**
 * Repository Module
 *
 * @module
 */

export * from "./git-fetcher.js";
export * from "./repository-list.js";
