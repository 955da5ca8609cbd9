/**
 * File System Utilities
 * File discovery and small helpers shared by the scanner, resolver and namer
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";
import { isErrnoException } from "../core/errors.js";

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
}

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

/**
 * Find files matching glob patterns, sorted for deterministic ordering.
 *
 * Dot files are included and nothing is ignored by default: every matching
 * file under the root is a candidate.
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const {
    patterns,
    ignore = [],
    cwd = process.cwd(),
    absolute = true,
  } = options;

  const files = await fg(patterns, {
    cwd,
    absolute,
    onlyFiles: true,
    ignore,
    dot: true,
    followSymbolicLinks: false,
    suppressErrors: true,
  });

  return files.sort();
}

/**
 * Check if a path exists (file, directory or anything else)
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.lstat(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

/**
 * Encoding for HDL source text. Every byte maps to one code unit and back,
 * so sources in any 8-bit or multibyte charset are copied unchanged.
 */
export const SOURCE_ENCODING: BufferEncoding = "latin1";

/**
 * Read a regular file as source text, or null when it is missing, unreadable
 * or not a regular file.
 */
export async function readTextIfFile(filePath: string): Promise<string | null> {
  try {
    const stats = await fsPromises.stat(filePath);
    if (!stats.isFile()) return null;
    return await fsPromises.readFile(filePath, { encoding: SOURCE_ENCODING });
  } catch {
    return null;
  }
}

/**
 * Whether `target` lies inside `root` (or is root itself)
 */
export function isWithin(root: string, target: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(target));
  return relative === "" || (relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative));
}
