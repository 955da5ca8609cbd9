/**
 * Repository list: one identifier per line; blank lines and `#` comments skipped.
 */

import * as fsPromises from "node:fs/promises";
import { ErrorCode, RepositoryError } from "../errors.js";

export function parseRepositoryList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export async function readRepositoryList(filePath: string): Promise<string[]> {
  let text: string;
  try {
    text = await fsPromises.readFile(filePath, { encoding: "utf-8" });
  } catch (error) {
    throw new RepositoryError(
      `Cannot read repository list ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.REPOSITORY_LIST_UNREADABLE,
      { filePath }
    );
  }
  return parseRepositoryList(text);
}
