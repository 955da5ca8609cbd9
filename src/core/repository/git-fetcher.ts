/**
 * Git Repository Fetcher
 *
 * Shallow-clones `owner/name` identifiers from GitHub into a work directory.
 * Every clone gets a fresh directory of its own; nothing that existed in
 * the work directory before the fetch is touched.
 *
 * @module
 */

import { execFile } from "node:child_process";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import { promisify } from "node:util";
import type { IRepositoryFetcher } from "../interfaces/IRepositoryFetcher.js";
import { ErrorCode, RepositoryError } from "../errors.js";
import { ensureDirectory } from "../../utils/fs.js";
import { createLogger, type Logger } from "../../utils/logger.js";

const execFileAsync = promisify(execFile);

const IDENTIFIER_PATTERN = /^[\w.-]+\/[\w.-]+$/;

export interface GitRepositoryFetcherOptions {
  /** Base URL the identifier is appended to */
  baseUrl?: string;
  gitBinary?: string;
  logger?: Logger;
}

/**
 * The repository name: the part after the first `/`. Clone directories
 * start with it.
 */
export function shorterNameOf(identifier: string): string {
  return identifier.slice(identifier.indexOf("/") + 1);
}

export function isValidIdentifier(identifier: string): boolean {
  return IDENTIFIER_PATTERN.test(identifier) && !identifier.split("/").some((part) => part === "." || part === "..");
}

export class GitRepositoryFetcher implements IRepositoryFetcher {
  private readonly baseUrl: string;
  private readonly gitBinary: string;
  private readonly logger: Logger;

  constructor(options: GitRepositoryFetcherOptions = {}) {
    this.baseUrl = (options.baseUrl ?? "https://github.com").replace(/\/+$/, "");
    this.gitBinary = options.gitBinary ?? "git";
    this.logger = options.logger ?? createLogger("git-fetcher");
  }

  cloneUrlOf(identifier: string): string {
    return `${this.baseUrl}/${identifier}.git`;
  }

  async fetch(identifier: string, workDirectory: string): Promise<string> {
    if (!isValidIdentifier(identifier)) {
      throw new RepositoryError(
        `Invalid repository identifier "${identifier}" (expected owner/name)`,
        ErrorCode.REPOSITORY_INVALID_IDENTIFIER,
        { repository: identifier }
      );
    }

    await ensureDirectory(workDirectory);
    const target = await fsPromises.mkdtemp(path.join(path.resolve(workDirectory), `${shorterNameOf(identifier)}-`));

    const url = this.cloneUrlOf(identifier);
    this.logger.info({ repository: identifier, target }, "Cloning repository");
    try {
      await execFileAsync(this.gitBinary, ["clone", "--depth", "1", "--quiet", url, target], {
        env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
        maxBuffer: 16 * 1024 * 1024,
      });
    } catch (error) {
      await fsPromises.rm(target, { recursive: true, force: true });
      throw new RepositoryError(
        `git clone ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.REPOSITORY_FETCH_FAILED,
        { repository: identifier }
      );
    }
    return target;
  }

  async cleanup(localPath: string): Promise<void> {
    await fsPromises.rm(localPath, { recursive: true, force: true });
    this.logger.debug({ path: localPath }, "Removed clone");
  }
}

export function createGitRepositoryFetcher(options?: GitRepositoryFetcherOptions): GitRepositoryFetcher {
  return new GitRepositoryFetcher(options);
}
