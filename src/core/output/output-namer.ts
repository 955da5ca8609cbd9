/**
 * Output Namer
 *
 * Owns the flat output directory that accumulates accepted modules for a
 * whole run. Maps a desired file name to a path nobody has used yet,
 * prepending a random alphabetic prefix when the plain name is taken.
 * Files are never overwritten.
 *
 * @module
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import { randomInt } from "node:crypto";
import { ErrorCode, ExtractionError, isErrnoException } from "../errors.js";
import { Mutex } from "../../utils/async.js";
import { SOURCE_ENCODING, ensureDirectory, pathExists } from "../../utils/fs.js";
import { createLogger, type Logger } from "../../utils/logger.js";

const ASCII_LETTERS = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";

/** Collisions tolerated for one name before giving up */
const MAX_ATTEMPTS = 1000;

export interface OutputNamerOptions {
  /** Directory receiving accepted modules */
  directory: string;
  /** Letters in a collision prefix */
  prefixLength?: number;
  /** Returns an integer in [0, bound); injectable for tests */
  random?: (bound: number) => number;
  logger?: Logger;
}

/**
 * Make a module name usable as a single path segment.
 */
export function sanitizeFileName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_$.-]/g, "_").replace(/^\.+/, "");
  return cleaned.length > 0 ? cleaned : "module";
}

export class OutputNamer {
  readonly directory: string;
  private readonly prefixLength: number;
  private readonly random: (bound: number) => number;
  private readonly logger: Logger;
  private readonly mutex = new Mutex();

  constructor(options: OutputNamerOptions) {
    this.directory = path.resolve(options.directory);
    this.prefixLength = options.prefixLength ?? 5;
    this.random = options.random ?? ((bound) => randomInt(bound));
    this.logger = options.logger ?? createLogger("output-namer");
  }

  async initialize(): Promise<void> {
    await ensureDirectory(this.directory);
  }

  /**
   * Random letters followed by an underscore, e.g. `qZbfA_`.
   */
  randomPrefix(): string {
    let prefix = "";
    for (let i = 0; i < this.prefixLength; i++) {
      prefix += ASCII_LETTERS.charAt(this.random(ASCII_LETTERS.length));
    }
    return `${prefix}_`;
  }

  /**
   * Return a path under the output directory that does not exist right now.
   *
   * Nothing is created, so two callers may get the same path; `write`
   * is the race-free way to claim one.
   */
  async reserve(desiredName: string): Promise<string> {
    const fileName = sanitizeFileName(desiredName);
    let candidate = path.join(this.directory, fileName);

    let attempts = 0;
    while (await pathExists(candidate)) {
      if (++attempts > MAX_ATTEMPTS) {
        throw new ExtractionError(`No free name for ${fileName}`, ErrorCode.EXTRACTION_NAME_EXHAUSTED, {
          filePath: candidate,
        });
      }
      candidate = path.join(this.directory, this.randomPrefix() + fileName);
    }

    return candidate;
  }

  /**
   * Reserve a path for `desiredName` and create it with `content`.
   *
   * Creation is exclusive, so a path taken between the existence check and
   * the write is retried under a new prefix instead of being overwritten.
   */
  async write(desiredName: string, content: string): Promise<string> {
    return this.mutex.runExclusive(async () => {
      await this.initialize();
      for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
        const target = await this.reserve(desiredName);
        try {
          await fsPromises.writeFile(target, content, { encoding: SOURCE_ENCODING, flag: "wx" });
          this.logger.debug({ path: target }, "Artifact written");
          return target;
        } catch (error) {
          if (isErrnoException(error) && error.code === "EEXIST") continue;
          throw new ExtractionError(`Cannot write ${target}`, ErrorCode.EXTRACTION_WRITE_FAILED, {
            filePath: target,
            cause: error instanceof Error ? error.message : String(error),
          });
        }
      }
      throw new ExtractionError(`No free name for ${desiredName}`, ErrorCode.EXTRACTION_NAME_EXHAUSTED);
    });
  }

  /**
   * Delete an artifact written by this namer. Missing files are ignored.
   */
  async remove(artifactPath: string): Promise<void> {
    await fsPromises.rm(artifactPath, { force: true });
    this.logger.debug({ path: artifactPath }, "Artifact removed");
  }
}

/**
 * Creates an OutputNamer instance.
 */
export function createOutputNamer(options: OutputNamerOptions): OutputNamer {
  return new OutputNamer(options);
}
