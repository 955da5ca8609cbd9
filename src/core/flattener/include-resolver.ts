/**
 * Include Resolver
 *
 * Flattens a source file by substituting every `` `include `` directive with
 * the verbatim contents of the file it names. This is a textual pattern
 * substitution, not a preprocessor: directives inside comments or disabled
 * `ifdef blocks are inlined (or dropped) like any other.
 *
 * Targets are resolved against the directory of the ROOT file, whichever
 * file the directive came from. A missing target is replaced with nothing.
 * Resolution stops after a fixed number of passes, which bounds cyclic and
 * self-including inputs.
 *
 * @module
 */

import * as path from "node:path";
import * as fsPromises from "node:fs/promises";
import { createLogger, type Logger } from "../../utils/logger.js";
import { SOURCE_ENCODING, isWithin, readTextIfFile } from "../../utils/fs.js";

// =============================================================================
// Directive Pattern
// =============================================================================

const INCLUDE_DIRECTIVE_SOURCE = '`include\\s+(?:"([\\w./]+)"|<([\\w./]+)>)';

/**
 * A fresh global regex each time; global regexes carry lastIndex state.
 */
function includeDirectivePattern(): RegExp {
  return new RegExp(INCLUDE_DIRECTIVE_SOURCE, "g");
}

export interface IncludeDirective {
  /** Full matched text, e.g. `` `include "defs.vh" `` */
  text: string;
  /** Referenced path as written */
  target: string;
  /** Offset of the match in the scanned text */
  index: number;
}

/**
 * List the include directives in a text, in order of appearance.
 */
export function findIncludeDirectives(text: string): IncludeDirective[] {
  const directives: IncludeDirective[] = [];
  for (const match of text.matchAll(includeDirectivePattern())) {
    const target = match[1] ?? match[2] ?? "";
    directives.push({ text: match[0], target, index: match.index ?? 0 });
  }
  return directives;
}

// =============================================================================
// Types
// =============================================================================

export const DEFAULT_MAX_PASSES = 5;

export interface IncludeResolverOptions {
  /** Upper bound on substitution passes */
  maxPasses?: number;
  /**
   * Targets resolving outside this directory are treated as missing.
   * Unset means no containment check.
   */
  boundary?: string;
  logger?: Logger;
}

export interface FlattenResult {
  text: string;
  /** Substitution passes performed */
  passes: number;
  /** Directives still present when the pass bound was hit (0 when complete) */
  unresolved: number;
  /** Targets that could not be read and were dropped */
  missing: string[];
}

// =============================================================================
// Resolver
// =============================================================================

export class IncludeResolver {
  private readonly maxPasses: number;
  private readonly boundary: string | null;
  private readonly logger: Logger;

  constructor(options: IncludeResolverOptions = {}) {
    this.maxPasses = options.maxPasses ?? DEFAULT_MAX_PASSES;
    this.boundary = options.boundary ? path.resolve(options.boundary) : null;
    this.logger = options.logger ?? createLogger("include-resolver");
  }

  /**
   * Flatten a file on disk.
   */
  async flatten(rootFile: string): Promise<FlattenResult> {
    const text = await fsPromises.readFile(rootFile, { encoding: SOURCE_ENCODING });
    return this.flattenText(text, path.dirname(path.resolve(rootFile)));
  }

  /**
   * Flatten text whose include targets are relative to `baseDir`.
   * Text without directives comes back unchanged.
   */
  async flattenText(text: string, baseDir: string): Promise<FlattenResult> {
    let current = text;
    let passes = 0;
    const missing = new Set<string>();
    // One read per target within a call; contents do not change mid-flatten
    const contents = new Map<string, string | null>();

    while (passes < this.maxPasses) {
      const directives = findIncludeDirectives(current);
      if (directives.length === 0) break;

      for (const { target } of directives) {
        if (!contents.has(target)) {
          contents.set(target, await this.load(baseDir, target));
        }
      }

      current = current.replace(includeDirectivePattern(), (_match, quoted?: string, bracketed?: string) => {
        const target = quoted ?? bracketed ?? "";
        const content = contents.get(target) ?? null;
        if (content === null) {
          missing.add(target);
          return "";
        }
        return content;
      });
      passes++;
    }

    const unresolved = findIncludeDirectives(current).length;
    if (unresolved > 0) {
      this.logger.warn({ baseDir, unresolved, passes }, "Include resolution stopped at pass limit");
    }
    for (const target of missing) {
      this.logger.debug({ baseDir, target }, "Include target missing; directive dropped");
    }

    return { text: current, passes, unresolved, missing: [...missing] };
  }

  private async load(baseDir: string, target: string): Promise<string | null> {
    const resolved = path.resolve(baseDir, target);
    if (this.boundary && !isWithin(this.boundary, resolved)) {
      this.logger.debug({ target, boundary: this.boundary }, "Include target outside boundary");
      return null;
    }
    return readTextIfFile(resolved);
  }
}

/**
 * Creates an IncludeResolver instance.
 */
export function createIncludeResolver(options?: IncludeResolverOptions): IncludeResolver {
  return new IncludeResolver(options);
}
