/**
 * Oracle output signals
 *
 * Scans yosys / Surelog output for the lines that name the elaborated top
 * module. Two signals are recognized:
 *
 * 1. `[NTE:EL0503] ... "work@<name>" ...`, Surelog's top-level module note.
 *    The name is the text between the first `@` and the next `"`.
 * 2. `Automatically selected <name> as design top module.`, printed by
 *    `hierarchy -auto-top`.
 *
 * @module
 */

import { err, ok } from "../../types/result.js";
import type { ClassificationResult } from "../../types/index.js";

export const ELABORATION_TOP_PREFIX = "[NTE:EL0503]";

const AUTO_SELECTED_TOP = /^\s*Automatically selected ([a-zA-Z_][a-zA-Z0-9_$]*) as design top module\./;

/**
 * Extract the module name from an `[NTE:EL0503]` line.
 * Returns null when the `@` or the closing quote is missing, or the name is empty.
 */
export function parseElaborationTop(line: string): string | null {
  const start = line.indexOf("@");
  if (start === -1) return null;
  const end = line.indexOf('"', start + 1);
  if (end === -1) return null;
  const name = line.slice(start + 1, end);
  return name.length > 0 ? name : null;
}

/**
 * Extract the module name from an auto-top announcement, or null.
 */
export function parseAutoSelectedTop(line: string): string | null {
  const match = AUTO_SELECTED_TOP.exec(line);
  return match?.[1] ?? null;
}

/**
 * Find the top module in oracle output. The first signal in line order wins;
 * a malformed `[NTE:EL0503]` line ends the scan with NoTopModuleFound.
 */
export function findTopModule(lines: Iterable<string>): ClassificationResult {
  for (const line of lines) {
    if (line.startsWith(ELABORATION_TOP_PREFIX)) {
      const moduleName = parseElaborationTop(line);
      if (moduleName === null) {
        return err({ reason: "NoTopModuleFound", detail: `malformed diagnostic: ${line}` });
      }
      return ok({ moduleName, signal: "elaboration-top" });
    }

    const autoTop = parseAutoSelectedTop(line);
    if (autoTop !== null) {
      return ok({ moduleName: autoTop, signal: "auto-selected-top" });
    }
  }

  return err({ reason: "NoTopModuleFound" });
}

/**
 * Split captured output into lines, stdout before stderr.
 */
export function* outputLines(stdout: string, stderr: string): Generator<string> {
  for (const stream of [stdout, stderr]) {
    if (stream.length === 0) continue;
    yield* stream.split(/\r?\n/);
  }
}
