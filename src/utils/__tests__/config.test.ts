/**
 * Configuration loading tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";

import { CONFIG_FILE, configFromEnv, loadConfig, mergeConfigLayers } from "../index.js";
import { ConfigurationError } from "../../core/errors.js";

describe("loadConfig", () => {
  let tempDir: string;

  async function writeConfig(content: string): Promise<void> {
    await fs.writeFile(path.join(tempDir, CONFIG_FILE), content);
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "config-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should apply defaults when nothing is configured", () => {
    expect(loadConfig({ projectRoot: tempDir, env: {} })).toEqual({
      outputDirectory: "rtl",
      workDirectory: ".",
      repositoriesFile: "repos.txt",
      oracle: { binary: "yosys", timeoutMs: 1_000_000 },
      maxIncludePasses: 5,
      prefixLength: 5,
      sourceKinds: ["systemverilog", "verilog"],
      keepClones: false,
      logFile: "collector.log",
    });
  });

  it("should layer file, environment and overrides", async () => {
    await writeConfig(
      JSON.stringify({ outputDirectory: "from-file", oracle: { binary: "file-yosys", timeoutMs: 5000 }, prefixLength: 8 })
    );

    const config = loadConfig({
      projectRoot: tempDir,
      env: { YOSYS_BINARY: "/opt/yosys/bin/yosys", RTL_HARVEST_OUTPUT_DIR: "from-env" },
      overrides: { outputDirectory: "from-flag", oracle: { timeoutMs: 60_000 } },
    });

    expect(config.outputDirectory).toBe("from-flag");
    expect(config.oracle).toEqual({ binary: "/opt/yosys/bin/yosys", timeoutMs: 60_000 });
    expect(config.prefixLength).toBe(8);
  });

  it("should reject invalid values with the offending path", async () => {
    await writeConfig(JSON.stringify({ maxIncludePasses: -1, sourceKinds: ["vhdl"] }));

    const error = (() => {
      try {
        loadConfig({ projectRoot: tempDir, env: {} });
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    const issues = error instanceof ConfigurationError ? error.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]?.startsWith("maxIncludePasses: ")).toBe(true);
    expect(issues[1]?.startsWith("sourceKinds.0: ")).toBe(true);
  });

  it("should reject malformed JSON", async () => {
    await writeConfig("{ not json");

    expect(() => loadConfig({ projectRoot: tempDir, env: {} })).toThrow(ConfigurationError);
  });

  it("should reject a file that is not an object", async () => {
    await writeConfig("[1, 2]");

    expect(() => loadConfig({ projectRoot: tempDir, env: {} })).toThrow(/must contain a JSON object/);
  });
});

describe("configFromEnv", () => {
  it("should ignore unset and empty variables", () => {
    expect(configFromEnv({ YOSYS_BINARY: "" })).toEqual({});
  });
});

describe("mergeConfigLayers", () => {
  it("should skip undefined values", () => {
    expect(mergeConfigLayers({ a: 1 }, { a: undefined, b: 2 })).toEqual({ a: 1, b: 2 });
  });

  it("should replace non-oracle objects wholesale", () => {
    expect(mergeConfigLayers({ sourceKinds: ["verilog", "systemverilog"] }, { sourceKinds: ["verilog"] })).toEqual({
      sourceKinds: ["verilog"],
    });
  });
});
