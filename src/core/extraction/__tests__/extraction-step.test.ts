/**
 * ExtractionStep Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";

import { ExtractionStep } from "../extraction-step.js";
import { IncludeResolver } from "../../flattener/include-resolver.js";
import { OutputNamer } from "../../output/output-namer.js";
import { OracleError } from "../../errors.js";
import { ScriptedOracle, moduleDeclarationOracle } from "../../__tests__/scripted-oracle.js";
import { err, ok } from "../../../types/result.js";
import type { IOracle } from "../../interfaces/IOracle.js";

describe("ExtractionStep", () => {
  let tempDir: string;
  let sourceDir: string;
  let outputDir: string;
  let namer: OutputNamer;

  async function write(relative: string, content: string): Promise<string> {
    const file = path.join(sourceDir, relative);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content);
    return file;
  }

  function stepWith(oracle: IOracle): ExtractionStep {
    return new ExtractionStep({
      oracle,
      namer,
      resolver: new IncludeResolver({ boundary: sourceDir }),
    });
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "extraction-test-"));
    sourceDir = path.join(tempDir, "repo");
    outputDir = path.join(tempDir, "rtl");
    await fs.mkdir(sourceDir);
    namer = new OutputNamer({ directory: outputDir });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should copy a self-contained module under its top module name", async () => {
    const content = "module Foo(input a, output b);\n  assign b = a;\nendmodule\n";
    const file = await write("foo_impl.sv", content);
    const oracle = moduleDeclarationOracle();

    const outcome = await stepWith(oracle).extract({ path: file, kind: "systemverilog" });

    const expectedPath = path.join(outputDir, "Foo.sv");
    expect(outcome).toEqual({
      status: "accepted",
      candidate: { path: file, kind: "systemverilog" },
      moduleName: "Foo",
      outputPath: expectedPath,
    });
    expect(await fs.readFile(expectedPath, "utf-8")).toBe(content);
    expect(oracle.calls).toEqual([
      { inputs: [file], kind: "systemverilog" },
      { inputs: [expectedPath], kind: "systemverilog" },
    ]);
  });

  it("should copy bytes that are not valid UTF-8 unchanged", async () => {
    const content = Buffer.concat([
      Buffer.from("// "),
      Buffer.from([0xc4, 0xe3, 0xba, 0xc3]),
      Buffer.from("\nmodule Foo; endmodule\n"),
    ]);
    const file = path.join(sourceDir, "foo.v");
    await fs.writeFile(file, content);

    const outcome = await stepWith(moduleDeclarationOracle()).extract({ path: file, kind: "verilog" });

    expect(outcome.status).toBe("accepted");
    expect(await fs.readFile(path.join(outputDir, "Foo.v"))).toEqual(content);
  });

  it("should inline an included file byte for byte", async () => {
    const header = Buffer.from([0x2f, 0x2f, 0x20, 0xe9, 0xff, 0x0a]);
    await fs.writeFile(path.join(sourceDir, "defs.vh"), header);
    const file = await write("top.sv", '`include "defs.vh"\nmodule Top; endmodule\n');

    const outcome = await stepWith(moduleDeclarationOracle()).extract({ path: file, kind: "systemverilog" });

    expect(outcome.status).toBe("accepted");
    expect(await fs.readFile(path.join(outputDir, "Top.sv"))).toEqual(
      Buffer.concat([header, Buffer.from("\nmodule Top; endmodule\n")])
    );
  });

  it("should keep the candidate's extension", async () => {
    const file = await write("cnt.v", "module counter; endmodule\n");

    const outcome = await stepWith(moduleDeclarationOracle()).extract({ path: file, kind: "verilog" });

    expect(outcome.status === "accepted" && outcome.outputPath).toBe(path.join(outputDir, "counter.v"));
  });

  it("should inline a resolvable include into the artifact", async () => {
    await write("defs.vh", "localparam W = 8;\n");
    const file = await write("top.sv", '`include "defs.vh"\nmodule Top; endmodule\n');

    const outcome = await stepWith(moduleDeclarationOracle()).extract({ path: file, kind: "systemverilog" });

    expect(outcome.status).toBe("accepted");
    expect(await fs.readFile(path.join(outputDir, "Top.sv"), "utf-8")).toBe(
      "localparam W = 8;\n\nmodule Top; endmodule\n"
    );
  });

  it("should drop an include whose target is missing", async () => {
    const file = await write("top.sv", 'module Top;\n`include "nowhere.vh"\nendmodule\n');

    const outcome = await stepWith(moduleDeclarationOracle()).extract({ path: file, kind: "systemverilog" });

    expect(outcome.status).toBe("accepted");
    expect(await fs.readFile(path.join(outputDir, "Top.sv"), "utf-8")).toBe("module Top;\n\nendmodule\n");
  });

  it("should reject a candidate the oracle rejects without touching the output", async () => {
    const file = await write("pkg.sv", "package p; endpackage\n");
    const oracle = moduleDeclarationOracle();

    const outcome = await stepWith(oracle).extract({ path: file, kind: "systemverilog" });

    expect(outcome).toEqual({
      status: "rejected",
      candidate: { path: file, kind: "systemverilog" },
      stage: "classify",
      reason: "NoTopModuleFound",
      detail: undefined,
    });
    expect(oracle.calls).toHaveLength(1);
    await expect(fs.access(outputDir)).rejects.toThrow();
  });

  it("should delete an artifact that fails validation", async () => {
    await write("dup.vh", "module Top; endmodule\n");
    const file = await write("top.sv", 'module Top; endmodule\n`include "dup.vh"\n');

    const outcome = await stepWith(moduleDeclarationOracle()).extract({ path: file, kind: "systemverilog" });

    expect(outcome).toEqual({
      status: "rejected",
      candidate: { path: file, kind: "systemverilog" },
      stage: "validate",
      reason: "ValidationFailed",
      detail: "ToolFailure",
    });
    expect(await fs.readdir(outputDir)).toEqual([]);
  });

  it("should report a candidate that cannot be read as FlattenFailed", async () => {
    const missing = path.join(sourceDir, "vanished.sv");
    const oracle = new ScriptedOracle(() => ok({ moduleName: "Ghost", signal: "auto-selected-top" }));

    const outcome = await stepWith(oracle).extract({ path: missing, kind: "systemverilog" });

    expect(outcome.status).toBe("rejected");
    expect(outcome.status === "rejected" && outcome.stage).toBe("flatten");
    expect(outcome.status === "rejected" && outcome.reason).toBe("FlattenFailed");
  });

  it("should remove the artifact and rethrow when the oracle dies during validation", async () => {
    const file = await write("top.sv", "module Top; endmodule\n");
    let calls = 0;
    const oracle = new ScriptedOracle(() => {
      calls++;
      if (calls === 1) return ok({ moduleName: "Top", signal: "elaboration-top" });
      throw new OracleError("yosys vanished");
    });

    await expect(stepWith(oracle).extract({ path: file, kind: "systemverilog" })).rejects.toBeInstanceOf(
      OracleError
    );
    expect(await fs.readdir(outputDir)).toEqual([]);
  });

  it("should pass the oracle's reason through on a timeout", async () => {
    const file = await write("slow.sv", "module Slow; endmodule\n");
    const oracle = new ScriptedOracle(() => err({ reason: "Timeout", detail: "exceeded 10ms" }));

    const outcome = await stepWith(oracle).extract({ path: file, kind: "systemverilog" });

    expect(outcome.status === "rejected" && outcome.reason).toBe("Timeout");
    expect(outcome.status === "rejected" && outcome.detail).toBe("exceeded 10ms");
  });
});
