/**
 * Oracle Signal Tests
 */

import { describe, it, expect } from "vitest";
import {
  findTopModule,
  outputLines,
  parseAutoSelectedTop,
  parseElaborationTop,
} from "../signals.js";
import { SYSTEMVERILOG_RECIPE, VERILOG_RECIPE, joinFilePaths } from "../recipes.js";

describe("parseElaborationTop", () => {
  it("should take the text between the first @ and the next quote", () => {
    expect(parseElaborationTop('[NTE:EL0503] /src/alu.sv:3:1: Top level module "work@alu".')).toBe("alu");
  });

  it("should stop at the first quote after the @", () => {
    expect(parseElaborationTop('[NTE:EL0503] x "work@top" and "work@other"')).toBe("top");
  });

  it("should return null without an @", () => {
    expect(parseElaborationTop('[NTE:EL0503] Top level module "alu".')).toBeNull();
  });

  it("should return null without a closing quote", () => {
    expect(parseElaborationTop("[NTE:EL0503] Top level module work@alu")).toBeNull();
  });

  it("should return null for an empty name", () => {
    expect(parseElaborationTop('[NTE:EL0503] Top level module @"Foo"')).toBeNull();
  });
});

describe("parseAutoSelectedTop", () => {
  it("should read the announced module", () => {
    expect(parseAutoSelectedTop("Automatically selected uart_tx as design top module.")).toBe("uart_tx");
  });

  it("should allow leading whitespace and $ in identifiers", () => {
    expect(parseAutoSelectedTop("   Automatically selected fifo$2 as design top module.")).toBe("fifo$2");
  });

  it("should reject identifiers starting with a digit", () => {
    expect(parseAutoSelectedTop("Automatically selected 9lives as design top module.")).toBeNull();
  });

  it("should ignore unrelated lines", () => {
    expect(parseAutoSelectedTop("Selected top module candidate: foo")).toBeNull();
  });
});

describe("findTopModule", () => {
  it("should report the elaboration-top signal", () => {
    const result = findTopModule([
      "some banner",
      '[NTE:EL0503] /tmp/a.sv:1:1: Top level module "work@Foo".',
    ]);
    expect(result).toEqual({ ok: true, value: { moduleName: "Foo", signal: "elaboration-top" } });
  });

  it("should report the auto-selected signal", () => {
    const result = findTopModule(["Automatically selected counter as design top module."]);
    expect(result).toEqual({ ok: true, value: { moduleName: "counter", signal: "auto-selected-top" } });
  });

  it("should let the first signal in output order win", () => {
    const result = findTopModule([
      "Automatically selected first as design top module.",
      '[NTE:EL0503] f.sv:1:1: Top level module "work@second".',
      "Automatically selected third as design top module.",
    ]);
    expect(result.ok && result.value.moduleName).toBe("first");
  });

  it("should stop with NoTopModuleFound on a malformed diagnostic", () => {
    const result = findTopModule([
      "[NTE:EL0503] Top level module without marker",
      "Automatically selected later as design top module.",
    ]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe("NoTopModuleFound");
      expect(result.error.detail).toBe("malformed diagnostic: [NTE:EL0503] Top level module without marker");
    }
  });

  it("should return NoTopModuleFound when no signal appears", () => {
    expect(findTopModule(["", "End of script."])).toEqual({
      ok: false,
      error: { reason: "NoTopModuleFound" },
    });
  });

  it("should only honor the diagnostic at the start of a line", () => {
    const result = findTopModule(['note: [NTE:EL0503] "work@hidden"']);
    expect(result.ok).toBe(false);
  });
});

describe("outputLines", () => {
  it("should yield stdout lines before stderr lines", () => {
    expect([...outputLines("a\r\nb", "c\nd")]).toEqual(["a", "b", "c", "d"]);
  });

  it("should skip empty streams", () => {
    expect([...outputLines("", "only")]).toEqual(["only"]);
  });
});

describe("recipes", () => {
  it("should quote every input file", () => {
    expect(joinFilePaths(["/a/x.sv", "/b/y z.sv"])).toBe('"/a/x.sv" "/b/y z.sv"');
  });

  it("should load the systemverilog plugin quietly", () => {
    expect(SYSTEMVERILOG_RECIPE.buildArgs(["/r/top.sv"])).toEqual([
      "-qq",
      "-p",
      'plugin -i systemverilog; read_systemverilog -synth "/r/top.sv"',
    ]);
  });

  it("should auto-select the top for plain verilog", () => {
    expect(VERILOG_RECIPE.buildArgs(["/r/a.v", "/r/b.v"])).toEqual([
      "-p",
      'read_verilog "/r/a.v" "/r/b.v"; synth -auto-top',
    ]);
  });
});
