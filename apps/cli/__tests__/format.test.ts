import { describe, expect, it } from "vitest";
import { formatResults, formatValue } from "../src/format.js";
import { CliError, parseArgs } from "../src/args.js";

describe("formatValue", () => {
  it("hides floating-point noise", () => {
    expect(formatValue(4.3999999999999995)).toBe("4.4");
  });

  it("prints integers without a decimal point", () => {
    expect(formatValue(2)).toBe("2");
    expect(formatValue(-6)).toBe("-6");
  });

  it("keeps six significant digits", () => {
    expect(formatValue(1234567)).toBe("1234570");
    expect(formatValue(0.000123456789)).toBe("0.000123457");
  });

  it("stays in fixed notation for large and small magnitudes", () => {
    expect(formatValue(1e-5)).toBe("0.00001");
    expect(formatValue(98765432)).toBe("98765400");
  });
});

describe("formatResults", () => {
  it("renders one line per criterion", () => {
    expect(formatResults({ minimax: 2, savage: 15, hurwicz: -1.4 })).toEqual([
      "Minimax: 2",
      "Savage: 15",
      "Hurwicz: -1.4",
    ]);
  });
});

describe("parseArgs", () => {
  it("defaults to no file and no coefficient", () => {
    expect(parseArgs([])).toEqual({ help: false });
  });

  it("reads the matrix path and coefficient in any order", () => {
    expect(parseArgs(["-c", "0.3", "m.json"])).toEqual({ help: false, matrixPath: "m.json", coefficient: 0.3 });
  });

  it("rejects a missing flag value", () => {
    expect(() => parseArgs(["--coefficient"])).toThrow(CliError);
    expect(() => parseArgs(["--coefficient"])).toThrow("--coefficient expects a value");
  });

  it("rejects an empty flag value", () => {
    expect(() => parseArgs(["--coefficient="])).toThrow('--coefficient expects a number, got ""');
  });

  it("rejects a second positional argument", () => {
    expect(() => parseArgs(["a.json", "b.json"])).toThrow("unexpected argument b.json");
  });
});
