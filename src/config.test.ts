import { describe, expect, it } from "vitest";

import { layoutValueSchema, parseArgs } from "./config.js";

describe("parseArgs", () => {
  it("fills in defaults", () => {
    expect(parseArgs(["dump.bin"])).toEqual({
      kind: "run",
      options: { file: "dump.bin", octetsPerLine: 16, grouping: 4 },
    });
  });

  it("reads layout and table options", () => {
    expect(parseArgs(["-o", "8", "--grouping", "2", "-t", "rom.tbl", "rom.bin"])).toEqual({
      kind: "run",
      options: { file: "rom.bin", octetsPerLine: 8, grouping: 2, table: "rom.tbl" },
    });
  });

  it("handles help and version before anything else", () => {
    expect(parseArgs(["-h", "--bogus"])).toEqual({ kind: "help" });
    expect(parseArgs(["x", "--version"])).toEqual({ kind: "version" });
  });

  it("reports argument errors", () => {
    expect(parseArgs([])).toEqual({ kind: "error", message: "file: a file to open is required" });
    expect(parseArgs(["-x", "f"])).toEqual({ kind: "error", message: "unknown option -x" });
    expect(parseArgs(["f", "-o"])).toEqual({ kind: "error", message: "-o needs a value" });
    expect(parseArgs(["a", "b"])).toEqual({
      kind: "error",
      message: "only one file can be opened",
    });
  });

  it("validates layout values", () => {
    expect(parseArgs(["-o", "0", "f"])).toEqual({
      kind: "error",
      message: "octetsPerLine: Number must be greater than or equal to 1",
    });
    const result = parseArgs(["-g", "2.5", "f"]);
    expect(result.kind).toBe("error");
  });
});

describe("layoutValueSchema", () => {
  it("coerces numeric strings", () => {
    expect(layoutValueSchema.parse("12")).toBe(12);
    expect(layoutValueSchema.safeParse("65").success).toBe(false);
    expect(layoutValueSchema.safeParse("abc").success).toBe(false);
  });
});
