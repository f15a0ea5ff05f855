import { describe, expect, it } from "vitest";

import { parseCommand } from "./commands.js";

describe("parseCommand", () => {
  it("parses write and quit variants", () => {
    expect(parseCommand("w")).toEqual({ kind: "write" });
    expect(parseCommand("write")).toEqual({ kind: "write" });
    expect(parseCommand("q")).toEqual({ kind: "quit", force: false });
    expect(parseCommand("q!")).toEqual({ kind: "quit", force: true });
    expect(parseCommand("wq")).toEqual({ kind: "writeQuit" });
    expect(parseCommand("  x ")).toEqual({ kind: "writeQuit" });
  });

  it("parses offsets in decimal and hex", () => {
    expect(parseCommand("42")).toEqual({ kind: "goto", offset: 42 });
    expect(parseCommand("0x1f")).toEqual({ kind: "goto", offset: 31 });
    expect(parseCommand("0X1F")).toEqual({ kind: "goto", offset: 31 });
  });

  it("parses set with long and short option names", () => {
    expect(parseCommand("set o=8")).toEqual({ kind: "set", option: "octets", value: "8" });
    expect(parseCommand("set grouping = 2")).toEqual({
      kind: "set",
      option: "grouping",
      value: "2",
    });
    expect(parseCommand("set toString=1")).toEqual({
      kind: "unknown",
      text: "set toString=1",
      suggestion: "set",
    });
  });

  it("parses table and help", () => {
    expect(parseCommand("table tables/latin.tbl")).toEqual({
      kind: "table",
      path: "tables/latin.tbl",
    });
    expect(parseCommand("help")).toEqual({ kind: "help" });
  });

  it("suggests the closest command for a typo", () => {
    expect(parseCommand("wrte")).toEqual({ kind: "unknown", text: "wrte", suggestion: "write" });
    expect(parseCommand("zap")).toEqual({ kind: "unknown", text: "zap", suggestion: null });
  });
});
