import { describe, expect, it } from "vitest";

import { ADDRESS_WIDTH, Viewport } from "./viewport.js";

function view(length: number, rows = 10, octetsPerLine = 16, grouping = 4) {
  return new Viewport({ length }, { octetsPerLine, grouping }, rows, 80);
}

describe("Viewport", () => {
  it("maps offsets to screen cells with one gap per group", () => {
    const v = view(100);
    expect(v.offsetToPosition(0)).toEqual({ x: ADDRESS_WIDTH, y: 0 });
    expect(v.offsetToPosition(5)).toEqual({ x: 21, y: 0 });
    expect(v.offsetToPosition(20)).toEqual({ x: 19, y: 1 });
  });

  it("maps screen cells back to offsets", () => {
    const v = view(100);
    expect(v.positionToOffset(21, 0)).toBe(5);
    expect(v.positionToOffset(22, 0)).toBe(5);
    // the gap after the first group belongs to its last byte
    expect(v.positionToOffset(18, 0)).toBe(3);
    expect(v.positionToOffset(0, 2)).toBe(32);
    expect(v.positionToOffset(500, 1)).toBe(31);
    expect(v.positionToOffset(10, 9)).toBe(100);
  });

  it("round-trips every byte column", () => {
    const v = view(1000, 10, 12, 3);
    for (let offset = 0; offset < 12 * 10; offset++) {
      const { x, y } = v.offsetToPosition(offset);
      expect(v.positionToOffset(x, y)).toBe(offset);
    }
  });

  it("centres the target line when scrolling to an offset", () => {
    const v = view(10000);
    v.scrollToOffset(5000);
    expect(v.scrollTop).toBe(307);
    expect(v.cursor).toEqual({ row: 5, col: 8 });
    expect(v.offset).toBe(5000);
  });

  it("clamps scrolling near the ends of the buffer", () => {
    const v = view(10000);
    v.scrollToOffset(3);
    expect(v.scrollTop).toBe(0);
    expect(v.cursor).toEqual({ row: 0, col: 3 });

    v.scrollToOffset(10000);
    expect(v.scrollTop).toBe(616);
    expect(v.cursor).toEqual({ row: 9, col: 0 });

    v.scrollToOffset(99999);
    expect(v.offset).toBe(10000);
  });

  it("always keeps the target row on screen", () => {
    for (const length of [0, 1, 15, 16, 17, 160, 10000]) {
      const v = view(length, 7);
      for (const target of [0, 1, 8, 16, 100, 5000, length, length + 50]) {
        v.scrollToOffset(target);
        const expected = Math.min(target, length);
        expect(v.offset).toBe(expected);
        const row = v.lineOf(expected) - v.scrollTop;
        expect(row).toBeGreaterThanOrEqual(0);
        expect(row).toBeLessThan(7);
      }
    }
  });

  it("limits scroll to the readable part", () => {
    const v = view(10000);
    v.scroll(-5);
    expect(v.scrollTop).toBe(0);
    v.scroll(10000);
    expect(v.scrollTop).toBe(616);
    expect(v.cursor.row).toBe(0);
    expect(v.offset).toBe(616 * 16);
  });

  it("does not scroll a buffer that fits on screen", () => {
    const v = view(40);
    v.scroll(3);
    expect(v.scrollTop).toBe(0);
  });

  it("moves the cursor within the buffer bounds", () => {
    const v = view(100, 4);
    v.moveCursor("down", 1, false);
    expect(v.offset).toBe(16);
    v.moveCursor("left", 50, false);
    expect(v.offset).toBe(0);
    v.moveCursor("right", 1000, false);
    expect(v.offset).toBe(99);
    v.moveCursor("right", 1, true);
    expect(v.offset).toBe(100);
    v.clampCursor(false);
    expect(v.offset).toBe(99);
  });

  it("scrolls when the cursor leaves the screen", () => {
    const v = view(100, 4);
    for (let i = 0; i < 4; i++) v.moveCursor("down", 1, false);
    expect(v.offset).toBe(64);
    expect(v.scrollTop).toBe(1);
    expect(v.cursor.row).toBe(3);

    for (let i = 0; i < 4; i++) v.moveCursor("up", 1, false);
    expect(v.offset).toBe(0);
    expect(v.scrollTop).toBe(0);
  });

  it("copes with odd layout values", () => {
    const v = view(50, 5, 3, 2);
    expect(v.offsetToPosition(5)).toEqual({ x: 15, y: 1 });
    expect(v.hexWidth()).toBe(7);
    v.scrollToOffset(49);
    expect(v.offset).toBe(49);
  });

  it("keeps the offset across layout changes and resizes", () => {
    const v = view(1000);
    v.scrollToOffset(500);
    v.setLayout({ octetsPerLine: 8, grouping: 2 });
    expect(v.offset).toBe(500);
    expect(v.cursor.col).toBe(4);
    v.resize(3, 40);
    expect(v.offset).toBe(500);
    expect(v.cursor.row).toBeLessThan(3);
  });
});
