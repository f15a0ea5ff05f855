import type { Layout } from "./state.js";

export type Cursor = { row: number; col: number };

export type Direction = "left" | "right" | "up" | "down";

/** Width of the "%08x: " address column in front of every row. */
export const ADDRESS_WIDTH = 10;

type Extent = { readonly length: number };

/**
 * Maps buffer offsets to screen cells and back, and keeps the cursor visible.
 * `cursor.col` is the byte index within the row, `cursor.row` the screen row.
 */
export class Viewport {
  scrollTop = 0;
  cursor: Cursor = { row: 0, col: 0 };
  screenRows: number;
  screenCols: number;
  octetsPerLine: number;
  grouping: number;

  constructor(
    private readonly doc: Extent,
    layout: Layout,
    screenRows = 24,
    screenCols = 80,
  ) {
    this.octetsPerLine = Math.max(1, Math.floor(layout.octetsPerLine));
    this.grouping = Math.max(1, Math.floor(layout.grouping));
    this.screenRows = Math.max(1, screenRows);
    this.screenCols = Math.max(1, screenCols);
  }

  /** Offset the cursor points at. */
  get offset(): number {
    return (this.scrollTop + this.cursor.row) * this.octetsPerLine + this.cursor.col;
  }

  lineOf(offset: number): number {
    return Math.floor(offset / this.octetsPerLine);
  }

  /** Highest scrollTop that still shows the line holding the past-end position. */
  maxScrollTop(): number {
    return Math.max(0, this.lineOf(this.doc.length) - this.screenRows + 1);
  }

  /** Screen column of the high nibble of byte `index` within a row. */
  hexColumn(index: number): number {
    return ADDRESS_WIDTH + index * 2 + Math.floor(index / this.grouping);
  }

  /** Width of the hex area of one row, group gaps included. */
  hexWidth(): number {
    return this.hexColumn(this.octetsPerLine) - ADDRESS_WIDTH;
  }

  /** Screen cell of `offset`. Does not scroll; `y` may fall off-screen. */
  offsetToPosition(offset: number): { x: number; y: number } {
    return {
      x: this.hexColumn(offset % this.octetsPerLine),
      y: this.lineOf(offset) - this.scrollTop,
    };
  }

  /**
   * Offset of the byte drawn at screen cell (x, y). Cells left of the hex area
   * resolve to the row's first byte, group gaps to the byte before the gap, and
   * anything past the data to the past-end position.
   */
  positionToOffset(x: number, y: number): number {
    const span = this.grouping * 2 + 1;
    const rel = Math.max(0, x - ADDRESS_WIDTH);
    const group = Math.floor(rel / span);
    const within = Math.min(Math.floor((rel % span) / 2), this.grouping - 1);
    const index = Math.min(group * this.grouping + within, this.octetsPerLine - 1);
    const row = Math.max(0, Math.min(y, this.screenRows - 1));
    const offset = (this.scrollTop + row) * this.octetsPerLine + index;
    return Math.min(offset, this.doc.length);
  }

  /** Moves the view by `units` lines within the readable part of the buffer. */
  scroll(units: number) {
    const offset = this.offset;
    this.scrollTop = Math.max(0, Math.min(this.scrollTop + units, this.maxScrollTop()));
    // the cursor is dragged along when its line leaves the view
    const line = Math.max(
      this.scrollTop,
      Math.min(this.lineOf(offset), this.scrollTop + this.screenRows - 1),
    );
    this.placeCursor(
      Math.min(line * this.octetsPerLine + (offset % this.octetsPerLine), this.doc.length),
    );
  }

  /** Puts `offset` on the middle row of the screen, clamped near the edges. */
  scrollToOffset(offset: number) {
    const target = Math.max(0, Math.min(Math.floor(offset), this.doc.length));
    const line = this.lineOf(target);
    const top = line - Math.floor(this.screenRows / 2);
    this.scrollTop = Math.max(0, Math.min(top, this.maxScrollTop()));
    this.placeCursor(target);
  }

  /** Scrolls as little as possible so that `offset` is on screen. */
  reveal(offset: number) {
    const target = Math.max(0, Math.min(Math.floor(offset), this.doc.length));
    const line = this.lineOf(target);
    if (line < this.scrollTop) this.scrollTop = line;
    else if (line >= this.scrollTop + this.screenRows)
      this.scrollTop = line - this.screenRows + 1;
    this.placeCursor(target);
  }

  moveCursor(direction: Direction, amount: number, allowPastEnd: boolean) {
    const step =
      direction === "left" || direction === "right" ? amount : amount * this.octetsPerLine;
    const sign = direction === "left" || direction === "up" ? -1 : 1;
    this.reveal(this.clampOffset(this.offset + sign * step, allowPastEnd));
  }

  /** Keeps the cursor on a valid byte after the buffer shrank or the mode changed. */
  clampCursor(allowPastEnd: boolean) {
    const clamped = this.clampOffset(this.offset, allowPastEnd);
    if (clamped !== this.offset) this.reveal(clamped);
  }

  clampOffset(offset: number, allowPastEnd: boolean): number {
    const max = allowPastEnd ? this.doc.length : Math.max(0, this.doc.length - 1);
    return Math.max(0, Math.min(offset, max));
  }

  setLayout(layout: Layout) {
    const offset = this.offset;
    this.octetsPerLine = Math.max(1, Math.floor(layout.octetsPerLine));
    this.grouping = Math.max(1, Math.floor(layout.grouping));
    this.scrollToOffset(offset);
  }

  resize(screenRows: number, screenCols: number) {
    const offset = this.offset;
    this.screenRows = Math.max(1, screenRows);
    this.screenCols = Math.max(1, screenCols);
    this.scrollTop = Math.min(this.scrollTop, this.maxScrollTop());
    this.reveal(offset);
  }

  private placeCursor(offset: number) {
    this.cursor.row = this.lineOf(offset) - this.scrollTop;
    this.cursor.col = offset % this.octetsPerLine;
  }
}
