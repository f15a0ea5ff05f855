import { describe, expect, it } from "vitest";

import { ByteBuffer } from "./buffer.js";
import { History, invert } from "./history.js";

function tracked(bytes: number[]) {
  const buf = new ByteBuffer(Uint8Array.from(bytes));
  const history = new History();
  buf.onEdit((a) => history.record(a));
  return { buf, history };
}

describe("History", () => {
  it("undoes an append and can redo it", () => {
    const { buf, history } = tracked([0x41, 0x42]);
    buf.insert(0, 0x00, true);
    expect(history.undoDepth).toBe(1);

    const undone = history.undo(buf);
    expect(undone).toEqual({ kind: "insert", offset: 1, byte: 0x00 });
    expect([...buf.contents()]).toEqual([0x41, 0x42]);
    expect(buf.dirty).toBe(true);
    expect(history.undoDepth).toBe(0);
    expect(history.redoDepth).toBe(1);

    history.redo(buf);
    expect([...buf.contents()]).toEqual([0x41, 0x00, 0x42]);
    expect(history.redoDepth).toBe(0);
  });

  it("restores the original bytes after undoing every edit", () => {
    const original = [10, 20, 30, 40, 50, 60];
    const { buf, history } = tracked(original);
    buf.insert(3, 99);
    buf.replace(0, 7);
    buf.delete(5);
    buf.insert(5, 1, true);
    buf.incrementByte(2, -31);
    const edited = [...buf.contents()];

    for (let i = 0; i < 5; i++) expect(history.undo(buf)).not.toBeNull();
    expect([...buf.contents()]).toEqual(original);

    for (let i = 0; i < 5; i++) expect(history.redo(buf)).not.toBeNull();
    expect([...buf.contents()]).toEqual(edited);
  });

  it("does not record its own replays", () => {
    const { buf, history } = tracked([1, 2]);
    buf.delete(0);
    history.undo(buf);
    history.redo(buf);
    expect(history.undoDepth).toBe(1);
    expect(history.redoDepth).toBe(0);
  });

  it("drops the redo side when a new edit is recorded", () => {
    const { buf, history } = tracked([1, 2, 3]);
    buf.replace(0, 9);
    buf.replace(1, 9);
    history.undo(buf);
    expect(history.redoDepth).toBe(1);
    buf.delete(2);
    expect(history.redoDepth).toBe(0);
    expect(history.redo(buf)).toBeNull();
  });

  it("is a no-op when empty", () => {
    const { buf, history } = tracked([1]);
    expect(history.undo(buf)).toBeNull();
    expect(history.redo(buf)).toBeNull();
    expect([...buf.contents()]).toEqual([1]);
    expect(buf.dirty).toBe(false);
  });

  it("inverts each kind of action", () => {
    expect(invert({ kind: "insert", offset: 2, byte: 5 })).toEqual({
      kind: "delete",
      offset: 2,
      byte: 5,
    });
    expect(invert({ kind: "delete", offset: 0, byte: 7 })).toEqual({
      kind: "insert",
      offset: 0,
      byte: 7,
    });
    expect(invert({ kind: "replace", offset: 1, oldByte: 3, newByte: 4 })).toEqual({
      kind: "replace",
      offset: 1,
      oldByte: 4,
      newByte: 3,
    });
  });
});
