import { describe, expect, it } from "vitest";

import { ByteBuffer, type EditAction } from "./buffer.js";

function withLog(bytes: number[]) {
  const buf = new ByteBuffer(Uint8Array.from(bytes));
  const log: EditAction[] = [];
  buf.onEdit((a) => log.push(a));
  return { buf, log };
}

describe("ByteBuffer", () => {
  it("inserts after an offset and reports where the byte landed", () => {
    const { buf, log } = withLog([0x41, 0x42]);
    expect(buf.insert(0, 0x00, true)).toBe(1);
    expect([...buf.contents()]).toEqual([0x41, 0x00, 0x42]);
    expect(buf.length).toBe(3);
    expect(buf.dirty).toBe(true);
    expect(log).toEqual([{ kind: "insert", offset: 1, byte: 0x00 }]);
  });

  it("accepts an insert at the end but not beyond it", () => {
    const { buf, log } = withLog([0x41, 0x42]);
    expect(buf.insert(2, 0x43)).toBe(2);
    expect(buf.insert(4, 0x44)).toBeNull();
    expect(buf.insert(2, 0x44, true)).toBe(3);
    expect(buf.insert(4, 0x45, true)).toBeNull();
    expect([...buf.contents()]).toEqual([0x41, 0x42, 0x43, 0x44]);
    expect(log).toHaveLength(2);
  });

  it("leaves the buffer untouched when an operation is rejected", () => {
    const { buf, log } = withLog([0x41]);
    expect(buf.delete(1)).toBeNull();
    expect(buf.replace(-1, 0)).toBeNull();
    expect(buf.insert(1.5, 0)).toBeNull();
    expect([...buf.contents()]).toEqual([0x41]);
    expect(buf.dirty).toBe(false);
    expect(log).toEqual([]);
  });

  it("deletes a byte and hands it back", () => {
    const { buf, log } = withLog([0x41, 0x42, 0x43]);
    expect(buf.delete(1)).toBe(0x42);
    expect([...buf.contents()]).toEqual([0x41, 0x43]);
    expect(log).toEqual([{ kind: "delete", offset: 1, byte: 0x42 }]);
  });

  it("refuses to delete from an empty buffer", () => {
    const { buf } = withLog([]);
    expect(buf.delete(0)).toBeNull();
    expect(buf.length).toBe(0);
  });

  it("reports the overwritten byte on replace", () => {
    const { buf, log } = withLog([0x41, 0x42]);
    expect(buf.replace(1, 0x7a)).toBe(0x42);
    expect(buf.length).toBe(2);
    expect(log).toEqual([{ kind: "replace", offset: 1, oldByte: 0x42, newByte: 0x7a }]);
  });

  it("wraps increments around 8 bits", () => {
    const { buf, log } = withLog([0xff, 0x00]);
    expect(buf.incrementByte(0, 1)).toBe(0x00);
    expect(buf.incrementByte(1, -1)).toBe(0xff);
    expect(buf.incrementByte(1, 258)).toBe(0x01);
    expect(log[0]).toEqual({ kind: "replace", offset: 0, oldByte: 0xff, newByte: 0x00 });
    expect(buf.incrementByte(2, 1)).toBeNull();
  });

  it("grows past its initial capacity", () => {
    const buf = new ByteBuffer();
    for (let i = 0; i < 200; i++) buf.insert(buf.length, i);
    expect(buf.length).toBe(200);
    expect(buf.read(199)).toBe(199);
    expect(buf.read(200)).toBeUndefined();
  });

  it("undoes an insert by deleting at the same offset", () => {
    const original = [1, 2, 3, 4];
    for (let offset = 0; offset <= original.length; offset++) {
      const buf = new ByteBuffer(Uint8Array.from(original));
      const at = buf.insert(offset, 0xee);
      expect(at).toBe(offset);
      buf.delete(offset);
      expect([...buf.contents()]).toEqual(original);
    }
  });

  it("does not report edits made silently", () => {
    const { buf, log } = withLog([0x41]);
    buf.silently(() => buf.replace(0, 0x42));
    expect(buf.read(0)).toBe(0x42);
    expect(log).toEqual([]);
    buf.replace(0, 0x43);
    expect(log).toHaveLength(1);
  });

  it("clears the dirty flag on load and save", () => {
    const buf = new ByteBuffer();
    buf.insert(0, 1);
    buf.markSaved();
    expect(buf.dirty).toBe(false);
    buf.insert(0, 2);
    buf.load(Uint8Array.of(9, 9), "x.bin");
    expect(buf.dirty).toBe(false);
    expect(buf.filename).toBe("x.bin");
    expect([...buf.slice(0, 10)]).toEqual([9, 9]);
  });
});
