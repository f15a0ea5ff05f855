export type EditAction =
  | { kind: "insert"; offset: number; byte: number }
  | { kind: "delete"; offset: number; byte: number }
  | { kind: "replace"; offset: number; oldByte: number; newByte: number };

export type EditListener = (action: EditAction) => void;

const MIN_CAPACITY = 64;

/**
 * Flat, growable byte sequence. Every successful mutation is reported to the
 * edit listener before the call returns, so callers that only see the new
 * state (replace in particular) can still build a reversible action.
 */
export class ByteBuffer {
  filename: string | null = null;
  dirty = false;

  private bytes: Uint8Array;
  private len = 0;
  private listener: EditListener | null = null;
  private muted = 0;

  constructor(initial?: Uint8Array) {
    this.bytes = new Uint8Array(Math.max(MIN_CAPACITY, initial?.length ?? 0));
    if (initial) {
      this.bytes.set(initial);
      this.len = initial.length;
    }
  }

  get length(): number {
    return this.len;
  }

  load(data: Uint8Array, filename: string | null) {
    this.bytes = new Uint8Array(Math.max(MIN_CAPACITY, data.length));
    this.bytes.set(data);
    this.len = data.length;
    this.filename = filename;
    this.dirty = false;
  }

  /** Copy of the current contents, e.g. for writing out. */
  contents(): Uint8Array {
    return this.bytes.slice(0, this.len);
  }

  slice(start: number, end: number): Uint8Array {
    const s = Math.max(0, Math.min(start, this.len));
    const e = Math.max(s, Math.min(end, this.len));
    return this.bytes.subarray(s, e);
  }

  read(offset: number): number | undefined {
    if (!this.inRange(offset)) return undefined;
    return this.bytes[offset];
  }

  markSaved() {
    this.dirty = false;
  }

  onEdit(listener: EditListener | null) {
    this.listener = listener;
  }

  /** Runs `fn` without reporting its edits (used when replaying history). */
  silently<T>(fn: () => T): T {
    this.muted++;
    try {
      return fn();
    } finally {
      this.muted--;
    }
  }

  /**
   * Inserts `byte` at `offset`, or at `offset + 1` when `after` is set.
   * Returns the offset the byte landed on, or null when out of range.
   */
  insert(offset: number, byte: number, after = false): number | null {
    const at = after ? offset + 1 : offset;
    if (!Number.isInteger(at) || at < 0 || at > this.len) return null;

    this.ensureCapacity(this.len + 1);
    this.bytes.copyWithin(at + 1, at, this.len);
    this.bytes[at] = byte & 0xff;
    this.len++;
    this.dirty = true;
    this.emit({ kind: "insert", offset: at, byte: byte & 0xff });
    return at;
  }

  /** Removes the byte at `offset` and returns it, or null when out of range. */
  delete(offset: number): number | null {
    if (!this.inRange(offset)) return null;

    const removed = this.bytes[offset];
    this.bytes.copyWithin(offset, offset + 1, this.len);
    this.len--;
    this.dirty = true;
    this.emit({ kind: "delete", offset, byte: removed });
    return removed;
  }

  /** Overwrites the byte at `offset` and returns the previous value. */
  replace(offset: number, byte: number): number | null {
    if (!this.inRange(offset)) return null;

    const old = this.bytes[offset];
    this.bytes[offset] = byte & 0xff;
    this.dirty = true;
    this.emit({ kind: "replace", offset, oldByte: old, newByte: byte & 0xff });
    return old;
  }

  /** Adds a signed amount with 8-bit wraparound; returns the new value. */
  incrementByte(offset: number, amount: number): number | null {
    const current = this.read(offset);
    if (current === undefined) return null;
    const next = (((current + amount) % 256) + 256) % 256;
    this.replace(offset, next);
    return next;
  }

  private inRange(offset: number) {
    return Number.isInteger(offset) && offset >= 0 && offset < this.len;
  }

  private ensureCapacity(needed: number) {
    if (needed <= this.bytes.length) return;
    let cap = this.bytes.length;
    while (cap < needed) cap *= 2;
    const grown = new Uint8Array(cap);
    grown.set(this.bytes.subarray(0, this.len));
    this.bytes = grown;
  }

  private emit(action: EditAction) {
    if (this.muted === 0) this.listener?.(action);
  }
}
