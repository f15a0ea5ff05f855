/** Capacity of the command/search prompt, terminator slot excluded. */
export const INPUT_CAPACITY = 79;

/** Bounded line editor behind the `:` and `/` prompts. */
export class InputLine {
  private chars: string[] = [];

  constructor(readonly capacity = INPUT_CAPACITY) {}

  get value(): string {
    return this.chars.join("");
  }

  get length(): number {
    return this.chars.length;
  }

  /** Appends one character; false (and no change) when the line is full. */
  push(ch: string): boolean {
    if (this.chars.length >= this.capacity) return false;
    this.chars.push(ch);
    return true;
  }

  backspace(): boolean {
    return this.chars.pop() !== undefined;
  }

  clear() {
    this.chars = [];
  }
}

export function hexValue(ch: string): number | null {
  if (ch.length !== 1) return null;
  const code = ch.charCodeAt(0);
  if (code >= 0x30 && code <= 0x39) return code - 0x30;
  if (code >= 0x41 && code <= 0x46) return code - 0x41 + 10;
  if (code >= 0x61 && code <= 0x66) return code - 0x61 + 10;
  return null;
}

export type HexFeed =
  | { kind: "invalid" }
  | { kind: "pending"; nibble: number }
  | { kind: "byte"; value: number };

/** Collects two hex digits into one byte. */
export class HexReader {
  private high: number | null = null;

  get pending(): number | null {
    return this.high;
  }

  feed(ch: string): HexFeed {
    const nibble = hexValue(ch);
    if (nibble === null) return { kind: "invalid" };
    if (this.high === null) {
      this.high = nibble;
      return { kind: "pending", nibble };
    }
    const value = (this.high << 4) | nibble;
    this.high = null;
    return { kind: "byte", value };
  }

  reset() {
    this.high = null;
  }
}
