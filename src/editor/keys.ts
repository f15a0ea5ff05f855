import type { Key } from "./state.js";

/** The parts of a blessed keypress event the editor looks at. */
export type RawKey = {
  name?: string;
  full?: string;
  ctrl?: boolean;
  meta?: boolean;
};

/**
 * Normalises a terminal keypress; null for events that carry no key.
 * neo-blessed reports a carriage return twice, first as `enter` and then as
 * `return`, so only the first one is kept.
 */
export function toKey(ch: string | undefined, raw: RawKey | undefined): Key | null {
  const ctrl = raw?.ctrl ?? false;
  const meta = raw?.meta ?? false;

  if (ch !== undefined && !ctrl && !meta && [...ch].length === 1) {
    const code = ch.codePointAt(0) ?? 0;
    if (code >= 0x20 && code !== 0x7f) return { name: ch, char: ch };
  }

  const name = raw?.full || raw?.name;
  if (!name || name === "return") return null;
  return { name };
}
