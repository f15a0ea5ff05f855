import type { SearchDirection } from "./state.js";
import { hexValue } from "./input.js";

export type ParseResult =
  | { ok: true; bytes: Uint8Array }
  | { ok: false; error: "InvalidHex" | "InvalidEscape"; index: number; span: string };

/**
 * Turns a typed pattern into raw bytes. `\\` is a backslash and `\xHH` a byte
 * in hex; every other character stands for itself (UTF-8 encoded).
 * On failure `index`/`span` point at the offending part of `input`.
 */
export function parseSearchString(input: string): ParseResult {
  const out: number[] = [];
  const encoder = new TextEncoder();

  let i = 0;
  while (i < input.length) {
    const ch = input[i];
    if (ch !== "\\") {
      const cp = input.codePointAt(i) ?? 0;
      const text = String.fromCodePoint(cp);
      out.push(...encoder.encode(text));
      i += text.length;
      continue;
    }

    const next = input[i + 1];
    if (next === "\\") {
      out.push(0x5c);
      i += 2;
      continue;
    }
    if (next !== "x") {
      return { ok: false, error: "InvalidEscape", index: i + 1, span: next ?? "" };
    }

    const digits = input.slice(i + 2, i + 4);
    const hi = hexValue(digits.charAt(0));
    const lo = hexValue(digits.charAt(1));
    if (hi === null || lo === null) {
      return { ok: false, error: "InvalidHex", index: i + 2, span: digits };
    }
    out.push((hi << 4) | lo);
    i += 4;
  }

  return { ok: true, bytes: Uint8Array.from(out) };
}

export type SearchHit = { offset: number; wrapped: boolean };

function matchesAt(haystack: Uint8Array, needle: Uint8Array, at: number): boolean {
  if (at + needle.length > haystack.length) return false;
  for (let j = 0; j < needle.length; j++) {
    if (haystack[at + j] !== needle[j]) return false;
  }
  return true;
}

/**
 * Finds the first match of `needle` next to `start`, moving in `direction`.
 * Forward tries start+1 .. end, then 0 .. start; backward tries start-1 .. 0,
 * then end .. start. Each position is tried once, `start` itself last.
 */
export function search(
  haystack: Uint8Array,
  needle: Uint8Array,
  start: number,
  direction: SearchDirection,
): SearchHit | null {
  const len = haystack.length;
  if (needle.length === 0 || len === 0 || needle.length > len) return null;

  const origin = Math.max(0, Math.min(start, len - 1));
  const step = direction === "forward" ? 1 : -1;

  for (let n = 1; n <= len; n++) {
    const raw = origin + step * n;
    const at = ((raw % len) + len) % len;
    if (matchesAt(haystack, needle, at)) {
      return { offset: at, wrapped: raw < 0 || raw >= len };
    }
  }
  return null;
}
