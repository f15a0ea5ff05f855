export const MAX_KEY_LENGTH = 255;

type Chained = { key: Uint8Array; value: string };

export type RuleOutcome = "assigned" | "deleted" | "invalid";

export type TableLoadResult = {
  loaded: number;
  deleted: number;
  /** 1-based line numbers of rules that were rejected. */
  skipped: number[];
};

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
  return true;
}

/**
 * Display substitutions for byte sequences ("thingy table"). Single-byte keys
 * live in a direct 256-slot array; longer keys are chained by their first byte.
 */
export class SubstitutionTable {
  private single: Array<string | undefined> = new Array(256).fill(undefined);
  private chains = new Map<number, Chained[]>();
  private longest = 0;

  /** Length of the longest key ever assigned; longer lookups miss at once. */
  get longestKey(): number {
    return this.longest;
  }

  get size(): number {
    let n = 0;
    for (const v of this.single) if (v !== undefined) n++;
    for (const chain of this.chains.values()) n += chain.length;
    return n;
  }

  assign(key: Uint8Array, value: string) {
    if (key.length === 0 || key.length > MAX_KEY_LENGTH) return;
    if (key.length > this.longest) this.longest = key.length;

    if (key.length === 1) {
      this.single[key[0]] = value;
      return;
    }

    const chain = this.chains.get(key[0]);
    if (!chain) {
      this.chains.set(key[0], [{ key: key.slice(), value }]);
      return;
    }
    const existing = chain.find((e) => sameBytes(e.key, key));
    if (existing) existing.value = value;
    else chain.push({ key: key.slice(), value });
  }

  lookup(key: Uint8Array): string | undefined {
    if (key.length === 0 || key.length > this.longest) return undefined;
    if (key.length === 1) return this.single[key[0]];
    return this.chains.get(key[0])?.find((e) => sameBytes(e.key, key))?.value;
  }

  /** Removes `key`; false when it was not present. */
  delete(key: Uint8Array): boolean {
    if (key.length === 0 || key.length > this.longest) return false;
    if (key.length === 1) {
      if (this.single[key[0]] === undefined) return false;
      this.single[key[0]] = undefined;
      return true;
    }
    const chain = this.chains.get(key[0]);
    const idx = chain ? chain.findIndex((e) => sameBytes(e.key, key)) : -1;
    if (!chain || idx < 0) return false;
    chain.splice(idx, 1);
    if (chain.length === 0) this.chains.delete(key[0]);
    return true;
  }

  /**
   * Longest substitution rooted at `offset` that ends before `end`.
   * Returns the value and how many bytes it covers.
   */
  match(
    bytes: Uint8Array,
    offset: number,
    end = bytes.length,
  ): { value: string; length: number } | null {
    const max = Math.min(this.longest, end - offset);
    for (let n = max; n >= 1; n--) {
      const value = this.lookup(bytes.subarray(offset, offset + n));
      if (value !== undefined) return { value, length: n };
    }
    return null;
  }

  /**
   * Applies one rule line: `HEX=value`, `/HEX` (newline), `*HEX` (NUL byte),
   * or a bare `HEX` which removes the key.
   */
  addRule(rule: string): RuleOutcome {
    const eq = rule.indexOf("=");
    let keyText = eq < 0 ? rule : rule.slice(0, eq);
    let value: string | null = null;

    if (keyText.startsWith("/")) {
      value = "\n";
      keyText = keyText.slice(1);
    } else if (keyText.startsWith("*")) {
      value = "\0";
      keyText = keyText.slice(1);
    }

    const key = parseHexKey(keyText);
    if (!key) return "invalid";

    if (value === null) {
      const rest = eq < 0 ? "" : rule.slice(eq + 1);
      if (rest === "") {
        this.delete(key);
        return "deleted";
      }
      value = rest;
    }
    this.assign(key, value);
    return "assigned";
  }

  /** Loads rules from table-file text; comments and blank lines are ignored. */
  loadFromText(source: string): TableLoadResult {
    const result: TableLoadResult = { loaded: 0, deleted: 0, skipped: [] };
    const lines = source.split("\n");
    lines.forEach((raw, i) => {
      const line = raw.replace(/\r$/, "").replace(/^[ \t]+/, "");
      if (line === "" || line.startsWith("#")) return;
      const outcome = this.addRule(line);
      if (outcome === "assigned") result.loaded++;
      else if (outcome === "deleted") result.deleted++;
      else result.skipped.push(i + 1);
    });
    return result;
  }
}

/** Hex digits to bytes; an odd count gets an implicit leading zero nibble. */
export function parseHexKey(text: string): Uint8Array | null {
  if (text === "" || !/^[0-9A-Fa-f]+$/.test(text)) return null;
  const padded = text.length % 2 === 1 ? "0" + text : text;
  if (padded.length / 2 > MAX_KEY_LENGTH) return null;
  const key = new Uint8Array(padded.length / 2);
  for (let i = 0; i < key.length; i++) {
    key[i] = parseInt(padded.slice(i * 2, i * 2 + 2), 16);
  }
  return key;
}
