export type FuzzyHit<T> = { item: T; score: number };

/**
 * Scores `query` as an in-order subsequence of `text`, or -1 when it is not
 * one. Each matched character is worth 10; adjacent matches add 8 and every
 * skipped character between matches costs 2. A late first match and unmatched
 * trailing length lower the score.
 */
export function fuzzyScore(query: string, text: string): number {
  const q = query.toLowerCase();
  const t = text.toLowerCase();
  if (!q) return 0;

  const positions: number[] = [];
  let from = 0;
  for (const ch of q) {
    const at = t.indexOf(ch, from);
    if (at < 0) return -1;
    positions.push(at);
    from = at + 1;
  }

  let score = q.length * 10 - positions[0] * 3 - (t.length - q.length);
  for (let i = 1; i < positions.length; i++) {
    const gap = positions[i] - positions[i - 1] - 1;
    score += gap === 0 ? 8 : -2 * gap;
  }
  return Math.max(0, score);
}

export function fuzzyFind<T>(
  query: string,
  items: readonly T[],
  toText: (t: T) => string,
  limit = 20,
): FuzzyHit<T>[] {
  const hits: FuzzyHit<T>[] = [];
  for (const it of items) {
    const s = fuzzyScore(query, toText(it));
    if (s >= 0) hits.push({ item: it, score: s });
  }
  hits.sort((a, b) => b.score - a.score);
  return hits.slice(0, limit);
}

/** Best-scoring word for a mistyped `query`, if any word contains it in order. */
export function closestMatch(query: string, words: readonly string[]): string | null {
  if (!query) return null;
  return fuzzyFind(query, words, (w) => w, 1)[0]?.item ?? null;
}
