export type FuzzyHit<T> = { item: T; score: number };

const SEPARATORS = new Set([" ", "/", "\\", ".", "_", "-"]);

const MATCH = 16;
const ADJACENT = 24;
const AFTER_SEPARATOR = 12;
const MAX_LEAD_PENALTY = 15;
const MAX_GAP_PENALTY = 3;

/** Leftmost position of each query character in `hay`, in order; null on a miss. */
function matchPositions(needle: string[], hay: string[]): number[] | null {
  const positions: number[] = [];
  let from = 0;
  for (const ch of needle) {
    const at = hay.indexOf(ch, from);
    if (at === -1) return null;
    positions.push(at);
    from = at + 1;
  }
  return positions;
}

/**
 * Case-insensitive subsequence score of `query` in `text`, or -1 when some
 * query character is missing. Adjacent matches and matches just after a path
 * or word separator add to the score; leading characters and gaps between
 * matches take a capped amount off, so any match scores above zero.
 */
export function fuzzyScore(query: string, text: string): number {
  const needle = [...query.toLowerCase()];
  if (needle.length === 0) return 0;
  const hay = [...text.toLowerCase()];
  const positions = matchPositions(needle, hay);
  if (!positions) return -1;

  let score = -Math.min(positions[0] ?? 0, MAX_LEAD_PENALTY);
  let prev = -1;
  for (const at of positions) {
    score += MATCH;
    if (prev >= 0) {
      score += at === prev + 1 ? ADJACENT : -Math.min(at - prev - 1, MAX_GAP_PENALTY);
    }
    if (at === 0 || SEPARATORS.has(hay[at - 1] ?? "")) score += AFTER_SEPARATOR;
    prev = at;
  }
  return score;
}

/**
 * Ranks `items` by score, best first. Ties keep their input order so an
 * empty query leaves the list untouched.
 */
export function fuzzyFind<T>(
  query: string,
  items: readonly T[],
  toText: (t: T) => string,
  limit = Infinity,
): FuzzyHit<T>[] {
  const hits: Array<FuzzyHit<T> & { order: number }> = [];
  items.forEach((item, order) => {
    const score = fuzzyScore(query, toText(item));
    if (score >= 0) hits.push({ item, score, order });
  });
  hits.sort((a, b) => b.score - a.score || a.order - b.order);
  return hits.slice(0, limit).map(({ item, score }) => ({ item, score }));
}
