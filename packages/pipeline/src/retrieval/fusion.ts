export const DEFAULT_RRF_K = 60;

export interface RankedItem<T> {
  id: string;
  item: T;
}

export interface FusedItem<T> {
  id: string;
  item: T;
  score: number;
  rank: number;
}

/**
 * Reciprocal Rank Fusion: each list contributes `1 / (k + rank)` (rank is
 * 1-based) for every id it contains. Ties are ordered by id so the result is a
 * total order. The first occurrence of an id supplies its item.
 */
export function reciprocalRankFusion<T>(
  rankings: ReadonlyArray<ReadonlyArray<RankedItem<T>>>,
  options: { k?: number; limit?: number } = {}
): FusedItem<T>[] {
  const k = options.k ?? DEFAULT_RRF_K;
  const entries = new Map<string, { item: T; score: number }>();

  for (const ranking of rankings) {
    const seen = new Set<string>();
    ranking.forEach((entry, index) => {
      if (seen.has(entry.id)) {
        return;
      }
      seen.add(entry.id);
      const contribution = 1 / (k + index + 1);
      const existing = entries.get(entry.id);
      if (existing) {
        existing.score += contribution;
      } else {
        entries.set(entry.id, { item: entry.item, score: contribution });
      }
    });
  }

  const fused = [...entries.entries()]
    .map(([id, entry]) => ({ id, item: entry.item, score: entry.score }))
    .sort((left, right) => {
      if (right.score !== left.score) {
        return right.score - left.score;
      }
      return left.id < right.id ? -1 : left.id > right.id ? 1 : 0;
    });

  const limited = options.limit === undefined ? fused : fused.slice(0, Math.max(0, options.limit));
  return limited.map((entry, index) => ({ ...entry, rank: index + 1 }));
}
