import type { CanonicalItem } from '../types/feed';
import { countWords } from '../utils/text';

export interface RankingOptions {
  titleMinWords: number;
  titleMaxWords: number;
  titleBonus: number;
}

export interface RankedItem<T extends CanonicalItem = CanonicalItem> {
  item: T;
  score: number;
}

export const DEFAULT_RANKING: RankingOptions = {
  titleMinWords: 6,
  titleMaxWords: 14,
  titleBonus: 0.5
};

const HOUR_MS = 60 * 60 * 1000;

/**
 * Recency dominates: 100 / (1 + ageHours). Titles inside the ideal word band
 * get a small fixed bonus.
 */
export function scoreItem<T extends CanonicalItem>(
  item: T,
  now: Date,
  options: RankingOptions = DEFAULT_RANKING
): RankedItem<T> {
  const publishedMs = item.publishedAt ? item.publishedAt.getTime() : Number.NaN;
  // Undated items never reach the ranker through the pipeline; they sink if passed in directly
  const ageHours = Number.isNaN(publishedMs)
    ? Number.POSITIVE_INFINITY
    : Math.max(0, (now.getTime() - publishedMs) / HOUR_MS);

  const recency = Number.isFinite(ageHours) ? 100 / (1 + ageHours) : 0;
  const titleWords = countWords(item.title);
  const bonus = titleWords >= options.titleMinWords && titleWords <= options.titleMaxWords ? options.titleBonus : 0;

  return { item, score: recency + bonus };
}

/**
 * Deterministic total order: score descending, then feed order.
 */
export function rank<T extends CanonicalItem>(
  items: readonly T[],
  now: Date,
  options: RankingOptions = DEFAULT_RANKING
): RankedItem<T>[] {
  return items
    .map((item) => scoreItem(item, now, options))
    .sort((a, b) => b.score - a.score || a.item.feedIndex - b.item.feedIndex);
}

/**
 * The single point where the per-run cap is applied.
 */
export function selectTop<T extends CanonicalItem>(
  items: readonly T[],
  now: Date,
  maxPosts: number,
  options: RankingOptions = DEFAULT_RANKING
): RankedItem<T>[] {
  return rank(items, now, options).slice(0, Math.max(0, maxPosts));
}
