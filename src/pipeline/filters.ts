/**
 * Freshness & Quality Filter
 */

import type { CanonicalItem, SkipReason } from '../types/feed';
import { countWords, htmlToText } from '../utils/text';

export type FilterReason = Extract<SkipReason, 'no-date' | 'too-old' | 'too-short'>;

export interface FilterOptions {
  now: Date;
  windowHours: number;
  minWords: number;
}

export type FilterDecision =
  | { accepted: true; wordCount: number }
  | { accepted: false; reason: FilterReason; wordCount?: number };

const HOUR_MS = 60 * 60 * 1000;

// Reasons that can never change for the same item; those items are recorded as seen
export const PERMANENT_REJECTIONS: ReadonlySet<SkipReason> = new Set<SkipReason>(['no-url', 'no-date', 'too-old']);

/**
 * Word count of the bundled content with markup stripped. An item without
 * bundled content counts as zero words.
 */
export function bundledWordCount(item: CanonicalItem): number {
  return countWords(htmlToText(item.rawContentHtml));
}

export function isFresh(publishedAt: Date, now: Date, windowHours: number): boolean {
  return now.getTime() - publishedAt.getTime() <= windowHours * HOUR_MS;
}

/**
 * Decide whether an item is worth drafting. Checks run cheapest first and the
 * first failing check is the reported reason.
 */
export function evaluateItem(item: CanonicalItem, options: FilterOptions): FilterDecision {
  if (!item.publishedAt) {
    return { accepted: false, reason: 'no-date' };
  }

  if (!isFresh(item.publishedAt, options.now, options.windowHours)) {
    return { accepted: false, reason: 'too-old' };
  }

  const wordCount = bundledWordCount(item);
  if (wordCount < options.minWords) {
    return { accepted: false, reason: 'too-short', wordCount };
  }

  return { accepted: true, wordCount };
}

export function accept(item: CanonicalItem, now: Date, windowHours: number, minWords: number): boolean {
  return evaluateItem(item, { now, windowHours, minWords }).accepted;
}
