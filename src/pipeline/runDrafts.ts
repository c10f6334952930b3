/**
 * Drafting run
 *
 * Feed entries → normalize → dedup → freshness/quality gate → rank (cap) →
 * extract (bundled fallback) → summarize → write → record as seen.
 *
 * Per-item work runs concurrently up to the configured limit. Draft writes and
 * every seen-state mutation go through a single-slot queue so they never
 * interleave. Per-item failures are counted and never abort the run.
 */

import pLimit from 'p-limit';
import type { FeedSource } from '../adapters/feed-source';
import type { EnvironmentConfig } from '../config/environment';
import type { CanonicalItem, Draft, RunSummary, SkipReason, Summary } from '../types/feed';
import { PipelineError, SummarizeFailure, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { countWords, htmlToText } from '../utils/text';
import { buildDraft, writeDraft } from './draft-writer';
import type { ExtractionResult } from './extractor';
import { PERMANENT_REJECTIONS, evaluateItem } from './filters';
import { normalize } from './normalizer';
import { type RankedItem, selectTop } from './ranker';
import type { SeenStore } from './seen-store';
import type { Summarizer } from './summarizer';

export const BUNDLED_STRATEGY = 'bundled';

export interface PageExtractor {
  extract(url: string): Promise<ExtractionResult>;
}

export interface DraftRunDependencies {
  config: EnvironmentConfig;
  feedSource: FeedSource;
  extractor: PageExtractor;
  summarizer: Summarizer;
  store: SeenStore;
  now?: Date;
}

// Candidates that passed every gate carry a URL and a publication date
type PublishableItem = CanonicalItem & { url: string; publishedAt: Date };

type ItemOutcome =
  | { status: 'created'; path: string }
  | { status: 'failed'; kind: string };

export function emptyRunSummary(dryRun: boolean): RunSummary {
  return { created: [], count: 0, skipped: {}, failed: {}, dryRun };
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K) {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Text to summarize when page extraction did not produce any: the feed's
 * bundled content, provided it clears the same word bar.
 */
export function bundledFallback(item: CanonicalItem, minWords: number): string | null {
  const text = htmlToText(item.rawContentHtml);
  return countWords(text) >= minWords ? text : null;
}

export async function runDrafts(deps: DraftRunDependencies): Promise<RunSummary> {
  const { config, feedSource, extractor, summarizer, store } = deps;
  const now = deps.now ?? new Date();
  const dryRun = config.output.dryRun;
  const summary = emptyRunSummary(dryRun);
  const writeQueue = pLimit(1);
  const limit = pLimit(config.extraction.concurrencyLimit);

  const persistState = async () => {
    if (dryRun || !store.isDirty) return;
    try {
      await store.persist();
    } catch (error) {
      increment(summary.failed, 'state');
      logger.error('Failed to persist seen-state', errorMessage(error));
    }
  };

  const rawItems = await feedSource.fetchItems();
  logger.info(`Screening ${rawItems.length} feed entries`, { dryRun });

  try {
    // Screening is sequential; it only touches in-memory state
    const candidates: PublishableItem[] = [];
    const idsThisRun = new Set<string>();

    const skip = (item: CanonicalItem, reason: SkipReason) => {
      increment(summary.skipped, reason);
      if (PERMANENT_REJECTIONS.has(reason)) {
        store.add(item.id);
      }
      logger.debug(`Skipped ${item.id}: ${reason}`);
    };

    rawItems.forEach((raw, index) => {
      const item = normalize(raw, index);

      if (idsThisRun.has(item.id)) {
        increment(summary.skipped, 'duplicate');
        return;
      }
      idsThisRun.add(item.id);

      if (store.contains(item.id)) {
        increment(summary.skipped, 'already-seen');
        return;
      }

      const { url } = item;
      if (!url) {
        skip(item, 'no-url');
        return;
      }

      const decision = evaluateItem(item, {
        now,
        windowHours: config.selection.lookbackHours,
        minWords: config.selection.qualityMinWords
      });
      if (!decision.accepted) {
        skip(item, decision.reason);
        return;
      }

      if (item.publishedAt) {
        candidates.push({ ...item, url, publishedAt: item.publishedAt });
      }
    });

    await writeQueue(persistState);

    const selected = selectTop(candidates, now, config.selection.maxPosts, {
      titleMinWords: config.selection.titleMinWords,
      titleMaxWords: config.selection.titleMaxWords,
      titleBonus: 0.5
    });

    if (candidates.length > selected.length) {
      logger.info(`${candidates.length - selected.length} eligible items left for a later run (MAX_POSTS=${config.selection.maxPosts})`);
    }
    logger.info(`Drafting ${selected.length} of ${candidates.length} eligible items`);

    const finalize = async (item: PublishableItem, draft: Draft): Promise<ItemOutcome> => {
      if (dryRun) {
        logger.info(`[dry run] Would write ${draft.path}`);
        return { status: 'created', path: draft.path };
      }
      const result = await writeDraft(draft);
      if (!result.success) {
        logger.error(`Draft for ${item.id} not written`, result.error.message);
        return { status: 'failed', kind: result.error.kind };
      }
      store.add(item.id);
      await persistState();
      return { status: 'created', path: result.draft.path };
    };

    const recordPermanentFailure = async (item: PublishableItem) => {
      store.add(item.id);
      await persistState();
    };

    const processItem = async ({ item }: RankedItem<PublishableItem>): Promise<ItemOutcome> => {
      const extraction = await extractor.extract(item.url);

      let text: string;
      let strategy: string;
      let extractedTitle: string | undefined;
      if (extraction.success) {
        text = extraction.content.text;
        strategy = extraction.content.strategy;
        extractedTitle = extraction.content.title;
      } else {
        const bundled = bundledFallback(item, config.extraction.minWords);
        if (bundled === null) {
          const { error } = extraction;
          logger.warn(`Skipping ${item.url}: ${error.message}`);
          if (error.permanent) {
            await writeQueue(() => recordPermanentFailure(item));
          }
          return { status: 'failed', kind: error.kind };
        }
        logger.info(`Extraction failed for ${item.url}, summarizing bundled feed content`, {
          reason: extraction.error.message
        });
        text = bundled;
        strategy = BUNDLED_STRATEGY;
      }

      let itemSummary: Summary;
      try {
        itemSummary = await summarizer.summarize(text, config.summary.targetWords);
      } catch (error) {
        const failure =
          error instanceof PipelineError
            ? error
            : new SummarizeFailure(`Summarizer ${summarizer.name} failed: ${errorMessage(error)}`, { cause: error });
        logger.warn(`Skipping ${item.url}: ${failure.message}`);
        return { status: 'failed', kind: failure.kind };
      }

      const draft = buildDraft(
        item,
        itemSummary,
        {
          draftsDir: config.output.draftsDir,
          layout: config.output.layout,
          author: config.output.author,
          category: config.output.category,
          tags: config.output.tags,
          lookbackHours: config.selection.lookbackHours,
          extraction: strategy,
          title: extractedTitle
        },
        now
      );

      return writeQueue(() => finalize(item, draft));
    };

    const outcomes = await Promise.all(
      selected.map((ranked) =>
        limit(async (): Promise<ItemOutcome> => {
          try {
            return await processItem(ranked);
          } catch (error) {
            const kind = error instanceof PipelineError ? error.kind : 'unexpected';
            logger.error(`Unexpected failure while drafting ${ranked.item.id}`, error);
            return { status: 'failed', kind };
          }
        })
      )
    );

    // Outcomes keep rank order whatever order the items finished in
    for (const outcome of outcomes) {
      if (outcome.status === 'created') {
        summary.created.push(outcome.path);
      } else {
        increment(summary.failed, outcome.kind);
      }
    }
  } finally {
    await writeQueue(persistState);
  }

  summary.count = summary.created.length;
  logger.info(`Run complete: ${summary.count} draft(s)`, {
    skipped: summary.skipped,
    failed: summary.failed
  });
  return summary;
}
