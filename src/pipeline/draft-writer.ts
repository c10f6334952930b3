/**
 * Draft Formatter/Writer
 *
 * Renders one Markdown draft (YAML front matter + body) per item and writes it
 * atomically. The filename depends only on the item's publication date and
 * title (or URL), so re-drafting an item overwrites the same file.
 */

import path from 'path';
import { stringify } from 'yaml';
import type { CanonicalItem, Draft, DraftMetadataValue, Summary } from '../types/feed';
import { WriteFailure, errorMessage } from '../utils/errors';
import { writeFileAtomic } from '../utils/files';
import { logger } from '../utils/logger';
import { hashText } from '../utils/text';

export const MAX_SLUG_LENGTH = 80;

export interface DraftOptions {
  draftsDir: string;
  layout: string;
  author: string;
  category: string;
  tags: string[];
  lookbackHours: number;
  // Extraction strategy name, or 'bundled' when the feed's own content was summarized
  extraction: string;
  // Display title when the feed entry had none; never affects the filename
  title?: string;
}

export type WriteResult =
  | { success: true; draft: Draft }
  | { success: false; error: WriteFailure };

export function slugify(value: string): string {
  const slug = value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');

  if (!slug) {
    return hashText(value, 12);
  }
  return slug.slice(0, MAX_SLUG_LENGTH).replace(/-+$/, '');
}

/**
 * `YYYY-MM-DDTHH:mm:ss+00:00`
 */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, '+00:00');
}

export function draftFilename(item: CanonicalItem, fallbackDate: Date): string {
  const date = (item.publishedAt ?? fallbackDate).toISOString().slice(0, 10);
  return `${date}-${slugify(item.title || item.url || '')}.md`;
}

function sourceHost(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return url;
  }
}

export function renderBody(item: CanonicalItem, summary: Summary, lookbackHours: number): string {
  const parts = [summary.body.trim()];
  if (item.url) {
    parts.push(`**Source:** [${sourceHost(item.url)}](${item.url})`);
  }
  parts.push(
    `> _Editor's note: auto-drafted from feed items of the last ${lookbackHours} hours. ` +
      'Awaits manual approval before publishing._'
  );
  return `${parts.filter(Boolean).join('\n\n')}\n`;
}

export function buildDraft(item: CanonicalItem, summary: Summary, options: DraftOptions, now: Date = new Date()): Draft {
  const filename = draftFilename(item, now);
  const metadata: Record<string, DraftMetadataValue> = {
    layout: options.layout,
    title: item.title || options.title || item.url || filename.replace(/\.md$/, ''),
    date: formatUtcTimestamp(item.publishedAt ?? now),
    author: options.author,
    categories: [options.category],
    tags: [...options.tags],
    original_link: item.url ?? '',
    extraction: options.extraction
  };

  return {
    filename,
    path: path.join(options.draftsDir, filename),
    metadata,
    body: renderBody(item, summary, options.lookbackHours)
  };
}

export function renderDraft(draft: Draft): string {
  return `---\n${stringify(draft.metadata)}---\n\n${draft.body}`;
}

/**
 * All or nothing: the draft either appears complete or not at all.
 */
export async function writeDraft(draft: Draft): Promise<WriteResult> {
  try {
    await writeFileAtomic(draft.path, renderDraft(draft));
    logger.info(`Wrote draft ${draft.path}`);
    return { success: true, draft };
  } catch (error) {
    return {
      success: false,
      error: new WriteFailure(`Could not write draft ${draft.path}: ${errorMessage(error)}`, { cause: error })
    };
  }
}
