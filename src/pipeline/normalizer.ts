/**
 * Item Normalizer
 *
 * The only place that knows about upstream record shapes. JSON Feed entries,
 * reader-service exports (canonical/alternate href arrays, microsecond
 * timestamps) and rss-parser items all come out as a CanonicalItem.
 * No network I/O happens here.
 */

import type { CanonicalItem, RawItem } from '../types/feed';
import { hashText } from '../utils/text';

const URL_ARRAY_FIELDS = ['canonical', 'alternate'] as const;
const DIRECT_URL_FIELDS = ['url', 'link'] as const;
const ID_FIELDS = ['id', 'guid', 'originId'] as const;

// Tried in order; the first field that parses as an absolute instant wins
export const TIMESTAMP_FIELDS = [
  'date_published',
  'published',
  'isoDate',
  'pubDate',
  'updated',
  'date_modified',
  'crawled',
  'timestampUsec',
  'crawlTimeMsec'
] as const;

const CONTENT_FIELDS = [
  'content_html',
  'content',
  'content:encoded',
  'summary',
  'description',
  'content_text',
  'contentSnippet'
] as const;

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATETIME_RE = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/i;
const ISO_OFFSET_RE = /(Z|[+-]\d{2}:?\d{2})$/i;
// RFC 2822 as used by RSS pubDate, e.g. "Tue, 10 Jun 2025 04:00:00 GMT"
const RFC2822_RE = /^(?:[A-Za-z]{3},\s*)?\d{1,2}\s+[A-Za-z]{3}\s+\d{2,4}\s+\d{2}:\d{2}(?::\d{2})?\s*(?:[A-Za-z]{1,5}|[+-]\d{4})$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

export function isAbsoluteHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

export function resolveUrl(raw: RawItem): string | undefined {
  for (const field of URL_ARRAY_FIELDS) {
    const entries = raw[field];
    if (!Array.isArray(entries)) continue;
    for (const entry of entries) {
      const href = isRecord(entry) ? nonEmptyString(entry.href) : undefined;
      if (href && isAbsoluteHttpUrl(href)) {
        return href;
      }
    }
  }

  for (const field of DIRECT_URL_FIELDS) {
    const value = nonEmptyString(raw[field]);
    if (value && isAbsoluteHttpUrl(value)) {
      return value;
    }
  }

  for (const field of ID_FIELDS) {
    const value = nonEmptyString(raw[field]);
    if (value && isAbsoluteHttpUrl(value)) {
      return value;
    }
  }

  return undefined;
}

/**
 * Epoch values are told apart by magnitude: seconds, milliseconds or microseconds.
 */
export function epochToDate(value: number): Date | undefined {
  if (!Number.isFinite(value) || value <= 0) return undefined;
  let ms: number;
  if (value < 1e11) {
    ms = value * 1000;
  } else if (value < 1e14) {
    ms = value;
  } else if (value < 1e17) {
    ms = value / 1000;
  } else {
    return undefined;
  }
  const date = new Date(Math.floor(ms));
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function parseInstant(value: unknown): Date | undefined {
  if (typeof value === 'number') {
    return epochToDate(value);
  }
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  if (!trimmed) return undefined;

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return epochToDate(Number(trimmed));
  }

  let candidate: string | undefined;
  if (ISO_DATE_RE.test(trimmed)) {
    candidate = `${trimmed}T00:00:00Z`;
  } else if (ISO_DATETIME_RE.test(trimmed)) {
    const withT = trimmed.replace(' ', 'T');
    // Offset-less date-times are read as UTC rather than host-local time
    candidate = ISO_OFFSET_RE.test(withT) ? withT : `${withT}Z`;
  } else if (RFC2822_RE.test(trimmed)) {
    candidate = trimmed;
  }

  if (!candidate) return undefined;
  const ms = Date.parse(candidate);
  return Number.isNaN(ms) ? undefined : new Date(ms);
}

export function resolvePublishedAt(raw: RawItem): Date | undefined {
  for (const field of TIMESTAMP_FIELDS) {
    const date = parseInstant(raw[field]);
    if (date) {
      return date;
    }
  }
  return undefined;
}

function contentFrom(value: unknown): string | undefined {
  if (isRecord(value)) {
    return nonEmptyString(value.content);
  }
  if (Array.isArray(value)) {
    for (const entry of value) {
      const found = contentFrom(entry);
      if (found) return found;
    }
    return undefined;
  }
  return nonEmptyString(value);
}

export function resolveContent(raw: RawItem): string | undefined {
  for (const field of CONTENT_FIELDS) {
    const found = contentFrom(raw[field]);
    if (found) {
      return found;
    }
  }
  return undefined;
}

function resolveNativeId(raw: RawItem): string | undefined {
  for (const field of ID_FIELDS) {
    const value = raw[field];
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
    const text = nonEmptyString(value);
    if (text) {
      return text;
    }
  }
  return undefined;
}

function resolveTitle(raw: RawItem): string {
  const title = raw.title;
  if (typeof title === 'string') {
    return title.replace(/\s+/g, ' ').trim();
  }
  return contentFrom(title)?.replace(/\s+/g, ' ') ?? '';
}

export function normalize(raw: RawItem, feedIndex = 0): CanonicalItem {
  const title = resolveTitle(raw);
  const url = resolveUrl(raw);
  const publishedAt = resolvePublishedAt(raw);
  const id =
    resolveNativeId(raw) ??
    url ??
    hashText(`${title}|${publishedAt ? publishedAt.toISOString() : ''}`);

  return {
    id,
    title,
    url,
    publishedAt,
    rawContentHtml: resolveContent(raw),
    feedIndex
  };
}
