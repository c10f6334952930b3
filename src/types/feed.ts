// Raw feed record as delivered by the feed source. Read defensively, never mutated.
export type RawItem = Record<string, unknown>;

// CanonicalItem is what every stage after the normalizer works with
export interface CanonicalItem {
  id: string;                // Native id, else resolved URL, else hash of title + timestamp
  title: string;             // Trimmed headline, may be empty
  url?: string;              // Absolute HTTP(S) link; items without one are never drafted
  publishedAt?: Date;        // Absent when no field parsed as an absolute instant
  rawContentHtml?: string;   // Body bundled with the feed entry (HTML or plain text)
  feedIndex: number;         // Position in the feed, used to break ranking ties
}

export interface ExtractedContent {
  title?: string;
  text: string;
  strategy: string;          // Name of the extraction strategy (or 'bundled')
}

export interface Summary {
  body: string;
  wordCount: number;
}

export type DraftMetadataValue = string | number | boolean | string[];

export interface Draft {
  filename: string;
  path: string;
  metadata: Record<string, DraftMetadataValue>;
  body: string;
}

export type SkipReason =
  | 'already-seen'
  | 'duplicate'
  | 'no-url'
  | 'no-date'
  | 'too-old'
  | 'too-short';

export interface RunSummary {
  created: string[];
  count: number;
  skipped: Partial<Record<SkipReason, number>>;
  failed: Partial<Record<string, number>>;
  dryRun: boolean;
  error?: string;
}
