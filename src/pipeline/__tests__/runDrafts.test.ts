import fs from 'fs/promises';
import path from 'path';
import { parse } from 'yaml';
import { NOW, hoursAgo, makeTempDir, removeTempDir, sentences, testConfig, words } from '../../__tests__/helpers';
import type { FeedSource } from '../../adapters/feed-source';
import type { RawItem } from '../../types/feed';
import { ExtractionFailure, FeedError, FetchFailure } from '../../utils/errors';
import type { ExtractionResult } from '../extractor';
import { type PageExtractor, runDrafts } from '../runDrafts';
import { SeenStore } from '../seen-store';
import { ExtractiveSummarizer, type Summarizer } from '../summarizer';

const entry = (id: string, ageHours: number, overrides: RawItem = {}): RawItem => ({
  id,
  title: `Harbor story ${id} reaches another milestone`,
  url: `https://news.example.com/${id}`,
  date_published: hoursAgo(ageHours).toISOString(),
  content_html: `<p>${sentences(5)}</p>`,
  ...overrides
});

const feedOf = (items: RawItem[]): FeedSource => ({ fetchItems: async () => items });

const extracted = (): PageExtractor => ({
  extract: vi.fn(
    async (): Promise<ExtractionResult> => ({
      success: true,
      content: { text: sentences(20, 'Page'), strategy: 'readability' }
    })
  )
});

const failing = (error: FetchFailure | ExtractionFailure): PageExtractor => ({
  extract: vi.fn(async (): Promise<ExtractionResult> => ({ success: false, error }))
});

const FRONT_MATTER_RE = /^---\n([\s\S]*?)---\n\n([\s\S]*)$/;

describe('runDrafts', () => {
  let dir: string;
  let draftsDir: string;
  let statePath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    draftsDir = path.join(dir, 'drafts');
    statePath = path.join(dir, 'state', 'seen.json');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  const draftPath = (id: string) => path.join(draftsDir, `2025-06-10-harbor-story-${id}-reaches-another-milestone.md`);

  const run = async (
    items: RawItem[],
    options: { extractor?: PageExtractor; summarizer?: Summarizer; env?: Record<string, string> } = {}
  ) => {
    const config = testConfig({ TARGET_WORDS: '50', ...options.env }, dir);
    const store = await SeenStore.load(config.output.stateFile, config.output.seenLimit);
    const summary = await runDrafts({
      config,
      feedSource: feedOf(items),
      extractor: options.extractor ?? extracted(),
      summarizer: options.summarizer ?? new ExtractiveSummarizer({ tolerance: 10, minSentenceWords: 4 }),
      store,
      now: NOW
    });
    return { summary, store };
  };

  const persistedIds = async (): Promise<string[]> => JSON.parse(await fs.readFile(statePath, 'utf-8')).seen;

  it('should draft the newest items up to the cap and record them as seen', async () => {
    const items = ['a', 'b', 'c', 'd', 'e'].map((id, i) => entry(id, 5 - i));

    const { summary } = await run(items);

    expect(summary).toEqual({
      created: [draftPath('e'), draftPath('d'), draftPath('c')],
      count: 3,
      skipped: {},
      failed: {},
      dryRun: false
    });
    expect((await fs.readdir(draftsDir)).sort()).toEqual(
      [draftPath('c'), draftPath('d'), draftPath('e')].map((p) => path.basename(p))
    );
    expect(await persistedIds()).toEqual(['c', 'd', 'e']);
  });

  it('should write the extracted summary into the draft', async () => {
    await run([entry('a', 1)]);

    const written = await fs.readFile(draftPath('a'), 'utf-8');
    const match = FRONT_MATTER_RE.exec(written);
    expect(parse(match?.[1] ?? '')).toMatchObject({
      title: 'Harbor story a reaches another milestone',
      date: '2025-06-10T11:00:00+00:00',
      original_link: 'https://news.example.com/a',
      extraction: 'readability'
    });
    expect(match?.[2].startsWith(`${sentences(5, 'Page')}\n\n**Source:** [news.example.com](https://news.example.com/a)`)).toBe(true);
  });

  it('should create nothing on a second run over the same feed', async () => {
    const items = [entry('a', 1), entry('b', 2)];

    const first = await run(items);
    expect(first.summary.count).toBe(2);

    const second = await run(items);
    expect(second.summary.created).toEqual([]);
    expect(second.summary.skipped).toEqual({ 'already-seen': 2 });
  });

  it('should reject stale and undated items and never consider them again', async () => {
    const { summary, store } = await run([
      entry('stale', 10),
      entry('undated', 1, { date_published: undefined }),
      entry('fresh', 1)
    ]);

    expect(summary.created).toEqual([draftPath('fresh')]);
    expect(summary.skipped).toEqual({ 'too-old': 1, 'no-date': 1 });
    expect(store.contains('stale')).toBe(true);
    expect(store.contains('undated')).toBe(true);
    expect(await persistedIds()).toEqual(['fresh', 'stale', 'undated']);
  });

  it('should skip teasers without recording them', async () => {
    const { summary, store } = await run([entry('teaser', 1, { content_html: `<p>${words(10)}</p>` })]);

    expect(summary.skipped).toEqual({ 'too-short': 1 });
    expect(store.contains('teaser')).toBe(false);
  });

  it('should record items without a URL as seen', async () => {
    const { summary, store } = await run([entry('nolink', 1, { url: undefined })]);

    expect(summary.skipped).toEqual({ 'no-url': 1 });
    expect(store.contains('nolink')).toBe(true);
  });

  it('should skip a repeated id within one feed', async () => {
    const { summary } = await run([entry('a', 1), entry('a', 2)]);

    expect(summary.created).toEqual([draftPath('a')]);
    expect(summary.skipped).toEqual({ duplicate: 1 });
  });

  it('should summarize bundled content when the source page is unreachable', async () => {
    const extractor = failing(new FetchFailure('Request failed for https://news.example.com/a: getaddrinfo ENOTFOUND'));
    const { summary, store } = await run([entry('a', 1, { content_html: `<p>${sentences(20, 'Feed')}</p>` })], {
      extractor
    });

    expect(summary.created).toEqual([draftPath('a')]);
    expect(summary.failed).toEqual({});
    expect(store.contains('a')).toBe(true);

    const written = await fs.readFile(draftPath('a'), 'utf-8');
    expect(written).toContain('extraction: bundled');
    expect(written).toContain(sentences(5, 'Feed'));
  });

  it('should retry a fetch failure on the next run', async () => {
    const items = [entry('a', 1)];

    const first = await run(items, { extractor: failing(new FetchFailure('HTTP 500 for https://news.example.com/a', 500)) });
    expect(first.summary).toMatchObject({ created: [], failed: { fetch: 1 } });
    expect(first.store.contains('a')).toBe(false);

    const extractor = extracted();
    const second = await run(items, { extractor });
    expect(extractor.extract).toHaveBeenCalledWith('https://news.example.com/a');
    expect(second.summary.created).toEqual([draftPath('a')]);
  });

  it('should record an extraction failure as permanent', async () => {
    const { summary, store } = await run([entry('a', 1)], {
      extractor: failing(new ExtractionFailure('No extraction strategy reached 120 words', 30))
    });

    expect(summary.failed).toEqual({ extraction: 1 });
    expect(store.contains('a')).toBe(true);
    expect(await persistedIds()).toEqual(['a']);
  });

  it('should not record an item whose summary failed', async () => {
    const summarizer: Summarizer = {
      name: 'broken',
      summarize: vi.fn().mockRejectedValue(new Error('model offline'))
    };
    const { summary, store } = await run([entry('a', 1)], { summarizer });

    expect(summary.failed).toEqual({ summarize: 1 });
    expect(store.contains('a')).toBe(false);
  });

  it('should not record an item whose draft could not be written', async () => {
    await fs.writeFile(path.join(dir, 'blocker'), 'not a directory');
    const { summary, store } = await run([entry('a', 1)], { env: { DRAFTS_DIR: 'blocker' } });

    expect(summary.failed).toEqual({ write: 1 });
    expect(summary.created).toEqual([]);
    expect(store.contains('a')).toBe(false);
  });

  it('should persist each finished item before the next one completes', async () => {
    const config = testConfig({ TARGET_WORDS: '50', CONCURRENCY_LIMIT: '1' }, dir);
    const store = await SeenStore.load(config.output.stateFile, config.output.seenLimit);
    const page: ExtractionResult = { success: true, content: { text: sentences(20, 'Page'), strategy: 'readability' } };
    let release: (result: ExtractionResult) => void = () => undefined;
    const extractor: PageExtractor = {
      extract: vi.fn(async (url: string) =>
        url.endsWith('/a')
          ? page
          : new Promise<ExtractionResult>((resolve) => {
              release = resolve;
            })
      )
    };

    const pending = runDrafts({
      config,
      feedSource: feedOf([entry('a', 1), entry('b', 2)]),
      extractor,
      summarizer: new ExtractiveSummarizer({ tolerance: 10, minSentenceWords: 4 }),
      store,
      now: NOW
    });

    await vi.waitFor(() => expect(extractor.extract).toHaveBeenCalledTimes(2));
    expect(await persistedIds()).toEqual(['a']);

    release(page);
    const summary = await pending;
    expect(summary.created).toEqual([draftPath('a'), draftPath('b')]);
    expect(await persistedIds()).toEqual(['a', 'b']);
  });

  it('should compute drafts without touching disk on a dry run', async () => {
    const { summary } = await run([entry('a', 1), entry('old', 10)], { env: { DRY_RUN: 'true' } });

    expect(summary).toEqual({
      created: [draftPath('a')],
      count: 1,
      skipped: { 'too-old': 1 },
      failed: {},
      dryRun: true
    });
    await expect(fs.access(draftsDir)).rejects.toThrow();
    await expect(fs.access(statePath)).rejects.toThrow();
  });

  it('should propagate a feed failure without touching state', async () => {
    const config = testConfig({}, dir);
    const store = await SeenStore.load(config.output.stateFile);
    const feedSource: FeedSource = {
      fetchItems: async () => {
        throw new FeedError('Feed request returned HTTP 404');
      }
    };

    await expect(
      runDrafts({
        config,
        feedSource,
        extractor: extracted(),
        summarizer: new ExtractiveSummarizer(),
        store,
        now: NOW
      })
    ).rejects.toBeInstanceOf(FeedError);
    await expect(fs.access(statePath)).rejects.toThrow();
  });
});
