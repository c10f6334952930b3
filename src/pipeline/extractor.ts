/**
 * Content Fetcher & Extractor
 *
 * One bounded GET per item, then an ordered chain of extraction strategies.
 * A strategy's output only counts once it has been cleaned and reaches the
 * minimum word count; the first usable output wins. Failures are returned as
 * values and never thrown past this module.
 */

import { Readability } from '@mozilla/readability';
import * as cheerio from 'cheerio';
import { JSDOM, VirtualConsole } from 'jsdom';
import TurndownService from 'turndown';
import type { ExtractedContent } from '../types/feed';
import { ExtractionFailure, FetchFailure, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { NON_CONTENT_SELECTOR, cleanText, countWords, spaceBlocks } from '../utils/text';

export interface StrategyOutput {
  title?: string;
  text: string;
}

export interface ExtractionStrategy {
  name: string;
  extract(html: string, url: string): StrategyOutput | null;
}

export type ExtractionResult =
  | { success: true; content: ExtractedContent }
  | { success: false; error: FetchFailure | ExtractionFailure };

export type FetchPageResult =
  | { success: true; html: string; finalUrl: string }
  | { success: false; error: FetchFailure | ExtractionFailure };

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface FetchOptions {
  timeoutMs: number;
  userAgent: string;
  fetch?: FetchLike;
}

// Elements that carry navigation, chrome or promotion rather than article text
const BOILERPLATE_SELECTOR = [
  'nav',
  'header',
  'footer',
  'aside',
  'form',
  'iframe',
  'button',
  '[role="navigation"]',
  '[role="banner"]',
  '[role="contentinfo"]',
  '[aria-hidden="true"]',
  '.nav',
  '.navbar',
  '.menu',
  '.sidebar',
  '.share',
  '.social',
  '.comments',
  '.related',
  '.advert',
  '.ad',
  '.ads',
  '.newsletter',
  '.subscribe',
  '.cookie-banner'
].join(', ');

const ARTICLE_SELECTORS = [
  '[itemprop="articleBody"]',
  'article',
  '[role="main"]',
  'main',
  '.article-body',
  '.article-content',
  '.entry-content',
  '.post-content',
  '#content'
];

const MIN_PARAGRAPH_WORDS = 5;

const TEXT_CONTENT_TYPE_RE = /(text\/|application\/xhtml\+xml|application\/xml)/i;

function createPlainTextTurndown(): TurndownService {
  const service = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced'
  });

  service.remove(['script', 'style', 'noscript', 'nav', 'footer', 'aside', 'form', 'iframe']);

  // Keep the words, drop the Markdown decoration
  service.addRule('plainInline', {
    filter: ['a', 'strong', 'b', 'em', 'i', 'u', 'code', 'span', 'mark', 'small'],
    replacement: (content) => content
  });
  service.addRule('plainBlock', {
    filter: ['h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'blockquote', 'li', 'pre'],
    replacement: (content) => `\n\n${content.trim()}\n\n`
  });
  service.addRule('dropMedia', {
    filter: ['img', 'figure', 'picture', 'video', 'audio'],
    replacement: () => ''
  });
  service.escape = (text: string) => text;

  return service;
}

const turndown = createPlainTextTurndown();

/**
 * Statistical boilerplate removal with Mozilla Readability over a jsdom document.
 */
export const readabilityStrategy: ExtractionStrategy = {
  name: 'readability',
  extract(html, url) {
    // Page stylesheets and scripts are irrelevant here; keep jsdom quiet about them
    const dom = new JSDOM(html, { url, virtualConsole: new VirtualConsole() });
    try {
      const article = new Readability(dom.window.document).parse();
      if (!article || !article.content) {
        return null;
      }
      return {
        title: article.title?.trim() || undefined,
        text: cleanText(turndown.turndown(article.content))
      };
    } finally {
      dom.window.close();
    }
  }
};

function pickTitle($: cheerio.CheerioAPI): string | undefined {
  const candidates = [
    $('meta[property="og:title"]').attr('content'),
    $('meta[name="twitter:title"]').attr('content'),
    $('h1').first().text(),
    $('title').first().text()
  ];
  for (const candidate of candidates) {
    const cleaned = candidate?.replace(/\s+/g, ' ').trim();
    if (cleaned) return cleaned;
  }
  return undefined;
}

/**
 * DOM heuristic: strip chrome, then take a known article container or the
 * element whose paragraphs carry the most words.
 */
export const domHeuristicStrategy: ExtractionStrategy = {
  name: 'dom-heuristic',
  extract(html) {
    const $ = cheerio.load(spaceBlocks(html));
    const title = pickTitle($);

    $(NON_CONTENT_SELECTOR).remove();
    $(BOILERPLATE_SELECTOR).remove();

    for (const selector of ARTICLE_SELECTORS) {
      let bestText = '';
      for (const el of $(selector).toArray()) {
        const text = cleanText($(el).text());
        if (countWords(text) > countWords(bestText)) {
          bestText = text;
        }
      }
      if (bestText) {
        return { title, text: bestText };
      }
    }

    const paragraphs = $('p').toArray();
    const scores = new Map<(typeof paragraphs)[number], number>();
    for (const paragraph of paragraphs) {
      const words = countWords($(paragraph).text());
      if (words < MIN_PARAGRAPH_WORDS) continue;
      const parent = $(paragraph).parent().get(0);
      if (parent) {
        scores.set(parent, (scores.get(parent) ?? 0) + words);
      }
      const grandparent = $(paragraph).parent().parent().get(0);
      if (grandparent) {
        scores.set(grandparent, (scores.get(grandparent) ?? 0) + words / 2);
      }
    }

    let best: (typeof paragraphs)[number] | undefined;
    let bestScore = 0;
    for (const [node, score] of scores) {
      if (score > bestScore) {
        best = node;
        bestScore = score;
      }
    }

    if (!best) {
      return null;
    }

    return { title, text: cleanText($(best).text()) };
  }
};

/**
 * Last resort: every word in <body>, minus script/style/noscript.
 */
export const rawTextStrategy: ExtractionStrategy = {
  name: 'raw-text',
  extract(html) {
    const $ = cheerio.load(spaceBlocks(html));
    const title = $('title').first().text().trim() || undefined;
    $(NON_CONTENT_SELECTOR).remove();
    return { title, text: cleanText($('body').text()) };
  }
};

export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [
  readabilityStrategy,
  domHeuristicStrategy,
  rawTextStrategy
];

/**
 * Run the strategy chain over markup that has already been fetched.
 */
export function extractFromHtml(
  html: string,
  url: string,
  options: { minWords: number; strategies?: readonly ExtractionStrategy[] }
): ExtractionResult {
  const strategies = options.strategies ?? DEFAULT_STRATEGIES;
  let bestWordCount = 0;

  for (const strategy of strategies) {
    let output: StrategyOutput | null;
    try {
      output = strategy.extract(html, url);
    } catch (error) {
      logger.debug(`Extraction strategy ${strategy.name} threw for ${url}`, { error: errorMessage(error) });
      continue;
    }
    if (!output) {
      logger.debug(`Extraction strategy ${strategy.name} found nothing for ${url}`);
      continue;
    }

    const text = cleanText(output.text);
    const wordCount = countWords(text);
    bestWordCount = Math.max(bestWordCount, wordCount);

    if (wordCount >= options.minWords) {
      logger.debug(`Extracted ${wordCount} words from ${url} with ${strategy.name}`);
      return {
        success: true,
        content: {
          title: output.title || undefined,
          text,
          strategy: strategy.name
        }
      };
    }

    logger.debug(`Extraction strategy ${strategy.name} yielded ${wordCount} words for ${url}, below ${options.minWords}`);
  }

  return {
    success: false,
    error: new ExtractionFailure(
      `No extraction strategy reached ${options.minWords} words for ${url} (best: ${bestWordCount})`,
      bestWordCount
    )
  };
}

/**
 * Fetch a page with a bounded timeout, an identifying user-agent and redirect following.
 */
export async function fetchPage(url: string, options: FetchOptions): Promise<FetchPageResult> {
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetchImpl(url, {
      method: 'GET',
      redirect: 'follow',
      signal: controller.signal,
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5'
      }
    });

    if (!response.ok) {
      return {
        success: false,
        error: new FetchFailure(`HTTP ${response.status} for ${url}`, response.status)
      };
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType && !TEXT_CONTENT_TYPE_RE.test(contentType)) {
      return {
        success: false,
        error: new ExtractionFailure(`Unsupported content-type ${contentType} for ${url}`)
      };
    }

    const html = await response.text();
    return { success: true, html, finalUrl: response.url || url };
  } catch (error) {
    const message =
      error instanceof Error && error.name === 'AbortError'
        ? `Request timeout after ${options.timeoutMs}ms for ${url}`
        : `Request failed for ${url}: ${errorMessage(error)}`;
    return { success: false, error: new FetchFailure(message, undefined, { cause: error }) };
  } finally {
    clearTimeout(timeout);
  }
}

export interface ContentExtractorOptions extends FetchOptions {
  minWords: number;
  strategies?: readonly ExtractionStrategy[];
}

export class ContentExtractor {
  constructor(private readonly options: ContentExtractorOptions) {}

  async extract(url: string): Promise<ExtractionResult> {
    const page = await fetchPage(url, this.options);
    if (!page.success) {
      logger.debug(`Fetch failed for ${url}`, { error: page.error.message });
      return page;
    }
    return extractFromHtml(page.html, page.finalUrl, {
      minWords: this.options.minWords,
      strategies: this.options.strategies
    });
  }
}
