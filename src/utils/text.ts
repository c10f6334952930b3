import * as cheerio from 'cheerio';
import CryptoJS from 'crypto-js';

// Elements whose text never counts as article content
export const NON_CONTENT_SELECTOR = 'script, style, noscript, template';

const BLOCK_TAG_RE =
  /<(\/?)(p|div|br|li|ul|ol|h[1-6]|tr|td|th|table|section|article|aside|blockquote|pre|header|footer|figure|figcaption|dd|dt)\b/gi;

/**
 * Collapse whitespace: horizontal runs become one space, lines are trimmed and
 * three or more line breaks become a single blank line.
 */
export function cleanText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t\f\v\u00a0]+/g, ' ')
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function countWords(text: string | null | undefined): number {
  if (!text) return 0;
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Block boundaries are marked with a line break before parsing so adjacent
 * paragraphs do not run together once the tags are gone.
 */
export function spaceBlocks(html: string): string {
  return html.replace(BLOCK_TAG_RE, '\n<$1$2');
}

/**
 * Tag-stripped, cleaned text of an HTML document or fragment (plain text passes through).
 */
export function htmlToText(html: string | null | undefined): string {
  if (!html || !html.trim()) return '';
  const $ = cheerio.load(spaceBlocks(html));
  $(NON_CONTENT_SELECTOR).remove();
  return cleanText($('body').text());
}

export function hashText(value: string, length = 16): string {
  return CryptoJS.SHA256(value).toString().slice(0, length);
}

export function firstWords(text: string, count: number): string[] {
  return text.split(/\s+/).filter(Boolean).slice(0, count);
}
