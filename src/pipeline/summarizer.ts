/**
 * Summarizer strategies
 *
 * Any implementation of `Summarizer` may be plugged into a run. Both shipped
 * strategies are deterministic for a given input: the extractive one has no
 * randomness and the model-based one runs with temperature 0.
 */

import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { EnvironmentConfig } from '../config/environment';
import type { Summary } from '../types/feed';
import { SummarizeFailure, errorMessage } from '../utils/errors';
import { OpenAIClient } from '../utils/openaiClient';
import { cleanText, countWords, firstWords } from '../utils/text';

export interface Summarizer {
  readonly name: string;
  summarize(text: string, targetWords: number): Promise<Summary>;
}

export interface LengthOptions {
  tolerance: number;
}

export const ELLIPSIS = '…';

// Sentence end: terminal punctuation, optionally closed by a quote or bracket
const SENTENCE_BOUNDARY_RE = /(?<=[.!?…]["'”’)\]]?)\s+|\n\s*\n/;

export function splitSentences(text: string): string[] {
  return cleanText(text)
    .split(SENTENCE_BOUNDARY_RE)
    .map((sentence) => sentence.replace(/\s+/g, ' ').trim())
    .filter(Boolean);
}

export function truncateWords(text: string, maxWords: number): string {
  const kept = firstWords(text, maxWords).join(' ').replace(/[\s,;:.!?\-–—]+$/, '');
  return kept ? `${kept}${ELLIPSIS}` : '';
}

/**
 * Cut anything longer than target + tolerance back to the target, marked with an ellipsis.
 */
export function clampSummary(body: string, targetWords: number, options: LengthOptions): Summary {
  const wordCount = countWords(body);
  if (wordCount > targetWords + options.tolerance) {
    const truncated = truncateWords(body, targetWords);
    return { body: truncated, wordCount: countWords(truncated) };
  }
  return { body, wordCount };
}

export interface ExtractiveOptions extends LengthOptions {
  minSentenceWords: number;
}

/**
 * Lead-sentence extraction: sentences in original order, noise skipped,
 * until the target is reached. Short sources are returned whole, never padded.
 */
export class ExtractiveSummarizer implements Summarizer {
  readonly name = 'extractive';

  constructor(private readonly options: ExtractiveOptions = { tolerance: 60, minSentenceWords: 4 }) {}

  summarizeSync(text: string, targetWords: number): Summary {
    const sentences = splitSentences(text);
    if (!sentences.length || targetWords <= 0) {
      return { body: '', wordCount: 0 };
    }

    const meaningful = sentences.filter((sentence) => countWords(sentence) >= this.options.minSentenceWords);
    // Text made only of fragments (lists, captions) is used as-is
    const pool = meaningful.length ? meaningful : sentences;

    const picked: string[] = [];
    let running = 0;
    for (const sentence of pool) {
      if (running >= targetWords) break;
      picked.push(sentence);
      running += countWords(sentence);
    }

    return clampSummary(picked.join(' '), targetWords, this.options);
  }

  async summarize(text: string, targetWords: number): Promise<Summary> {
    return this.summarizeSync(text, targetWords);
  }
}

export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

export interface OpenAISummarizerOptions extends LengthOptions {
  model: string;
  apiKey?: string;
  timeoutMs?: number;
  client?: ChatCompletionClient;
  maxInputChars?: number;
}

/**
 * Model-based summaries through the chat completions API.
 */
export class OpenAISummarizer implements Summarizer {
  readonly name = 'openai';

  constructor(private readonly options: OpenAISummarizerOptions) {}

  private getClient(): ChatCompletionClient {
    return this.options.client ?? OpenAIClient.get({ apiKey: this.options.apiKey, timeoutMs: this.options.timeoutMs });
  }

  async summarize(text: string, targetWords: number): Promise<Summary> {
    const maxChars = this.options.maxInputChars ?? 10000;
    const source = cleanText(text);
    const input = source.length > maxChars ? source.substring(0, maxChars) : source;

    if (!input) {
      return { body: '', wordCount: 0 };
    }

    let response: ChatCompletion;
    try {
      response = await this.getClient().chat.completions.create({
        model: this.options.model,
        temperature: 0,
        max_tokens: Math.ceil((targetWords + this.options.tolerance) * 2),
        messages: [
          {
            role: 'system',
            content:
              'You write neutral news briefs. Summarize the article in plain prose paragraphs, ' +
              'without headings, lists or commentary. Use only facts stated in the article.'
          },
          {
            role: 'user',
            content: `Summarize the following article in about ${targetWords} words.\n\n${input}`
          }
        ]
      });
    } catch (error) {
      throw new SummarizeFailure(`Model summarization failed: ${errorMessage(error)}`, { cause: error });
    }

    const content = response.choices[0]?.message?.content;
    const body = content ? cleanText(content) : '';
    if (!body) {
      throw new SummarizeFailure('Model returned an empty summary');
    }

    return clampSummary(body, targetWords, this.options);
  }
}

export function createSummarizer(config: EnvironmentConfig): Summarizer {
  if (config.summary.strategy === 'openai') {
    return new OpenAISummarizer({
      model: config.openai.model,
      apiKey: config.openai.apiKey,
      tolerance: config.summary.tolerance
    });
  }
  return new ExtractiveSummarizer({
    tolerance: config.summary.tolerance,
    minSentenceWords: config.summary.minSentenceWords
  });
}
