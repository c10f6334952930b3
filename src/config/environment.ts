/**
 * Environment configuration for the drafting pipeline
 * Loads and validates the recognized options from environment variables
 */

import path from 'path';
import { z } from 'zod';
import { ConfigError } from '../utils/errors';

const ConfigSchema = z.object({
  feed: z.object({
    url: z.string().url(),
    timeoutMs: z.number().int().positive(),
    retries: z.number().int().min(0).max(10)
  }),
  selection: z.object({
    lookbackHours: z.number().positive(),
    maxPosts: z.number().int().min(0),
    qualityMinWords: z.number().int().min(0),
    titleMinWords: z.number().int().min(0),
    titleMaxWords: z.number().int().positive()
  }).refine((s) => s.titleMinWords <= s.titleMaxWords, {
    message: 'TITLE_MIN_WORDS must not exceed TITLE_MAX_WORDS'
  }),
  extraction: z.object({
    minWords: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
    userAgent: z.string().min(1),
    concurrencyLimit: z.number().int().positive()
  }),
  summary: z.object({
    strategy: z.enum(['extractive', 'openai']),
    targetWords: z.number().int().positive(),
    tolerance: z.number().int().min(0),
    minSentenceWords: z.number().int().min(0)
  }),
  openai: z.object({
    apiKey: z.string().optional(),
    model: z.string().min(1)
  }),
  output: z.object({
    draftsDir: z.string().min(1),
    stateFile: z.string().min(1),
    seenLimit: z.number().int().positive(),
    dryRun: z.boolean(),
    author: z.string().min(1),
    category: z.string().min(1),
    tags: z.array(z.string()),
    layout: z.string().min(1)
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error'])
  })
});

export type EnvironmentConfig = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  // Non-numeric input becomes NaN and is rejected by the schema
  return Number(value);
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
};

const csvFromEnv = (value: string | undefined): string[] => {
  if (!value) return [];
  return value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
};

const ENV_NAMES: Record<string, string> = {
  'feed.url': 'FEED_URL',
  'feed.timeoutMs': 'FEED_TIMEOUT_MS',
  'feed.retries': 'FEED_RETRIES',
  'selection.lookbackHours': 'LOOKBACK_HOURS',
  'selection.maxPosts': 'MAX_POSTS',
  'selection.qualityMinWords': 'QUALITY_MIN_WORDS',
  'selection.titleMinWords': 'TITLE_MIN_WORDS',
  'selection.titleMaxWords': 'TITLE_MAX_WORDS',
  'extraction.minWords': 'EXTRACTION_MIN_WORDS',
  'extraction.timeoutMs': 'FETCH_TIMEOUT_MS',
  'extraction.userAgent': 'USER_AGENT',
  'extraction.concurrencyLimit': 'CONCURRENCY_LIMIT',
  'summary.strategy': 'SUMMARIZER',
  'summary.targetWords': 'TARGET_WORDS',
  'summary.tolerance': 'SUMMARY_TOLERANCE',
  'summary.minSentenceWords': 'MIN_SENTENCE_WORDS',
  'openai.model': 'OPENAI_MODEL',
  'output.draftsDir': 'DRAFTS_DIR',
  'output.stateFile': 'STATE_FILE',
  'output.seenLimit': 'SEEN_LIMIT',
  'output.author': 'AUTHOR',
  'output.category': 'CATEGORY',
  'output.layout': 'DRAFT_LAYOUT',
  'logging.level': 'LOG_LEVEL'
};

function describeIssue(issue: z.ZodIssue): string {
  const key = issue.path.join('.');
  const name = ENV_NAMES[key] ?? key;
  return `${name}: ${issue.message}`;
}

/**
 * Load and validate environment configuration
 * @throws ConfigError if required variables are missing or malformed
 */
export function loadEnvironmentConfig(
  env: Env = process.env,
  overrides: { dryRun?: boolean; cwd?: string } = {}
): EnvironmentConfig {
  const cwd = overrides.cwd ?? process.cwd();
  const feedUrl = env.FEED_URL?.trim();

  if (!feedUrl) {
    throw new ConfigError('Missing required environment variables: FEED_URL');
  }

  const rawConfig = {
    feed: {
      url: feedUrl,
      timeoutMs: numberFromEnv(env.FEED_TIMEOUT_MS, 30_000),
      retries: numberFromEnv(env.FEED_RETRIES, 2)
    },
    selection: {
      lookbackHours: numberFromEnv(env.LOOKBACK_HOURS, 6),
      maxPosts: numberFromEnv(env.MAX_POSTS, 3),
      qualityMinWords: numberFromEnv(env.QUALITY_MIN_WORDS, 40),
      titleMinWords: numberFromEnv(env.TITLE_MIN_WORDS, 6),
      titleMaxWords: numberFromEnv(env.TITLE_MAX_WORDS, 14)
    },
    extraction: {
      minWords: numberFromEnv(env.EXTRACTION_MIN_WORDS, 120),
      timeoutMs: numberFromEnv(env.FETCH_TIMEOUT_MS, 20_000),
      userAgent: env.USER_AGENT?.trim() || 'FeedDrafter/1.0 (+https://github.com/feed-drafter)',
      concurrencyLimit: numberFromEnv(env.CONCURRENCY_LIMIT, 3)
    },
    summary: {
      strategy: (env.SUMMARIZER || 'extractive').trim().toLowerCase(),
      targetWords: numberFromEnv(env.TARGET_WORDS, 300),
      tolerance: numberFromEnv(env.SUMMARY_TOLERANCE, 60),
      minSentenceWords: numberFromEnv(env.MIN_SENTENCE_WORDS, 4)
    },
    openai: {
      apiKey: env.OPENAI_API_KEY?.trim() || undefined,
      model: env.OPENAI_MODEL?.trim() || 'gpt-4o-mini'
    },
    output: {
      draftsDir: path.resolve(cwd, env.DRAFTS_DIR || 'drafts'),
      stateFile: path.resolve(cwd, env.STATE_FILE || path.join('state', 'seen.json')),
      seenLimit: numberFromEnv(env.SEEN_LIMIT, 2000),
      dryRun: overrides.dryRun ?? booleanFromEnv(env.DRY_RUN, false),
      author: env.AUTHOR?.trim() || 'Automated',
      category: env.CATEGORY?.trim() || 'automated',
      tags: csvFromEnv(env.TAGS),
      layout: env.DRAFT_LAYOUT?.trim() || 'post'
    },
    logging: {
      level: (env.LOG_LEVEL || 'info').trim().toLowerCase()
    }
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${parsed.error.issues.map(describeIssue).join('; ')}`);
  }

  const config = parsed.data;
  if (config.summary.strategy === 'openai' && !config.openai.apiKey) {
    throw new ConfigError('Missing required environment variables: OPENAI_API_KEY (required when SUMMARIZER=openai)');
  }

  return config;
}
