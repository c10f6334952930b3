import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadEnvironmentConfig, type EnvironmentConfig } from '../config/environment';

export const NOW = new Date('2025-06-10T12:00:00Z');

export const hoursAgo = (hours: number, from: Date = NOW): Date => new Date(from.getTime() - hours * 60 * 60 * 1000);

export const words = (count: number, word = 'word'): string => Array.from({ length: count }, () => word).join(' ');

/**
 * `count` words made of ten-word sentences, e.g. "Alpha 1 reports steady progress on the harbor project today."
 */
export const sentences = (count: number, prefix = 'Alpha'): string =>
  Array.from({ length: count }, (_, i) => `${prefix} ${i + 1} reports steady progress on the harbor project today.`).join(' ');

export const htmlResponse = (body: string, status = 200, contentType = 'text/html; charset=utf-8'): Response =>
  new Response(body, { status, headers: { 'content-type': contentType } });

export const jsonResponse = (data: unknown, status = 200): Response =>
  new Response(JSON.stringify(data), { status, headers: { 'content-type': 'application/json' } });

export async function makeTempDir(prefix = 'feed-drafter-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function testConfig(
  env: Record<string, string | undefined> = {},
  cwd: string = os.tmpdir()
): EnvironmentConfig {
  return loadEnvironmentConfig({ FEED_URL: 'https://feeds.example.com/news.json', ...env }, { cwd });
}
