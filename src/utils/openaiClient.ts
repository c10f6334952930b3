/**
 * OpenAI client utility
 * Lazily creates the client used by the model-based summarizer
 */

import OpenAI from 'openai';
import { ConfigError } from './errors';

export interface OpenAIClientOptions {
  apiKey?: string;
  timeoutMs?: number;
  maxRetries?: number;
}

class OpenAIClient {
  private static instance: OpenAI | null = null;
  private static apiKey: string | null = null;

  /**
   * Get the shared client, creating it on first access.
   * Asking with a different key replaces the cached client.
   */
  static get(options: OpenAIClientOptions = {}): OpenAI {
    const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ConfigError('Missing required environment variables: OPENAI_API_KEY (required when SUMMARIZER=openai)');
    }
    if (!this.instance || this.apiKey !== apiKey) {
      this.instance = new OpenAI({
        apiKey,
        timeout: options.timeoutMs ?? 60_000,
        maxRetries: options.maxRetries ?? 2
      });
      this.apiKey = apiKey;
    }
    return this.instance;
  }

  /**
   * Reset the cached client (useful for testing)
   */
  static reset(): void {
    this.instance = null;
    this.apiKey = null;
  }

  static isInitialized(): boolean {
    return this.instance !== null;
  }
}

export { OpenAIClient };
