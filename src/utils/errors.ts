/**
 * Error taxonomy for a drafting run.
 *
 * Only ConfigError aborts a run before any work starts. Per-item failures are
 * returned as values and turn into "skip this item"; `permanent` decides
 * whether the item is recorded as seen so it is not retried next run.
 */

export type FailureKind =
  | 'config'
  | 'feed'
  | 'fetch'
  | 'extraction'
  | 'summarize'
  | 'write'
  | 'state';

export class PipelineError extends Error {
  readonly kind: FailureKind;
  readonly permanent: boolean;

  constructor(kind: FailureKind, message: string, permanent: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.permanent = permanent;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super('config', message, true);
  }
}

export class FeedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('feed', message, false, options);
  }
}

export class FetchFailure extends PipelineError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super('fetch', message, false, options);
    this.status = status;
  }
}

export class ExtractionFailure extends PipelineError {
  readonly bestWordCount: number;

  constructor(message: string, bestWordCount = 0) {
    super('extraction', message, true);
    this.bestWordCount = bestWordCount;
  }
}

export class SummarizeFailure extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('summarize', message, false, options);
  }
}

export class WriteFailure extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('write', message, false, options);
  }
}

export class StateCorruption extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('state', message, false, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
