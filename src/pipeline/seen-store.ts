/**
 * Dedup/State Store
 *
 * Holds the ids of items already drafted (or permanently skipped) across runs.
 * Loaded once at run start, mutated as items are finalized and persisted
 * atomically. Unreadable state fails open to an empty set.
 */

import fs from 'fs/promises';
import { z } from 'zod';
import { StateCorruption, errorMessage } from '../utils/errors';
import { writeFileAtomic } from '../utils/files';
import { logger } from '../utils/logger';

export const DEFAULT_SEEN_LIMIT = 2000;

const PersistedState = z.union([
  z.array(z.string()),
  z.object({
    seen: z.array(z.string()),
    order: z.array(z.string()).optional()
  })
]);

/**
 * `seen` is sorted for readable diffs; `order` lists the same ids oldest first
 * and is what eviction follows after a reload.
 */
export interface PersistedSeenState {
  seen: string[];
  order: string[];
}

export class SeenStore {
  // Set iteration order is insertion order, which drives eviction
  private readonly ids = new Set<string>();
  private dirty = false;

  constructor(
    private readonly filePath: string | null,
    private readonly limit: number = DEFAULT_SEEN_LIMIT,
    initial: Iterable<string> = []
  ) {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new RangeError(`Seen limit must be a positive integer, got ${limit}`);
    }
    for (const id of initial) {
      this.ids.add(id);
    }
    this.evict();
  }

  static async load(filePath: string, limit: number = DEFAULT_SEEN_LIMIT): Promise<SeenStore> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        logger.info(`No seen-state at ${filePath}, starting empty`);
        return new SeenStore(filePath, limit);
      }
      const failure = new StateCorruption(`Unreadable seen-state at ${filePath}: ${errorMessage(error)}`, { cause: error });
      logger.warn(failure.message);
      return new SeenStore(filePath, limit);
    }

    try {
      const parsed = PersistedState.parse(JSON.parse(raw));
      return new SeenStore(filePath, limit, insertionOrder(parsed));
    } catch (error) {
      const failure = new StateCorruption(`Corrupt seen-state at ${filePath}, continuing with an empty set`, { cause: error });
      logger.warn(failure.message, { error: errorMessage(error) });
      return new SeenStore(filePath, limit);
    }
  }

  contains(id: string): boolean {
    return this.ids.has(id);
  }

  add(id: string): boolean {
    if (this.ids.has(id)) {
      return false;
    }
    this.ids.add(id);
    this.dirty = true;
    this.evict();
    return true;
  }

  get size(): number {
    return this.ids.size;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  /**
   * Ids in insertion order, oldest first.
   */
  snapshot(): string[] {
    return Array.from(this.ids);
  }

  toJSON(): PersistedSeenState {
    const order = this.snapshot();
    return {
      seen: [...order].sort(),
      order
    };
  }

  /**
   * Write the set with a temp file + rename so readers never see a partial file.
   */
  async persist(): Promise<void> {
    if (!this.filePath) return;
    await writeFileAtomic(this.filePath, `${JSON.stringify(this.toJSON(), null, 2)}\n`);
    this.dirty = false;
    logger.debug(`Persisted ${this.ids.size} seen ids to ${this.filePath}`);
  }

  private evict() {
    while (this.ids.size > this.limit) {
      const oldest = this.ids.values().next();
      if (oldest.done) break;
      this.ids.delete(oldest.value);
    }
  }
}

function insertionOrder(state: z.infer<typeof PersistedState>): string[] {
  if (Array.isArray(state)) {
    return state;
  }
  const { seen, order } = state;
  if (!order) {
    return seen;
  }
  // Ids missing from `order` count as the oldest
  const known = new Set(seen);
  const ordered = order.filter((id) => known.has(id));
  const listed = new Set(ordered);
  return [...seen.filter((id) => !listed.has(id)), ...ordered];
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
