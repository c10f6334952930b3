import fs from 'fs/promises';
import path from 'path';
import { makeTempDir, removeTempDir } from '../../__tests__/helpers';
import { logger } from '../../utils/logger';
import { SeenStore } from '../seen-store';

describe('SeenStore', () => {
  let dir: string;
  let statePath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    statePath = path.join(dir, 'state', 'seen.json');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('membership', () => {
    it('should ignore repeated adds', () => {
      const store = new SeenStore(null);
      expect(store.add('a')).toBe(true);
      expect(store.add('a')).toBe(false);
      expect(store.size).toBe(1);
      expect(store.contains('a')).toBe(true);
      expect(store.contains('b')).toBe(false);
    });

    it('should evict the oldest ids beyond the limit', () => {
      const store = new SeenStore(null, 3);
      ['a', 'b', 'c', 'd', 'e'].forEach((id) => store.add(id));

      expect(store.snapshot()).toEqual(['c', 'd', 'e']);
      expect(store.contains('a')).toBe(false);
    });

    it('should reject a non-positive limit', () => {
      expect(() => new SeenStore(null, 0)).toThrow(RangeError);
    });

    it('should only become dirty when something was added', () => {
      const store = new SeenStore(null, 10, ['a']);
      expect(store.isDirty).toBe(false);
      store.add('a');
      expect(store.isDirty).toBe(false);
      store.add('b');
      expect(store.isDirty).toBe(true);
    });
  });

  describe('load', () => {
    it('should start empty when no state file exists', async () => {
      const store = await SeenStore.load(statePath);
      expect(store.size).toBe(0);
    });

    it('should accept a plain JSON array', async () => {
      await fs.mkdir(path.dirname(statePath), { recursive: true });
      await fs.writeFile(statePath, JSON.stringify(['x', 'y']));

      const store = await SeenStore.load(statePath);
      expect(store.snapshot()).toEqual(['x', 'y']);
    });

    it('should restore insertion order from the order list', async () => {
      await fs.mkdir(path.dirname(statePath), { recursive: true });
      await fs.writeFile(statePath, JSON.stringify({ seen: ['a', 'b', 'c'], order: ['b', 'c', 'a'] }));

      const store = await SeenStore.load(statePath, 2);
      // 'b' is the oldest and is evicted first
      expect(store.snapshot()).toEqual(['c', 'a']);
    });

    it('should treat ids missing from the order list as the oldest', async () => {
      await fs.mkdir(path.dirname(statePath), { recursive: true });
      await fs.writeFile(statePath, JSON.stringify({ seen: ['a', 'b', 'c'], order: ['c', 'a', 'gone'] }));

      const store = await SeenStore.load(statePath);
      expect(store.snapshot()).toEqual(['b', 'c', 'a']);
    });

    it('should fail open on corrupt state and log a warning', async () => {
      const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
      await fs.mkdir(path.dirname(statePath), { recursive: true });
      await fs.writeFile(statePath, '{ not json');

      const store = await SeenStore.load(statePath);
      expect(store.size).toBe(0);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toBe(`Corrupt seen-state at ${statePath}, continuing with an empty set`);
    });

    it('should fail open on a well-formed file of the wrong shape', async () => {
      vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
      await fs.mkdir(path.dirname(statePath), { recursive: true });
      await fs.writeFile(statePath, JSON.stringify({ seen: [1, 2, 3] }));

      const store = await SeenStore.load(statePath);
      expect(store.size).toBe(0);
    });
  });

  describe('persist', () => {
    it('should write sorted ids with their insertion order and round-trip them', async () => {
      const store = new SeenStore(statePath, 10);
      store.add('zeta');
      store.add('alpha');
      await store.persist();

      const written = JSON.parse(await fs.readFile(statePath, 'utf-8'));
      expect(written).toEqual({ seen: ['alpha', 'zeta'], order: ['zeta', 'alpha'] });
      expect(store.isDirty).toBe(false);

      const reloaded = await SeenStore.load(statePath, 10);
      expect(reloaded.snapshot()).toEqual(['zeta', 'alpha']);
    });

    it('should keep evicting the oldest ids across a reload', async () => {
      const store = new SeenStore(statePath, 3);
      store.add('z');
      store.add('y');
      await store.persist();

      const reloaded = await SeenStore.load(statePath, 3);
      reloaded.add('x');
      reloaded.add('w');

      expect(reloaded.snapshot()).toEqual(['y', 'x', 'w']);
      expect(reloaded.contains('z')).toBe(false);
    });

    it('should do nothing without a file path', async () => {
      const store = new SeenStore(null);
      store.add('a');
      await expect(store.persist()).resolves.toBeUndefined();
    });
  });
});
