import { beforeEach, describe, expect, it } from 'vitest';
import { NotFoundError, PersistenceError, ValidationError } from '../errors/mesh-error.js';
import type { LogEntry } from '../observability/logger.js';
import { createLogger } from '../observability/logger.js';
import type { Recipe } from '../types/recipe.js';
import { MemoryPersistence } from './memory-persistence.js';
import { RecordStore } from './record-store.js';

function recipe(publisherId: string, id: number, name = `Recipe ${id}`): Recipe {
  return { id, name, ingredients: '', instructions: '', publisherId, published: false };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

describe('RecordStore', () => {
  let persistence: MemoryPersistence;
  let store: RecordStore;

  beforeEach(async () => {
    persistence = new MemoryPersistence();
    store = await RecordStore.open({ localId: 'peer-a', persistence });
  });

  describe('open', () => {
    it('should start empty when nothing is persisted', () => {
      expect(store.size).toBe(0);
      expect(store.localId).toBe('peer-a');
    });

    it('should continue owned ids after the highest persisted one', async () => {
      const reopened = await RecordStore.open({
        localId: 'peer-a',
        persistence: new MemoryPersistence([recipe('peer-a', 3), recipe('peer-b', 9)]),
      });

      const created = await reopened.create({ name: 'Stew' });

      expect(created.id).toBe(4);
    });

    it('should reject invalid persisted entries', async () => {
      const broken = new MemoryPersistence();
      await broken.save([{ ...recipe('peer-a', 1), name: '' }]);

      const error = await rejection(RecordStore.open({ localId: 'peer-a', persistence: broken }));

      expect(error).toBeInstanceOf(PersistenceError);
      if (error instanceof PersistenceError) {
        expect(error.code).toBe('MESH_S301');
        expect(error.message).toBe('Invalid record at index 0 in memory');
        expect(error.context['issues']).toEqual([{ path: '[0].name', message: 'must not be empty' }]);
      }
    });

    it('should drop duplicate persisted records with a warning', async () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ level: 'warn', handler: (entry) => entries.push(entry) });

      const reopened = await RecordStore.open({
        localId: 'peer-a',
        persistence: new MemoryPersistence([recipe('peer-b', 1), recipe('peer-b', 1, 'Copy')]),
        logger,
      });

      expect(reopened.size).toBe(1);
      expect(reopened.listAll()[0]?.name).toBe('Recipe 1');
      expect(entries).toHaveLength(1);
      expect(entries[0]?.context).toEqual({ key: 'peer-b#1' });
    });
  });

  describe('create', () => {
    it('should assign ids starting at 1', async () => {
      const first = await store.create({ name: 'Soup', ingredients: 'water|salt', instructions: 'boil' });
      const second = await store.create({ name: 'Bread' });

      expect(first).toEqual({
        id: 1,
        name: 'Soup',
        ingredients: 'water|salt',
        instructions: 'boil',
        publisherId: 'peer-a',
        published: false,
      });
      expect(second.id).toBe(2);
      expect(persistence.getSnapshot()).toEqual([first, second]);
    });

    it('should list a created record exactly once', async () => {
      const created = await store.create({ name: 'Soup' });

      const local = Array.from(store.listLocal());

      expect(local.filter((r) => r.id === created.id)).toHaveLength(1);
    });

    it('should reject invalid drafts without touching the store', async () => {
      const error = await rejection(store.create({ name: '  ', instructions: 'x'.repeat(4001) }));

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.errors.map((e) => e.path)).toEqual(['name', 'instructions']);
      }
      expect(store.size).toBe(0);
      expect(persistence.getSaveCount()).toBe(0);
    });

    it('should roll back when persisting fails', async () => {
      persistence.failNextSave(new Error('disk full'));

      const error = await rejection(store.create({ name: 'Soup' }));

      expect(error).toBeInstanceOf(PersistenceError);
      if (error instanceof PersistenceError) {
        expect(error.code).toBe('MESH_S300');
        expect(error.cause?.message).toBe('disk full');
      }
      expect(store.size).toBe(0);

      const retried = await store.create({ name: 'Soup' });
      expect(retried.id).toBe(1);
    });

    it('should never reuse an id', async () => {
      const ids: number[] = [];
      for (let i = 0; i < 5; i++) {
        ids.push((await store.create({ name: `R${i}` })).id);
      }

      expect(ids).toEqual([1, 2, 3, 4, 5]);
    });
  });

  describe('listLocal', () => {
    it('should yield only owned records and be restartable', async () => {
      await store.create({ name: 'Soup' });
      await store.mergeReceived([recipe('peer-b', 1)]);
      await store.create({ name: 'Bread' });

      expect(Array.from(store.listLocal(), (r) => r.name)).toEqual(['Soup', 'Bread']);
      expect(Array.from(store.listLocal(), (r) => r.name)).toEqual(['Soup', 'Bread']);
      expect(store.listAll().map((r) => r.publisherId)).toEqual(['peer-a', 'peer-b', 'peer-a']);
    });
  });

  describe('mergeReceived', () => {
    it('should be idempotent', async () => {
      const batch = [recipe('peer-b', 1), recipe('peer-c', 1)];

      expect(await store.mergeReceived(batch)).toBe(2);
      expect(await store.mergeReceived(batch)).toBe(0);
      expect(store.size).toBe(2);
      expect(persistence.getSaveCount()).toBe(1);
    });

    it('should count duplicates inside one batch once', async () => {
      const added = await store.mergeReceived([
        recipe('peer-b', 1),
        recipe('peer-b', 1, 'Later copy'),
        recipe('peer-b', 2),
      ]);

      expect(added).toBe(2);
      expect(store.get('peer-b', 1)?.name).toBe('Recipe 1');
    });

    it('should keep the first copy seen', async () => {
      await store.mergeReceived([recipe('peer-b', 1, 'Original')]);
      await store.mergeReceived([recipe('peer-b', 1, 'Rewritten')]);

      expect(store.get('peer-b', 1)?.name).toBe('Original');
    });

    it('should skip records claiming the local identity', async () => {
      const added = await store.mergeReceived([recipe('peer-a', 1, 'Spoofed')]);

      expect(added).toBe(0);
      expect(Array.from(store.listLocal())).toEqual([]);
    });

    it('should roll back when persisting fails', async () => {
      persistence.failNextSave();

      const error = await rejection(store.mergeReceived([recipe('peer-b', 1)]));

      expect(error).toBeInstanceOf(PersistenceError);
      expect(store.size).toBe(0);
      expect(await store.mergeReceived([recipe('peer-b', 1)])).toBe(1);
    });
  });

  describe('getOwned', () => {
    it('should not return received records', async () => {
      await store.mergeReceived([recipe('peer-b', 1)]);

      expect(() => store.getOwned(1)).toThrow(NotFoundError);
    });
  });

  describe('markPublished', () => {
    it('should flag owned records and persist once', async () => {
      await store.create({ name: 'Soup' });
      await store.create({ name: 'Bread' });
      const savesBefore = persistence.getSaveCount();

      const records = await store.markPublished([2, 1]);

      expect(records.map((r) => [r.id, r.published])).toEqual([
        [2, true],
        [1, true],
      ]);
      expect(persistence.getSaveCount()).toBe(savesBefore + 1);

      await store.markPublished([1]);
      expect(persistence.getSaveCount()).toBe(savesBefore + 1);
    });

    it('should change nothing when an id is not owned', async () => {
      await store.create({ name: 'Soup' });

      const error = await rejection(store.markPublished([1, 8]));

      expect(error).toBeInstanceOf(NotFoundError);
      expect(store.getOwned(1).published).toBe(false);
    });
  });

  describe('flush', () => {
    it('should write the current content', async () => {
      await store.create({ name: 'Soup' });
      const saves = persistence.getSaveCount();

      await store.flush();

      expect(persistence.getSaveCount()).toBe(saves + 1);
    });
  });
});
