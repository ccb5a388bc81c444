import { mkdtemp, rm, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MetadataStore } from '../metadata-store.js';
import type { CreateVersionInput } from '../transaction.js';
import {
  CorruptStateError,
  DuplicateTagError,
  HasChildrenError,
  NotFoundError,
  ValidationError,
} from '../../errors.js';
import type { TagPolicy } from '../../schema.js';

function clock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++));
}

function input(name: string, hexChar: string, parentIds: string[] = []): CreateVersionInput {
  return {
    name,
    fingerprint: hexChar.repeat(64),
    dataPointer: `memory://${hexChar}`,
    shape: { columns: [], rowCount: 0, columnCount: 0 },
    parentIds,
    author: 'tester',
  };
}

describe('MetadataStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'dataver-store-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function openStore(tagPolicy: TagPolicy = 'overwrite'): MetadataStore {
    return new MetadataStore({ root, tagPolicy, now: clock(), lockTimeoutMs: 2000 });
  }

  describe('init', () => {
    it('writes an empty state once and leaves existing state alone', async () => {
      const store = openStore();
      await store.init();
      const created = await store.create(input('sales', 'a'));
      await store.init();

      const raw = JSON.parse(await readFile(join(root, 'metadata.json'), 'utf-8'));
      expect(raw.schemaVersion).toBe(1);
      expect((await store.all()).map((v) => v.id)).toEqual([created.id]);
    });

    it('reads a missing file as an empty repository', async () => {
      expect(await openStore().all()).toEqual([]);
    });
  });

  describe('create', () => {
    it('assigns an id and timestamps from the clock', async () => {
      const store = openStore();
      const version = await store.create(input('sales', 'a'));

      expect(version.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(version.createdAt).toBe('2026-01-01T00:00:00.000Z');
      expect(version.updatedAt).toBe(version.createdAt);
      expect(version.description).toBeNull();
      expect(await store.get(version.id)).toEqual(version);
    });

    it('rejects a missing parent without writing anything', async () => {
      const store = openStore();
      await expect(
        store.create(input('sales', 'a', ['00000000-0000-4000-8000-000000000000'])),
      ).rejects.toThrow(NotFoundError);
      expect(await store.all()).toEqual([]);
    });

    it('deduplicates parent ids keeping first occurrence', async () => {
      const store = openStore();
      const a = await store.create(input('a', 'a'));
      const b = await store.create(input('b', 'b'));
      const c = await store.create(input('c', 'c', [b.id, a.id, b.id]));
      expect(c.parentIds).toEqual([b.id, a.id]);
    });

    it('validates the name', async () => {
      await expect(openStore().create(input('bad name', 'a'))).rejects.toThrow(ValidationError);
    });
  });

  describe('transaction', () => {
    it('writes nothing when the callback throws', async () => {
      const store = openStore();
      await expect(
        store.transaction((tx) => {
          const v = tx.create(input('sales', 'a'));
          tx.addTag(v.id, 'v1');
          throw new Error('abort');
        }),
      ).rejects.toThrow('abort');

      expect(await store.all()).toEqual([]);
      expect(await store.tags()).toEqual([]);
    });

    it('serializes concurrent writers', async () => {
      const store = openStore();
      const hex = '0123456789';
      await Promise.all(hex.split('').map((c) => store.create(input(`set-${c}`, c))));
      expect(await store.all()).toHaveLength(10);
    });

    it('runs commit hooks after the state is on disk', async () => {
      const store = openStore();
      let seen = -1;
      await store.transaction((tx) => {
        tx.create(input('sales', 'a'));
        tx.onCommit(async () => {
          seen = (await store.all()).length;
        });
      });
      expect(seen).toBe(1);
    });

    it('runs rollback hooks instead of commit hooks when the callback throws', async () => {
      const store = openStore();
      const ran: string[] = [];
      await expect(
        store.transaction((tx) => {
          tx.onCommit(async () => {
            ran.push('commit');
          });
          tx.onRollback(async () => {
            ran.push('rollback');
          });
          tx.create(input('sales', 'a'));
          throw new Error('abort');
        }),
      ).rejects.toThrow('abort');

      expect(ran).toEqual(['rollback']);
    });
  });

  describe('pre-write checks', () => {
    it('reports a tag the reject policy would refuse', async () => {
      const store = openStore('reject');
      const v1 = await store.create(input('sales', 'a'));
      await store.addTag(v1.id, 'prod');

      await store.transaction((tx) => {
        expect(() => tx.checkTagAssignable('sales', 'prod')).toThrow(DuplicateTagError);
        expect(tx.checkTagAssignable('sales', 'prod', v1.id)?.datasetId).toBe(v1.id);
        expect(tx.checkTagAssignable('sales', 'dev')).toBeUndefined();
      });
    });

    it('refuses replacement parents that descend from the version', async () => {
      const store = openStore();
      const a = await store.create(input('a', 'a'));
      const b = await store.create(input('b', 'b', [a.id]));

      await store.transaction((tx) => {
        expect(() => tx.checkReplacementParents(a.id, [b.id])).toThrow(ValidationError);
        expect(() => tx.checkReplacementParents(a.id, [a.id])).toThrow(ValidationError);
        expect(tx.checkReplacementParents(b.id, [a.id, a.id])).toEqual([a.id]);
      });
    });
  });

  describe('tags', () => {
    it('overwrites a tag and logs the reassignment', async () => {
      const store = openStore();
      const v1 = await store.create(input('sales', 'a'));
      const v2 = await store.create(input('sales', 'b'));
      await store.addTag(v1.id, 'prod');
      await store.addTag(v2.id, 'prod');

      expect((await store.tags()).map((t) => t.datasetId)).toEqual([v2.id]);
      const history = await store.tagHistory({ label: 'prod' });
      expect(history.map((e) => e.action)).toEqual(['assign', 'reassign']);
      expect(history[1].previousDatasetId).toBe(v1.id);
    });

    it('rejects reuse under the reject policy', async () => {
      const store = openStore('reject');
      const v1 = await store.create(input('sales', 'a'));
      const v2 = await store.create(input('sales', 'b'));
      await store.addTag(v1.id, 'prod');

      await expect(store.addTag(v2.id, 'prod')).rejects.toThrow(DuplicateTagError);
      expect((await store.tags())[0].datasetId).toBe(v1.id);
    });

    it('treats re-tagging the same version as a no-op', async () => {
      const store = openStore();
      const v1 = await store.create(input('sales', 'a'));
      await store.addTag(v1.id, 'prod');
      await store.addTag(v1.id, 'prod');
      expect(await store.tagHistory()).toHaveLength(1);
    });

    it('scopes labels to the dataset name', async () => {
      const store = openStore('reject');
      const sales = await store.create(input('sales', 'a'));
      const costs = await store.create(input('costs', 'b'));
      await store.addTag(sales.id, 'prod');
      await store.addTag(costs.id, 'prod');
      expect(await store.tags()).toHaveLength(2);
    });

    it('removes a tag and logs it', async () => {
      const store = openStore();
      const v1 = await store.create(input('sales', 'a'));
      await store.addTag(v1.id, 'prod');
      const removed = await store.removeTag('sales', 'prod');

      expect(removed.datasetId).toBe(v1.id);
      expect(await store.tags()).toEqual([]);
      expect((await store.tagHistory()).map((e) => e.action)).toEqual(['assign', 'remove']);
    });

    it('fails to remove an unknown tag', async () => {
      await expect(openStore().removeTag('sales', 'prod')).rejects.toThrow(
        "Tag 'prod' not found for dataset 'sales'",
      );
    });
  });

  describe('delete', () => {
    it('refuses to delete a version with children', async () => {
      const store = openStore();
      const parent = await store.create(input('raw', 'a'));
      const child = await store.create(input('clean', 'b', [parent.id]));

      const attempt = store.delete(parent.id);
      await expect(attempt).rejects.toThrow(HasChildrenError);
      await expect(attempt).rejects.toMatchObject({ childIds: [child.id] });
      expect(await store.get(parent.id)).not.toBeNull();
    });

    it('force-deletes, leaving the child with a dangling parent', async () => {
      const store = openStore();
      const parent = await store.create(input('raw', 'a'));
      const child = await store.create(input('clean', 'b', [parent.id]));
      await store.addTag(parent.id, 'v1');

      const result = await store.delete(parent.id, { force: true });

      expect(result.orphanedChildIds).toEqual([child.id]);
      expect(result.removedTags.map((t) => t.label)).toEqual(['v1']);
      expect(await store.get(parent.id)).toBeNull();
      expect((await store.get(child.id))?.parentIds).toEqual([parent.id]);
      expect((await store.tagHistory()).map((e) => e.action)).toEqual(['assign', 'purge']);
    });

    it('fails for an unknown id', async () => {
      await expect(openStore().delete('00000000-0000-4000-8000-000000000000')).rejects.toThrow(
        NotFoundError,
      );
    });
  });

  describe('update', () => {
    it('replaces data identity and keeps id, name and tags', async () => {
      const store = openStore();
      const v1 = await store.create(input('sales', 'a'));
      await store.addTag(v1.id, 'prod');

      const updated = await store.update(v1.id, {
        fingerprint: 'f'.repeat(64),
        dataPointer: 'memory://f',
        shape: { columns: [{ name: 'x', type: 'integer' }], rowCount: 3, columnCount: 1 },
      });

      expect(updated.id).toBe(v1.id);
      expect(updated.name).toBe('sales');
      expect(updated.fingerprint).toBe('f'.repeat(64));
      expect(updated.createdAt).toBe('2026-01-01T00:00:00.000Z');
      expect(updated.updatedAt).toBe('2026-01-01T00:00:02.000Z');
      expect((await store.tagsFor(v1.id)).map((t) => t.label)).toEqual(['prod']);
    });

    it('rejects a version as its own parent', async () => {
      const store = openStore();
      const v1 = await store.create(input('sales', 'a'));
      await expect(
        store.update(v1.id, { ...input('sales', 'b'), parentIds: [v1.id] }),
      ).rejects.toThrow(ValidationError);
    });

    it('rejects a descendant as parent', async () => {
      const store = openStore();
      const a = await store.create(input('a', 'a'));
      const b = await store.create(input('b', 'b', [a.id]));
      const c = await store.create(input('c', 'c', [b.id]));

      await expect(
        store.update(a.id, { ...input('a', 'd'), parentIds: [c.id] }),
      ).rejects.toThrow('would create a cycle');
    });
  });

  describe('rename', () => {
    it('moves tags to the new name', async () => {
      const store = openStore();
      const v1 = await store.create(input('sales', 'a'));
      await store.addTag(v1.id, 'prod');
      const renamed = await store.rename(v1.id, 'revenue');

      expect(renamed.name).toBe('revenue');
      const tags = await store.tags();
      expect(tags.map((t) => `${t.name}:${t.label}`)).toEqual(['revenue:prod']);
      expect((await store.tagHistory()).map((e) => e.action)).toEqual(['assign', 'move']);
    });

    it('refuses to displace a tag under the reject policy', async () => {
      const store = openStore('reject');
      const sales = await store.create(input('sales', 'a'));
      const revenue = await store.create(input('revenue', 'b'));
      await store.addTag(sales.id, 'prod');
      await store.addTag(revenue.id, 'prod');

      await expect(store.rename(sales.id, 'revenue')).rejects.toThrow(DuplicateTagError);
      expect((await store.get(sales.id))?.name).toBe('sales');
    });
  });

  describe('describe', () => {
    it('sets and clears the description', async () => {
      const store = openStore();
      const v1 = await store.create(input('sales', 'a'));
      expect((await store.setDescription(v1.id, 'Q1 export')).description).toBe('Q1 export');
      expect((await store.setDescription(v1.id, null)).description).toBeNull();
    });
  });

  describe('list', () => {
    it('filters by name substring and tag label together', async () => {
      const store = openStore();
      const sales = await store.create(input('sales', 'a'));
      const salesEu = await store.create(input('sales-eu', 'b'));
      await store.create(input('costs', 'c'));
      await store.addTag(sales.id, 'prod');
      await store.addTag(salesEu.id, 'dev');

      expect((await store.list({ name: 'sales' })).map((v) => v.id)).toEqual([sales.id, salesEu.id]);
      expect((await store.list({ name: 'sales', tag: 'dev' })).map((v) => v.id)).toEqual([salesEu.id]);
      expect((await store.list({ limit: 1 })).map((v) => v.id)).toEqual([sales.id]);
    });
  });

  describe('corrupt state', () => {
    it('reports unparseable metadata', async () => {
      await writeFile(join(root, 'metadata.json'), '{ not json', 'utf-8');
      await expect(openStore().all()).rejects.toThrow(CorruptStateError);
    });

    it('reports metadata that fails validation', async () => {
      await writeFile(
        join(root, 'metadata.json'),
        JSON.stringify({ schemaVersion: 1, datasets: [{ id: 'x' }], tags: [], tagHistory: [] }),
        'utf-8',
      );
      await expect(openStore().all()).rejects.toThrow(CorruptStateError);
    });
  });
});
