import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { MemoryStore, embeddingText } from '../../src/memory/store.js';
import { FailuresFirstEviction } from '../../src/memory/eviction.js';
import type { NewMemoryItem } from '../../src/memory/types.js';
import { DuplicateTitleError, NotFoundError, PersistenceError, ValidationError } from '../../src/errors.js';
import { KeywordEmbedder, removeDir, tmpDir } from '../helpers/fakes.js';

function memory(title: string, overrides: Partial<NewMemoryItem> = {}): NewMemoryItem {
  return {
    title,
    description: `${title} description`,
    content: `${title} content`,
    isFromSuccess: true,
    ...overrides,
  };
}

function at(day: number): Date {
  return new Date(Date.UTC(2024, 0, day));
}

describe('MemoryStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = tmpDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  describe('construction', () => {
    it('rejects a non-positive capacity', () => {
      expect(() => new MemoryStore({ maxItems: 0 })).toThrow(ValidationError);
      expect(() => new MemoryStore({ maxItems: 2.5 })).toThrow(ValidationError);
    });

    it('defaults to a capacity of 1000 and oldest-first eviction', () => {
      const store = new MemoryStore();
      expect(store.maxItems).toBe(1000);
      expect(store.evictionPolicyName).toBe('oldest');
      expect(store.hasEmbedder).toBe(false);
    });
  });

  describe('add', () => {
    it('adds and finds a memory by title', async () => {
      const store = new MemoryStore();
      await store.add(memory('Choline chloride works'));

      expect(store.size).toBe(1);
      expect(store.getByTitle('Choline chloride works').content).toBe('Choline chloride works content');
      expect(store.findByTitle('missing')).toBeNull();
    });

    it('rejects a duplicate title and leaves the store unchanged', async () => {
      const store = new MemoryStore();
      await store.add(memory('A'));

      await expect(store.add(memory('A', { content: 'other' }))).rejects.toBeInstanceOf(DuplicateTitleError);
      expect(store.size).toBe(1);
      expect(store.getByTitle('A').content).toBe('A content');
    });

    it('rejects empty and over-long titles', async () => {
      const store = new MemoryStore();
      await expect(store.add(memory('   '))).rejects.toBeInstanceOf(ValidationError);
      await expect(store.add(memory('x'.repeat(201)))).rejects.toBeInstanceOf(ValidationError);
      await store.add(memory('x'.repeat(200)));
      expect(store.size).toBe(1);
    });

    it('computes an embedding from title and description on request', async () => {
      const embedder = new KeywordEmbedder(['urea', 'cellulose', 'viscous']);
      const store = new MemoryStore({ embedder });

      const item = await store.add(
        memory('Urea helps', { description: 'urea dissolves cellulose' }),
        { computeEmbedding: true }
      );

      expect(Array.from(item.embedding ?? [])).toEqual([2, 1, 0]);
    });

    it('stores null when the embedder fails', async () => {
      const embedder = new KeywordEmbedder(['urea']);
      embedder.failWith = new Error('offline');
      const store = new MemoryStore({ embedder });

      const item = await store.add(memory('A'), { computeEmbedding: true });
      expect(item.embedding).toBeNull();
    });

    it('evicts the oldest memory when over capacity', async () => {
      const store = new MemoryStore({ maxItems: 2 });
      await store.add(memory('old', { createdAt: at(1) }));
      await store.add(memory('middle', { createdAt: at(2) }));
      await store.add(memory('new', { createdAt: at(3) }));

      expect(store.getAll().map((m) => m.title)).toEqual(['middle', 'new']);
    });

    it('never evicts the memory being added, even if it is the oldest', async () => {
      const store = new MemoryStore({ maxItems: 1 });
      await store.add(memory('recent', { createdAt: at(5) }));
      await store.add(memory('backdated', { createdAt: at(1) }));

      expect(store.getAll().map((m) => m.title)).toEqual(['backdated']);
    });

    it('evicts failures first under the failures-first policy', async () => {
      const store = new MemoryStore({ maxItems: 2, evictionPolicy: new FailuresFirstEviction() });
      await store.add(memory('old success', { createdAt: at(1) }));
      await store.add(memory('newer failure', { createdAt: at(2), isFromSuccess: false }));
      await store.add(memory('newest', { createdAt: at(3) }));

      expect(store.getAll().map((m) => m.title)).toEqual(['old success', 'newest']);
    });
  });

  describe('list', () => {
    it('filters and pages newest first', async () => {
      const store = new MemoryStore();
      await store.add(memory('a', { createdAt: at(1), sourceTaskId: 'rec_1' }));
      await store.add(memory('b', { createdAt: at(2), isFromSuccess: false }));
      await store.add(memory('c', { createdAt: at(3), sourceTaskId: 'rec_1' }));

      expect(store.list().items.map((m) => m.title)).toEqual(['c', 'b', 'a']);
      expect(store.list({ isFromSuccess: true }).items.map((m) => m.title)).toEqual(['c', 'a']);
      expect(store.list({ sourceTaskId: 'rec_1', limit: 1 })).toMatchObject({ total: 2 });
      expect(store.list({ limit: 1, offset: 1 }).items.map((m) => m.title)).toEqual(['b']);
    });
  });

  describe('update and delete', () => {
    it('re-embeds when the description changes and merges metadata', async () => {
      const embedder = new KeywordEmbedder(['urea', 'glycerol']);
      const store = new MemoryStore({ embedder });
      await store.add(memory('A', { description: 'urea', metadata: { a: 1 } }), { computeEmbedding: true });

      const updated = await store.update('A', { description: 'glycerol', metadata: { b: 2 } });

      expect(Array.from(updated.embedding ?? [])).toEqual([0, 1]);
      expect(updated.metadata).toEqual({ a: 1, b: 2 });
      expect(updated.content).toBe('A content');
    });

    it('drops a stale embedding when the text changes and nothing can re-embed it', async () => {
      const store = new MemoryStore();
      await store.add(memory('A', { embedding: [1, 0] }));

      const originOnly = await store.update('A', { isFromSuccess: false });
      expect(Array.from(originOnly.embedding ?? [])).toEqual([1, 0]);

      const rewritten = await store.update('A', { content: 'new content' });
      expect(rewritten.embedding).toBeNull();
    });

    it('keeps the embedding when only the origin changes', async () => {
      const embedder = new KeywordEmbedder(['urea']);
      const store = new MemoryStore({ embedder });
      await store.add(memory('A', { description: 'urea' }), { computeEmbedding: true });
      const callsBefore = embedder.calls;

      const updated = await store.update('A', { isFromSuccess: false });

      expect(updated.isFromSuccess).toBe(false);
      expect(embedder.calls).toBe(callsBefore);
    });

    it('raises NotFoundError for an unknown title', async () => {
      const store = new MemoryStore();
      await expect(store.update('nope', { content: 'x' })).rejects.toBeInstanceOf(NotFoundError);
    });

    it('reports whether a delete removed anything', async () => {
      const store = new MemoryStore();
      await store.add(memory('A'));

      expect(await store.deleteByTitle('A')).toBe(true);
      expect(await store.deleteByTitle('A')).toBe(false);
      expect(store.size).toBe(0);
    });
  });

  describe('consolidate', () => {
    it('adds new candidates under the given source', async () => {
      const store = new MemoryStore();
      const report = await store.consolidate([memory('A'), memory('B')], { sourceTaskId: 'rec_1', replaceBySource: false });

      expect(report).toEqual({ titles: ['A', 'B'], added: 2, replaced: 0, deleted: 0, evicted: [] });
      expect(store.findBySourceTaskId('rec_1').map((m) => m.title)).toEqual(['A', 'B']);
    });

    it('replaces a same-title memory in place', async () => {
      const store = new MemoryStore();
      await store.add(memory('first'));
      await store.add(memory('A'));
      await store.add(memory('last'));

      const report = await store.consolidate([memory('A', { content: 'new' })], { sourceTaskId: 'rec_1', replaceBySource: false });

      expect(report.replaced).toBe(1);
      expect(store.getAll().map((m) => m.title)).toEqual(['first', 'A', 'last']);
      expect(store.getByTitle('A').content).toBe('new');
    });

    it('replaces the memories of a source and deletes the leftovers', async () => {
      const store = new MemoryStore();
      await store.consolidate([memory('old 1'), memory('old 2'), memory('old 3')], { sourceTaskId: 'rec_1', replaceBySource: false });
      await store.add(memory('unrelated', { sourceTaskId: 'rec_2' }));

      const report = await store.consolidate([memory('fresh 1'), memory('fresh 2')], { sourceTaskId: 'rec_1', replaceBySource: true });

      expect(report).toEqual({ titles: ['fresh 1', 'fresh 2'], added: 0, replaced: 2, deleted: 1, evicted: [] });
      expect(store.getAll().map((m) => m.title)).toEqual(['fresh 1', 'fresh 2', 'unrelated']);
      expect(store.findBySourceTaskId('rec_1')).toHaveLength(2);
    });

    it('adds candidates beyond the number of memories being replaced', async () => {
      const store = new MemoryStore();
      await store.consolidate([memory('old')], { sourceTaskId: 'rec_1', replaceBySource: false });

      const report = await store.consolidate([memory('x'), memory('y')], { sourceTaskId: 'rec_1', replaceBySource: true });

      expect(report).toMatchObject({ added: 1, replaced: 1, deleted: 0 });
      expect(store.getAll().map((m) => m.title)).toEqual(['x', 'y']);
    });

    it('evicts over capacity without touching the new candidates', async () => {
      const store = new MemoryStore({ maxItems: 2 });
      await store.add(memory('ancient', { createdAt: at(1) }));
      await store.add(memory('old', { createdAt: at(2) }));

      const report = await store.consolidate([memory('new', { createdAt: at(3) })], { sourceTaskId: 'rec_1', replaceBySource: false });

      expect(report.evicted).toEqual(['ancient']);
      expect(store.getAll().map((m) => m.title)).toEqual(['old', 'new']);
    });
  });

  describe('backfillEmbeddings', () => {
    it('requires an embedder', async () => {
      await expect(new MemoryStore().backfillEmbeddings()).rejects.toBeInstanceOf(ValidationError);
    });

    it('fills only missing embeddings unless forced', async () => {
      const embedder = new KeywordEmbedder(['urea']);
      const store = new MemoryStore({ embedder });
      await store.add(memory('with', { description: 'urea' }), { computeEmbedding: true });
      await store.add(memory('without'));

      expect(await store.backfillEmbeddings()).toEqual({ updated: 1, failed: 0, skipped: 1 });
      expect(store.getByTitle('without').embedding).not.toBeNull();
      expect(await store.backfillEmbeddings({ force: true })).toEqual({ updated: 2, failed: 0, skipped: 0 });
    });

    it('counts failures and leaves those memories without an embedding', async () => {
      const embedder = new KeywordEmbedder(['urea']);
      const store = new MemoryStore({ embedder });
      await store.add(memory('A'));
      embedder.failWith = new Error('offline');

      expect(await store.backfillEmbeddings()).toEqual({ updated: 0, failed: 1, skipped: 0 });
      expect(store.getByTitle('A').embedding).toBeNull();
    });
  });

  describe('persistence', () => {
    it('round-trips memories, including missing embeddings', async () => {
      const file = path.join(dir, 'bank.json');
      const store = new MemoryStore({ persistPath: file, maxItems: 50 });
      await store.add(memory('A', {
        createdAt: at(1),
        sourceTaskId: 'rec_1',
        embedding: new Float32Array([0.5, 0.25]),
        metadata: { extraction_mode: 'experiment' },
      }));
      await store.add(memory('B', { createdAt: at(2), isFromSuccess: false }));
      await store.save();

      const loaded = await MemoryStore.load(file);
      expect(loaded.maxItems).toBe(50);
      const a = loaded.getByTitle('A');
      expect(a.sourceTaskId).toBe('rec_1');
      expect(a.createdAt.toISOString()).toBe('2024-01-01T00:00:00.000Z');
      expect(Array.from(a.embedding ?? [])).toEqual([0.5, 0.25]);
      expect(a.metadata).toEqual({ extraction_mode: 'experiment' });
      const b = loaded.getByTitle('B');
      expect(b.embedding).toBeNull();
      expect(b.isFromSuccess).toBe(false);
      expect(b.sourceTaskId).toBeNull();
    });

    it('keeps embedding values exact across load and save', async () => {
      const file = path.join(dir, 'bank.json');
      const row = {
        title: 'A',
        description: 'A description',
        content: 'A content',
        is_from_success: true,
        source_task_id: null,
        created_at: '2024-01-01T00:00:00.000Z',
        embedding: [0.1, 0.2, 0.3],
        metadata: {},
      };
      fs.writeFileSync(file, JSON.stringify({ memories: [row], max_items: 10 }));

      const store = await MemoryStore.load(file);
      expect(Array.from(store.getByTitle('A').embedding ?? [])).toEqual([0.1, 0.2, 0.3]);
      await store.save();

      expect(JSON.parse(fs.readFileSync(file, 'utf-8')).memories[0].embedding).toEqual([0.1, 0.2, 0.3]);
    });

    it('writes the snake_case bank format', async () => {
      const file = path.join(dir, 'bank.json');
      const store = new MemoryStore({ persistPath: file, maxItems: 10 });
      await store.add(memory('A', { createdAt: at(1) }));
      await store.save();

      expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({
        memories: [{
          title: 'A',
          description: 'A description',
          content: 'A content',
          is_from_success: true,
          source_task_id: null,
          created_at: '2024-01-01T00:00:00.000Z',
          embedding: null,
          metadata: {},
        }],
        max_items: 10,
      });
    });

    it('loads an empty store when the file is missing', async () => {
      const store = await MemoryStore.load(path.join(dir, 'missing.json'));
      expect(store.size).toBe(0);
      expect(store.persistPath).toBe(path.join(dir, 'missing.json'));
    });

    it('raises PersistenceError for a malformed bank', async () => {
      const file = path.join(dir, 'bank.json');
      fs.writeFileSync(file, JSON.stringify({ memories: [{ title: 1 }] }));
      await expect(MemoryStore.load(file)).rejects.toBeInstanceOf(PersistenceError);

      fs.writeFileSync(file, '{not json');
      await expect(MemoryStore.load(file)).rejects.toBeInstanceOf(PersistenceError);
    });

    it('rejects a bank with an unreadable creation time', async () => {
      const file = path.join(dir, 'bank.json');
      fs.writeFileSync(file, JSON.stringify({
        memories: [{ title: 'A', description: 'd', content: 'c', is_from_success: true, created_at: 'not a timestamp' }],
      }));

      await expect(MemoryStore.load(file)).rejects.toThrow(`Invalid memory bank ${file}: memories.0.created_at: Invalid timestamp`);
    });

    it('writes after every mutation with autoSave', async () => {
      const file = path.join(dir, 'bank.json');
      const store = new MemoryStore({ persistPath: file, autoSave: true });
      await store.add(memory('A'));

      const loaded = await MemoryStore.load(file);
      expect(loaded.getAll().map((m) => m.title)).toEqual(['A']);
    });

    it('rolls back the in-memory change when the autoSave write fails', async () => {
      // A directory where the file should be makes the rename fail
      const file = path.join(dir, 'bank.json');
      fs.mkdirSync(file);
      const store = new MemoryStore({ persistPath: file, autoSave: true });

      await expect(store.add(memory('A'))).rejects.toThrow();
      expect(store.size).toBe(0);
    });
  });

  it('embeds title and description together', () => {
    expect(embeddingText('Title', 'Desc')).toBe('Title. Desc');
  });
});
