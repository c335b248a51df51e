import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { pino } from 'pino';
import { closeDatabase, openDatabase, type SqliteDatabase } from './index.js';
import { PostStore } from './queries.js';

const logger = pino({ level: 'silent' });

describe('PostStore', () => {
  let db: SqliteDatabase;
  let store: PostStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    store = new PostStore(db, logger);
    expect(store.ensureSchema()).toBe(true);
  });

  afterEach(() => {
    closeDatabase(db);
  });

  describe('ensureSchema', () => {
    it('can run again on an existing database', () => {
      const sourceId = store.getOrCreateSource('Blog');
      expect(store.ensureSchema()).toBe(true);
      expect(store.getOrCreateSource('Blog')).toBe(sourceId);
    });
  });

  describe('getOrCreateSource', () => {
    it('returns the same id for the same name', () => {
      const first = store.getOrCreateSource('Passageiro de Primeira');
      const second = store.getOrCreateSource('Passageiro de Primeira');
      expect(first).not.toBeNull();
      expect(second).toBe(first);
    });

    it('creates distinct ids for distinct names', () => {
      const a = store.getOrCreateSource('A');
      const b = store.getOrCreateSource('B');
      expect(a).not.toBe(b);
      expect(store.getStats()?.totalSources).toBe(2);
    });

    it('returns null instead of throwing on a store error', () => {
      expect(store.getOrCreateSource('')).toBeNull();
    });

    it('returns null when the connection is closed', () => {
      db.close();
      expect(store.getOrCreateSource('Blog')).toBeNull();
    });
  });

  describe('insertPosts', () => {
    it('counts only links not already stored', () => {
      const sourceId = store.getOrCreateSource('Blog') ?? -1;
      expect(store.insertPosts(sourceId, [{ title: 'B', link: 'https://example.com/b' }])).toBe(1);

      const inserted = store.insertPosts(sourceId, [
        { title: 'A', link: 'https://example.com/a' },
        { title: 'B again', link: 'https://example.com/b' },
        { title: 'A again', link: 'https://example.com/a' },
        { title: 'C', link: 'https://example.com/c' },
      ]);

      expect(inserted).toBe(2);
      expect(store.getStats()?.totalPosts).toBe(3);
    });

    it('leaves an existing row untouched when its link is inserted again', () => {
      const sourceId = store.getOrCreateSource('Blog') ?? -1;
      store.insertPosts(sourceId, [{ title: 'Original', link: 'https://example.com/x' }]);
      const [pending] = store.postsPendingAnalysis();
      expect(pending).toBeDefined();
      const postId = pending?.id ?? -1;

      store.setPostState(postId, 'RELEVANT', '40% bonus');
      const before = store.getPost(postId);

      const otherSource = store.getOrCreateSource('Other') ?? -1;
      expect(store.insertPosts(otherSource, [{ title: 'Changed', link: 'https://example.com/x' }])).toBe(0);

      expect(store.getPost(postId)).toEqual(before);
      expect(before?.title).toBe('Original');
      expect(before?.state).toBe('RELEVANT');
    });

    it('stores new posts as UNPROCESSED with no processed timestamp', () => {
      const sourceId = store.getOrCreateSource('Blog') ?? -1;
      store.insertPosts(sourceId, [{ title: 'New', link: 'https://example.com/new' }]);
      const [pending] = store.postsPendingAnalysis();
      const post = store.getPost(pending?.id ?? -1);

      expect(post).toMatchObject({
        sourceId,
        title: 'New',
        link: 'https://example.com/new',
        state: 'UNPROCESSED',
        processedAt: null,
        summary: null,
      });
      expect(post?.extractedAt).toBeInstanceOf(Date);
      expect(Number.isNaN(post?.extractedAt.getTime())).toBe(false);
    });

    it('skips items rejected by the store and reports zero', () => {
      expect(store.insertPosts(999, [{ title: 'Orphan', link: 'https://example.com/o' }])).toBe(0);
      expect(store.getStats()?.totalPosts).toBe(0);
    });
  });

  describe('postsPendingAnalysis', () => {
    it('returns only UNPROCESSED posts', () => {
      const sourceId = store.getOrCreateSource('Blog') ?? -1;
      store.insertPosts(sourceId, [
        { title: '1', link: 'https://example.com/1' },
        { title: '2', link: 'https://example.com/2' },
        { title: '3', link: 'https://example.com/3' },
      ]);
      const ids = new Map(store.postsPendingAnalysis().map((p) => [p.link, p.id]));

      store.setPostState(ids.get('https://example.com/1') ?? -1, 'RELEVANT');
      store.setPostState(ids.get('https://example.com/2') ?? -1, 'ERROR');

      expect(store.postsPendingAnalysis()).toEqual([
        { id: ids.get('https://example.com/3'), link: 'https://example.com/3' },
      ]);
    });

    it('filters by source and applies the limit', () => {
      const a = store.getOrCreateSource('A') ?? -1;
      const b = store.getOrCreateSource('B') ?? -1;
      store.insertPosts(a, [
        { title: 'a1', link: 'https://a.example/1' },
        { title: 'a2', link: 'https://a.example/2' },
      ]);
      store.insertPosts(b, [{ title: 'b1', link: 'https://b.example/1' }]);

      expect(store.postsPendingAnalysis({ sourceId: b }).map((p) => p.link)).toEqual([
        'https://b.example/1',
      ]);
      expect(store.postsPendingAnalysis({ sourceId: a, limit: 1 })).toHaveLength(1);
      expect(store.postsPendingAnalysis({ limit: 0 })).toHaveLength(3);
    });
  });

  describe('setPostState', () => {
    it('records the state and stamps processedAt', () => {
      const sourceId = store.getOrCreateSource('Blog') ?? -1;
      store.insertPosts(sourceId, [{ title: 'P', link: 'https://example.com/p' }]);
      const postId = store.postsPendingAnalysis()[0]?.id ?? -1;

      expect(store.setPostState(postId, 'NOT_RELEVANT')).toBe(true);

      const post = store.getPost(postId);
      expect(post?.state).toBe('NOT_RELEVANT');
      expect(post?.processedAt).toBeInstanceOf(Date);
      expect(post?.summary).toBeNull();
    });

    it('stores the summary when given', () => {
      const sourceId = store.getOrCreateSource('Blog') ?? -1;
      store.insertPosts(sourceId, [{ title: 'P', link: 'https://example.com/p' }]);
      const postId = store.postsPendingAnalysis()[0]?.id ?? -1;

      store.setPostState(postId, 'RELEVANT', '40% bonus, valid June 2025');

      expect(store.getPost(postId)?.summary).toBe('40% bonus, valid June 2025');
    });

    it('is a no-op for an unknown id', () => {
      const sourceId = store.getOrCreateSource('Blog') ?? -1;
      store.insertPosts(sourceId, [{ title: 'P', link: 'https://example.com/p' }]);

      expect(store.setPostState(12345, 'RELEVANT')).toBe(false);
      expect(store.getStats()?.postsByState).toEqual({
        UNPROCESSED: 1,
        RELEVANT: 0,
        NOT_RELEVANT: 0,
        ERROR: 0,
      });
    });
  });

  describe('getStats', () => {
    it('counts posts by state', () => {
      const sourceId = store.getOrCreateSource('Blog') ?? -1;
      store.insertPosts(sourceId, [
        { title: '1', link: 'https://example.com/1' },
        { title: '2', link: 'https://example.com/2' },
      ]);
      expect(store.getStats()?.lastProcessedAt).toBeNull();

      const postId = store.postsPendingAnalysis({ limit: 1 })[0]?.id ?? -1;
      store.setPostState(postId, 'ERROR', 'Content fetch failed');

      const stats = store.getStats();
      expect(stats?.totalPosts).toBe(2);
      expect(stats?.postsByState.UNPROCESSED).toBe(1);
      expect(stats?.postsByState.ERROR).toBe(1);
      expect(stats?.lastProcessedAt).toBeInstanceOf(Date);
    });
  });
});
