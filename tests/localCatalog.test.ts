import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { initDatabase, closeDatabase, getDb } from '../src/database/db.js';
import { insertBook } from '../src/database/library.js';
import { LocalCatalog, bestMatch, scoreMatch } from '../src/catalog/localCatalog.js';
import type { RemoteBook, RemoteBookSource } from '../src/sources/openLibrary.js';

function fakeRemote(byIsbn: RemoteBook | null, search: RemoteBook[]) {
  const remote = {
    name: 'fake',
    lookupIsbn: vi.fn(async (_isbn13: string) => byIsbn),
    searchTitleAuthor: vi.fn(async (_title: string, _author: string) => search),
  };
  return remote satisfies RemoteBookSource;
}

function bookCount(): number {
  const row = getDb().prepare('SELECT COUNT(*) AS n FROM book').get() as { n: number };
  return row.n;
}

describe('scoreMatch', () => {
  it('scores identical title and author as 1', () => {
    expect(scoreMatch('Paper Tides', 'Jon Ferreira', { title: 'paper tides', author: 'Jon Ferreira' })).toBe(1);
  });

  it('halves the score when the candidate has no author', () => {
    expect(scoreMatch('Paper Tides', 'Jon Ferreira', { title: 'Paper Tides', author: null })).toBe(0.5);
  });

  it('scores 0 when either side normalizes to nothing', () => {
    expect(scoreMatch('!!!', '...', { title: '???', author: '--' })).toBe(0);
    expect(scoreMatch('Война и мир', 'Лев Толстой', { title: '???', author: 'Лев Толстой' })).toBe(0.5);
  });

  it('scores identical non-Latin text as 1', () => {
    expect(scoreMatch('東京の本', '山田 花子', { title: '東京の本', author: '山田 花子' })).toBe(1);
  });

  it('picks the closest candidate', () => {
    const match = bestMatch('Paper Tides', 'Jon Ferreira', [
      { title: 'Paper Tigers', author: 'Someone Else' },
      { title: 'Paper Tides', author: 'Jon Ferreira' },
    ]);
    expect(match?.candidate.title).toBe('Paper Tides');
    expect(match?.confidence).toBe(1);
    expect(bestMatch('Paper Tides', 'Jon Ferreira', [])).toBeNull();
  });
});

describe('LocalCatalog', () => {
  beforeEach(() => {
    initDatabase(':memory:');
  });

  afterEach(() => {
    closeDatabase();
  });

  describe('resolveByIsbn', () => {
    it('finds a local book without asking the remote', async () => {
      const local = insertBook({ title: 'Harbor Lights', author: 'Ines Varga', isbn13: '9780000005501', openlibraryKey: null });
      const remote = fakeRemote(null, []);
      const catalog = new LocalCatalog({ remote });

      expect(await catalog.resolveByIsbn('9780000005501')).toEqual(local);
      expect(remote.lookupIsbn).not.toHaveBeenCalled();
    });

    it('stores a remote hit', async () => {
      const remote = fakeRemote({ key: '/works/OL1W', title: 'Harbor Lights', author: 'Ines Varga', isbn13: '9780000005501' }, []);
      const catalog = new LocalCatalog({ remote });

      const book = await catalog.resolveByIsbn('9780000005501');

      expect(book).toMatchObject({ title: 'Harbor Lights', author: 'Ines Varga', isbn13: '9780000005501', openlibraryKey: '/works/OL1W' });
      expect(await catalog.resolveByIsbn('9780000005501')).toEqual(book);
      expect(remote.lookupIsbn).toHaveBeenCalledTimes(1);
    });

    it('returns null without a remote', async () => {
      expect(await new LocalCatalog().resolveByIsbn('9780000005501')).toBeNull();
    });
  });

  describe('searchOrCreate', () => {
    it('matches a local book by title and author', async () => {
      const local = insertBook({ title: 'Salt and Static', author: 'Devin Okoro', isbn13: null, openlibraryKey: null });
      const catalog = new LocalCatalog();

      expect(await catalog.searchOrCreate('Salt and Static', 'Devin Okoro')).toEqual(local);
    });

    it('does not match a different author', async () => {
      insertBook({ title: 'Salt and Static', author: 'Someone Else Entirely', isbn13: null, openlibraryKey: null });
      expect(await new LocalCatalog().searchOrCreate('Salt and Static', 'Devin Okoro')).toBeNull();
    });

    it('stores the best remote candidate once', async () => {
      const remote = fakeRemote(null, [
        { key: '/works/OL2W', title: 'Paper Tigers', author: 'Someone Else', isbn13: null },
        { key: '/works/OL3W', title: 'Paper Tides', author: 'Jon Ferreira', isbn13: '9780000000404' },
      ]);
      const catalog = new LocalCatalog({ remote });

      const first = await catalog.searchOrCreate('Paper Tides', 'Jon Ferreira');
      const second = await catalog.searchOrCreate('Paper Tides', 'Jon Ferreira');

      expect(first?.openlibraryKey).toBe('/works/OL3W');
      expect(second).toEqual(first);
      expect(remote.searchTitleAuthor).toHaveBeenCalledTimes(1);
      expect(bookCount()).toBe(1);
    });

    it('reuses a stored remote book with the same key', async () => {
      const stored = insertBook({ title: 'Paper Tides (Reissue)', author: 'J. Ferreira', isbn13: null, openlibraryKey: '/works/OL3W' });
      const remote = fakeRemote(null, [{ key: '/works/OL3W', title: 'Paper Tides', author: 'Jon Ferreira', isbn13: null }]);
      const catalog = new LocalCatalog({ remote, minConfidence: 0.9 });

      expect(await catalog.searchOrCreate('Paper Tides', 'Jon Ferreira')).toEqual(stored);
      expect(bookCount()).toBe(1);
    });

    it('rejects weak remote candidates', async () => {
      const remote = fakeRemote(null, [{ key: '/works/OL9W', title: 'Completely Different', author: 'Nobody', isbn13: null }]);
      expect(await new LocalCatalog({ remote }).searchOrCreate('Paper Tides', 'Jon Ferreira')).toBeNull();
      expect(bookCount()).toBe(0);
    });

    it('does not match unrelated books in non-Latin scripts', async () => {
      insertBook({ title: 'Преступление и наказание', author: 'Фёдор Достоевский', isbn13: null, openlibraryKey: null });

      expect(await new LocalCatalog().searchOrCreate('Война и мир', 'Лев Толстой')).toBeNull();
    });

    it('matches a non-Latin title and author', async () => {
      insertBook({ title: 'Преступление и наказание', author: 'Фёдор Достоевский', isbn13: null, openlibraryKey: null });
      const tolstoy = insertBook({ title: 'Война и мир', author: 'Лев Толстой', isbn13: null, openlibraryKey: null });

      expect(await new LocalCatalog().searchOrCreate('Война и мир', 'Лев Толстой')).toEqual(tolstoy);
    });

    it('finds nothing for a title made only of punctuation', async () => {
      insertBook({ title: '???', author: 'Anonymous', isbn13: null, openlibraryKey: null });
      expect(await new LocalCatalog().searchOrCreate('!!!', 'Anonymous')).toBeNull();
    });

    it('passes remote errors through', async () => {
      const remote = fakeRemote(null, []);
      remote.searchTitleAuthor.mockRejectedValueOnce(new Error('HTTP 503'));
      await expect(new LocalCatalog({ remote }).searchOrCreate('Paper Tides', 'Jon Ferreira')).rejects.toThrow('HTTP 503');
    });
  });
});
