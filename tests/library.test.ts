import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { initDatabase, closeDatabase, checkDatabaseHealth, immediate } from '../src/database/db.js';
import {
  createUser,
  findBookCandidates,
  findUserByUsername,
  getOrCreateShelf,
  getUser,
  getUserShelves,
  insertBook,
} from '../src/database/library.js';

describe('library store', () => {
  beforeEach(() => {
    initDatabase(':memory:');
  });

  afterEach(() => {
    closeDatabase();
  });

  it('creates users with the default shelves', () => {
    const user = createUser('mouse');

    expect(getUser(user.id)).toEqual(user);
    expect(findUserByUsername('mouse')).toEqual(user);
    expect(findUserByUsername('rat')).toBeNull();
    expect(getUserShelves(user.id).map(s => [s.identifier, s.name, s.editable]).sort()).toEqual([
      ['read', 'Read', false],
      ['reading', 'Currently Reading', false],
      ['to-read', 'To Read', false],
    ]);
  });

  it('reuses an existing shelf', () => {
    const user = createUser('mouse');
    const custom = getOrCreateShelf(user.id, 'favorites', 'Favorites');

    expect(getOrCreateShelf(user.id, 'favorites')).toEqual(custom);
    expect(getUserShelves(user.id)).toHaveLength(4);
  });

  it('finds candidate books by normalized title', () => {
    const exact = insertBook({ title: 'Salt and Static', author: 'Devin Okoro', isbn13: null, openlibraryKey: null });
    const similar = insertBook({ title: 'Salt and Sorrow', author: 'Devin Okoro', isbn13: null, openlibraryKey: null });
    insertBook({ title: 'Harbor Lights', author: 'Ines Varga', isbn13: null, openlibraryKey: null });

    expect(findBookCandidates('Salt and Static!').map(b => b.id)).toEqual([exact.id, similar.id]);
  });

  it('finds no candidates for a title without letters or digits', () => {
    insertBook({ title: 'Salt and Static', author: 'Devin Okoro', isbn13: null, openlibraryKey: null });
    insertBook({ title: 'Война и мир', author: 'Лев Толстой', isbn13: null, openlibraryKey: null });

    expect(findBookCandidates('!!!')).toEqual([]);
    expect(findBookCandidates('Война и мир').map(b => b.title)).toEqual(['Война и мир']);
  });

  it('rolls back a failed immediate transaction', () => {
    const user = createUser('mouse');
    expect(() => immediate(() => {
      getOrCreateShelf(user.id, 'favorites');
      throw new Error('abort');
    })).toThrow('abort');
    expect(getUserShelves(user.id)).toHaveLength(3);
  });

  it('reports health', () => {
    createUser('mouse');
    const health = checkDatabaseHealth();
    expect(health.ok).toBe(true);
    expect(health.details).toMatchObject({ jobCount: 0, itemCount: 0, path: ':memory:' });
  });
});
