/**
 * Library Operations
 * Users, shelves, books and the records an import creates for them.
 */

import { randomUUID } from 'crypto';
import { getDb } from './db.js';
import { normalizeText } from '../utils/text.js';
import {
  DEFAULT_SHELVES,
  type Book,
  type Privacy,
  type ReadThrough,
  type Review,
  type ReviewKind,
  type Shelf,
  type ShelfBook,
  type User,
} from '../types.js';

// =============================================================================
// Row Types
// =============================================================================

interface UserRecord {
  id: string;
  username: string;
}

interface BookRecord {
  id: string;
  title: string;
  author: string | null;
  isbn13: string | null;
  openlibrary_key: string | null;
}

interface ShelfRecord {
  id: string;
  user_id: string;
  identifier: string;
  name: string;
  editable: number;
}

interface ShelfBookRecord {
  id: string;
  shelf_id: string;
  book_id: string;
  user_id: string;
  shelved_date: string;
}

interface ReviewRecord {
  id: string;
  kind: ReviewKind;
  user_id: string;
  book_id: string;
  name: string | null;
  content: string | null;
  rating: number | null;
  privacy: Privacy;
  published_date: string;
}

interface ReadThroughRecord {
  id: string;
  user_id: string;
  book_id: string;
  start_date: string | null;
  finish_date: string | null;
}

const SHELF_NAMES: Record<string, string> = {
  'to-read': 'To Read',
  'reading': 'Currently Reading',
  'read': 'Read',
};

function toBook(row: BookRecord): Book {
  return {
    id: row.id,
    title: row.title,
    author: row.author,
    isbn13: row.isbn13,
    openlibraryKey: row.openlibrary_key,
  };
}

function toShelf(row: ShelfRecord): Shelf {
  return {
    id: row.id,
    userId: row.user_id,
    identifier: row.identifier,
    name: row.name,
    editable: row.editable === 1,
  };
}

function toShelfBook(row: ShelfBookRecord): ShelfBook {
  return {
    id: row.id,
    shelfId: row.shelf_id,
    bookId: row.book_id,
    userId: row.user_id,
    shelvedDate: row.shelved_date,
  };
}

function toReview(row: ReviewRecord): Review {
  return {
    id: row.id,
    kind: row.kind,
    userId: row.user_id,
    bookId: row.book_id,
    name: row.name,
    content: row.content,
    rating: row.rating,
    privacy: row.privacy,
    publishedDate: row.published_date,
  };
}

function toReadThrough(row: ReadThroughRecord): ReadThrough {
  return {
    id: row.id,
    userId: row.user_id,
    bookId: row.book_id,
    startDate: row.start_date,
    finishDate: row.finish_date,
  };
}

// =============================================================================
// Users
// =============================================================================

/**
 * Create a user along with the default to-read / reading / read shelves
 */
export function createUser(username: string): User {
  const db = getDb();
  const id = randomUUID();

  const insertUser = db.prepare('INSERT INTO users (id, username) VALUES (?, ?)');
  const insertShelf = db.prepare(`
    INSERT INTO shelf (id, user_id, identifier, name, editable) VALUES (?, ?, ?, ?, 0)
  `);

  db.transaction(() => {
    insertUser.run(id, username);
    for (const identifier of DEFAULT_SHELVES) {
      insertShelf.run(randomUUID(), id, identifier, SHELF_NAMES[identifier] ?? identifier);
    }
  })();

  return { id, username };
}

export function getUser(id: string): User | null {
  const row = getDb().prepare('SELECT id, username FROM users WHERE id = ?').get(id) as UserRecord | undefined;
  return row ?? null;
}

export function findUserByUsername(username: string): User | null {
  const row = getDb().prepare('SELECT id, username FROM users WHERE username = ?').get(username) as UserRecord | undefined;
  return row ?? null;
}

// =============================================================================
// Books
// =============================================================================

export function insertBook(book: Omit<Book, 'id'> & { id?: string }): Book {
  const id = book.id || randomUUID();
  getDb().prepare(`
    INSERT INTO book (id, title, title_normalized, author, author_normalized, isbn13, openlibrary_key)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(
    id,
    book.title,
    normalizeText(book.title),
    book.author,
    book.author ? normalizeText(book.author) : null,
    book.isbn13,
    book.openlibraryKey
  );
  return { ...book, id };
}

export function getBook(id: string): Book | null {
  const row = getDb().prepare('SELECT * FROM book WHERE id = ?').get(id) as BookRecord | undefined;
  return row ? toBook(row) : null;
}

export function findBookByIsbn(isbn13: string): Book | null {
  const row = getDb().prepare(
    'SELECT * FROM book WHERE isbn13 = ? ORDER BY created_at ASC LIMIT 1'
  ).get(isbn13) as BookRecord | undefined;
  return row ? toBook(row) : null;
}

export function findBookByOpenLibraryKey(key: string): Book | null {
  const row = getDb().prepare('SELECT * FROM book WHERE openlibrary_key = ?').get(key) as BookRecord | undefined;
  return row ? toBook(row) : null;
}

/**
 * Candidate books for a title: exact normalized match, or sharing the
 * leading words of the title
 */
export function findBookCandidates(title: string, limit = 25): Book[] {
  const normalized = normalizeText(title);
  if (!normalized) return [];
  const prefix = normalized.split(' ').slice(0, 2).join(' ');

  const rows = getDb().prepare(`
    SELECT * FROM book
    WHERE title_normalized = ? OR title_normalized LIKE ?
    ORDER BY CASE WHEN title_normalized = ? THEN 0 ELSE 1 END, created_at ASC
    LIMIT ?
  `).all(normalized, `${prefix}%`, normalized, limit) as BookRecord[];

  return rows.map(toBook);
}

// =============================================================================
// Shelves
// =============================================================================

export function getShelf(userId: string, identifier: string): Shelf | null {
  const row = getDb().prepare(
    'SELECT * FROM shelf WHERE user_id = ? AND identifier = ?'
  ).get(userId, identifier) as ShelfRecord | undefined;
  return row ? toShelf(row) : null;
}

export function getUserShelves(userId: string): Shelf[] {
  const rows = getDb().prepare(
    'SELECT * FROM shelf WHERE user_id = ? ORDER BY editable ASC, created_at ASC'
  ).all(userId) as ShelfRecord[];
  return rows.map(toShelf);
}

/**
 * Find a shelf, creating a user-defined one if it doesn't exist yet
 */
export function getOrCreateShelf(userId: string, identifier: string, name: string = identifier): Shelf {
  const existing = getShelf(userId, identifier);
  if (existing) return existing;

  const id = randomUUID();
  getDb().prepare(`
    INSERT INTO shelf (id, user_id, identifier, name, editable) VALUES (?, ?, ?, ?, 1)
  `).run(id, userId, identifier, name);
  return { id, userId, identifier, name, editable: true };
}

/**
 * Every shelving of this book by this user, on any shelf
 */
export function findShelfBooks(userId: string, bookId: string): ShelfBook[] {
  const rows = getDb().prepare(
    'SELECT * FROM shelf_book WHERE user_id = ? AND book_id = ? ORDER BY created_at ASC'
  ).all(userId, bookId) as ShelfBookRecord[];
  return rows.map(toShelfBook);
}

export function getShelfBooks(shelfId: string): ShelfBook[] {
  const rows = getDb().prepare(
    'SELECT * FROM shelf_book WHERE shelf_id = ? ORDER BY shelved_date ASC'
  ).all(shelfId) as ShelfBookRecord[];
  return rows.map(toShelfBook);
}

export function insertShelfBook(shelf: Shelf, bookId: string, shelvedDate: string): ShelfBook {
  const id = randomUUID();
  getDb().prepare(`
    INSERT INTO shelf_book (id, shelf_id, book_id, user_id, shelved_date) VALUES (?, ?, ?, ?, ?)
  `).run(id, shelf.id, bookId, shelf.userId, shelvedDate);
  return { id, shelfId: shelf.id, bookId, userId: shelf.userId, shelvedDate };
}

// =============================================================================
// Reviews and Ratings
// =============================================================================

export interface ReviewInput {
  kind: ReviewKind;
  userId: string;
  bookId: string;
  name: string | null;
  content: string | null;
  rating: number | null;
  privacy: Privacy;
  publishedDate: string;
}

/**
 * An existing record with the same kind, rating and content for this book
 */
export function findMatchingReview(input: Pick<ReviewInput, 'kind' | 'userId' | 'bookId' | 'content' | 'rating'>): Review | null {
  const row = getDb().prepare(`
    SELECT * FROM review
    WHERE user_id = ? AND book_id = ? AND kind = ?
      AND content IS ? AND rating IS ?
    LIMIT 1
  `).get(input.userId, input.bookId, input.kind, input.content, input.rating) as ReviewRecord | undefined;
  return row ? toReview(row) : null;
}

export function insertReview(input: ReviewInput): Review {
  const id = randomUUID();
  getDb().prepare(`
    INSERT INTO review (id, kind, user_id, book_id, name, content, rating, privacy, published_date)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    id,
    input.kind,
    input.userId,
    input.bookId,
    input.name,
    input.content,
    input.rating,
    input.privacy,
    input.publishedDate
  );
  return { id, ...input };
}

export function getReviews(userId: string, bookId: string, kind?: ReviewKind): Review[] {
  const rows = kind
    ? getDb().prepare(
      'SELECT * FROM review WHERE user_id = ? AND book_id = ? AND kind = ? ORDER BY created_at ASC'
    ).all(userId, bookId, kind) as ReviewRecord[]
    : getDb().prepare(
      'SELECT * FROM review WHERE user_id = ? AND book_id = ? ORDER BY created_at ASC'
    ).all(userId, bookId) as ReviewRecord[];
  return rows.map(toReview);
}

// =============================================================================
// Reading History
// =============================================================================

export function hasReadThrough(userId: string, bookId: string, startDate: string | null, finishDate: string | null): boolean {
  const row = getDb().prepare(`
    SELECT 1 AS found FROM read_through
    WHERE user_id = ? AND book_id = ? AND start_date IS ? AND finish_date IS ?
    LIMIT 1
  `).get(userId, bookId, startDate, finishDate);
  return row !== undefined;
}

export function insertReadThrough(userId: string, bookId: string, startDate: string | null, finishDate: string | null): ReadThrough {
  const id = randomUUID();
  getDb().prepare(`
    INSERT INTO read_through (id, user_id, book_id, start_date, finish_date) VALUES (?, ?, ?, ?, ?)
  `).run(id, userId, bookId, startDate, finishDate);
  return { id, userId, bookId, startDate, finishDate };
}

export function getReadThroughs(userId: string, bookId: string): ReadThrough[] {
  const rows = getDb().prepare(
    'SELECT * FROM read_through WHERE user_id = ? AND book_id = ? ORDER BY created_at ASC'
  ).all(userId, bookId) as ReadThroughRecord[];
  return rows.map(toReadThrough);
}
