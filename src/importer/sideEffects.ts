/**
 * Imported Book Side Effects
 *
 * Everything an imported row does to the user's library once its book is
 * known: shelving, reading history, and the rating or review. Applying the
 * same item twice leaves the library as the first application did.
 */

import { config } from '../config.js';
import { immediate } from '../database/db.js';
import {
  findMatchingReview,
  findShelfBooks,
  getOrCreateShelf,
  hasReadThrough,
  insertReadThrough,
  insertReview,
  insertShelfBook,
} from '../database/library.js';
import { linkItemReview } from '../database/jobs.js';
import { ImportError, PersistenceError } from '../errors.js';
import type {
  Broadcaster,
  CanonicalFields,
  ImportItem,
  Privacy,
  Review,
  ShelfBook,
} from '../types.js';

export interface ApplyResult {
  /** False when the book was already on one of the user's shelves */
  shelved: boolean;
  shelfBook: ShelfBook | null;
  readThrough: boolean;
  review: Review | null;
  reviewCreated: boolean;
}

const SHELF_ALIASES: Record<string, string> = {
  'read': 'read',
  'currently-reading': 'reading',
  'currently reading': 'reading',
  'reading': 'reading',
  'to-read': 'to-read',
  'to read': 'to-read',
  'want-to-read': 'to-read',
};

/** Custom shelf for source shelf names that leave nothing to slug */
export const FALLBACK_SHELF = 'imported';

/**
 * Map a source shelf onto one of the user's shelves.
 * Known reading states map to the default shelves; a row with no shelf but a
 * finish date is "read"; anything else becomes a custom shelf identifier.
 */
export function mapShelf(sourceShelf: string | null, dateFinished: string | null): string | null {
  const key = sourceShelf?.trim().toLowerCase() ?? '';
  const known = Object.hasOwn(SHELF_ALIASES, key) ? SHELF_ALIASES[key] : undefined;
  if (known) return known;
  if (!key) return dateFinished ? 'read' : null;
  return slugShelf(key) || FALLBACK_SHELF;
}

function slugShelf(name: string): string {
  return name
    .normalize('NFC')
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * `yyyy-MM-dd` → ISO timestamp at UTC midnight
 */
export function toTimestamp(date: string | null): string | null {
  return date ? `${date}T00:00:00.000Z` : null;
}

function shelve(userId: string, bookId: string, data: CanonicalFields): { shelved: boolean; shelfBook: ShelfBook | null } {
  return immediate(() => {
    // first shelving wins: never move or re-date a book the user already shelved
    const existing = findShelfBooks(userId, bookId);
    if (existing.length > 0) {
      return { shelved: false, shelfBook: existing[0] ?? null };
    }

    const identifier = mapShelf(data.shelf, data.dateFinished);
    if (!identifier) {
      return { shelved: false, shelfBook: null };
    }

    const name = identifier === FALLBACK_SHELF ? 'Imported' : data.shelf ?? identifier;
    const shelf = getOrCreateShelf(userId, identifier, name);
    const shelvedDate = toTimestamp(data.dateFinished ?? data.dateAdded) ?? new Date().toISOString();
    return { shelved: true, shelfBook: insertShelfBook(shelf, bookId, shelvedDate) };
  });
}

function recordReading(userId: string, bookId: string, data: CanonicalFields): boolean {
  const startDate = toTimestamp(data.dateStarted);
  const finishDate = toTimestamp(data.dateFinished);
  if (!startDate && !finishDate) return false;

  return immediate(() => {
    if (hasReadThrough(userId, bookId, startDate, finishDate)) return false;
    insertReadThrough(userId, bookId, startDate, finishDate);
    return true;
  });
}

function createReview(
  userId: string,
  bookId: string,
  data: CanonicalFields,
  privacy: Privacy
): { review: Review; created: boolean } | null {
  const rating = data.rating !== null ? Number(data.rating) : null;
  const content = data.review;
  if (!content && rating === null) return null;

  const kind = content ? 'review' : 'rating';
  const publishedDate = toTimestamp(data.dateFinished ?? data.dateAdded) ?? new Date().toISOString();

  return immediate(() => {
    const existing = findMatchingReview({ kind, userId, bookId, content, rating });
    if (existing) return { review: existing, created: false };

    const review = insertReview({
      kind,
      userId,
      bookId,
      name: content ? `Review of "${data.title ?? 'untitled'}"` : null,
      content,
      rating,
      privacy,
      publishedDate,
    });
    return { review, created: true };
  });
}

/**
 * Apply an imported item to the user's library. The item must already be
 * resolved to a book.
 */
export async function applyImportedBook(
  userId: string,
  item: ImportItem,
  includeReviews: boolean,
  privacy: Privacy,
  broadcaster: Broadcaster
): Promise<ApplyResult> {
  const { bookId, data } = item;
  if (!bookId) {
    throw new ImportError(`Import item ${item.id} has no resolved book`);
  }

  let shelving: { shelved: boolean; shelfBook: ShelfBook | null };
  let readThrough: boolean;
  try {
    shelving = shelve(userId, bookId, data);
    readThrough = recordReading(userId, bookId, data);
  } catch (error) {
    throw new PersistenceError('Failed to shelve imported book', error);
  }

  if (!includeReviews) {
    return { ...shelving, readThrough, review: null, reviewCreated: false };
  }

  let outcome: { review: Review; created: boolean } | null;
  try {
    outcome = createReview(userId, bookId, data, privacy);
    if (outcome?.created) {
      linkItemReview(item.id, outcome.review.id);
    }
  } catch (error) {
    throw new PersistenceError('Failed to save imported review', error);
  }

  if (outcome?.created) {
    try {
      await broadcaster.broadcast(outcome.review, { software: config.software, priority: 'low' });
    } catch (error) {
      // the record is saved; delivery is the broadcaster's to retry
      console.error(`[Importer] Broadcast of ${outcome.review.kind} ${outcome.review.id} failed:`, error);
    }
  }

  return {
    ...shelving,
    readThrough,
    review: outcome?.review ?? null,
    reviewCreated: outcome?.created ?? false,
  };
}
