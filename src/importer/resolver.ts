/**
 * Book Resolution
 * ISBN-13 first, then title + author search against the catalog.
 */

import { ResolutionFailure, errorMessage } from '../errors.js';
import type { Book, CanonicalFields, Catalog } from '../types.js';

export const NO_MATCH_REASON = 'Could not find a match for book';

export type Resolution =
  | { ok: true; book: Book; method: 'isbn' | 'title-author' }
  | { ok: false; error: ResolutionFailure };

/**
 * Resolve a normalized row to a book. Catalog errors are returned as
 * failures, never thrown: one bad lookup must not sink the rest of the job.
 */
export async function resolveBook(catalog: Catalog, fields: CanonicalFields): Promise<Resolution> {
  try {
    if (fields.isbn13) {
      const book = await catalog.resolveByIsbn(fields.isbn13);
      if (book) return { ok: true, book, method: 'isbn' };
    }

    if (fields.title && fields.authors) {
      const book = await catalog.searchOrCreate(fields.title, fields.authors);
      if (book) return { ok: true, book, method: 'title-author' };
    }

    return { ok: false, error: new ResolutionFailure(NO_MATCH_REASON) };
  } catch (error) {
    return { ok: false, error: new ResolutionFailure(`Error loading book: ${errorMessage(error)}`) };
  }
}
