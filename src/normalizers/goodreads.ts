/**
 * Goodreads library export
 * My Books → Import and Export → Export Library
 */

import { Normalizer } from './normalizer.js';
import { cell, normalizeDate, normalizeIsbn13, normalizeRating } from '../utils/text.js';
import type { CanonicalFields, RawRow } from '../types.js';

export class GoodreadsNormalizer extends Normalizer {
  readonly name = 'goodreads';

  protected parseFields(row: RawRow): Partial<CanonicalFields> {
    return {
      id: cell(row['Book Id']),
      title: cell(row['Title']),
      authors: cell(row['Author']),
      // ISBNs are exported spreadsheet-escaped: ="9780441172719"
      isbn13: normalizeIsbn13(row['ISBN13']) ?? normalizeIsbn13(row['ISBN']),
      rating: normalizeRating(row['My Rating']),
      review: cell(row['My Review']),
      shelf: cell(row['Exclusive Shelf']),
      dateAdded: normalizeDate(row['Date Added']),
      dateFinished: normalizeDate(row['Date Read']),
    };
  }
}
