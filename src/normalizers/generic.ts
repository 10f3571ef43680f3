/**
 * Plain CSV using ShelfPort's own column names
 *
 * id,title,author,isbn13,rating,review,shelf,date_added,date_started,date_finished
 */

import { Normalizer } from './normalizer.js';
import { cell, normalizeDate, normalizeIsbn13, normalizeRating } from '../utils/text.js';
import type { CanonicalFields, RawRow } from '../types.js';

export class GenericNormalizer extends Normalizer {
  readonly name = 'generic';

  protected parseFields(row: RawRow): Partial<CanonicalFields> {
    return {
      id: cell(row['id']),
      title: cell(row['title']),
      authors: cell(row['author'] ?? row['authors']),
      isbn13: normalizeIsbn13(row['isbn13'] ?? row['isbn']),
      rating: normalizeRating(row['rating']),
      review: cell(row['review']),
      shelf: cell(row['shelf']),
      dateAdded: normalizeDate(row['date_added']),
      dateStarted: normalizeDate(row['date_started']),
      dateFinished: normalizeDate(row['date_finished']),
    };
  }
}
