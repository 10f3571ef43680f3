/**
 * The StoryGraph export
 */

import { Normalizer } from './normalizer.js';
import { cell, normalizeDate, normalizeIsbn13, normalizeRating } from '../utils/text.js';
import type { CanonicalFields, RawRow } from '../types.js';

export class StoryGraphNormalizer extends Normalizer {
  readonly name = 'storygraph';

  protected parseFields(row: RawRow): Partial<CanonicalFields> {
    const uid = cell(row['ISBN/UID']);
    const status = cell(row['Read Status']);

    return {
      // no row id in this export; the ISBN/UID column is the closest thing
      id: uid,
      title: cell(row['Title']),
      authors: cell(row['Authors']),
      isbn13: normalizeIsbn13(uid),
      rating: normalizeRating(row['Star Rating']),
      review: cell(row['Review']),
      shelf: status,
      dateAdded: normalizeDate(row['Date Added']),
      dateFinished: normalizeDate(row['Last Date Read']),
    };
  }
}
