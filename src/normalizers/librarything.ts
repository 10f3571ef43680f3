/**
 * LibraryThing export (tab-separated, Latin-1)
 */

import { Normalizer } from './normalizer.js';
import { cell, normalizeDate, normalizeIsbn13, normalizeRating } from '../utils/text.js';
import type { CanonicalFields, RawRow } from '../types.js';

export class LibraryThingNormalizer extends Normalizer {
  readonly name = 'librarything';
  readonly encoding = 'iso-8859-1';
  readonly delimiter = '\t';

  protected parseFields(row: RawRow): Partial<CanonicalFields> {
    const dateFinished = normalizeDate(row['Date Read']);

    return {
      id: cell(row['Book Id']),
      title: cell(row['Title']),
      authors: cell(row['Primary Author']),
      isbn13: pickIsbn(row['ISBNs'] ?? row['ISBN']),
      rating: normalizeRating(row['Rating']),
      review: cell(row['Review']),
      shelf: shelfFromCollections(row['Collections'], dateFinished),
      dateAdded: normalizeDate(row['Entry Date']),
      dateStarted: normalizeDate(row['Date Started']),
      dateFinished,
    };
  }
}

/**
 * ISBNs come as a bracketed list: "[0441172717, 9780441172719]"
 */
function pickIsbn(value: string | undefined): string | null {
  const candidates = (value ?? '').replace(/[[\]]/g, '').split(/[,\s]+/).filter(Boolean);
  const isbn13 = candidates.find(c => c.replace(/\D/g, '').length === 13);
  return normalizeIsbn13(isbn13 ?? candidates[0]);
}

function shelfFromCollections(value: string | undefined, dateFinished: string | null): string | null {
  const collections = (value ?? '')
    .split(',')
    .map(c => c.trim().toLowerCase())
    .filter(Boolean);

  if (collections.includes('currently reading')) return 'currently-reading';
  if (collections.includes('read but unowned') || dateFinished) return 'read';
  if (collections.includes('to read') || collections.includes('wishlist')) return 'to-read';

  // "Your library" is LibraryThing's catch-all, not a reading state
  const custom = collections.find(c => c !== 'your library');
  return custom ?? null;
}
