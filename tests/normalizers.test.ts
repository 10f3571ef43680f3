import { describe, it, expect } from 'vitest';
import {
  GenericNormalizer,
  GoodreadsNormalizer,
  LibraryThingNormalizer,
  StoryGraphNormalizer,
  SOURCE_NAMES,
  getNormalizer,
} from '../src/normalizers/index.js';
import { ValidationError } from '../src/errors.js';
import { fixture } from './helpers.js';

describe('GoodreadsNormalizer', () => {
  const normalizer = new GoodreadsNormalizer();
  const rows = normalizer.readRows(fixture('goodreads.csv'));

  it('reads every row of the export', () => {
    expect(rows).toHaveLength(2);
    expect(rows[0]?.['Title']).toBe('Harbor Lights');
  });

  it('maps a rated, reviewed row', () => {
    expect(normalizer.normalize(rows[0] ?? {})).toEqual({
      id: '5501',
      title: 'Harbor Lights',
      authors: 'Ines Varga',
      isbn13: '9780000005501',
      rating: '4',
      review: 'Quiet, patient, lovely.',
      shelf: 'read',
      dateAdded: '2021-01-10',
      dateStarted: null,
      dateFinished: '2021-03-04',
    });
  });

  it('treats a zero rating and empty ISBNs as absent', () => {
    const fields = normalizer.normalize(rows[1] ?? {});
    expect(fields.rating).toBeNull();
    expect(fields.isbn13).toBeNull();
    expect(fields.dateFinished).toBeNull();
    expect(fields.shelf).toBe('to-read');
  });

  it('falls back to the ISBN-10 column', () => {
    const fields = normalizer.normalize({ Title: 'Dune', Author: 'Frank Herbert', ISBN: '="0441172717"', ISBN13: '=""' });
    expect(fields.isbn13).toBe('9780441172719');
  });
});

describe('LibraryThingNormalizer', () => {
  const normalizer = new LibraryThingNormalizer();
  const tsv = [
    'Book Id\tTitle\tPrimary Author\tISBNs\tRating\tReview\tCollections\tEntry Date\tDate Started\tDate Read',
    '9001\tCafé Noir\tAurélie Brun\t[0441172717, 9780441172719]\t4.5\t\tCurrently reading, Your library\t2022-03-01\t2022-03-05\t',
    '9002\tThe Quiet Field\tSam Ostrow\t[0000000000]\t\tLovely.\tYour library\t2021-11-02\t\t2021-12-24',
  ].join('\n');
  const rows = normalizer.readRows(Buffer.from(tsv, 'latin1'));

  it('decodes Latin-1 tab-separated exports', () => {
    expect(rows).toHaveLength(2);
    expect(rows[0]?.['Title']).toBe('Café Noir');
    expect(rows[0]?.['Primary Author']).toBe('Aurélie Brun');
  });

  it('maps a row in progress', () => {
    expect(normalizer.normalize(rows[0] ?? {})).toEqual({
      id: '9001',
      title: 'Café Noir',
      authors: 'Aurélie Brun',
      isbn13: '9780441172719',
      rating: '4.5',
      review: null,
      shelf: 'currently-reading',
      dateAdded: '2022-03-01',
      dateStarted: '2022-03-05',
      dateFinished: null,
    });
  });

  it('shelves a finished row as read', () => {
    const fields = normalizer.normalize(rows[1] ?? {});
    expect(fields.shelf).toBe('read');
    expect(fields.dateFinished).toBe('2021-12-24');
    expect(fields.review).toBe('Lovely.');
    expect(fields.rating).toBeNull();
  });
});

describe('StoryGraphNormalizer', () => {
  const normalizer = new StoryGraphNormalizer();
  const csv = [
    'Title,Authors,Contributors,ISBN/UID,Format,Read Status,Date Added,Last Date Read,Star Rating,Review',
    'Harbor Lights,Ines Varga,,9780000005501,paperback,read,2023/05/01,2023/06/15,3.75,Slow start.',
    'Night Ferry,Lea Moss,,sg-8812,digital,to-read,2023/07/09,,,',
  ].join('\n');
  const rows = normalizer.readRows(csv);

  it('uses the ISBN/UID column as id and ISBN', () => {
    const fields = normalizer.normalize(rows[0] ?? {});
    expect(fields.id).toBe('9780000005501');
    expect(fields.isbn13).toBe('9780000005501');
    expect(fields.rating).toBe('3.75');
    expect(fields.shelf).toBe('read');
    expect(fields.dateAdded).toBe('2023-05-01');
    expect(fields.dateFinished).toBe('2023-06-15');
  });

  it('keeps a non-ISBN id without inventing an ISBN', () => {
    const fields = normalizer.normalize(rows[1] ?? {});
    expect(fields.id).toBe('sg-8812');
    expect(fields.isbn13).toBeNull();
    expect(fields.rating).toBeNull();
  });
});

describe('Normalizer', () => {
  const normalizer = new GenericNormalizer();

  it('lists missing mandatory fields', () => {
    expect(normalizer.missingFields(normalizer.normalize({ title: 'Only a Title' }))).toEqual(['authors']);
    expect(normalizer.missingFields(normalizer.normalize({ title: ' ', author: '' }))).toEqual(['title', 'authors']);
    expect(normalizer.missingFields(normalizer.normalize({ title: 'A', author: 'B' }))).toEqual([]);
  });

  it('fills absent fields with null', () => {
    expect(normalizer.normalize({})).toEqual({
      id: null,
      title: null,
      authors: null,
      isbn13: null,
      rating: null,
      review: null,
      shelf: null,
      dateAdded: null,
      dateStarted: null,
      dateFinished: null,
    });
  });

  it('strips a byte order mark from the header', () => {
    const rows = normalizer.readRows('\uFEFFid,title,author\n1,Harbor Lights,Ines Varga\n');
    expect(rows).toEqual([{ id: '1', title: 'Harbor Lights', author: 'Ines Varga' }]);
  });

  it('rejects an unparseable file', () => {
    expect(() => normalizer.readRows('title,author\n"unterminated,Ines Varga\n')).toThrow(ValidationError);
  });
});

describe('getNormalizer', () => {
  it('knows every supported source', () => {
    expect(SOURCE_NAMES).toEqual(['goodreads', 'librarything', 'storygraph', 'generic']);
    expect(getNormalizer('Goodreads')).toBeInstanceOf(GoodreadsNormalizer);
  });

  it('rejects an unknown source', () => {
    expect(() => getNormalizer('kindle')).toThrow(ValidationError);
    expect(() => getNormalizer('toString')).toThrow(ValidationError);
  });
});
