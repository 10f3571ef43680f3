/**
 * Source Normalizer
 *
 * Each external export format gets one subclass that maps its columns onto
 * the canonical field set. Normalizing is pure; reading the file only decodes
 * and splits it.
 */

import { parse } from 'csv-parse/sync';
import type { CanonicalField, CanonicalFields, RawRow } from '../types.js';
import { ValidationError } from '../errors.js';

export abstract class Normalizer {
  /** Source name stored on the job, e.g. "goodreads" */
  abstract readonly name: string;

  /** Canonical fields a row must carry to be importable */
  readonly mandatoryFields: readonly CanonicalField[] = ['title', 'authors'];

  /** WHATWG encoding label used to decode the export file */
  readonly encoding: string = 'utf-8';

  readonly delimiter: string = ',';

  /**
   * Map one source row to canonical fields. Implementations return null
   * for anything absent.
   */
  protected abstract parseFields(row: RawRow): Partial<CanonicalFields>;

  normalize(row: RawRow): CanonicalFields {
    const parsed = this.parseFields(row);
    return {
      id: parsed.id ?? null,
      title: parsed.title ?? null,
      authors: parsed.authors ?? null,
      isbn13: parsed.isbn13 ?? null,
      rating: parsed.rating ?? null,
      review: parsed.review ?? null,
      shelf: parsed.shelf ?? null,
      dateAdded: parsed.dateAdded ?? null,
      dateStarted: parsed.dateStarted ?? null,
      dateFinished: parsed.dateFinished ?? null,
    };
  }

  /**
   * Mandatory fields that are empty in a normalized row
   */
  missingFields(fields: CanonicalFields): CanonicalField[] {
    return this.mandatoryFields.filter(key => !fields[key]);
  }

  /**
   * Decode an export file and split it into header-keyed rows
   */
  readRows(input: Buffer | Uint8Array | string): RawRow[] {
    const text = typeof input === 'string'
      ? input
      : new TextDecoder(this.encoding).decode(input);

    let records: unknown;
    try {
      records = parse(text, {
        bom: true,
        columns: true,
        delimiter: this.delimiter,
        skip_empty_lines: true,
        relax_column_count: true,
        relax_quotes: true,
      });
    } catch (error) {
      throw new ValidationError(
        `Could not read ${this.name} export: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!Array.isArray(records)) {
      throw new ValidationError(`Could not read ${this.name} export`);
    }

    return records.map(toRawRow);
  }
}

function toRawRow(record: unknown): RawRow {
  const row: RawRow = {};
  if (typeof record !== 'object' || record === null) return row;
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === 'string') {
      row[key] = value;
    }
  }
  return row;
}
