/**
 * Text and value helpers shared by the source normalizers and the catalog
 */

import { parse, isValid, format } from 'date-fns';

/**
 * Normalize text for matching (lowercase, remove punctuation). Letters and
 * digits of any script are kept.
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Trimmed cell value, or null for blank/missing cells
 */
export function cell(value: string | undefined | null): string | null {
  if (value === undefined || value === null) return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

/**
 * Digits-only ISBN-13, or null. Accepts spreadsheet-escaped values like ="9780..."
 * and ISBN-10s, which are converted.
 */
export function normalizeIsbn13(value: string | undefined | null): string | null {
  if (!value) return null;
  const digits = value.replace(/[^0-9xX]/g, '').toUpperCase();
  if (digits.length === 13 && /^\d{13}$/.test(digits)) return digits;
  if (digits.length === 10) return isbn10To13(digits);
  return null;
}

export function isbn10To13(isbn10: string): string | null {
  if (!/^\d{9}[\dX]$/.test(isbn10)) return null;
  const body = `978${isbn10.slice(0, 9)}`;
  let sum = 0;
  for (let i = 0; i < body.length; i++) {
    sum += Number(body[i]) * (i % 2 === 0 ? 1 : 3);
  }
  const check = (10 - (sum % 10)) % 10;
  return `${body}${check}`;
}

/**
 * Star rating as a decimal string. Zero and out-of-range values mean "unrated".
 */
export function normalizeRating(value: string | undefined | null): string | null {
  const text = cell(value);
  if (!text) return null;
  const rating = Number(text);
  if (!Number.isFinite(rating) || rating <= 0 || rating > 5) return null;
  return String(rating);
}

const DATE_FORMATS = [
  'yyyy-MM-dd',
  'yyyy/MM/dd',
  'yyyy/MM/dd HH:mm:ss',
  'yyyy-MM-dd HH:mm:ss',
  'MM/dd/yyyy',
  'MMM d, yyyy',
  'yyyy-MM',
  'yyyy',
];

/**
 * Parse a source date into `yyyy-MM-dd`, or null if unparseable
 */
export function normalizeDate(value: string | undefined | null): string | null {
  const text = cell(value);
  if (!text) return null;

  for (const pattern of DATE_FORMATS) {
    const parsed = parse(text, pattern, new Date(2000, 0, 1));
    if (isValid(parsed)) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }
  return null;
}
