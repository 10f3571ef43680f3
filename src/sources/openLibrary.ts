/**
 * Open Library Source
 * Remote fallback for book resolution when the local catalog has no match.
 *
 * API docs: https://openlibrary.org/dev/docs/api/search
 * - ISBN:         /search.json?isbn=9780...&fields=key,title,author_name,isbn
 * - Title+author: /search.json?title=...&author=...&fields=...
 *
 * Unlike a lookup miss, an infrastructure failure is thrown so the importer
 * can record it on the item.
 */

import { config } from '../config.js';
import { fetchWithTimeout, withRetry, sleep, HttpError } from '../utils/resilience.js';
import { openLibraryBreaker, CircuitBreaker } from '../circuitBreaker.js';
import { normalizeIsbn13 } from '../utils/text.js';

const USER_AGENT = 'ShelfPort/0.1.0 (Library Import)';
const SEARCH_FIELDS = 'key,title,author_name,isbn';

/**
 * A candidate book as the remote catalog describes it
 */
export interface RemoteBook {
  key: string;
  title: string;
  author: string | null;
  isbn13: string | null;
}

export interface RemoteBookSource {
  readonly name: string;
  lookupIsbn(isbn13: string): Promise<RemoteBook | null>;
  searchTitleAuthor(title: string, author: string): Promise<RemoteBook[]>;
}

interface OLSearchDoc {
  key: string;
  title: string;
  author_name?: string[];
  isbn?: string[];
}

// Rate limiter: each caller reserves the next free slot before sleeping
let nextSlot = 0;
const MIN_INTERVAL = 1000 / config.rateLimit.openLibrary;

async function rateLimit(): Promise<void> {
  const now = Date.now();
  const slot = Math.max(now, nextSlot);
  nextSlot = slot + MIN_INTERVAL;
  if (slot > now) {
    await sleep(slot - now);
  }
}

/**
 * Fetch through the circuit breaker. 404 counts as a successful "no data".
 */
function olFetch(url: string): Promise<Response> {
  return openLibraryBreaker.call(
    () => fetchWithTimeout(url, {
      headers: { 'User-Agent': USER_AGENT },
      timeout: config.openLibrary.timeout,
    }),
    resp => CircuitBreaker.isHttpFailure(resp.status)
  );
}

async function search(params: Record<string, string>): Promise<OLSearchDoc[]> {
  const query = new URLSearchParams({
    ...params,
    fields: SEARCH_FIELDS,
    limit: String(config.openLibrary.searchLimit),
  });
  const url = `${config.openLibrary.baseUrl}/search.json?${query.toString()}`;

  return withRetry(async () => {
    await rateLimit();
    const resp = await olFetch(url);

    if (resp.status === 404) return [];
    if (!resp.ok) throw HttpError.fromResponse(resp, url);

    const data = await resp.json() as { docs?: OLSearchDoc[] };
    return data.docs ?? [];
  }, { maxRetries: 2, baseDelay: 500, label: 'OpenLibrary' });
}

function toRemoteBook(doc: OLSearchDoc, isbnHint: string | null = null): RemoteBook {
  const isbn13 = isbnHint
    ?? (doc.isbn ?? []).map(normalizeIsbn13).find((isbn): isbn is string => isbn !== null && isbn.length === 13)
    ?? null;

  return {
    key: doc.key,
    title: doc.title,
    author: doc.author_name?.[0] ?? null,
    isbn13,
  };
}

export async function lookupIsbn(isbn13: string): Promise<RemoteBook | null> {
  console.log(`[OpenLibrary] ISBN lookup: ${isbn13}`);
  const docs = await search({ isbn: isbn13 });
  const doc = docs[0];
  return doc ? toRemoteBook(doc, isbn13) : null;
}

export async function searchTitleAuthor(title: string, author: string): Promise<RemoteBook[]> {
  console.log(`[OpenLibrary] Searching: "${title}" by ${author}`);
  const docs = await search({ title, author });
  return docs.map(doc => toRemoteBook(doc));
}

export const openLibrarySource: RemoteBookSource = {
  name: 'openlibrary',
  lookupIsbn,
  searchTitleAuthor,
};
