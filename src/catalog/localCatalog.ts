/**
 * Local Catalog
 *
 * Resolves import rows against the local book table first, then a remote
 * source (Open Library). Remote hits are stored locally so later rows and
 * later imports resolve without a network round trip.
 */

import stringSimilarity from 'string-similarity';
import { config } from '../config.js';
import { immediate } from '../database/db.js';
import {
  findBookByIsbn,
  findBookByOpenLibraryKey,
  findBookCandidates,
  insertBook,
} from '../database/library.js';
import { normalizeText } from '../utils/text.js';
import type { RemoteBook, RemoteBookSource } from '../sources/openLibrary.js';
import type { Book, Catalog } from '../types.js';

export interface LocalCatalogOptions {
  remote?: RemoteBookSource | null;
  minConfidence?: number;
}

export interface ScoredMatch<T> {
  candidate: T;
  confidence: number;
}

/**
 * Match confidence between a wanted title/author and a candidate:
 * the mean of the two string similarities.
 */
export function scoreMatch(
  title: string,
  author: string,
  candidate: { title: string; author: string | null }
): number {
  const titleScore = similarity(title, candidate.title);
  const authorScore = candidate.author ? similarity(author, candidate.author) : 0;
  return (titleScore + authorScore) / 2;
}

// two strings that normalize to nothing are not a match
function similarity(a: string, b: string): number {
  const left = normalizeText(a);
  const right = normalizeText(b);
  if (!left || !right) return 0;
  return stringSimilarity.compareTwoStrings(left, right);
}

export function bestMatch<T extends { title: string; author: string | null }>(
  title: string,
  author: string,
  candidates: T[]
): ScoredMatch<T> | null {
  let best: ScoredMatch<T> | null = null;
  for (const candidate of candidates) {
    const confidence = scoreMatch(title, author, candidate);
    if (!best || confidence > best.confidence) {
      best = { candidate, confidence };
    }
  }
  return best;
}

export class LocalCatalog implements Catalog {
  private readonly remote: RemoteBookSource | null;
  private readonly minConfidence: number;

  constructor(options: LocalCatalogOptions = {}) {
    this.remote = options.remote ?? null;
    this.minConfidence = options.minConfidence ?? config.catalog.minConfidence;
  }

  async resolveByIsbn(isbn13: string): Promise<Book | null> {
    const local = findBookByIsbn(isbn13);
    if (local) return local;
    if (!this.remote) return null;

    const remote = await this.remote.lookupIsbn(isbn13);
    return remote ? this.store(remote) : null;
  }

  async searchOrCreate(title: string, author: string): Promise<Book | null> {
    const local = bestMatch(title, author, findBookCandidates(title));
    if (local && local.confidence >= this.minConfidence) {
      return local.candidate;
    }
    if (!this.remote) return null;

    const remote = bestMatch(title, author, await this.remote.searchTitleAuthor(title, author));
    if (!remote || remote.confidence < this.minConfidence) {
      return null;
    }
    console.log(
      `[Catalog] Matched "${title}" to ${remote.candidate.key} (confidence ${remote.confidence.toFixed(2)})`
    );
    return this.store(remote.candidate);
  }

  /**
   * Insert a remote book unless a concurrent import already stored it
   */
  private store(remote: RemoteBook): Book {
    return immediate(() => {
      const existing = findBookByOpenLibraryKey(remote.key);
      if (existing) return existing;
      return insertBook({
        title: remote.title,
        author: remote.author,
        isbn13: remote.isbn13,
        openlibraryKey: remote.key,
      });
    });
  }
}
