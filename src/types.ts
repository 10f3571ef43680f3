/**
 * ShelfPort Type Definitions
 */

// =============================================================================
// Canonical Row Types (what every source normalizer produces)
// =============================================================================

export const CANONICAL_FIELDS = [
  'id',
  'title',
  'authors',
  'isbn13',
  'rating',
  'review',
  'shelf',
  'dateAdded',
  'dateStarted',
  'dateFinished',
] as const;

export type CanonicalField = typeof CANONICAL_FIELDS[number];

/**
 * A source row mapped onto the canonical field set.
 * Dates are ISO `yyyy-MM-dd` strings, ratings are decimal strings.
 */
export type CanonicalFields = Record<CanonicalField, string | null>;

/**
 * A row exactly as read from the export file (column header → cell)
 */
export type RawRow = Record<string, string>;

// =============================================================================
// Privacy
// =============================================================================

export const PRIVACY_LEVELS = ['public', 'unlisted', 'followers', 'private'] as const;

export type Privacy = typeof PRIVACY_LEVELS[number];

export function isPrivacy(value: unknown): value is Privacy {
  return typeof value === 'string' && (PRIVACY_LEVELS as readonly string[]).includes(value);
}

// =============================================================================
// Import Job Types
// =============================================================================

export interface ImportJob {
  id: string;
  userId: string;
  source: string;
  includeReviews: boolean;
  privacy: Privacy;
  retry: boolean;
  taskId: string | null;
  createdAt: string;
}

export interface ImportItem {
  id: string;
  jobId: string;
  index: number;
  data: CanonicalFields;
  rawData: RawRow | null;
  bookId: string | null;
  failReason: string | null;
  linkedReviewId: string | null;
  resolvedAt: string | null;
}

export interface ImportProgress {
  total: number;
  resolved: number;
  failed: number;
  pending: number;
  complete: boolean;
}

// =============================================================================
// Library Types
// =============================================================================

export interface User {
  id: string;
  username: string;
}

export interface Book {
  id: string;
  title: string;
  author: string | null;
  isbn13: string | null;
  openlibraryKey: string | null;
}

export const DEFAULT_SHELVES = ['to-read', 'reading', 'read'] as const;

export interface Shelf {
  id: string;
  userId: string;
  identifier: string;
  name: string;
  editable: boolean;
}

export interface ShelfBook {
  id: string;
  shelfId: string;
  bookId: string;
  userId: string;
  shelvedDate: string;
}

export type ReviewKind = 'review' | 'rating';

export interface Review {
  id: string;
  kind: ReviewKind;
  userId: string;
  bookId: string;
  name: string | null;
  content: string | null;
  rating: number | null;
  privacy: Privacy;
  publishedDate: string;
}

export interface ReadThrough {
  id: string;
  userId: string;
  bookId: string;
  startDate: string | null;
  finishDate: string | null;
}

// =============================================================================
// Collaborator Contracts
// =============================================================================

/**
 * Black-box book catalog. Returns null when nothing matches; throws on
 * infrastructure failures.
 */
export interface Catalog {
  resolveByIsbn(isbn13: string): Promise<Book | null>;
  searchOrCreate(title: string, author: string): Promise<Book | null>;
}

export interface TaskHandle {
  id: string | number;
}

export type TaskHandler = (payload: TaskPayload) => Promise<void>;

export interface TaskPayload {
  jobId: string;
  itemId?: string;
}

/**
 * Fire-and-forget task submission. The returned handle is recorded, never awaited.
 */
export interface TaskDispatcher {
  dispatch(handler: string, payload: TaskPayload): TaskHandle | Promise<TaskHandle>;
}

export interface BroadcastMetadata {
  software: string;
  priority: 'high' | 'medium' | 'low';
}

export interface Broadcaster {
  broadcast(record: Review, metadata: BroadcastMetadata): void | Promise<void>;
}
