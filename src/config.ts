/**
 * ShelfPort Configuration
 * Bulk library import pipeline
 */

/**
 * Positive integer from an env var, or the fallback when unset or unusable
 */
export function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const config = {
  // Database
  database: {
    path: process.env.SHELFPORT_DB_PATH || './data/shelfport.db',
  },

  // Identifies this platform on broadcast records
  software: 'shelfport',

  // Import pipeline
  importer: {
    defaultSource: process.env.SHELFPORT_DEFAULT_SOURCE || 'goodreads',
    concurrency: positiveInt(process.env.SHELFPORT_IMPORT_CONCURRENCY, 4),
    defaultPrivacy: 'public',
  },

  // Book resolution
  catalog: {
    minConfidence: 0.75,   // title+author matches below this are treated as "not found"
    remoteEnabled: process.env.SHELFPORT_REMOTE_CATALOG !== 'false',
  },

  // Rate limiting (requests per second)
  rateLimit: {
    openLibrary: 5,
  },

  // Open Library
  openLibrary: {
    baseUrl: process.env.SHELFPORT_OPENLIBRARY_URL || 'https://openlibrary.org',
    timeout: 10000,
    searchLimit: 5,
  },
};

export type Config = typeof config;
