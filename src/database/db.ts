/**
 * ShelfPort Database Connection
 * SQLite database for import jobs and the user library
 */

import Database from 'better-sqlite3';
import { readFileSync, mkdirSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { config } from '../config.js';
import { registerCleanup } from '../utils/resilience.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

let db: Database.Database | null = null;
let dbPath = config.database.path;

/**
 * Initialize database connection and schema.
 * Pass ':memory:' for a throwaway database.
 */
export function initDatabase(path: string = config.database.path): Database.Database {
  if (db) return db;

  try {
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }
    db = new Database(path);
    dbPath = path;
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000'); // Wait up to 5s if another process holds the write lock

    const schema = readFileSync(join(__dirname, 'schema.sql'), 'utf-8');
    db.exec(schema);

    runMigrations(db);

    if (path !== ':memory:') {
      registerCleanup(() => closeDatabase());
      console.log(`[ShelfPort] Database initialized at ${path}`);
    }
    return db;
  } catch (error) {
    console.error(`[ShelfPort] FATAL: Failed to initialize database at ${path}:`, error);
    db = null;
    throw error;
  }
}

/**
 * Get database instance
 */
export function getDb(): Database.Database {
  if (!db) {
    return initDatabase();
  }
  return db;
}

/**
 * Close database connection
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Run fn inside a BEGIN IMMEDIATE transaction so that reads and the writes
 * depending on them hold the write lock together.
 */
export function immediate<T>(fn: () => T): T {
  return getDb().transaction(fn).immediate();
}

/**
 * Schema migrations for databases created by earlier versions.
 * Each migration checks if it's needed before applying.
 */
function runMigrations(db: Database.Database): void {
  const itemColumns = db.prepare('PRAGMA table_info(import_item)').all() as Array<{ name: string }>;

  if (!itemColumns.some(c => c.name === 'linked_review_id')) {
    console.log('[ShelfPort] Running migration: adding import_item.linked_review_id');
    db.exec('ALTER TABLE import_item ADD COLUMN linked_review_id TEXT REFERENCES review(id)');
  }

  if (!itemColumns.some(c => c.name === 'raw_data')) {
    console.log('[ShelfPort] Running migration: adding import_item.raw_data');
    db.exec('ALTER TABLE import_item ADD COLUMN raw_data TEXT');
  }

  const jobColumns = db.prepare('PRAGMA table_info(import_job)').all() as Array<{ name: string }>;

  if (!jobColumns.some(c => c.name === 'retry')) {
    console.log('[ShelfPort] Running migration: adding import_job.retry');
    db.exec('ALTER TABLE import_job ADD COLUMN retry INTEGER NOT NULL DEFAULT 0');
  }
}

/**
 * Database health for the `health` command
 */
export function checkDatabaseHealth(): { ok: boolean; details: Record<string, unknown> } {
  try {
    const instance = getDb();
    const jobs = instance.prepare('SELECT COUNT(*) as count FROM import_job').get() as { count: number };
    const items = instance.prepare('SELECT COUNT(*) as count FROM import_item').get() as { count: number };
    const walMode = (instance.pragma('journal_mode') as Array<{ journal_mode: string }>)[0]?.journal_mode;
    return {
      ok: true,
      details: {
        jobCount: jobs.count,
        itemCount: items.count,
        journalMode: walMode,
        path: dbPath,
      },
    };
  } catch (error) {
    return {
      ok: false,
      details: {
        error: error instanceof Error ? error.message : String(error),
        path: dbPath,
      },
    };
  }
}
