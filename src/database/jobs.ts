/**
 * Import Job Store
 * Durable jobs and their ordered items.
 */

import { randomUUID } from 'crypto';
import { getDb } from './db.js';
import type {
  CanonicalFields,
  ImportItem,
  ImportJob,
  ImportProgress,
  Privacy,
  RawRow,
} from '../types.js';

interface ImportJobRecord {
  id: string;
  user_id: string;
  source: string;
  include_reviews: number;
  privacy: Privacy;
  retry: number;
  task_id: string | null;
  created_at: string;
}

interface ImportItemRecord {
  id: string;
  job_id: string;
  index: number;
  data: string;
  raw_data: string | null;
  book_id: string | null;
  fail_reason: string | null;
  linked_review_id: string | null;
  resolved_at: string | null;
}

export interface NewJob {
  userId: string;
  source: string;
  includeReviews: boolean;
  privacy: Privacy;
  retry?: boolean;
}

export interface NewItem {
  data: CanonicalFields;
  rawData: RawRow | null;
}

function toJob(row: ImportJobRecord): ImportJob {
  return {
    id: row.id,
    userId: row.user_id,
    source: row.source,
    includeReviews: row.include_reviews === 1,
    privacy: row.privacy,
    retry: row.retry === 1,
    taskId: row.task_id,
    createdAt: row.created_at,
  };
}

function toItem(row: ImportItemRecord): ImportItem {
  return {
    id: row.id,
    jobId: row.job_id,
    index: row.index,
    data: JSON.parse(row.data) as CanonicalFields,
    rawData: row.raw_data ? JSON.parse(row.raw_data) as RawRow : null,
    bookId: row.book_id,
    failReason: row.fail_reason,
    linkedReviewId: row.linked_review_id,
    resolvedAt: row.resolved_at,
  };
}

/**
 * Insert a job and its items in one transaction. Item indexes follow the
 * order of `items`, starting at 0.
 */
export function insertJobWithItems(job: NewJob, items: NewItem[]): ImportJob {
  const db = getDb();
  const id = randomUUID();
  const createdAt = new Date().toISOString();

  const insertJob = db.prepare(`
    INSERT INTO import_job (id, user_id, source, include_reviews, privacy, retry, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);
  const insertItem = db.prepare(`
    INSERT INTO import_item (id, job_id, "index", data, raw_data) VALUES (?, ?, ?, ?, ?)
  `);

  db.transaction(() => {
    insertJob.run(id, job.userId, job.source, job.includeReviews ? 1 : 0, job.privacy, job.retry ? 1 : 0, createdAt);
    items.forEach((item, index) => {
      insertItem.run(
        randomUUID(),
        id,
        index,
        JSON.stringify(item.data),
        item.rawData ? JSON.stringify(item.rawData) : null
      );
    });
  })();

  return {
    id,
    userId: job.userId,
    source: job.source,
    includeReviews: job.includeReviews,
    privacy: job.privacy,
    retry: job.retry ?? false,
    taskId: null,
    createdAt,
  };
}

export function getJob(id: string): ImportJob | null {
  const row = getDb().prepare('SELECT * FROM import_job WHERE id = ?').get(id) as ImportJobRecord | undefined;
  return row ? toJob(row) : null;
}

export function listJobs(userId: string, limit = 20): ImportJob[] {
  const rows = getDb().prepare(
    'SELECT * FROM import_job WHERE user_id = ? ORDER BY created_at DESC LIMIT ?'
  ).all(userId, limit) as ImportJobRecord[];
  return rows.map(toJob);
}

/**
 * Record the most recent dispatch handle for a job
 */
export function setJobTaskId(jobId: string, taskId: string): void {
  getDb().prepare('UPDATE import_job SET task_id = ? WHERE id = ?').run(taskId, jobId);
}

export function getItems(jobId: string): ImportItem[] {
  const rows = getDb().prepare(
    'SELECT * FROM import_item WHERE job_id = ? ORDER BY "index" ASC'
  ).all(jobId) as ImportItemRecord[];
  return rows.map(toItem);
}

export function getItem(id: string): ImportItem | null {
  const row = getDb().prepare('SELECT * FROM import_item WHERE id = ?').get(id) as ImportItemRecord | undefined;
  return row ? toItem(row) : null;
}

export function getItemByIndex(jobId: string, index: number): ImportItem | null {
  const row = getDb().prepare(
    'SELECT * FROM import_item WHERE job_id = ? AND "index" = ?'
  ).get(jobId, index) as ImportItemRecord | undefined;
  return row ? toItem(row) : null;
}

export function getFailedItems(jobId: string): ImportItem[] {
  const rows = getDb().prepare(
    'SELECT * FROM import_item WHERE job_id = ? AND fail_reason IS NOT NULL ORDER BY "index" ASC'
  ).all(jobId) as ImportItemRecord[];
  return rows.map(toItem);
}

export function recordItemBook(itemId: string, bookId: string): void {
  getDb().prepare(`
    UPDATE import_item SET book_id = ?, fail_reason = NULL, resolved_at = ? WHERE id = ?
  `).run(bookId, new Date().toISOString(), itemId);
}

export function recordItemFailure(itemId: string, reason: string): void {
  getDb().prepare(`
    UPDATE import_item SET fail_reason = ?, resolved_at = COALESCE(resolved_at, ?) WHERE id = ?
  `).run(reason, new Date().toISOString(), itemId);
}

export function linkItemReview(itemId: string, reviewId: string): void {
  getDb().prepare('UPDATE import_item SET linked_review_id = ? WHERE id = ?').run(reviewId, itemId);
}

export function getProgress(jobId: string): ImportProgress {
  const row = getDb().prepare(`
    SELECT
      COUNT(*) AS total,
      SUM(CASE WHEN fail_reason IS NOT NULL THEN 1 ELSE 0 END) AS failed,
      SUM(CASE WHEN fail_reason IS NULL AND book_id IS NOT NULL THEN 1 ELSE 0 END) AS resolved
    FROM import_item WHERE job_id = ?
  `).get(jobId) as { total: number; failed: number | null; resolved: number | null };

  const failed = row.failed ?? 0;
  const resolved = row.resolved ?? 0;
  const pending = row.total - failed - resolved;

  return {
    total: row.total,
    resolved,
    failed,
    pending,
    complete: pending === 0,
  };
}
