/**
 * Import Pipeline
 *
 * Creates jobs from export rows, dispatches one task per item, and turns
 * failed items into retry jobs. Each item task resolves its book, then
 * applies the library side effects; whatever goes wrong ends up on the item.
 */

import pLimit from 'p-limit';
import { config } from '../config.js';
import {
  getItem,
  getItems,
  getJob,
  insertJobWithItems,
  recordItemBook,
  recordItemFailure,
  setJobTaskId,
  getProgress,
  type NewItem,
  type NewJob,
} from '../database/jobs.js';
import { getBook } from '../database/library.js';
import { ImportError, PersistenceError, ValidationError, errorMessage, type RowProblem } from '../errors.js';
import type { Normalizer } from '../normalizers/normalizer.js';
import { resolveBook } from './resolver.js';
import { applyImportedBook, type ApplyResult } from './sideEffects.js';
import {
  isPrivacy,
  type Broadcaster,
  type Catalog,
  type ImportItem,
  type ImportJob,
  type ImportProgress,
  type Privacy,
  type RawRow,
  type TaskDispatcher,
  type TaskPayload,
  type User,
} from '../types.js';

export const IMPORT_ITEM_TASK = 'import-item';

export interface ImporterOptions {
  normalizer: Normalizer;
  catalog: Catalog;
  dispatcher: TaskDispatcher;
  broadcaster: Broadcaster;
  concurrency?: number;
}

export type ItemOutcome =
  | { status: 'imported'; itemId: string; bookId: string; effects: ApplyResult }
  | { status: 'failed'; itemId: string; reason: string }
  | { status: 'skipped'; itemId: string; reason: string };

export class Importer {
  readonly normalizer: Normalizer;
  private readonly catalog: Catalog;
  private readonly dispatcher: TaskDispatcher;
  private readonly broadcaster: Broadcaster;
  private readonly concurrency: number;

  constructor(options: ImporterOptions) {
    this.normalizer = options.normalizer;
    this.catalog = options.catalog;
    this.dispatcher = options.dispatcher;
    this.broadcaster = options.broadcaster;
    const concurrency = options.concurrency ?? config.importer.concurrency;
    this.concurrency = Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : config.importer.concurrency;
  }

  get service(): string {
    return this.normalizer.name;
  }

  // ===========================================================================
  // Job creation
  // ===========================================================================

  /**
   * Normalize every row and persist the job with one item per row.
   * Any row missing a mandatory field rejects the whole file. A file with
   * no rows makes a job with no items.
   */
  createJob(user: User, rows: RawRow[], includeReviews: boolean, privacy: Privacy): ImportJob {
    assertPrivacy(privacy);

    const items: NewItem[] = [];
    const problems: RowProblem[] = [];

    rows.forEach((row, index) => {
      const data = this.normalizer.normalize(row);
      const missing = this.normalizer.missingFields(data);
      if (missing.length > 0) {
        problems.push({ row: index + 1, missing });
        return;
      }
      items.push({ data, rawData: row });
    });

    if (problems.length > 0) {
      const summary = problems
        .slice(0, 5)
        .map(p => `row ${p.row}: missing ${p.missing.join(', ')}`)
        .join('; ');
      const more = problems.length > 5 ? ` (and ${problems.length - 5} more)` : '';
      throw new ValidationError(`Import file has incomplete rows: ${summary}${more}`, problems);
    }

    const job = this.persistJob(
      { userId: user.id, source: this.service, includeReviews, privacy },
      items
    );
    console.log(`[Importer] Created job ${job.id} (${items.length} items from ${this.service})`);
    return job;
  }

  /**
   * Decode and parse an export file, then create its job
   */
  createJobFromFile(user: User, file: Buffer | Uint8Array | string, includeReviews: boolean, privacy: Privacy): ImportJob {
    return this.createJob(user, this.normalizer.readRows(file), includeReviews, privacy);
  }

  /**
   * New job holding copies of the given items, renumbered from 0 in the
   * order given. The original job and its items are untouched.
   */
  createRetryJob(user: User, originalJob: ImportJob, items: ImportItem[]): ImportJob {
    if (originalJob.userId !== user.id) {
      throw new ValidationError(`Import job ${originalJob.id} belongs to another user`);
    }
    const foreign = items.find(item => item.jobId !== originalJob.id);
    if (foreign) {
      throw new ValidationError(`Import item ${foreign.id} is not part of job ${originalJob.id}`);
    }

    const job = this.persistJob(
      {
        userId: user.id,
        source: originalJob.source,
        includeReviews: originalJob.includeReviews,
        privacy: originalJob.privacy,
        retry: true,
      },
      items.map(item => ({ data: item.data, rawData: item.rawData }))
    );
    console.log(`[Importer] Created retry job ${job.id} from ${originalJob.id} (${items.length} items)`);
    return job;
  }

  private persistJob(job: NewJob, items: NewItem[]): ImportJob {
    try {
      return insertJobWithItems(job, items);
    } catch (error) {
      throw new PersistenceError('Failed to create import job', error);
    }
  }

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  /**
   * Dispatch one task per item and record the latest task handle on the job.
   * Returns without waiting for any item to finish.
   */
  async startImport(job: ImportJob): Promise<ImportJob> {
    const items = getItems(job.id);
    let taskId = job.taskId;

    for (const item of items) {
      const handle = await this.dispatcher.dispatch(IMPORT_ITEM_TASK, { jobId: job.id, itemId: item.id });
      taskId = String(handle.id);
      setJobTaskId(job.id, taskId);
    }

    console.log(`[Importer] Dispatched ${items.length} items for job ${job.id} (task ${taskId ?? 'none'})`);
    return { ...job, taskId };
  }

  // ===========================================================================
  // Processing
  // ===========================================================================

  /**
   * Process a single item: resolve, then apply. Never throws; failures are
   * written to the item's fail_reason.
   */
  async importItem(itemId: string): Promise<ItemOutcome> {
    try {
      const item = getItem(itemId);
      if (!item) {
        throw new ImportError(`Import item ${itemId} not found`);
      }
      if (item.failReason) {
        return { status: 'skipped', itemId, reason: item.failReason };
      }

      const job = getJob(item.jobId);
      if (!job) {
        throw new ImportError(`Import job ${item.jobId} not found`);
      }

      let bookId = item.bookId;
      if (!bookId) {
        const resolution = await resolveBook(this.catalog, item.data);
        if (!resolution.ok) {
          recordItemFailure(itemId, resolution.error.message);
          console.log(`[Importer] Item ${item.index} of job ${job.id}: ${resolution.error.message}`);
          return { status: 'failed', itemId, reason: resolution.error.message };
        }
        bookId = resolution.book.id;
        recordItemBook(itemId, bookId);
      } else if (!getBook(bookId)) {
        throw new ImportError(`Book ${bookId} for import item ${itemId} no longer exists`);
      }

      const effects = await applyImportedBook(
        job.userId,
        { ...item, bookId },
        job.includeReviews,
        job.privacy,
        this.broadcaster
      );
      return { status: 'imported', itemId, bookId, effects };
    } catch (error) {
      const reason = `Error applying import: ${errorMessage(error)}`;
      console.error(`[Importer] Item ${itemId} failed:`, error);
      try {
        recordItemFailure(itemId, reason);
      } catch (recordError) {
        console.error(`[Importer] Could not record failure for item ${itemId}:`, recordError);
      }
      return { status: 'failed', itemId, reason };
    }
  }

  /**
   * Process every outstanding item of a job in this process, a few at a time
   */
  async importData(jobId: string): Promise<ImportProgress> {
    const job = getJob(jobId);
    if (!job) {
      throw new ImportError(`Import job ${jobId} not found`);
    }

    const limit = pLimit(this.concurrency);
    const outstanding = getItems(jobId).filter(item => !item.failReason);
    await Promise.all(outstanding.map(item => limit(() => this.importItem(item.id))));

    const progress = getProgress(jobId);
    console.log(
      `[Importer] Job ${jobId}: ${progress.resolved}/${progress.total} imported, ${progress.failed} failed`
    );
    return progress;
  }

  /**
   * Task handler for dispatched items
   */
  async handleTask(payload: TaskPayload): Promise<void> {
    if (payload.itemId) {
      await this.importItem(payload.itemId);
    } else {
      await this.importData(payload.jobId);
    }
  }
}

function assertPrivacy(privacy: unknown): asserts privacy is Privacy {
  if (!isPrivacy(privacy)) {
    throw new ValidationError(`Invalid privacy level "${String(privacy)}"`);
  }
}
