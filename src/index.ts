#!/usr/bin/env node
/**
 * ShelfPort - Library Import Pipeline
 * Imports book-cataloging exports into a user's library
 */

import { readFileSync, existsSync } from 'fs';
import { initDatabase, checkDatabaseHealth, closeDatabase } from './database/db.js';
import { createUser, findUserByUsername } from './database/library.js';
import { getFailedItems, getJob, getProgress, listJobs } from './database/jobs.js';
import { createImportRuntime } from './importer/index.js';
import { SOURCE_NAMES } from './normalizers/index.js';
import { openLibraryBreaker } from './circuitBreaker.js';
import { ImportError } from './errors.js';
import { config } from './config.js';
import { isPrivacy, PRIVACY_LEVELS, type Privacy, type User } from './types.js';

function flag(args: string[], name: string): string | undefined {
  return args.find(a => a.startsWith(`--${name}=`))?.split('=').slice(1).join('=');
}

function positional(args: string[]): string[] {
  return args.filter(a => !a.startsWith('--'));
}

function requireUser(args: string[], create = false): User {
  const username = flag(args, 'user');
  if (!username) {
    throw new ImportError('Missing --user=<username>');
  }
  const existing = findUserByUsername(username);
  if (existing) return existing;
  if (!create) {
    throw new ImportError(`Unknown user "${username}"`);
  }
  console.log(`[ShelfPort] Creating user ${username}`);
  return createUser(username);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0] || 'help';

  console.log('╔══════════════════════════════════════════════════════════════════╗');
  console.log('║                          SHELFPORT                               ║');
  console.log('║               Library Import Pipeline v0.1.0                     ║');
  console.log('╚══════════════════════════════════════════════════════════════════╝');
  console.log('');

  initDatabase();

  switch (command) {
    case 'import':
      // Usage: import <source> <file> --user=<name> [--privacy=public] [--no-reviews]
      await runImport(args.slice(1));
      break;

    case 'run':
      // Process a job in the foreground instead of through the task queue
      await runJob(args[1]);
      break;

    case 'status':
      showStatus(args[1]);
      break;

    case 'jobs':
      showJobs(args.slice(1));
      break;

    case 'retry':
      await runRetry(args.slice(1));
      break;

    case 'health':
      showHealth();
      break;

    default:
      showHelp();
  }

  closeDatabase();
}

async function runImport(args: string[]): Promise<void> {
  const [source, file] = positional(args);
  if (!source || !file) {
    showHelp();
    return;
  }
  if (!existsSync(file)) {
    throw new ImportError(`File not found: ${file}`);
  }

  const privacyArg = flag(args, 'privacy') ?? config.importer.defaultPrivacy;
  if (!isPrivacy(privacyArg)) {
    throw new ImportError(`--privacy must be one of: ${PRIVACY_LEVELS.join(', ')}`);
  }
  const privacy: Privacy = privacyArg;
  const includeReviews = !args.includes('--no-reviews');

  const user = requireUser(args, true);
  const { importer, queue } = createImportRuntime(source);

  const job = importer.createJobFromFile(user, readFileSync(file), includeReviews, privacy);
  await importer.startImport(job);
  await queue.drain();

  printProgress(job.id);
}

async function runJob(jobId: string | undefined): Promise<void> {
  const job = jobId ? getJob(jobId) : null;
  if (!job) {
    throw new ImportError(`Import job ${jobId ?? '(missing)'} not found`);
  }
  const { importer } = createImportRuntime(job.source);
  await importer.importData(job.id);
  printProgress(job.id);
}

async function runRetry(args: string[]): Promise<void> {
  const [jobId] = positional(args);
  const job = jobId ? getJob(jobId) : null;
  if (!job) {
    throw new ImportError(`Import job ${jobId ?? '(missing)'} not found`);
  }

  const failed = getFailedItems(job.id);
  if (failed.length === 0) {
    console.log(`Job ${job.id} has no failed items.`);
    return;
  }

  const user = requireUser(args);
  const { importer, queue } = createImportRuntime(job.source);
  const retry = importer.createRetryJob(user, job, failed);
  await importer.startImport(retry);
  await queue.drain();

  printProgress(retry.id);
}

function printProgress(jobId: string): void {
  const progress = getProgress(jobId);
  console.log('');
  console.log(`Job ${jobId}`);
  console.log(`  Imported: ${progress.resolved}/${progress.total}`);
  console.log(`  Failed:   ${progress.failed}`);
  console.log(`  Pending:  ${progress.pending}`);

  const failed = getFailedItems(jobId);
  for (const item of failed.slice(0, 20)) {
    console.log(`  #${item.index} "${item.data.title}" by ${item.data.authors}: ${item.failReason}`);
  }
  if (failed.length > 20) {
    console.log(`  ... and ${failed.length - 20} more`);
  }
  if (failed.length > 0) {
    console.log(`\nRetry with: shelfport retry ${jobId} --user=<username>`);
  }
}

function showStatus(jobId: string | undefined): void {
  const job = jobId ? getJob(jobId) : null;
  if (!job) {
    throw new ImportError(`Import job ${jobId ?? '(missing)'} not found`);
  }
  console.log(`Source:  ${job.source}${job.retry ? ' (retry)' : ''}`);
  console.log(`Created: ${job.createdAt}`);
  console.log(`Privacy: ${job.privacy}, reviews ${job.includeReviews ? 'included' : 'skipped'}`);
  console.log(`Task:    ${job.taskId ?? 'not dispatched'}`);
  printProgress(job.id);
}

function showJobs(args: string[]): void {
  const user = requireUser(args);
  const jobs = listJobs(user.id);
  if (jobs.length === 0) {
    console.log(`No imports for ${user.username}.`);
    return;
  }
  for (const job of jobs) {
    const progress = getProgress(job.id);
    console.log(
      `${job.id}  ${job.createdAt}  ${job.source.padEnd(12)} ` +
      `${progress.resolved}/${progress.total} imported, ${progress.failed} failed${job.retry ? '  (retry)' : ''}`
    );
  }
}

function showHealth(): void {
  const db = checkDatabaseHealth();
  console.log(`Database:    ${db.ok ? 'ok' : 'degraded'}`);
  for (const [key, value] of Object.entries(db.details)) {
    console.log(`  ${key}: ${String(value)}`);
  }
  const circuit = openLibraryBreaker.getStatus();
  console.log(`OpenLibrary: ${circuit.state} (${circuit.consecutiveFailures} consecutive failures)`);
}

function showHelp(): void {
  console.log('Usage:');
  console.log('  shelfport import <source> <file> --user=<name> [--privacy=<level>] [--no-reviews]');
  console.log('  shelfport run <jobId>');
  console.log('  shelfport status <jobId>');
  console.log('  shelfport jobs --user=<name>');
  console.log('  shelfport retry <jobId> --user=<name>');
  console.log('  shelfport health');
  console.log('');
  console.log(`Sources: ${SOURCE_NAMES.join(', ')}`);
  console.log(`Privacy: ${PRIVACY_LEVELS.join(', ')}`);
}

main().catch((error: unknown) => {
  console.error(`[ShelfPort] ${error instanceof Error ? error.message : String(error)}`);
  closeDatabase();
  process.exit(1);
});
