import { config } from '../config.js';
import { LocalCatalog } from '../catalog/localCatalog.js';
import { getNormalizer } from '../normalizers/index.js';
import { openLibrarySource } from '../sources/openLibrary.js';
import { LogBroadcaster } from './broadcast.js';
import { Importer, IMPORT_ITEM_TASK } from './importer.js';
import { LocalTaskQueue } from './taskQueue.js';
import type { Broadcaster, Catalog } from '../types.js';

export { Importer, IMPORT_ITEM_TASK } from './importer.js';
export type { ImporterOptions, ItemOutcome } from './importer.js';
export { LocalTaskQueue } from './taskQueue.js';
export { LogBroadcaster } from './broadcast.js';
export { resolveBook, NO_MATCH_REASON } from './resolver.js';
export { applyImportedBook, mapShelf } from './sideEffects.js';

export interface ImportRuntime {
  importer: Importer;
  queue: LocalTaskQueue;
}

/**
 * Wire an importer for a source to the in-process task queue, the local
 * catalog (with Open Library fallback unless disabled) and the log broadcaster.
 */
export function createImportRuntime(
  source: string,
  overrides: { catalog?: Catalog; broadcaster?: Broadcaster } = {}
): ImportRuntime {
  const queue = new LocalTaskQueue(config.importer.concurrency);
  const importer = new Importer({
    normalizer: getNormalizer(source),
    catalog: overrides.catalog ?? new LocalCatalog({
      remote: config.catalog.remoteEnabled ? openLibrarySource : null,
    }),
    dispatcher: queue,
    broadcaster: overrides.broadcaster ?? new LogBroadcaster(),
  });
  queue.register(IMPORT_ITEM_TASK, payload => importer.handleTask(payload));
  return { importer, queue };
}
