import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { Book, Catalog, TaskDispatcher, Broadcaster } from '../src/types.js';
import { vi } from 'vitest';

export function fixture(name: string): Buffer {
  return readFileSync(fileURLToPath(new URL(`./data/${name}`, import.meta.url)));
}

export function fakeCatalog(book: Book | null) {
  const catalog = {
    resolveByIsbn: vi.fn(async (_isbn13: string): Promise<Book | null> => book),
    searchOrCreate: vi.fn(async (_title: string, _author: string): Promise<Book | null> => book),
  };
  return catalog satisfies Catalog;
}

export function fakeDispatcher(ids: Array<string | number> = [7]) {
  let call = 0;
  const dispatcher = {
    dispatch: vi.fn((_handler: string, _payload: { jobId: string; itemId?: string }) => ({
      id: ids[Math.min(call++, ids.length - 1)] ?? 0,
    })),
  };
  return dispatcher satisfies TaskDispatcher;
}

export function fakeBroadcaster() {
  const broadcaster = {
    broadcast: vi.fn(),
  };
  return broadcaster satisfies Broadcaster;
}
