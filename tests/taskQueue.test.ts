import { describe, it, expect, vi } from 'vitest';
import { LocalTaskQueue } from '../src/importer/taskQueue.js';
import type { TaskPayload } from '../src/types.js';

describe('LocalTaskQueue', () => {
  it('returns numbered handles and runs tasks later', async () => {
    const queue = new LocalTaskQueue(2);
    const handler = vi.fn(async (_payload: TaskPayload) => undefined);
    queue.register('work', handler);

    const first = queue.dispatch('work', { jobId: 'job-1', itemId: 'a' });
    const second = queue.dispatch('work', { jobId: 'job-1', itemId: 'b' });

    expect(first).toEqual({ id: 1 });
    expect(second).toEqual({ id: 2 });
    expect(handler).not.toHaveBeenCalled();
    expect(queue.size).toBe(2);

    await queue.drain();
    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler).toHaveBeenCalledWith({ jobId: 'job-1', itemId: 'a' });
  });

  it('waits for tasks dispatched while draining', async () => {
    const queue = new LocalTaskQueue(1);
    const done: string[] = [];
    queue.register('work', async payload => {
      await new Promise(resolve => setTimeout(resolve, 5));
      if (payload.itemId === 'first') {
        queue.dispatch('work', { jobId: payload.jobId, itemId: 'follow-up' });
      }
      done.push(payload.itemId ?? '');
    });

    queue.dispatch('work', { jobId: 'job-1', itemId: 'first' });
    await queue.drain();

    expect(done).toEqual(['first', 'follow-up']);
  });

  it('runs at most `concurrency` tasks at once', async () => {
    const queue = new LocalTaskQueue(2);
    let running = 0;
    let peak = 0;
    queue.register('work', async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise(resolve => setTimeout(resolve, 5));
      running--;
    });

    for (let i = 0; i < 6; i++) {
      queue.dispatch('work', { jobId: 'job-1', itemId: String(i) });
    }
    await queue.drain();

    expect(peak).toBe(2);
  });

  it('keeps going after a task fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const queue = new LocalTaskQueue(1);
    const done: string[] = [];
    queue.register('work', async payload => {
      if (payload.itemId === 'bad') throw new Error('boom');
      done.push(payload.itemId ?? '');
    });

    queue.dispatch('work', { jobId: 'job-1', itemId: 'bad' });
    queue.dispatch('work', { jobId: 'job-1', itemId: 'good' });
    await queue.drain();

    expect(done).toEqual(['good']);
    vi.restoreAllMocks();
  });

  it('refuses unknown task names', () => {
    const queue = new LocalTaskQueue();
    expect(() => queue.dispatch('missing', { jobId: 'job-1' })).toThrow('No task handler registered for "missing"');
  });

  it('drains immediately when idle', async () => {
    await expect(new LocalTaskQueue().drain()).resolves.toBeUndefined();
  });
});
