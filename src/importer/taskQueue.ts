/**
 * In-process task queue
 *
 * Fire-and-forget dispatch with numbered handles. Tasks start after the
 * dispatch call returns, at most `concurrency` at a time; a failing task is
 * logged and does not affect the others.
 */

import pLimit, { type LimitFunction } from 'p-limit';
import type { TaskDispatcher, TaskHandle, TaskHandler, TaskPayload } from '../types.js';

export class LocalTaskQueue implements TaskDispatcher {
  private nextId = 1;
  private readonly limit: LimitFunction;
  private readonly handlers = new Map<string, TaskHandler>();
  private readonly inFlight = new Set<Promise<void>>();

  constructor(concurrency = 4) {
    this.limit = pLimit(concurrency);
  }

  register(name: string, handler: TaskHandler): void {
    this.handlers.set(name, handler);
  }

  dispatch(name: string, payload: TaskPayload): TaskHandle {
    const handler = this.handlers.get(name);
    if (!handler) {
      throw new Error(`No task handler registered for "${name}"`);
    }

    const id = this.nextId++;
    const task = this.limit(() => this.run(id, name, handler, payload));
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
    return { id };
  }

  /** Tasks queued or running */
  get size(): number {
    return this.limit.activeCount + this.limit.pendingCount;
  }

  /**
   * Resolves once every dispatched task has finished, including tasks
   * dispatched while draining
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private async run(id: number, name: string, handler: TaskHandler, payload: TaskPayload): Promise<void> {
    try {
      await handler(payload);
    } catch (error) {
      console.error(`[TaskQueue] Task ${id} (${name}) failed:`, error);
    }
  }
}
