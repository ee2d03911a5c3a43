// ============================================
// Task Queue — bounded-concurrency worker pool for background work
// One item failing is logged and counted; the pool keeps going.
// ============================================

import { logger } from "../lib/logger.js";

export interface TaskQueueOptions<T> {
  /** Name used in log entries */
  name: string;
  concurrency: number;
  worker: (item: T) => Promise<void>;
  /** Short label for an item in failure logs */
  describe?: (item: T) => string;
}

export interface TaskQueueStats {
  processed: number;
  failed: number;
  pending: number;
  active: number;
}

export class TaskQueue<T> {
  private readonly pending: T[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private readonly concurrency: number;
  private active = 0;
  private processed = 0;
  private failed = 0;

  constructor(private readonly options: TaskQueueOptions<T>) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency));
  }

  enqueue(item: T): void {
    this.pending.push(item);
    this.pump();
  }

  enqueueAll(items: Iterable<T>): void {
    for (const item of items) {
      this.pending.push(item);
    }
    this.pump();
  }

  /** Resolves once nothing is pending or running */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  stats(): TaskQueueStats {
    return {
      processed: this.processed,
      failed: this.failed,
      pending: this.pending.length,
      active: this.active,
    };
  }

  private isIdle(): boolean {
    return this.active === 0 && this.pending.length === 0;
  }

  private pump(): void {
    while (this.active < this.concurrency && this.pending.length > 0) {
      const item = this.pending.shift();
      if (item === undefined) break;
      this.active++;
      void this.run(item);
    }

    if (this.isIdle()) {
      for (const resolve of this.idleWaiters.splice(0)) resolve();
    }
  }

  /** Never rejects */
  private async run(item: T): Promise<void> {
    try {
      await this.options.worker(item);
    } catch (err) {
      this.failed++;
      logger.error("Background task failed", {
        stage: "background",
        queue: this.options.name,
        item: this.options.describe?.(item),
        error: err,
      });
    } finally {
      this.processed++;
      this.active--;
      this.pump();
    }
  }
}
