/**
 * Task Scheduler - single delayed-task queue for the dispatch engine
 *
 * All future work (pattern steps, node expiries, hold and turbo timers,
 * keep-alive) goes through one sorted queue with one armed timer.
 * Tasks carry an owner tag so a playback can be cancelled with one call.
 */

import { bridgeLogger } from '../core/bridgeLogger';

export type TaskId = number;

interface ScheduledTask {
  id: TaskId;
  /** Due time on the scheduler clock */
  at: number;
  owner: string;
  run: () => void;
}

export interface TaskSchedulerOptions {
  /** Clock (ms). Defaults to Date.now so fake timers drive it in tests. */
  now?: () => number;
}

export class TaskScheduler {
  /** Sorted by `at`, then by insertion */
  private queue: ScheduledTask[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;
  private armedAt: number = Infinity;
  private nextId: TaskId = 0;
  private disposed: boolean = false;
  private clock: () => number;

  constructor(options: TaskSchedulerOptions = {}) {
    this.clock = options.now ?? (() => Date.now());
  }

  now(): number {
    return this.clock();
  }

  /**
   * Schedule `run` after `delayMs` (negative delays count as 0)
   */
  schedule(delayMs: number, owner: string, run: () => void): TaskId {
    const task: ScheduledTask = {
      id: ++this.nextId,
      at: this.now() + Math.max(0, delayMs),
      owner,
      run,
    };

    if (this.disposed) {
      bridgeLogger.warn(`[TaskScheduler] Dropping task for ${owner}: scheduler disposed`);
      return task.id;
    }

    // Insert after every task due at the same time or earlier
    let lo = 0;
    let hi = this.queue.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.queue[mid].at <= task.at) lo = mid + 1;
      else hi = mid;
    }
    this.queue.splice(lo, 0, task);

    this.arm();
    return task.id;
  }

  /**
   * @returns true if the task was still pending
   */
  cancel(id: TaskId): boolean {
    const index = this.queue.findIndex((task) => task.id === id);
    if (index === -1) return false;

    this.queue.splice(index, 1);
    this.arm();
    return true;
  }

  /**
   * Cancel every pending task of an owner
   * @returns number of tasks removed
   */
  cancelOwner(owner: string): number {
    const before = this.queue.length;
    this.queue = this.queue.filter((task) => task.owner !== owner);
    const removed = before - this.queue.length;
    if (removed > 0) this.arm();
    return removed;
  }

  pendingCount(owner?: string): number {
    if (owner === undefined) return this.queue.length;
    return this.queue.filter((task) => task.owner === owner).length;
  }

  /**
   * Drop all tasks and stop the timer. Further schedules are ignored.
   */
  dispose(): void {
    this.disposed = true;
    this.queue = [];
    this.disarm();
  }

  private arm(): void {
    const head = this.queue[0];
    if (!head) {
      this.disarm();
      return;
    }
    if (this.timer !== null && this.armedAt === head.at) return;

    this.disarm();
    this.armedAt = head.at;
    this.timer = setTimeout(() => this.drain(), Math.max(0, head.at - this.now()));
  }

  private disarm(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.armedAt = Infinity;
  }

  private drain(): void {
    this.timer = null;
    this.armedAt = Infinity;

    const now = this.now();
    while (this.queue.length > 0 && this.queue[0].at <= now) {
      const task = this.queue.shift();
      if (!task) break;
      try {
        task.run();
      } catch (err) {
        console.error(`[TaskScheduler] Task for ${task.owner} threw:`, err);
      }
      if (this.disposed) return;
    }

    this.arm();
  }
}
