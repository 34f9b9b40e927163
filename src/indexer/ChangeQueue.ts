import { WATCHER_CONSTANTS } from '../config/constants.js';
import { log } from '../utils/logger.js';
import { Mutex } from '../utils/mutex.js';

export interface ScheduledTask {
  cancel(): void;
}

export interface Scheduler {
  schedule(callback: () => void, delayMs: number): ScheduledTask;
}

export type Clock = () => number;

export const timerScheduler: Scheduler = {
  schedule(callback, delayMs) {
    const handle = setTimeout(callback, delayMs);
    return { cancel: () => clearTimeout(handle) };
  }
};

export interface PendingChange {
  projectPath: string;
  observedAt: number;
}

/**
 * Called once per drained entry, in insertion order
 */
export type ChangeHandler = (filePath: string, change: PendingChange) => Promise<void>;

export interface ChangeQueueOptions {
  onChange: ChangeHandler;
  debounceMs?: number;
  scheduler?: Scheduler;
  clock?: Clock;
}

/**
 * Pending writes keyed by absolute path, shared by every watched project, with a
 * single debounce timer.
 *
 * The map and the timer handle only change under the mutex. The mutex is never
 * held while the handler runs, so events keep arriving during a flush; they arm
 * a fresh timer that re-arms again if it fires while the flush is still running.
 */
export class ChangeQueue {
  private readonly pending = new Map<string, PendingChange>();
  private readonly mutex = new Mutex();
  private readonly flushingProjects = new Set<string>();
  private readonly flushingFiles = new Set<string>();
  private readonly debounceMs: number;
  private readonly scheduler: Scheduler;
  private readonly clock: Clock;
  private timer: ScheduledTask | null = null;
  private flushPromise: Promise<void> | null = null;

  constructor(private readonly options: ChangeQueueOptions) {
    this.debounceMs = Math.max(
      options.debounceMs ?? WATCHER_CONSTANTS.DEFAULT_DEBOUNCE_MS,
      WATCHER_CONSTANTS.MIN_DEBOUNCE_MS
    );
    this.scheduler = options.scheduler ?? timerScheduler;
    this.clock = options.clock ?? Date.now;
  }

  get delayMs(): number {
    return this.debounceMs;
  }

  /**
   * Record a write and restart the debounce timer
   */
  async enqueue(projectPath: string, filePath: string): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.pending.set(filePath, { projectPath, observedAt: this.clock() });
      this.arm();
    });
  }

  /**
   * Forget a single path, e.g. once it has been deleted
   */
  async discardFile(filePath: string): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const removed = this.pending.delete(filePath);
      if (this.pending.size === 0) this.disarm();
      return removed;
    });
  }

  /**
   * Drop every pending entry of one project; returns how many were dropped
   */
  async discardProject(projectPath: string): Promise<number> {
    return this.mutex.runExclusive(() => {
      let dropped = 0;
      for (const [filePath, change] of this.pending) {
        if (change.projectPath === projectPath) {
          this.pending.delete(filePath);
          dropped++;
        }
      }
      if (this.pending.size === 0) this.disarm();
      return dropped;
    });
  }

  /**
   * Drain now, including anything that arrives while draining
   */
  async flush(): Promise<void> {
    for (;;) {
      if (this.flushPromise) {
        await this.flushPromise;
        continue;
      }
      if (this.pending.size === 0) return;
      await this.startFlush();
    }
  }

  /**
   * Resolves once no flush is running
   */
  async whenIdle(): Promise<void> {
    while (this.flushPromise) {
      await this.flushPromise;
    }
  }

  /**
   * Resolves once no running flush holds `filePath`
   */
  async whenSettled(filePath: string): Promise<void> {
    while (this.flushPromise && this.flushingFiles.has(filePath)) {
      await this.flushPromise;
    }
  }

  /**
   * Cancel the timer; pending entries stay queued
   */
  cancel(): void {
    this.disarm();
  }

  hasPending(projectPath?: string): boolean {
    if (projectPath === undefined) return this.pending.size > 0;
    for (const change of this.pending.values()) {
      if (change.projectPath === projectPath) return true;
    }
    return false;
  }

  isFlushing(projectPath?: string): boolean {
    if (projectPath === undefined) return this.flushPromise !== null;
    return this.flushingProjects.has(projectPath);
  }

  get size(): number {
    return this.pending.size;
  }

  private arm(): void {
    this.timer?.cancel();
    this.timer = this.scheduler.schedule(() => this.onTimer(), this.debounceMs);
  }

  private disarm(): void {
    this.timer?.cancel();
    this.timer = null;
  }

  private onTimer(): void {
    this.trigger().catch(error => {
      log.error('Watch flush failed', error);
    });
  }

  /**
   * Timer path: a flush that is already running is waited for, then the timer is
   * armed again when entries are left.
   */
  private async trigger(): Promise<void> {
    if (this.flushPromise) {
      await this.flushPromise;
      await this.mutex.runExclusive(() => {
        if (this.pending.size > 0) this.arm();
      });
      return;
    }
    await this.startFlush();
  }

  private startFlush(): Promise<void> {
    const run = this.drain().finally(() => {
      this.flushPromise = null;
      this.flushingProjects.clear();
      this.flushingFiles.clear();
    });
    this.flushPromise = run;
    return run;
  }

  private async drain(): Promise<void> {
    const entries = await this.mutex.runExclusive(() => {
      this.timer?.cancel();
      this.timer = null;
      const drained = [...this.pending];
      this.pending.clear();
      return drained;
    });
    if (entries.length === 0) return;

    for (const [filePath, change] of entries) {
      this.flushingProjects.add(change.projectPath);
      this.flushingFiles.add(filePath);
    }
    log.debug('Flushing watched changes', { files: entries.length });

    for (const [filePath, change] of entries) {
      try {
        await this.options.onChange(filePath, change);
      } catch (error) {
        log.error('Watch update failed', error, {
          file: filePath,
          project: change.projectPath,
          waitedMs: this.clock() - change.observedAt
        });
      }
    }
  }
}
