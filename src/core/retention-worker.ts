/**
 * Retention Worker
 * Periodically removes expired task records, and their state histories
 * when given the state manager; owned and started by the composition
 * root, stopped explicitly.
 */

import { errorMessage } from './errors.js';
import { getLogger } from './logger.js';
import type { TaskStateManager } from './states.js';
import type { TaskStore } from './task-store.js';
import type { TaskState } from './types.js';

const log = getLogger({ module: 'TaskRetentionWorker' });

export interface RetentionWorkerConfig {
  cleanupIntervalMs: number;
  maxTaskAgeHours?: number;
  statusFilter?: readonly TaskState[];
}

const DEFAULT_CONFIG: RetentionWorkerConfig = {
  cleanupIntervalMs: 60 * 60 * 1000
};

export class TaskRetentionWorker {
  private readonly store: TaskStore;
  private readonly stateManager?: TaskStateManager;
  private readonly config: RetentionWorkerConfig;
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private lastRemoved = 0;

  constructor(store: TaskStore, config: Partial<RetentionWorkerConfig> = {}, stateManager?: TaskStateManager) {
    this.store = store;
    this.stateManager = stateManager;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Start the cleanup schedule; the first run happens after one interval
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule();
    log.info({ intervalMs: this.config.cleanupIntervalMs }, 'Retention worker started');
  }

  /**
   * Stop the worker and release its timer
   */
  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /**
   * Run one cleanup pass immediately
   */
  runNow(): number {
    try {
      const removed = this.store.removeExpiredTasks(
        this.config.maxTaskAgeHours ?? this.store.maxTaskAgeHours,
        this.config.statusFilter
      );
      for (const taskId of removed) {
        this.stateManager?.removeTask(taskId);
      }
      this.lastRemoved = removed.length;
      return this.lastRemoved;
    } catch (error) {
      log.error({ err: error }, `Retention run failed: ${errorMessage(error)}`);
      return 0;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  getLastRemovedCount(): number {
    return this.lastRemoved;
  }

  private tick(): void {
    if (!this.running) return;
    this.runNow();
    this.schedule();
  }

  private schedule(): void {
    this.timer = setTimeout(() => this.tick(), this.config.cleanupIntervalMs);
    this.timer.unref();
  }
}

/**
 * Create a retention worker and start it when the store has cleanup enabled
 */
export function createRetentionWorker(
  store: TaskStore,
  config?: Partial<RetentionWorkerConfig>,
  stateManager?: TaskStateManager
): TaskRetentionWorker {
  const worker = new TaskRetentionWorker(store, config, stateManager);
  if (store.cleanupEnabled) {
    worker.start();
  }
  return worker;
}
