/**
 * Task Store
 * In-memory CRUD and retention over task records.
 *
 * Every operation is synchronous and runs to completion on the event loop,
 * so check-then-insert in storeTask and the lookups in update/delete cannot
 * interleave with another caller. Records are copied in and out.
 */

import { TaskStoreError } from './errors.js';
import { getLogger } from './logger.js';
import { cloneTaskRecord, validateTaskRecord } from './task-record.js';
import type { Clock } from './states.js';
import { emptyStateCounts, type TaskRecord, type TaskState } from './types.js';

const log = getLogger({ module: 'TaskStore' });

const HOUR_MS = 60 * 60 * 1000;

export interface TaskStoreConfig {
  maxTaskAgeHours: number;
  cleanupEnabled: boolean;
  clock: Clock;
}

const DEFAULT_CONFIG: TaskStoreConfig = {
  maxTaskAgeHours: 24,
  cleanupEnabled: true,
  clock: () => new Date()
};

export interface StorageStats {
  totalTasks: number;
  statusCounts: Record<TaskState, number>;
  oldestTaskHours: number;
  newestTaskHours: number;
  averageAgeHours: number;
  cleanupEnabled: boolean;
  maxTaskAgeHours: number;
}

function roundHours(ms: number): number {
  return Math.round((ms / HOUR_MS) * 100) / 100;
}

export class TaskStore {
  private readonly tasks = new Map<string, TaskRecord>();
  private readonly config: TaskStoreConfig;

  constructor(config: Partial<TaskStoreConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get maxTaskAgeHours(): number {
    return this.config.maxTaskAgeHours;
  }

  get cleanupEnabled(): boolean {
    return this.config.cleanupEnabled;
  }

  /**
   * Insert a new record; ids are unique
   */
  storeTask(record: TaskRecord): void {
    if (!record.taskId || !record.taskId.trim()) {
      throw new TaskStoreError('Task ID cannot be empty');
    }
    if (this.tasks.has(record.taskId)) {
      throw new TaskStoreError(`Task ${record.taskId} already exists`, { taskId: record.taskId });
    }

    validateTaskRecord(record);
    this.tasks.set(record.taskId, cloneTaskRecord(record));
    log.debug({ taskId: record.taskId, status: record.status }, 'Task stored');
  }

  getTask(taskId: string): TaskRecord | undefined {
    if (!taskId) return undefined;
    const record = this.tasks.get(taskId);
    return record ? cloneTaskRecord(record) : undefined;
  }

  /**
   * Replace an existing record
   */
  updateTask(record: TaskRecord): void {
    if (!this.tasks.has(record.taskId)) {
      throw new TaskStoreError(`Task ${record.taskId} not found`, { taskId: record.taskId });
    }

    validateTaskRecord(record);
    this.tasks.set(record.taskId, cloneTaskRecord(record));
    log.debug({ taskId: record.taskId, status: record.status }, 'Task updated');
  }

  deleteTask(taskId: string): boolean {
    const deleted = this.tasks.delete(taskId);
    if (deleted) {
      log.debug({ taskId }, 'Task deleted');
    }
    return deleted;
  }

  getAllTasks(): TaskRecord[] {
    return [...this.tasks.values()].map(cloneTaskRecord);
  }

  getTasksByStatus(status: TaskState | readonly TaskState[]): TaskRecord[] {
    const wanted = new Set<TaskState>(typeof status === 'string' ? [status] : status);
    return this.getAllTasks().filter(task => wanted.has(task.status));
  }

  /**
   * Records created strictly after the given time
   */
  getTasksCreatedAfter(date: Date): TaskRecord[] {
    return this.getAllTasks().filter(task => task.createdAt.getTime() > date.getTime());
  }

  getTaskCount(status?: TaskState): number {
    if (status === undefined) return this.tasks.size;

    let count = 0;
    for (const task of this.tasks.values()) {
      if (task.status === status) count++;
    }
    return count;
  }

  taskExists(taskId: string): boolean {
    return this.tasks.has(taskId);
  }

  clearAllTasks(): number {
    const count = this.tasks.size;
    this.tasks.clear();
    log.info({ count }, 'All tasks cleared');
    return count;
  }

  /**
   * Remove records created at or before now - maxAgeHours
   */
  cleanupOldTasks(maxAgeHours = this.config.maxTaskAgeHours, statusFilter?: readonly TaskState[]): number {
    return this.removeExpiredTasks(maxAgeHours, statusFilter).length;
  }

  /**
   * cleanupOldTasks, returning the removed ids
   */
  removeExpiredTasks(maxAgeHours = this.config.maxTaskAgeHours, statusFilter?: readonly TaskState[]): string[] {
    const cutoff = this.config.clock().getTime() - maxAgeHours * HOUR_MS;
    const statuses = statusFilter ? new Set<TaskState>(statusFilter) : undefined;
    const removed: string[] = [];

    for (const [taskId, task] of this.tasks) {
      if (task.createdAt.getTime() > cutoff) continue;
      if (statuses && !statuses.has(task.status)) continue;

      this.tasks.delete(taskId);
      removed.push(taskId);
    }

    if (removed.length > 0) {
      log.info({ removed: removed.length, maxAgeHours, statusFilter }, 'Old tasks cleaned up');
    }
    return removed;
  }

  getStorageStats(): StorageStats {
    const now = this.config.clock().getTime();
    const statusCounts = emptyStateCounts();
    const ages: number[] = [];

    for (const task of this.tasks.values()) {
      statusCounts[task.status]++;
      ages.push(Math.max(0, now - task.createdAt.getTime()));
    }

    const total = ages.reduce((sum, age) => sum + age, 0);

    return {
      totalTasks: this.tasks.size,
      statusCounts,
      oldestTaskHours: ages.length > 0 ? roundHours(Math.max(...ages)) : 0,
      newestTaskHours: ages.length > 0 ? roundHours(Math.min(...ages)) : 0,
      averageAgeHours: ages.length > 0 ? roundHours(total / ages.length) : 0,
      cleanupEnabled: this.config.cleanupEnabled,
      maxTaskAgeHours: this.config.maxTaskAgeHours
    };
  }
}
