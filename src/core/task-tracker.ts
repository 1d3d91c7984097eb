/**
 * Task Tracker
 * Single entry point that keeps the task store and the state machine in
 * lockstep for every task id, plus a repair pass for when they drift.
 */

import { InvalidStateError, PublishingError, TaskError, errorMessage } from './errors.js';
import type { ResilientExecutor } from './executor.js';
import { getLogger } from './logger.js';
import type { StateHistory, TaskStateManager } from './states.js';
import { TaskIdGenerator } from './task-id.js';
import { addPlatformResult, applyTaskStatus, createTaskRecord } from './task-record.js';
import type { TaskStore } from './task-store.js';
import type { ProgressCallback, TaskRecord, TaskState } from './types.js';

const log = getLogger({ module: 'TaskTracker' });

export const RECONCILED_ERROR_MESSAGE = 'State reconciled without error detail';
export const UNKNOWN_PLATFORM = 'unknown';

/**
 * Non-empty error text for a failed record
 */
function failureDetail(error: unknown): string {
  const message = errorMessage(error).trim();
  if (message) return message;
  return (error instanceof Error && error.name) || 'Unknown error';
}

export interface ReconcileReport {
  initialized: number;
  repaired: number;
  orphansRemoved: number;
}

export interface TaskTrackerOptions {
  idGenerator?: TaskIdGenerator;
  clock?: () => Date;
}

export class TaskTracker {
  private readonly store: TaskStore;
  private readonly states: TaskStateManager;
  private readonly idGenerator: TaskIdGenerator;
  private readonly clock: () => Date;

  constructor(store: TaskStore, states: TaskStateManager, options: TaskTrackerOptions = {}) {
    this.store = store;
    this.states = states;
    this.idGenerator = options.idGenerator ?? new TaskIdGenerator();
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Create the record and its history together; nothing is kept if either side rejects
   */
  createTask(taskId?: string, initialState: TaskState = 'pending', taskType?: string): TaskRecord {
    const id = taskId ?? this.idGenerator.generate(taskType);
    const now = this.clock();
    const record = createTaskRecord({ taskId: id, status: initialState, createdAt: now, updatedAt: now });

    this.store.storeTask(record);
    try {
      this.states.initializeTask(id, initialState);
    } catch (error) {
      this.store.deleteTask(id);
      throw error;
    }

    return record;
  }

  startTask(taskId: string, message?: string): TaskRecord {
    return this.moveTo(taskId, 'in_progress', message);
  }

  /**
   * Store progress under results.progress and narrate it in the message
   */
  recordProgress(taskId: string, progress: object, message?: string): TaskRecord {
    const record = this.require(taskId);
    const next = addPlatformResult(record, 'progress', { ...progress }, this.clock());
    if (message !== undefined) next.message = message;
    this.store.updateTask(next);
    return next;
  }

  completeTask(taskId: string, results: Record<string, unknown> = {}, message?: string): TaskRecord {
    const record = this.require(taskId);
    const withResults: TaskRecord = { ...record, results: { ...record.results, ...results } };
    return this.moveTo(taskId, 'completed', message, withResults);
  }

  /**
   * The record gets its error and platform before the state machine moves to failed
   */
  failTask(taskId: string, error: string, failedPlatform: string): TaskRecord {
    const record = this.require(taskId);
    const withError: TaskRecord = { ...record, error, failedPlatform };
    return this.moveTo(taskId, 'failed', undefined, withError);
  }

  cancelTask(taskId: string, message?: string): TaskRecord {
    return this.moveTo(taskId, 'cancelled', message);
  }

  rollbackTask(taskId: string, targetState: TaskState, message?: string): TaskRecord {
    const record = this.require(taskId);
    const transition = this.states.rollbackTask(taskId, targetState, message);

    const next: TaskRecord = {
      ...record,
      status: targetState,
      message: transition.message,
      error: targetState === 'failed' ? record.error ?? RECONCILED_ERROR_MESSAGE : undefined,
      failedPlatform: targetState === 'failed' ? record.failedPlatform ?? UNKNOWN_PLATFORM : undefined,
      updatedAt: this.laterOf(record.updatedAt)
    };
    this.store.updateTask(next);
    return next;
  }

  removeTask(taskId: string): boolean {
    const fromStore = this.store.deleteTask(taskId);
    const fromStates = this.states.removeTask(taskId);
    return fromStore || fromStates;
  }

  getTask(taskId: string): TaskRecord | undefined {
    return this.store.getTask(taskId);
  }

  getHistory(taskId: string): StateHistory | undefined {
    return this.states.getTaskHistory(taskId);
  }

  /**
   * Drive one executor run through the task lifecycle; errors are recorded and rethrown
   */
  async runTask<TMetadata, TResult, TProgress>(
    taskId: string,
    executor: ResilientExecutor<TMetadata, TResult, TProgress>,
    content: string,
    metadata: TMetadata,
    onProgress?: ProgressCallback<TProgress>
  ): Promise<TResult> {
    const platform = executor.platformName;
    this.startTask(taskId, `Running on ${platform}`);

    let result: TResult;
    try {
      result = await executor.run(content, metadata, onProgress);
    } catch (error) {
      const failedPlatform = error instanceof PublishingError && error.platform ? error.platform : platform;
      this.failTask(taskId, failureDetail(error), failedPlatform);
      throw error;
    }

    this.completeTask(taskId, { [platform]: result }, `Completed on ${platform}`);
    return result;
  }

  /**
   * Bring store and state machine back into agreement; the history wins
   */
  reconcile(): ReconcileReport {
    const report: ReconcileReport = { initialized: 0, repaired: 0, orphansRemoved: 0 };
    const storedIds = new Set<string>();

    for (const record of this.store.getAllTasks()) {
      storedIds.add(record.taskId);
      const current = this.states.getCurrentState(record.taskId);

      if (current === undefined) {
        this.states.initializeTask(record.taskId, record.status);
        report.initialized++;
        continue;
      }

      if (current !== record.status) {
        this.store.updateTask({
          ...record,
          status: current,
          error: current === 'failed' ? record.error || RECONCILED_ERROR_MESSAGE : record.error,
          failedPlatform: current === 'failed' ? record.failedPlatform || UNKNOWN_PLATFORM : record.failedPlatform,
          updatedAt: this.laterOf(record.updatedAt)
        });
        report.repaired++;
      }
    }

    for (const taskId of this.states.getTaskIds()) {
      if (!storedIds.has(taskId)) {
        this.states.removeTask(taskId);
        report.orphansRemoved++;
      }
    }

    if (report.initialized + report.repaired + report.orphansRemoved > 0) {
      log.warn(report, 'Task store and state machine reconciled');
    }
    return report;
  }

  private moveTo(taskId: string, to: TaskState, message?: string, base?: TaskRecord): TaskRecord {
    const record = base ?? this.require(taskId);
    const from = this.states.getCurrentState(taskId);
    if (from === undefined) {
      throw new InvalidStateError(`Task ${taskId} has no state history`, { taskId });
    }

    // Validate against the graph before touching either side
    const next = applyTaskStatus({ ...record, status: from }, to, message, this.clock());
    this.store.updateTask(next);
    this.states.transitionState(taskId, to, message);
    return next;
  }

  private require(taskId: string): TaskRecord {
    const record = this.store.getTask(taskId);
    if (!record) {
      throw new TaskError(`Task ${taskId} not found`, { taskId });
    }
    return record;
  }

  private laterOf(updatedAt: Date): Date {
    const now = this.clock();
    return now.getTime() < updatedAt.getTime() ? updatedAt : now;
  }
}
