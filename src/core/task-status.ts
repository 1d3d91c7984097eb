/**
 * Task Status Reporting
 * Formats store records (plus optional state history and progress) into
 * status responses, with querying, pagination and duration metrics.
 */

import { z } from 'zod';
import { TaskStatusError, ValidationError } from './errors.js';
import { getLogger } from './logger.js';
import type { TaskStateManager } from './states.js';
import type { TaskStore } from './task-store.js';
import { TASK_STATES, TaskStateSchema, type StateTransitionJSON, type TaskRecord, type TaskState } from './types.js';

const log = getLogger({ module: 'TaskStatusManager' });

// ============================================================
// Query
// ============================================================

export const TaskStatusQuerySchema = z
  .object({
    statusFilter: z.array(TaskStateSchema).optional(),
    createdAfter: z.date().optional(),
    createdBefore: z.date().optional(),
    limit: z.number().int().nonnegative('Limit must be non-negative').optional(),
    offset: z.number().int().nonnegative('Offset must be non-negative').default(0)
  })
  .refine(
    query =>
      query.createdAfter === undefined ||
      query.createdBefore === undefined ||
      query.createdAfter.getTime() < query.createdBefore.getTime(),
    { message: 'createdAfter must be before createdBefore', path: ['createdAfter'] }
  );
export type TaskStatusQueryInput = z.input<typeof TaskStatusQuerySchema>;

export class TaskStatusQuery {
  readonly statusFilter?: readonly TaskState[];
  readonly createdAfter?: Date;
  readonly createdBefore?: Date;
  readonly limit?: number;
  readonly offset: number;

  constructor(input: TaskStatusQueryInput = {}) {
    const parsed = TaskStatusQuerySchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(issue?.message ?? 'Invalid task status query', {
        fieldName: issue?.path.join('.'),
        validationRule: issue?.code
      });
    }

    this.statusFilter = parsed.data.statusFilter;
    this.createdAfter = parsed.data.createdAfter;
    this.createdBefore = parsed.data.createdBefore;
    this.limit = parsed.data.limit;
    this.offset = parsed.data.offset;
  }

  /**
   * Half-open range: createdAfter inclusive, createdBefore exclusive
   */
  matches(task: TaskRecord): boolean {
    if (this.statusFilter && this.statusFilter.length > 0 && !this.statusFilter.includes(task.status)) {
      return false;
    }
    const created = task.createdAt.getTime();
    if (this.createdAfter && created < this.createdAfter.getTime()) return false;
    if (this.createdBefore && created >= this.createdBefore.getTime()) return false;
    return true;
  }
}

// ============================================================
// Response
// ============================================================

interface StatusExtras {
  history?: StateTransitionJSON[];
  progress?: Record<string, unknown>;
}

export type TaskStatusDict =
  | ({ status: 'completed'; results: Record<string, unknown> } & StatusExtras)
  | ({ status: 'failed'; error: string; failed_platform: string | null } & StatusExtras)
  | ({ status: 'in_progress'; message: string | null } & StatusExtras)
  | ({ status: 'pending' | 'cancelled' } & StatusExtras);

export class TaskStatusResponse {
  readonly taskId: string;
  readonly status: TaskState;
  readonly message?: string;
  readonly error?: string;
  readonly failedPlatform?: string;
  readonly results: Record<string, unknown>;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  history?: StateTransitionJSON[];
  progress?: Record<string, unknown>;

  constructor(record: TaskRecord) {
    this.taskId = record.taskId;
    this.status = record.status;
    this.message = record.message;
    this.error = record.error;
    this.failedPlatform = record.failedPlatform;
    this.results = record.results;
    this.createdAt = record.createdAt;
    this.updatedAt = record.updatedAt;
  }

  /**
   * Status-dependent key set; history/progress only when attached
   */
  toDict(): TaskStatusDict {
    const extras: StatusExtras = {};
    if (this.history !== undefined) extras.history = this.history;
    if (this.progress !== undefined) extras.progress = this.progress;

    const status = this.status;
    switch (status) {
      case 'completed':
        return { status: 'completed', results: this.results, ...extras };
      case 'failed':
        return {
          status: 'failed',
          error: this.error ?? '',
          failed_platform: this.failedPlatform ?? null,
          ...extras
        };
      case 'in_progress':
        return { status: 'in_progress', message: this.message ?? null, ...extras };
      default:
        return { status, ...extras };
    }
  }

  toJSON(): TaskStatusDict {
    return this.toDict();
  }
}

// ============================================================
// Manager
// ============================================================

export interface TaskStatusConfig {
  defaultIncludeHistory: boolean;
  defaultIncludeProgress: boolean;
  maxQueryLimit: number;
}

const DEFAULT_CONFIG: TaskStatusConfig = {
  defaultIncludeHistory: false,
  defaultIncludeProgress: false,
  maxQueryLimit: 1000
};

export interface StatusOptions {
  includeHistory?: boolean;
  includeProgress?: boolean;
}

export interface TaskPerformanceMetrics {
  taskId: string;
  status: TaskState;
  /** Seconds between creation and last update */
  totalDuration: number;
  createdAt: string;
  updatedAt: string;
  /** Seconds per state */
  stateDurations: Partial<Record<TaskState, number>>;
}

export interface AggregatedPerformanceMetrics {
  totalTasks: number;
  averageDuration: number;
  statusBreakdown: Partial<Record<TaskState, number>>;
  averageDurationByStatus: Partial<Record<TaskState, number>>;
  generatedAt: string;
}

function durationSeconds(task: TaskRecord): number {
  return (task.updatedAt.getTime() - task.createdAt.getTime()) / 1000;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class TaskStatusManager {
  private readonly taskStore: TaskStore;
  private readonly stateManager: TaskStateManager;
  private readonly config: TaskStatusConfig;

  constructor(taskStore: TaskStore, stateManager: TaskStateManager, config: Partial<TaskStatusConfig> = {}) {
    this.taskStore = taskStore;
    this.stateManager = stateManager;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  getTaskStatus(
    taskId: string,
    includeHistory = this.config.defaultIncludeHistory,
    includeProgress = this.config.defaultIncludeProgress
  ): TaskStatusResponse {
    if (!taskId || !taskId.trim()) {
      throw new TaskStatusError('Task ID cannot be empty');
    }

    const task = this.taskStore.getTask(taskId);
    if (!task) {
      throw new TaskStatusError('Task not found', taskId);
    }

    return this.formatResponse(task, { includeHistory, includeProgress });
  }

  /**
   * Statuses for several ids; missing ones are skipped unless skipMissing is false
   */
  getMultipleTaskStatuses(
    taskIds: readonly string[],
    options: StatusOptions & { skipMissing?: boolean } = {}
  ): TaskStatusResponse[] {
    const skipMissing = options.skipMissing ?? true;
    const responses: TaskStatusResponse[] = [];
    const missing: string[] = [];

    for (const taskId of taskIds) {
      try {
        responses.push(this.getTaskStatus(taskId, options.includeHistory, options.includeProgress));
      } catch (error) {
        if (!(error instanceof TaskStatusError) || !skipMissing) {
          throw error;
        }
        missing.push(taskId);
      }
    }

    if (missing.length > 0) {
      log.debug({ missing }, 'Skipped missing tasks');
    }
    return responses;
  }

  /**
   * Filter, sort newest first, then paginate
   */
  queryTaskStatuses(query: TaskStatusQuery, options: StatusOptions = {}): TaskStatusResponse[] {
    const limit = Math.min(query.limit ?? this.config.maxQueryLimit, this.config.maxQueryLimit);

    const tasks = this.taskStore
      .getAllTasks()
      .filter(task => query.matches(task))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(query.offset, query.offset + limit);

    return tasks.map(task =>
      this.formatResponse(task, {
        includeHistory: options.includeHistory ?? this.config.defaultIncludeHistory,
        includeProgress: options.includeProgress ?? this.config.defaultIncludeProgress
      })
    );
  }

  getTaskPerformanceMetrics(taskId: string): TaskPerformanceMetrics {
    const task = this.taskStore.getTask(taskId);
    if (!task) {
      throw new TaskStatusError('Task not found', taskId);
    }

    const stateDurations: Partial<Record<TaskState, number>> = {};
    if (this.stateManager.hasTask(taskId)) {
      const durations = this.stateManager.getStateDurations(taskId);
      for (const state of TASK_STATES) {
        const ms = durations[state];
        if (ms !== undefined) stateDurations[state] = ms / 1000;
      }
    } else {
      log.warn({ taskId }, 'No state history for task metrics');
    }

    return {
      taskId,
      status: task.status,
      totalDuration: durationSeconds(task),
      createdAt: task.createdAt.toISOString(),
      updatedAt: task.updatedAt.toISOString(),
      stateDurations
    };
  }

  getAggregatedPerformanceMetrics(): AggregatedPerformanceMetrics {
    const tasks = this.taskStore.getAllTasks();
    const statusBreakdown: Partial<Record<TaskState, number>> = {};
    const durationTotals: Partial<Record<TaskState, number>> = {};
    let totalDuration = 0;

    for (const task of tasks) {
      const duration = durationSeconds(task);
      totalDuration += duration;
      statusBreakdown[task.status] = (statusBreakdown[task.status] ?? 0) + 1;
      durationTotals[task.status] = (durationTotals[task.status] ?? 0) + duration;
    }

    const averageDurationByStatus: Partial<Record<TaskState, number>> = {};
    for (const state of TASK_STATES) {
      const count = statusBreakdown[state];
      const total = durationTotals[state];
      if (count && total !== undefined) {
        averageDurationByStatus[state] = total / count;
      }
    }

    return {
      totalTasks: tasks.length,
      averageDuration: tasks.length > 0 ? totalDuration / tasks.length : 0,
      statusBreakdown,
      averageDurationByStatus,
      generatedAt: new Date().toISOString()
    };
  }

  private formatResponse(task: TaskRecord, options: Required<StatusOptions>): TaskStatusResponse {
    const response = new TaskStatusResponse(task);

    if (options.includeHistory) {
      const history = this.stateManager.getTaskHistory(task.taskId);
      if (history && history.length > 0) {
        response.history = history.toJSON();
      } else {
        log.warn({ taskId: task.taskId }, 'No state history for task');
      }
    }

    if (options.includeProgress) {
      const progress = task.results.progress;
      if (isRecord(progress)) {
        response.progress = progress;
      }
    }

    return response;
  }
}
