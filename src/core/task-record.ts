/**
 * Task Record helpers
 * Construction, validation, status updates and the snake_case wire form.
 */

import { StateTransitionError, ValidationError } from './errors.js';
import { canTransition } from './states.js';
import {
  TaskRecordJSONSchema,
  TaskRecordSchema,
  type TaskRecord,
  type TaskRecordJSON,
  type TaskState
} from './types.js';

export interface CreateTaskRecordInput {
  taskId: string;
  status?: TaskState;
  message?: string;
  error?: string;
  failedPlatform?: string;
  results?: Record<string, unknown>;
  createdAt?: Date;
  updatedAt?: Date;
}

export function createTaskRecord(input: CreateTaskRecordInput): TaskRecord {
  const now = new Date();
  const createdAt = input.createdAt ?? now;
  const record: TaskRecord = {
    taskId: input.taskId,
    status: input.status ?? 'pending',
    message: input.message,
    error: input.error,
    failedPlatform: input.failedPlatform,
    results: { ...(input.results ?? {}) },
    createdAt,
    updatedAt: input.updatedAt ?? createdAt
  };
  validateTaskRecord(record);
  return record;
}

/**
 * Enforce the record invariants: a non-empty id and an error on every failure
 */
export function validateTaskRecord(record: TaskRecord): void {
  const parsed = TaskRecordSchema.safeParse(record);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue?.message ?? 'Invalid task record', {
      fieldName: issue?.path.join('.'),
      validationRule: issue?.code
    });
  }

  if (record.status === 'failed' && !record.error) {
    throw new ValidationError('Failed tasks must have an error message', {
      fieldName: 'error',
      validationRule: 'required_when_failed'
    });
  }

  if (record.updatedAt.getTime() < record.createdAt.getTime()) {
    throw new ValidationError('updatedAt cannot precede createdAt', {
      fieldName: 'updatedAt',
      validationRule: 'monotonic'
    });
  }
}

export function cloneTaskRecord(record: TaskRecord): TaskRecord {
  return {
    ...record,
    results: structuredClone(record.results),
    createdAt: new Date(record.createdAt.getTime()),
    updatedAt: new Date(record.updatedAt.getTime())
  };
}

function bumpUpdatedAt(record: TaskRecord, now: Date): Date {
  return now.getTime() < record.updatedAt.getTime() ? new Date(record.updatedAt.getTime()) : new Date(now.getTime());
}

/**
 * New record with the status applied along a valid transition
 */
export function applyTaskStatus(record: TaskRecord, status: TaskState, message?: string, now = new Date()): TaskRecord {
  if (!canTransition(record.status, status)) {
    throw new StateTransitionError(`Invalid transition from ${record.status} to ${status}`, {
      taskId: record.taskId,
      fromState: record.status,
      toState: status
    });
  }

  return {
    ...cloneTaskRecord(record),
    status,
    message: message ?? record.message,
    updatedAt: bumpUpdatedAt(record, now)
  };
}

export function addPlatformResult(record: TaskRecord, platform: string, result: unknown, now = new Date()): TaskRecord {
  const next = cloneTaskRecord(record);
  next.results[platform] = result;
  next.updatedAt = bumpUpdatedAt(record, now);
  return next;
}

export function taskRecordToJSON(record: TaskRecord): TaskRecordJSON {
  return {
    task_id: record.taskId,
    status: record.status,
    message: record.message ?? null,
    error: record.error ?? null,
    failed_platform: record.failedPlatform ?? null,
    results: structuredClone(record.results),
    created_at: record.createdAt.toISOString(),
    updated_at: record.updatedAt.toISOString()
  };
}

export function taskRecordFromJSON(data: unknown): TaskRecord {
  const parsed = TaskRecordJSONSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Malformed task record: ${issue?.message ?? 'unknown'}`, {
      fieldName: issue?.path.join('.')
    });
  }

  const json = parsed.data;
  return createTaskRecord({
    taskId: json.task_id,
    status: json.status,
    message: json.message ?? undefined,
    error: json.error ?? undefined,
    failedPlatform: json.failed_platform ?? undefined,
    results: json.results,
    createdAt: new Date(json.created_at),
    updatedAt: new Date(json.updated_at)
  });
}
