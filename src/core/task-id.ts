/**
 * Task ID Generator
 * Format: <prefix>[_<taskType>]_<YYYYMMDDHHMMSS UTC>_<uuid4>
 */

import { randomUUID } from 'crypto';
import { PublishingError, ValidationError } from './errors.js';

const NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9_]*$/;
const UUID4_SUFFIX = /([0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12})$/;
const TIMESTAMP_SUFFIX = /(\d{14})$/;

export class InvalidTaskIdError extends PublishingError {
  readonly taskId?: string;

  constructor(message: string, taskId?: string) {
    super(message, { errorCode: 'INVALID_TASK_ID', context: taskId ? { taskId } : {} });
    this.taskId = taskId;
  }
}

export interface ParsedTaskId {
  prefix: string;
  taskType?: string;
  timestamp: Date;
  uuid: string;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function formatTimestamp(date: Date): string {
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}

function parseTimestamp(value: string, taskId: string): Date {
  const [year, month, day, hour, minute, second] = [
    value.slice(0, 4),
    value.slice(4, 6),
    value.slice(6, 8),
    value.slice(8, 10),
    value.slice(10, 12),
    value.slice(12, 14)
  ].map(Number);

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls over out-of-range parts; a round trip catches that
  if (Number.isNaN(date.getTime()) || formatTimestamp(date) !== value) {
    throw new InvalidTaskIdError(`Invalid timestamp value in task ID: ${value}`, taskId);
  }
  return date;
}

export class TaskIdGenerator {
  static readonly DEFAULT_PREFIX = 'task';

  readonly prefix: string;
  private readonly clock: () => Date;

  constructor(prefix: string = TaskIdGenerator.DEFAULT_PREFIX, clock: () => Date = () => new Date()) {
    if (!NAME_PATTERN.test(prefix)) {
      throw new ValidationError(
        `Invalid prefix format: '${prefix}'. Prefix must start with a letter and contain only letters, numbers, and underscores.`,
        { fieldName: 'prefix', fieldValue: prefix, validationRule: 'pattern' }
      );
    }
    this.prefix = prefix;
    this.clock = clock;
  }

  generate(taskType?: string): string {
    if (taskType !== undefined && !NAME_PATTERN.test(taskType)) {
      throw new ValidationError(
        `Invalid task type format: '${taskType}'. Task type must start with a letter and contain only letters, numbers, and underscores.`,
        { fieldName: 'taskType', fieldValue: taskType, validationRule: 'pattern' }
      );
    }

    const parts = [this.prefix];
    if (taskType) parts.push(taskType);
    parts.push(formatTimestamp(this.clock()), randomUUID());
    return parts.join('_');
  }

  validate(taskId: unknown): boolean {
    if (typeof taskId !== 'string') return false;
    try {
      this.parse(taskId);
      return true;
    } catch (error) {
      if (error instanceof InvalidTaskIdError) return false;
      throw error;
    }
  }

  /**
   * Split an id into its parts; the uuid and timestamp are read from the end
   */
  parse(taskId: string): ParsedTaskId {
    const uuidMatch = UUID4_SUFFIX.exec(taskId);
    if (!uuidMatch) {
      throw new InvalidTaskIdError(`No valid UUID4 found in task ID: ${taskId}`, taskId);
    }

    const beforeUuid = taskId.slice(0, uuidMatch.index);
    if (!beforeUuid.endsWith('_')) {
      throw new InvalidTaskIdError(`Invalid task ID format: ${taskId}`, taskId);
    }

    const timestampPart = beforeUuid.slice(0, -1);
    const timestampMatch = TIMESTAMP_SUFFIX.exec(timestampPart);
    if (!timestampMatch) {
      throw new InvalidTaskIdError(`No valid timestamp found in task ID: ${taskId}`, taskId);
    }

    const head = timestampPart.slice(0, timestampMatch.index);
    if (!head.endsWith('_')) {
      throw new InvalidTaskIdError(`Invalid task ID format: ${taskId}`, taskId);
    }

    const prefixPart = head.slice(0, -1);
    if (!prefixPart.startsWith(this.prefix)) {
      throw new InvalidTaskIdError(`Task ID prefix mismatch: expected '${this.prefix}'`, taskId);
    }

    let taskType: string | undefined;
    const afterPrefix = prefixPart.slice(this.prefix.length);
    if (afterPrefix) {
      if (!afterPrefix.startsWith('_')) {
        throw new InvalidTaskIdError(`Invalid task ID format after prefix: ${taskId}`, taskId);
      }
      taskType = afterPrefix.slice(1);
      if (!NAME_PATTERN.test(taskType)) {
        throw new InvalidTaskIdError(`Invalid task type in task ID: ${taskType}`, taskId);
      }
    }

    return {
      prefix: this.prefix,
      taskType,
      timestamp: parseTimestamp(timestampMatch[1], taskId),
      uuid: uuidMatch[1]
    };
  }

  extractTimestamp(taskId: string): Date {
    return this.parse(taskId).timestamp;
  }

  extractTaskType(taskId: string): string | undefined {
    return this.parse(taskId).taskType;
  }

  extractUuid(taskId: string): string {
    return this.parse(taskId).uuid;
  }
}
