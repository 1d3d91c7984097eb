/**
 * API Utilities
 * Shared dependencies, query parsing and error mapping for the routers
 */

import type { Context } from 'hono';
import { z } from 'zod';
import { TaskStatusError, ValidationError, errorMessage } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import type { TaskStateManager } from '../../core/states.js';
import type { TaskStatusManager } from '../../core/task-status.js';
import type { TaskStore } from '../../core/task-store.js';

const log = getLogger({ module: 'StatusApi' });

export interface ApiDeps {
  taskStore: TaskStore;
  stateManager: TaskStateManager;
  statusManager: TaskStatusManager;
}

export const FlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform(value => (value === undefined ? undefined : value === 'true' || value === '1'));

export const DateParamSchema = z
  .string()
  .datetime({ offset: true })
  .transform(value => new Date(value))
  .optional();

export const IntParamSchema = z.coerce.number().int().optional();

export function describeZodError(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || 'query'}: ${issue.message}`).join('; ');
}

/**
 * Map core errors to HTTP responses
 */
export function errorResponse(c: Context, error: unknown): Response {
  if (error instanceof TaskStatusError) {
    return c.json({ error: error.message }, 404);
  }
  if (error instanceof ValidationError) {
    return c.json({ error: error.message, field: error.fieldName ?? null }, 400);
  }

  log.error({ err: error, path: c.req.path }, 'Unhandled API error');
  return c.json({ error: errorMessage(error) }, 500);
}
