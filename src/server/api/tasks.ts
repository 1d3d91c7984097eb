/**
 * Tasks API
 * Read-only task status endpoints
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { TaskStatusQuery, type TaskStatusResponse } from '../../core/task-status.js';
import { TaskStateSchema } from '../../core/types.js';
import { DateParamSchema, FlagSchema, IntParamSchema, describeZodError, errorResponse, type ApiDeps } from './utils.js';

const StatusListSchema = z
  .string()
  .optional()
  .transform(value => (value ? value.split(',').map(part => part.trim()).filter(Boolean) : undefined))
  .pipe(z.array(TaskStateSchema).optional());

const ListQuerySchema = z.object({
  status: StatusListSchema,
  createdAfter: DateParamSchema,
  createdBefore: DateParamSchema,
  limit: IntParamSchema,
  offset: IntParamSchema,
  history: FlagSchema,
  progress: FlagSchema
});

const DetailQuerySchema = z.object({
  history: FlagSchema,
  progress: FlagSchema
});

function present(response: TaskStatusResponse) {
  return { task_id: response.taskId, ...response.toDict() };
}

export function createTasksRouter(deps: ApiDeps): Hono {
  const router = new Hono();

  // GET /api/tasks - Query task statuses
  router.get('/', (c) => {
    const parsed = ListQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return c.json({ error: describeZodError(parsed.error) }, 400);
    }

    try {
      const params = parsed.data;
      const query = new TaskStatusQuery({
        statusFilter: params.status,
        createdAfter: params.createdAfter,
        createdBefore: params.createdBefore,
        limit: params.limit,
        offset: params.offset
      });
      const responses = deps.statusManager.queryTaskStatuses(query, {
        includeHistory: params.history,
        includeProgress: params.progress
      });

      return c.json({ tasks: responses.map(present), count: responses.length });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // GET /api/tasks/:id - Single task status
  router.get('/:id', (c) => {
    const parsed = DetailQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return c.json({ error: describeZodError(parsed.error) }, 400);
    }

    try {
      const response = deps.statusManager.getTaskStatus(
        c.req.param('id'),
        parsed.data.history,
        parsed.data.progress
      );
      return c.json(present(response));
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // GET /api/tasks/:id/metrics - Duration breakdown for one task
  router.get('/:id/metrics', (c) => {
    try {
      return c.json(deps.statusManager.getTaskPerformanceMetrics(c.req.param('id')));
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return router;
}
