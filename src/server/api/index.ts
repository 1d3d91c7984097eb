/**
 * API Router
 * Central router for all status endpoints
 */

import { Hono } from 'hono';
import { createMetricsRouter, createStatsRouter } from './stats.js';
import { createTasksRouter } from './tasks.js';
import type { ApiDeps } from './utils.js';

export type { ApiDeps } from './utils.js';

export function createApiRouter(deps: ApiDeps): Hono {
  const router = new Hono();

  router.route('/tasks', createTasksRouter(deps));
  router.route('/metrics', createMetricsRouter(deps));
  router.route('/stats', createStatsRouter(deps));

  return router;
}
