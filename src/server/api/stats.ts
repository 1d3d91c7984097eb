/**
 * Stats API
 * Storage statistics and aggregated task metrics
 */

import { Hono } from 'hono';
import { errorResponse, type ApiDeps } from './utils.js';

export function createStatsRouter(deps: ApiDeps): Hono {
  const router = new Hono();

  // GET /api/stats - Store and state machine counts
  router.get('/', (c) => {
    try {
      return c.json({
        storage: deps.taskStore.getStorageStats(),
        states: deps.stateManager.getStateStatistics(),
        memory: {
          heapUsed: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
          heapTotal: Math.round(process.memoryUsage().heapTotal / 1024 / 1024)
        }
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return router;
}

export function createMetricsRouter(deps: ApiDeps): Hono {
  const router = new Hono();

  // GET /api/metrics - Aggregated duration metrics
  router.get('/', (c) => {
    try {
      return c.json(deps.statusManager.getAggregatedPerformanceMetrics());
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return router;
}
