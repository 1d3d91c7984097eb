/**
 * Task Status HTTP Server
 * Read-only REST API over the task store and state manager, and the
 * composition of the core that embedding applications serve it from.
 */

import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as requestLogger } from 'hono/logger';

import { loadCoreConfig, type CoreConfig } from '../core/config.js';
import { getLogger } from '../core/logger.js';
import { createRetentionWorker, type TaskRetentionWorker } from '../core/retention-worker.js';
import { TaskStateManager } from '../core/states.js';
import { TaskStatusManager } from '../core/task-status.js';
import { TaskStore } from '../core/task-store.js';
import { TaskTracker } from '../core/task-tracker.js';
import { createApiRouter, type ApiDeps } from './api/index.js';

const log = getLogger({ module: 'StatusServer' });

export function createApp(deps: ApiDeps): Hono {
  const app = new Hono();

  // Middleware
  app.use('/*', cors());
  app.use('/*', requestLogger((message) => log.debug(message)));

  // API routes
  app.route('/api', createApiRouter(deps));

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  return app;
}

type ServerInstance = ReturnType<typeof serve>;

let serverInstance: ServerInstance | null = null;

/**
 * Start the HTTP server
 */
export function startServer(app: Hono, port: number = 37780, hostname: string = '127.0.0.1'): ServerInstance {
  if (serverInstance) {
    return serverInstance;
  }

  serverInstance = serve({ fetch: app.fetch, port, hostname });
  log.info({ port, hostname }, 'Task status server started');

  return serverInstance;
}

/**
 * Stop the HTTP server
 */
export function stopServer(): void {
  if (serverInstance) {
    serverInstance.close();
    serverInstance = null;
  }
}

export interface StatusService {
  config: CoreConfig;
  taskStore: TaskStore;
  stateManager: TaskStateManager;
  statusManager: TaskStatusManager;
  tracker: TaskTracker;
  retentionWorker: TaskRetentionWorker;
  app: Hono;
  /** Stop the retention worker and the HTTP server */
  shutdown(): void;
}

/**
 * Build the core around one store and state manager. Tasks enter through
 * the tracker; retention prunes records and their histories together.
 */
export function createStatusService(config: CoreConfig = loadCoreConfig()): StatusService {
  const taskStore = new TaskStore({
    maxTaskAgeHours: config.taskStore.maxTaskAgeHours,
    cleanupEnabled: config.taskStore.cleanupEnabled
  });
  const stateManager = new TaskStateManager();
  const statusManager = new TaskStatusManager(taskStore, stateManager, config.status);
  const tracker = new TaskTracker(taskStore, stateManager);
  const retentionWorker = createRetentionWorker(
    taskStore,
    { cleanupIntervalMs: config.taskStore.cleanupIntervalMinutes * 60 * 1000 },
    stateManager
  );
  const app = createApp({ taskStore, stateManager, statusManager });

  return {
    config,
    taskStore,
    stateManager,
    statusManager,
    tracker,
    retentionWorker,
    app,
    shutdown: () => {
      retentionWorker.stop();
      stopServer();
      log.info('Task status service stopped');
    }
  };
}
