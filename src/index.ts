/**
 * Media publishing core
 * Task tracking, resilient execution and a read-only status API
 */

export * from './core/index.js';
export * from './adapters/index.js';
export { createApp, createStatusService, startServer, stopServer, type StatusService } from './server/index.js';
export { createApiRouter, type ApiDeps } from './server/api/index.js';
