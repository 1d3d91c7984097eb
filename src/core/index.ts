/**
 * Core module exports
 * Task orchestration for publishing media to external platforms
 */

// Types
export * from './types.js';

// Errors & Logging
export * from './errors.js';
export * from './logger.js';

// Configuration
export * from './config.js';

// State Machine
export * from './states.js';

// Task Records & Storage
export * from './task-id.js';
export * from './task-record.js';
export * from './task-store.js';
export * from './retention-worker.js';
export * from './task-status.js';
export * from './task-tracker.js';

// Media & Templates
export * from './media.js';
export * from './template.js';

// Execution
export * from './retry.js';
export * from './executor.js';
export * from './resumable-transfer.js';

// Platform Registry
export * from './registry.js';
