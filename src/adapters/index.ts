/**
 * In-memory adapters for exercising the executor without a real platform
 */

export * from './mock-support.js';
export * from './mock-uploader.js';
export * from './mock-publisher.js';
