import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { TaskRetentionWorker, createRetentionWorker } from '../src/core/retention-worker.js';
import { TaskStateManager } from '../src/core/states.js';
import { createTaskRecord } from '../src/core/task-record.js';
import { TaskStore } from '../src/core/task-store.js';

const NOW = new Date('2024-06-01T12:00:00.000Z');
const HOUR = 60 * 60 * 1000;

describe('TaskRetentionWorker', () => {
  let store: TaskStore;

  beforeEach(() => {
    vi.useFakeTimers();
    store = new TaskStore({ clock: () => new Date(NOW.getTime()) });
    store.storeTask(createTaskRecord({ taskId: 'old', createdAt: new Date(NOW.getTime() - 48 * HOUR) }));
    store.storeTask(createTaskRecord({ taskId: 'new', createdAt: new Date(NOW.getTime() - HOUR) }));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should clean up after each interval', () => {
    const worker = new TaskRetentionWorker(store, { cleanupIntervalMs: 1000 });
    worker.start();

    vi.advanceTimersByTime(999);
    expect(store.taskExists('old')).toBe(true);

    vi.advanceTimersByTime(1);
    expect(store.taskExists('old')).toBe(false);
    expect(worker.getLastRemovedCount()).toBe(1);

    worker.stop();
  });

  it('should drop the state histories of removed records', () => {
    const states = new TaskStateManager();
    states.initializeTask('old');
    states.initializeTask('new');
    states.initializeTask('untracked');
    const worker = new TaskRetentionWorker(store, { cleanupIntervalMs: 1000 }, states);
    worker.start();

    vi.advanceTimersByTime(1000);

    expect(store.getTaskCount()).toBe(1);
    expect(states.getTaskIds()).toEqual(['new', 'untracked']);

    worker.stop();
  });

  it('should stop scheduling once stopped', () => {
    const worker = new TaskRetentionWorker(store, { cleanupIntervalMs: 1000 });
    worker.start();
    worker.stop();

    vi.advanceTimersByTime(5000);

    expect(worker.isRunning()).toBe(false);
    expect(store.taskExists('old')).toBe(true);
  });

  it('should use its own age limit when given', () => {
    const worker = new TaskRetentionWorker(store, { maxTaskAgeHours: 0.5 });

    expect(worker.runNow()).toBe(2);
    expect(store.getTaskCount()).toBe(0);
  });

  it('should log and swallow a failing run', () => {
    const worker = new TaskRetentionWorker(store);
    vi.spyOn(store, 'removeExpiredTasks').mockImplementation(() => {
      throw new Error('store unavailable');
    });

    expect(worker.runNow()).toBe(0);
  });

  it('should start only when the store has cleanup enabled', () => {
    const enabled = createRetentionWorker(store);
    const disabled = createRetentionWorker(new TaskStore({ cleanupEnabled: false }));

    expect(enabled.isRunning()).toBe(true);
    expect(disabled.isRunning()).toBe(false);

    enabled.stop();
  });
});
