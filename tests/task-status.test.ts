import { describe, it, expect, beforeEach } from 'vitest';

import { TaskStatusError, ValidationError } from '../src/core/errors.js';
import { TaskStateManager } from '../src/core/states.js';
import { createTaskRecord } from '../src/core/task-record.js';
import { TaskStatusManager, TaskStatusQuery, TaskStatusResponse } from '../src/core/task-status.js';
import { TaskStore } from '../src/core/task-store.js';

const BASE = new Date('2024-06-01T00:00:00.000Z').getTime();
const at = (seconds: number) => new Date(BASE + seconds * 1000);

describe('TaskStatusQuery', () => {
  it('should validate pagination and range', () => {
    expect(() => new TaskStatusQuery({ limit: -1 })).toThrow('Limit must be non-negative');
    expect(() => new TaskStatusQuery({ offset: -5 })).toThrow('Offset must be non-negative');
    expect(() => new TaskStatusQuery({ createdAfter: at(10), createdBefore: at(10) })).toThrow(
      'createdAfter must be before createdBefore'
    );
    expect(() => new TaskStatusQuery({ limit: -1 })).toThrow(ValidationError);
  });

  it('should match a half-open creation range', () => {
    const query = new TaskStatusQuery({ createdAfter: at(10), createdBefore: at(20) });

    expect(query.matches(createTaskRecord({ taskId: 'a', createdAt: at(10) }))).toBe(true);
    expect(query.matches(createTaskRecord({ taskId: 'b', createdAt: at(19) }))).toBe(true);
    expect(query.matches(createTaskRecord({ taskId: 'c', createdAt: at(20) }))).toBe(false);
    expect(query.matches(createTaskRecord({ taskId: 'd', createdAt: at(9) }))).toBe(false);
  });

  it('should treat an empty status filter as no filter', () => {
    const query = new TaskStatusQuery({ statusFilter: [] });

    expect(query.offset).toBe(0);
    expect(query.matches(createTaskRecord({ taskId: 'a', status: 'cancelled' }))).toBe(true);
  });
});

describe('TaskStatusResponse', () => {
  it('should shape completed responses', () => {
    const response = new TaskStatusResponse(
      createTaskRecord({ taskId: 't1', status: 'completed', results: { youtube: { id: 'v1' } } })
    );

    expect(response.toDict()).toEqual({ status: 'completed', results: { youtube: { id: 'v1' } } });
  });

  it('should shape failed responses', () => {
    const response = new TaskStatusResponse(
      createTaskRecord({ taskId: 't1', status: 'failed', error: 'quota', failedPlatform: 'youtube' })
    );

    expect(response.toDict()).toEqual({ status: 'failed', error: 'quota', failed_platform: 'youtube' });
  });

  it('should shape in-progress and pending responses', () => {
    expect(new TaskStatusResponse(createTaskRecord({ taskId: 't1', status: 'in_progress' })).toDict()).toEqual({
      status: 'in_progress',
      message: null
    });
    expect(new TaskStatusResponse(createTaskRecord({ taskId: 't2' })).toDict()).toEqual({ status: 'pending' });
  });
});

describe('TaskStatusManager', () => {
  let now: number;
  let store: TaskStore;
  let states: TaskStateManager;
  let manager: TaskStatusManager;

  beforeEach(() => {
    now = BASE;
    const clock = () => new Date(now);
    store = new TaskStore({ clock });
    states = new TaskStateManager({ clock });
    manager = new TaskStatusManager(store, states);
  });

  function track(taskId: string, createdSeconds: number) {
    now = BASE + createdSeconds * 1000;
    store.storeTask(createTaskRecord({ taskId, createdAt: at(createdSeconds) }));
    states.initializeTask(taskId);
  }

  describe('getTaskStatus', () => {
    it('should reject empty and unknown ids', () => {
      expect(() => manager.getTaskStatus('')).toThrow('Task ID cannot be empty');
      expect(() => manager.getTaskStatus('ghost')).toThrow('Task ghost: Task not found');
      expect(() => manager.getTaskStatus('ghost')).toThrow(TaskStatusError);
    });

    it('should attach history when asked', () => {
      track('t1', 0);
      now = BASE + 5000;
      states.transitionState('t1', 'in_progress', 'working');

      const response = manager.getTaskStatus('t1', true);

      expect(response.history).toEqual([
        {
          from_state: null,
          to_state: 'pending',
          timestamp: '2024-06-01T00:00:00.000Z',
          message: 'Task initialized',
          is_rollback: false
        },
        {
          from_state: 'pending',
          to_state: 'in_progress',
          timestamp: '2024-06-01T00:00:05.000Z',
          message: 'working',
          is_rollback: false
        }
      ]);
      expect(manager.getTaskStatus('t1').history).toBeUndefined();
    });

    it('should attach progress only when it is an object', () => {
      store.storeTask(
        createTaskRecord({ taskId: 'p1', status: 'in_progress', results: { progress: { percentage: 40 } } })
      );
      store.storeTask(createTaskRecord({ taskId: 'p2', status: 'in_progress', results: { progress: 40 } }));

      expect(manager.getTaskStatus('p1', false, true).progress).toEqual({ percentage: 40 });
      expect(manager.getTaskStatus('p2', false, true).progress).toBeUndefined();
    });
  });

  describe('getMultipleTaskStatuses', () => {
    it('should skip missing ids by default', () => {
      track('a', 0);

      expect(manager.getMultipleTaskStatuses(['a', 'ghost']).map(response => response.taskId)).toEqual(['a']);
      expect(() => manager.getMultipleTaskStatuses(['a', 'ghost'], { skipMissing: false })).toThrow(
        TaskStatusError
      );
    });
  });

  describe('queryTaskStatuses', () => {
    beforeEach(() => {
      track('first', 0);
      track('second', 10);
      track('third', 20);
    });

    it('should sort newest first and paginate', () => {
      const page = manager.queryTaskStatuses(new TaskStatusQuery({ limit: 2, offset: 1 }));

      expect(page.map(response => response.taskId)).toEqual(['second', 'first']);
    });

    it('should cap the limit at the configured maximum', () => {
      const capped = new TaskStatusManager(store, states, { maxQueryLimit: 1 });

      expect(capped.queryTaskStatuses(new TaskStatusQuery({ limit: 50 }))).toHaveLength(1);
    });

    it('should filter by creation range', () => {
      const query = new TaskStatusQuery({ createdAfter: at(10), createdBefore: at(20) });

      expect(manager.queryTaskStatuses(query).map(response => response.taskId)).toEqual(['second']);
    });
  });

  describe('metrics', () => {
    it('should report per-task durations in seconds', () => {
      track('t1', 0);
      now = BASE + 4000;
      states.transitionState('t1', 'in_progress');
      now = BASE + 10000;
      states.transitionState('t1', 'completed');
      const record = store.getTask('t1');
      if (record) {
        store.updateTask({ ...record, status: 'completed', updatedAt: at(10) });
      }

      expect(manager.getTaskPerformanceMetrics('t1')).toEqual({
        taskId: 't1',
        status: 'completed',
        totalDuration: 10,
        createdAt: '2024-06-01T00:00:00.000Z',
        updatedAt: '2024-06-01T00:00:10.000Z',
        stateDurations: { pending: 4, in_progress: 6, completed: 0 }
      });
    });

    it('should aggregate durations by status', () => {
      store.storeTask(createTaskRecord({ taskId: 'a', status: 'completed', createdAt: at(0), updatedAt: at(10) }));
      store.storeTask(createTaskRecord({ taskId: 'b', status: 'completed', createdAt: at(0), updatedAt: at(20) }));
      store.storeTask(createTaskRecord({ taskId: 'c', createdAt: at(0) }));

      const metrics = manager.getAggregatedPerformanceMetrics();

      expect(metrics.totalTasks).toBe(3);
      expect(metrics.averageDuration).toBe(10);
      expect(metrics.statusBreakdown).toEqual({ completed: 2, pending: 1 });
      expect(metrics.averageDurationByStatus).toEqual({ pending: 0, completed: 15 });
    });

    it('should report zero for an empty store', () => {
      expect(manager.getAggregatedPerformanceMetrics().averageDuration).toBe(0);
    });
  });
});
