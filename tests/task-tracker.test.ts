import { describe, it, expect, beforeEach } from 'vitest';

import { MockUploader } from '../src/adapters/mock-uploader.js';
import { parsePlatformConfig } from '../src/core/config.js';
import { AuthenticationError, InvalidStateError, StateTransitionError, TaskError } from '../src/core/errors.js';
import { createUploadExecutor } from '../src/core/executor.js';
import { TaskStateManager } from '../src/core/states.js';
import { TaskIdGenerator } from '../src/core/task-id.js';
import { createTaskRecord } from '../src/core/task-record.js';
import { TaskStore } from '../src/core/task-store.js';
import { RECONCILED_ERROR_MESSAGE, TaskTracker, UNKNOWN_PLATFORM } from '../src/core/task-tracker.js';
import type { MediaMetadata } from '../src/core/types.js';

const METADATA: MediaMetadata = { title: 'Clip', tags: [] };

describe('TaskTracker', () => {
  let store: TaskStore;
  let states: TaskStateManager;
  let tracker: TaskTracker;

  beforeEach(() => {
    store = new TaskStore();
    states = new TaskStateManager();
    tracker = new TaskTracker(store, states);
  });

  function statesOf(taskId: string) {
    return tracker.getHistory(taskId)?.transitions.map(transition => transition.toState);
  }

  describe('createTask', () => {
    it('should create the record and its history together', () => {
      const record = tracker.createTask('t1');

      expect(record.status).toBe('pending');
      expect(store.taskExists('t1')).toBe(true);
      expect(states.getCurrentState('t1')).toBe('pending');
    });

    it('should generate an id when none is given', () => {
      const generated = new TaskTracker(store, states, {
        idGenerator: new TaskIdGenerator('task', () => new Date('2024-01-02T03:04:05.000Z'))
      });

      expect(generated.createTask(undefined, 'pending', 'upload').taskId).toMatch(/^task_upload_20240102030405_/);
    });

    it('should keep nothing when the state machine rejects the task', () => {
      states.initializeTask('z');

      expect(() => tracker.createTask('z')).toThrow(InvalidStateError);
      expect(store.taskExists('z')).toBe(false);
    });

    it('should reject duplicate ids', () => {
      tracker.createTask('t1');

      expect(() => tracker.createTask('t1')).toThrow('Task t1 already exists');
    });
  });

  describe('lifecycle', () => {
    it('should move both sides along valid transitions', () => {
      tracker.createTask('t1');
      tracker.startTask('t1', 'Uploading');
      const done = tracker.completeTask('t1', { youtube: { id: 'v1' } }, 'Done');

      expect(done.status).toBe('completed');
      expect(done.results).toEqual({ youtube: { id: 'v1' } });
      expect(store.getTask('t1')?.message).toBe('Done');
      expect(statesOf('t1')).toEqual(['pending', 'in_progress', 'completed']);
    });

    it('should record the error before failing', () => {
      tracker.createTask('t1');
      tracker.startTask('t1');
      tracker.failTask('t1', 'Quota exceeded', 'youtube');

      const record = store.getTask('t1');
      expect(record?.status).toBe('failed');
      expect(record?.error).toBe('Quota exceeded');
      expect(record?.failedPlatform).toBe('youtube');
      expect(states.getCurrentState('t1')).toBe('failed');
    });

    it('should leave both sides untouched on an invalid transition', () => {
      tracker.createTask('t1');

      expect(() => tracker.failTask('t1', 'boom', 'youtube')).toThrow(StateTransitionError);
      expect(store.getTask('t1')?.status).toBe('pending');
      expect(store.getTask('t1')?.error).toBeUndefined();
      expect(states.getCurrentState('t1')).toBe('pending');
    });

    it('should store progress under results', () => {
      tracker.createTask('t1');
      tracker.startTask('t1');

      const record = tracker.recordProgress('t1', { percentage: 40 }, 'Uploading 40%');

      expect(record.results.progress).toEqual({ percentage: 40 });
      expect(store.getTask('t1')?.message).toBe('Uploading 40%');
    });

    it('should cancel pending tasks', () => {
      tracker.createTask('t1');

      expect(tracker.cancelTask('t1', 'User cancelled').status).toBe('cancelled');
      expect(states.getCurrentState('t1')).toBe('cancelled');
    });

    it('should roll back and clear the error when leaving failed', () => {
      tracker.createTask('t1');
      tracker.startTask('t1');
      tracker.failTask('t1', 'Network down', 'youtube');

      const record = tracker.rollbackTask('t1', 'in_progress', 'Retrying');

      expect(record.status).toBe('in_progress');
      expect(record.error).toBeUndefined();
      expect(record.message).toBe('Retrying');
      expect(states.getTaskHistory('t1')?.lastTransition?.isRollback).toBe(true);
    });

    it('should reject unknown tasks', () => {
      expect(() => tracker.startTask('ghost')).toThrow(TaskError);
    });

    it('should remove both sides', () => {
      tracker.createTask('t1');

      expect(tracker.removeTask('t1')).toBe(true);
      expect(store.taskExists('t1')).toBe(false);
      expect(states.hasTask('t1')).toBe(false);
      expect(tracker.removeTask('t1')).toBe(false);
    });
  });

  describe('runTask', () => {
    it('should complete the task with the platform result', async () => {
      const uploader = new MockUploader('youtube', { totalBytes: 10, chunkCount: 1 });
      const executor = createUploadExecutor(uploader, parsePlatformConfig({ platformName: 'youtube' }));
      await executor.connect();
      tracker.createTask('t1');

      const result = await tracker.runTask('t1', executor, '/videos/clip.mp4', METADATA);

      const record = store.getTask('t1');
      expect(record?.status).toBe('completed');
      expect(record?.message).toBe('Completed on youtube');
      expect(record?.results.youtube).toEqual(result);
      expect(statesOf('t1')).toEqual(['pending', 'in_progress', 'completed']);
    });

    it('should fail the task and rethrow', async () => {
      const uploader = new MockUploader('youtube', { uploadSuccess: false, errorType: 'auth' });
      const executor = createUploadExecutor(uploader, parsePlatformConfig({ platformName: 'youtube' }));
      await executor.connect();
      tracker.createTask('t1');

      await expect(tracker.runTask('t1', executor, '/videos/clip.mp4', METADATA)).rejects.toBeInstanceOf(
        AuthenticationError
      );

      const record = store.getTask('t1');
      expect(record?.status).toBe('failed');
      expect(record?.error).toBe('Mock upload failed');
      expect(record?.failedPlatform).toBe('youtube');
    });

    it('should fall back to the error name when the message is empty', async () => {
      const uploader = new MockUploader('youtube', { uploadSuccess: false, errorType: 'auth', uploadError: '' });
      const executor = createUploadExecutor(uploader, parsePlatformConfig({ platformName: 'youtube' }));
      await executor.connect();
      tracker.createTask('t1');

      await expect(tracker.runTask('t1', executor, '/videos/clip.mp4', METADATA)).rejects.toBeInstanceOf(
        AuthenticationError
      );

      const record = store.getTask('t1');
      expect(record?.status).toBe('failed');
      expect(record?.error).toBe('AuthenticationError');
      expect(states.getCurrentState('t1')).toBe('failed');
    });
  });

  describe('reconcile', () => {
    it('should repair drift in both directions', () => {
      store.storeTask(createTaskRecord({ taskId: 'untracked', status: 'completed' }));
      tracker.createTask('drifted');
      states.transitionState('drifted', 'in_progress');
      tracker.createTask('failed_behind');
      states.transitionState('failed_behind', 'in_progress');
      states.transitionState('failed_behind', 'failed');
      states.initializeTask('orphan');

      const report = tracker.reconcile();

      expect(report).toEqual({ initialized: 1, repaired: 2, orphansRemoved: 1 });
      expect(states.getCurrentState('untracked')).toBe('completed');
      expect(store.getTask('drifted')?.status).toBe('in_progress');
      expect(store.getTask('failed_behind')?.error).toBe(RECONCILED_ERROR_MESSAGE);
      expect(store.getTask('failed_behind')?.failedPlatform).toBe(UNKNOWN_PLATFORM);
      expect(states.hasTask('orphan')).toBe(false);
    });

    it('should report nothing when both sides agree', () => {
      tracker.createTask('t1');

      expect(tracker.reconcile()).toEqual({ initialized: 0, repaired: 0, orphansRemoved: 0 });
    });
  });
});
