import { describe, it, expect, vi } from 'vitest';

import { InvalidStateError, StateTransitionError } from '../src/core/errors.js';
import {
  StateEventSystem,
  StateHistory,
  TaskStateManager,
  canTransition,
  createStateTransition,
  deserializeTransition,
  isTerminalState,
  serializeTransition,
  type StateTransition
} from '../src/core/states.js';

function manualClock(start = '2024-01-01T00:00:00.000Z') {
  let now = new Date(start).getTime();
  return {
    clock: () => new Date(now),
    advance(ms: number) {
      now += ms;
    }
  };
}

describe('transition graph', () => {
  it('should allow the documented moves only', () => {
    expect(canTransition('pending', 'in_progress')).toBe(true);
    expect(canTransition('pending', 'completed')).toBe(true);
    expect(canTransition('pending', 'failed')).toBe(false);
    expect(canTransition('in_progress', 'failed')).toBe(true);
    expect(canTransition('in_progress', 'pending')).toBe(false);
    expect(canTransition('completed', 'completed')).toBe(true);
    expect(canTransition('completed', 'in_progress')).toBe(false);
  });

  it('should mark completed, failed and cancelled as terminal', () => {
    expect(isTerminalState('completed')).toBe(true);
    expect(isTerminalState('cancelled')).toBe(true);
    expect(isTerminalState('in_progress')).toBe(false);
  });
});

describe('StateTransition serialization', () => {
  it('should round-trip through the snake_case form', () => {
    const transition = createStateTransition({
      fromState: 'pending',
      toState: 'in_progress',
      timestamp: new Date('2024-01-01T00:00:05.000Z'),
      message: 'go'
    });
    const json = serializeTransition(transition);

    expect(json).toEqual({
      from_state: 'pending',
      to_state: 'in_progress',
      timestamp: '2024-01-01T00:00:05.000Z',
      message: 'go',
      is_rollback: false
    });
    expect(deserializeTransition(json)).toEqual(transition);
  });

  it('should reject malformed data', () => {
    expect(() => deserializeTransition({ to_state: 'sleeping' })).toThrow(InvalidStateError);
  });

  it('should be immutable', () => {
    const transition = createStateTransition({ fromState: null, toState: 'pending' });

    expect(Object.isFrozen(transition)).toBe(true);
  });
});

describe('StateHistory', () => {
  it('should track the current state and reject mismatched sources', () => {
    const { clock } = manualClock();
    const history = new StateHistory('t1', clock);

    history.addTransition(createStateTransition({ fromState: null, toState: 'pending' }));
    history.addTransition(createStateTransition({ fromState: 'pending', toState: 'in_progress' }));

    expect(history.currentState).toBe('in_progress');
    expect(history.length).toBe(2);
    expect(() =>
      history.addTransition(createStateTransition({ fromState: 'pending', toState: 'completed' }))
    ).toThrow('Transition from pending does not match current state in_progress');
  });

  it('should reject transitions outside the graph', () => {
    const history = new StateHistory('t1');
    history.addTransition(createStateTransition({ fromState: null, toState: 'pending' }));

    expect(() =>
      history.addTransition(createStateTransition({ fromState: 'pending', toState: 'failed' }))
    ).toThrow(StateTransitionError);
  });

  it('should sum milliseconds per state, the last one up to now', () => {
    const { clock, advance } = manualClock();
    const history = new StateHistory('t1', clock);

    history.addTransition(createStateTransition({ fromState: null, toState: 'pending', timestamp: clock() }));
    advance(2000);
    history.addTransition(createStateTransition({ fromState: 'pending', toState: 'in_progress', timestamp: clock() }));
    advance(3000);

    expect(history.getStateDurations()).toEqual({ pending: 2000, in_progress: 3000 });
  });

  it('should roll back to a visited state only', () => {
    const history = new StateHistory('t1');
    history.addTransition(createStateTransition({ fromState: null, toState: 'pending' }));
    history.addTransition(createStateTransition({ fromState: 'pending', toState: 'in_progress' }));
    history.addTransition(createStateTransition({ fromState: 'in_progress', toState: 'failed' }));

    const rollback = history.rollbackToState('in_progress');

    expect(rollback.isRollback).toBe(true);
    expect(rollback.fromState).toBe('failed');
    expect(rollback.message).toBe('Rollback to in_progress');
    expect(history.currentState).toBe('in_progress');
    expect(() => history.rollbackToState('cancelled')).toThrow(
      'Cannot rollback to cancelled: state never occurred in history'
    );
  });
});

describe('StateEventSystem', () => {
  it('should notify listeners of the destination state', () => {
    const events = new StateEventSystem();
    const listener = vi.fn();
    events.registerListener('completed', listener);

    const transition = createStateTransition({ fromState: 'in_progress', toState: 'completed' });
    events.emitStateChange('t1', transition);
    events.emitStateChange('t1', createStateTransition({ fromState: 'pending', toState: 'cancelled' }));

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('t1', transition);
  });

  it('should keep notifying after a listener throws', () => {
    const events = new StateEventSystem();
    const after = vi.fn();
    events.registerListener('pending', () => {
      throw new Error('listener broke');
    });
    events.registerListener('pending', after);

    events.emitStateChange('t1', createStateTransition({ fromState: null, toState: 'pending' }));

    expect(after).toHaveBeenCalledTimes(1);
  });

  it('should report whether a listener was removed', () => {
    const events = new StateEventSystem();
    const listener = vi.fn();
    events.registerListener('failed', listener);

    expect(events.unregisterListener('failed', listener)).toBe(true);
    expect(events.unregisterListener('failed', listener)).toBe(false);
    expect(events.listenerCount('failed')).toBe(0);
  });
});

describe('TaskStateManager', () => {
  it('should initialize and transition tasks', () => {
    const manager = new TaskStateManager();
    const seen: StateTransition[] = [];
    manager.registerStateListener('in_progress', (_taskId, transition) => seen.push(transition));

    const first = manager.initializeTask('t1');
    manager.transitionState('t1', 'in_progress', 'started');

    expect(first.fromState).toBeNull();
    expect(first.message).toBe('Task initialized');
    expect(manager.getCurrentState('t1')).toBe('in_progress');
    expect(seen.map(transition => transition.message)).toEqual(['started']);
  });

  it('should stop notifying unregistered listeners', () => {
    const manager = new TaskStateManager();
    const listener = vi.fn();
    manager.registerStateListener('in_progress', listener);

    expect(manager.unregisterStateListener('in_progress', listener)).toBe(true);
    manager.initializeTask('t1');
    manager.transitionState('t1', 'in_progress');

    expect(listener).not.toHaveBeenCalled();
  });

  it('should reject duplicate and unknown tasks', () => {
    const manager = new TaskStateManager();
    manager.initializeTask('t1');

    expect(() => manager.initializeTask('t1')).toThrow('Task t1 already initialized');
    expect(() => manager.transitionState('nope', 'completed')).toThrow('Task nope not found');
    expect(manager.getCurrentState('nope')).toBeUndefined();
  });

  it('should leave the state unchanged after an invalid transition', () => {
    const manager = new TaskStateManager();
    manager.initializeTask('t1');
    manager.transitionState('t1', 'completed');

    expect(() => manager.transitionState('t1', 'in_progress')).toThrow(StateTransitionError);
    expect(manager.getCurrentState('t1')).toBe('completed');
    expect(manager.getTaskHistory('t1')?.length).toBe(2);
  });

  it('should roll back through the manager', () => {
    const manager = new TaskStateManager();
    manager.initializeTask('t1');
    manager.transitionState('t1', 'in_progress');
    manager.transitionState('t1', 'failed', 'quota');

    manager.rollbackTask('t1', 'in_progress', 'retrying');

    expect(manager.getCurrentState('t1')).toBe('in_progress');
    expect(manager.getTaskHistory('t1')?.lastTransition?.message).toBe('retrying');
  });

  it('should count tasks per current state', () => {
    const manager = new TaskStateManager();
    manager.initializeTask('a');
    manager.initializeTask('b');
    manager.transitionState('b', 'cancelled');

    expect(manager.getStateStatistics()).toEqual({
      pending: 1,
      in_progress: 0,
      completed: 0,
      failed: 0,
      cancelled: 1
    });
  });

  it('should remove histories idle past the cutoff', () => {
    const { clock, advance } = manualClock();
    const manager = new TaskStateManager({ clock });
    manager.initializeTask('old');
    advance(25 * 60 * 60 * 1000);
    manager.initializeTask('fresh');

    expect(manager.cleanupOldTasks(24)).toBe(1);
    expect(manager.getTaskIds()).toEqual(['fresh']);
  });

  it('should report durations with the injected clock', () => {
    const { clock, advance } = manualClock();
    const manager = new TaskStateManager({ clock });
    manager.initializeTask('t1');
    advance(1500);

    expect(manager.getStateDurations('t1')).toEqual({ pending: 1500 });
  });
});
