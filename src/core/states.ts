/**
 * Task State Machine
 * Validated transitions, per-task history with rollback, and state listeners.
 *
 * pending     -> in_progress | completed | cancelled
 * in_progress -> completed | failed | cancelled
 * terminal states only self-loop
 */

import { InvalidStateError, StateTransitionError } from './errors.js';
import { getLogger } from './logger.js';
import { StateTransitionJSONSchema, emptyStateCounts, type StateTransitionJSON, type TaskState } from './types.js';

const log = getLogger({ module: 'TaskStateManager' });

export const VALID_TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  pending: ['in_progress', 'completed', 'cancelled'],
  in_progress: ['completed', 'failed', 'cancelled'],
  completed: ['completed'],
  failed: ['failed'],
  cancelled: ['cancelled']
};

const TERMINAL_STATES: ReadonlySet<TaskState> = new Set<TaskState>(['completed', 'failed', 'cancelled']);

export function canTransition(from: TaskState, to: TaskState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: TaskState): boolean {
  return TERMINAL_STATES.has(state);
}

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

// ============================================================
// StateTransition
// ============================================================

export interface StateTransition {
  readonly fromState: TaskState | null;
  readonly toState: TaskState;
  readonly timestamp: Date;
  readonly message?: string;
  readonly isRollback: boolean;
}

export function createStateTransition(input: {
  fromState: TaskState | null;
  toState: TaskState;
  timestamp?: Date;
  message?: string;
  isRollback?: boolean;
}): StateTransition {
  return Object.freeze({
    fromState: input.fromState,
    toState: input.toState,
    timestamp: new Date((input.timestamp ?? new Date()).getTime()),
    message: input.message,
    isRollback: input.isRollback ?? false
  });
}

export function serializeTransition(transition: StateTransition): StateTransitionJSON {
  return {
    from_state: transition.fromState,
    to_state: transition.toState,
    timestamp: transition.timestamp.toISOString(),
    message: transition.message ?? null,
    is_rollback: transition.isRollback
  };
}

export function deserializeTransition(data: unknown): StateTransition {
  const parsed = StateTransitionJSONSchema.safeParse(data);
  if (!parsed.success) {
    throw new InvalidStateError(`Malformed state transition: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  return createStateTransition({
    fromState: parsed.data.from_state,
    toState: parsed.data.to_state,
    timestamp: new Date(parsed.data.timestamp),
    message: parsed.data.message ?? undefined,
    isRollback: parsed.data.is_rollback
  });
}

// ============================================================
// StateHistory
// ============================================================

export class StateHistory {
  readonly taskId: string;
  private readonly entries: StateTransition[] = [];
  private readonly clock: Clock;

  constructor(taskId: string, clock: Clock = systemClock) {
    this.taskId = taskId;
    this.clock = clock;
  }

  get currentState(): TaskState | undefined {
    return this.entries.at(-1)?.toState;
  }

  get transitions(): readonly StateTransition[] {
    return [...this.entries];
  }

  get length(): number {
    return this.entries.length;
  }

  get lastTransition(): StateTransition | undefined {
    return this.entries.at(-1);
  }

  /**
   * Append a transition after checking it continues from the current state
   */
  addTransition(transition: StateTransition): void {
    const current = this.currentState;

    if (current !== undefined && transition.fromState !== current) {
      throw new StateTransitionError(
        `Transition from ${transition.fromState ?? 'null'} does not match current state ${current}`,
        { taskId: this.taskId, currentState: current, fromState: transition.fromState }
      );
    }

    if (
      transition.fromState !== null &&
      !transition.isRollback &&
      !canTransition(transition.fromState, transition.toState)
    ) {
      throw new StateTransitionError(`Invalid transition from ${transition.fromState} to ${transition.toState}`, {
        taskId: this.taskId,
        fromState: transition.fromState,
        toState: transition.toState
      });
    }

    this.entries.push(transition);
  }

  hasVisited(state: TaskState): boolean {
    return this.entries.some(entry => entry.toState === state);
  }

  /**
   * Milliseconds spent in each state; the last one runs until now
   */
  getStateDurations(now: Date = this.clock()): Partial<Record<TaskState, number>> {
    const durations: Partial<Record<TaskState, number>> = {};

    this.entries.forEach((entry, index) => {
      const end = index + 1 < this.entries.length ? this.entries[index + 1].timestamp : now;
      const elapsed = Math.max(0, end.getTime() - entry.timestamp.getTime());
      durations[entry.toState] = (durations[entry.toState] ?? 0) + elapsed;
    });

    return durations;
  }

  /**
   * Return to a previously visited state, bypassing the transition graph
   */
  rollbackToState(target: TaskState, message?: string): StateTransition {
    if (!this.hasVisited(target)) {
      throw new InvalidStateError(`Cannot rollback to ${target}: state never occurred in history`, {
        taskId: this.taskId,
        targetState: target
      });
    }

    const transition = createStateTransition({
      fromState: this.currentState ?? null,
      toState: target,
      timestamp: this.clock(),
      message: message ?? `Rollback to ${target}`,
      isRollback: true
    });
    this.addTransition(transition);
    return transition;
  }

  toJSON(): StateTransitionJSON[] {
    return this.entries.map(serializeTransition);
  }
}

// ============================================================
// StateEventSystem
// ============================================================

export type StateListener = (taskId: string, transition: StateTransition) => void;

export class StateEventSystem {
  private readonly listeners = new Map<TaskState, StateListener[]>();

  registerListener(state: TaskState, listener: StateListener): void {
    const existing = this.listeners.get(state) ?? [];
    existing.push(listener);
    this.listeners.set(state, existing);
  }

  /**
   * @returns false when the listener was not registered for the state
   */
  unregisterListener(state: TaskState, listener: StateListener): boolean {
    const existing = this.listeners.get(state);
    if (!existing) return false;

    const index = existing.indexOf(listener);
    if (index === -1) return false;

    existing.splice(index, 1);
    return true;
  }

  /**
   * Notify every listener of the destination state; a failing listener is logged and skipped
   */
  emitStateChange(taskId: string, transition: StateTransition): void {
    const listeners = [...(this.listeners.get(transition.toState) ?? [])];

    for (const listener of listeners) {
      try {
        listener(taskId, transition);
      } catch (error) {
        log.error({ err: error, taskId, state: transition.toState }, 'State listener failed');
      }
    }
  }

  listenerCount(state: TaskState): number {
    return this.listeners.get(state)?.length ?? 0;
  }
}

// ============================================================
// TaskStateManager
// ============================================================

export interface TaskStateManagerOptions {
  clock?: Clock;
  events?: StateEventSystem;
}

export class TaskStateManager {
  private readonly histories = new Map<string, StateHistory>();
  private readonly events: StateEventSystem;
  private readonly clock: Clock;

  constructor(options: TaskStateManagerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.events = options.events ?? new StateEventSystem();
  }

  /**
   * Start tracking a task; the first transition has no source state
   */
  initializeTask(taskId: string, initialState: TaskState = 'pending'): StateTransition {
    if (this.histories.has(taskId)) {
      throw new InvalidStateError(`Task ${taskId} already initialized`, { taskId });
    }

    const history = new StateHistory(taskId, this.clock);
    const transition = createStateTransition({
      fromState: null,
      toState: initialState,
      timestamp: this.clock(),
      message: 'Task initialized'
    });
    history.addTransition(transition);
    this.histories.set(taskId, history);

    log.debug({ taskId, state: initialState }, 'Task initialized');
    this.events.emitStateChange(taskId, transition);
    return transition;
  }

  transitionState(taskId: string, toState: TaskState, message?: string): StateTransition {
    const history = this.requireHistory(taskId);

    const transition = createStateTransition({
      fromState: history.currentState ?? null,
      toState,
      timestamp: this.clock(),
      message
    });
    history.addTransition(transition);

    log.info({ taskId, from: transition.fromState, to: toState }, 'State transition');
    this.events.emitStateChange(taskId, transition);
    return transition;
  }

  rollbackTask(taskId: string, targetState: TaskState, message?: string): StateTransition {
    const history = this.requireHistory(taskId);
    const transition = history.rollbackToState(targetState, message);

    log.warn({ taskId, from: transition.fromState, to: targetState }, 'State rolled back');
    this.events.emitStateChange(taskId, transition);
    return transition;
  }

  getCurrentState(taskId: string): TaskState | undefined {
    return this.histories.get(taskId)?.currentState;
  }

  getTaskHistory(taskId: string): StateHistory | undefined {
    return this.histories.get(taskId);
  }

  hasTask(taskId: string): boolean {
    return this.histories.has(taskId);
  }

  getTaskIds(): string[] {
    return [...this.histories.keys()];
  }

  registerStateListener(state: TaskState, listener: StateListener): void {
    this.events.registerListener(state, listener);
  }

  unregisterStateListener(state: TaskState, listener: StateListener): boolean {
    return this.events.unregisterListener(state, listener);
  }

  getStateDurations(taskId: string): Partial<Record<TaskState, number>> {
    return this.requireHistory(taskId).getStateDurations(this.clock());
  }

  /**
   * Drop histories whose last transition is older than the cutoff
   */
  cleanupOldTasks(maxAgeHours = 24): number {
    const cutoff = this.clock().getTime() - maxAgeHours * 60 * 60 * 1000;
    let removed = 0;

    for (const [taskId, history] of this.histories) {
      const last = history.lastTransition;
      if (last && last.timestamp.getTime() < cutoff) {
        this.histories.delete(taskId);
        removed++;
      }
    }

    if (removed > 0) {
      log.info({ removed, maxAgeHours }, 'Removed old task histories');
    }
    return removed;
  }

  removeTask(taskId: string): boolean {
    return this.histories.delete(taskId);
  }

  getStateStatistics(): Record<TaskState, number> {
    const stats = emptyStateCounts();

    for (const history of this.histories.values()) {
      const state = history.currentState;
      if (state) stats[state]++;
    }

    return stats;
  }

  private requireHistory(taskId: string): StateHistory {
    const history = this.histories.get(taskId);
    if (!history) {
      throw new InvalidStateError(`Task ${taskId} not found`, { taskId });
    }
    return history;
  }
}
