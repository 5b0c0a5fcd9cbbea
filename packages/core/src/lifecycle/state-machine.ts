/** Allowed transitions: each state maps to the states it may move to. */
export type TransitionTable<S extends string> = Record<S, ReadonlySet<S>>;

export interface StateTransitionEvent<S extends string> {
  from: S;
  to: S;
  timestamp: Date;
  reason?: string;
}

export type StateChangeListener<S extends string> = (
  event: StateTransitionEvent<S>,
) => void;

export class StateMachine<S extends string> {
  private state: S;
  private listeners: StateChangeListener<S>[] = [];

  constructor(
    private readonly transitions: TransitionTable<S>,
    initial: S,
  ) {
    this.state = initial;
  }

  getState(): S {
    return this.state;
  }

  is(...states: S[]): boolean {
    return states.includes(this.state);
  }

  canTransition(to: S): boolean {
    return this.transitions[this.state].has(to);
  }

  /** Throws if `to` is not reachable from the current state. */
  transition(to: S, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new Error(`Invalid state transition: ${this.state} -> ${to}`);
    }

    const event: StateTransitionEvent<S> = {
      from: this.state,
      to,
      timestamp: new Date(),
      ...(reason !== undefined && { reason }),
    };
    this.state = to;
    this.listeners.forEach((listener) => listener(event));
  }

  /** Returns an unsubscribe function. */
  onStateChange(listener: StateChangeListener<S>): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }
}

/**
 * Change watcher lifecycle.
 *
 * - idle: created, not subscribed yet
 * - watching: subscribed, debounce loop running
 * - stopping: loop cancelled, waiting for the last flush and the subscription
 * - stopped: all resources released
 * - failed: could not subscribe; the index keeps its last contents
 */
export type WatcherState =
  | "idle"
  | "watching"
  | "stopping"
  | "stopped"
  | "failed";

export const WATCHER_TRANSITIONS: TransitionTable<WatcherState> = {
  idle: new Set(["watching", "failed", "stopped"]),
  watching: new Set(["stopping"]),
  stopping: new Set(["stopped"]),
  stopped: new Set(),
  failed: new Set(["stopped"]),
};

export function createWatcherStateMachine(): StateMachine<WatcherState> {
  return new StateMachine(WATCHER_TRANSITIONS, "idle");
}
