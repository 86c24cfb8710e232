/**
 * State machine for one listener's lifecycle.
 *
 * States:
 * - idle: Nothing resolved yet
 * - resolving: Address descriptor being parsed
 * - bound: Socket open, concrete address being recorded
 * - serving: Handler running on the socket
 * - exited: Serving activity stopped on its own
 * - closing: Owner signalled closing, listener being closed
 * - grace-wait: Waiting for the serving activity to finish
 * - terminated: Serving activity finished, supervision over
 * - failed: Resolve, bind, or persist step failed before serving
 */

export type ListenerState =
  | "idle"
  | "resolving"
  | "bound"
  | "serving"
  | "exited"
  | "closing"
  | "grace-wait"
  | "terminated"
  | "failed";

/** Valid state transitions. Each key maps to the set of states it can transition to. */
const VALID_TRANSITIONS: Record<ListenerState, ReadonlySet<ListenerState>> = {
  idle: new Set(["resolving"]),
  resolving: new Set(["bound", "failed"]),
  bound: new Set(["serving", "failed"]),
  serving: new Set(["exited", "closing"]),
  exited: new Set(["terminated"]),
  closing: new Set(["grace-wait"]),
  "grace-wait": new Set(["terminated"]),
  terminated: new Set(),
  failed: new Set(),
};

export interface StateTransitionEvent {
  from: ListenerState;
  to: ListenerState;
  timestamp: Date;
  reason?: string;
}

export type StateChangeListener = (event: StateTransitionEvent) => void;

export class ListenerStateMachine {
  private state: ListenerState = "idle";
  private listeners: StateChangeListener[] = [];

  /** Get the current state. */
  getState(): ListenerState {
    return this.state;
  }

  /** Check whether a transition to the target state is valid. */
  canTransition(to: ListenerState): boolean {
    return VALID_TRANSITIONS[this.state].has(to);
  }

  /** Whether no further transitions are possible. */
  isTerminal(): boolean {
    return VALID_TRANSITIONS[this.state].size === 0;
  }

  /**
   * Transition to a new state.
   * Throws if the transition is not valid.
   */
  transition(to: ListenerState, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new Error(`Invalid state transition: ${this.state} -> ${to}`);
    }

    const event: StateTransitionEvent = {
      from: this.state,
      to,
      timestamp: new Date(),
      reason,
    };

    this.state = to;

    for (const listener of this.listeners) {
      listener(event);
    }
  }

  /** Register a listener for state changes. Returns an unsubscribe function. */
  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}
