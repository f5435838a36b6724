/**
 * Mutation state of the store coordinator.
 *
 * States:
 * - idle: no save or reload in flight
 * - mutating: exactly one save or reload is running
 * - closed: store shut down, no further mutations
 */

export type StoreState = "idle" | "mutating" | "closed";

/** Valid state transitions. Each key maps to the set of states it can transition to. */
const VALID_TRANSITIONS: Record<StoreState, ReadonlySet<StoreState>> = {
  idle: new Set(["mutating", "closed"]),
  mutating: new Set(["idle"]),
  closed: new Set(),
};

export interface StateTransitionEvent {
  from: StoreState;
  to: StoreState;
  timestamp: Date;
  reason?: string;
}

export type StateChangeListener = (event: StateTransitionEvent) => void;

export class StoreStateMachine {
  private state: StoreState = "idle";
  private listeners: StateChangeListener[] = [];

  getState(): StoreState {
    return this.state;
  }

  canTransition(to: StoreState): boolean {
    return VALID_TRANSITIONS[this.state].has(to);
  }

  /**
   * Transition to a new state.
   * Throws if the transition is not valid.
   */
  transition(to: StoreState, reason?: string): void {
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
