// Lightweight state machine for range rules
// 2 states, no transition tables

import type { TaggedLine } from "./line";

/**
 * Range state constants - use these instead of string literals
 * to prevent typos and get better editor autocomplete.
 */
export const RangeStates = {
  OUTSIDE: "outside",
  INSIDE: "inside",
} as const;

export type RangeState = (typeof RangeStates)[keyof typeof RangeStates];

export type RangeStateListener = (state: RangeState, line: TaggedLine) => void;

/**
 * Holds the OUTSIDE/INSIDE status of one range rule and tells
 * subscribers about every change, along with the line that caused it.
 */
export class RangeStateMachine {
  private state: RangeState = RangeStates.OUTSIDE;
  private transitions = 0;
  private listeners: Set<RangeStateListener> = new Set();

  /**
   * Transition to a new state
   */
  transition(next: RangeState, line: TaggedLine): void {
    if (this.state !== next) {
      this.state = next;
      this.transitions++;
      this.notify(line);
    }
  }

  /**
   * Get current state
   */
  get(): RangeState {
    return this.state;
  }

  /**
   * Check if current state matches any of the provided states
   */
  is(...states: RangeState[]): boolean {
    return states.includes(this.state);
  }

  /**
   * Number of state changes so far
   */
  getTransitionCount(): number {
    return this.transitions;
  }

  /**
   * Reset to initial state
   */
  reset(): void {
    this.state = RangeStates.OUTSIDE;
    this.transitions = 0;
  }

  /**
   * Subscribe to state changes
   */
  subscribe(listener: RangeStateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notify(line: TaggedLine): void {
    for (const listener of this.listeners) {
      listener(this.state, line);
    }
  }
}

/**
 * Create a new range state machine instance
 */
export function createRangeStateMachine(): RangeStateMachine {
  return new RangeStateMachine();
}
