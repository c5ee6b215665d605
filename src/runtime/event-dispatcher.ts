/**
 * Engine Event Dispatcher
 *
 * Centralized event emission for all engine lifecycle events.
 * - Adds ts, runId, context automatically to all events
 * - Calls handlers synchronously, in registration order
 * - Never throws from handler failures
 */

import { v7 as uuidv7 } from "uuid";
import type {
  EngineEvent,
  EngineEventHandler,
  EngineEventInput,
} from "../types/observability";
import { describeError } from "../utils/errors";

/**
 * Deep clone and freeze an object to ensure complete immutability.
 * Handles nested objects and arrays.
 */
function deepCloneAndFreeze<T>(obj: T): T;
function deepCloneAndFreeze(obj: unknown): unknown {
  if (obj === null || typeof obj !== "object") {
    return obj;
  }

  if (Array.isArray(obj)) {
    return Object.freeze(obj.map((item: unknown) => deepCloneAndFreeze(item)));
  }

  const cloned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    cloned[key] = deepCloneAndFreeze(value);
  }
  return Object.freeze(cloned);
}

export class EventDispatcher {
  private handlers: EngineEventHandler[] = [];
  private readonly runId: string;
  private readonly _context: Readonly<Record<string, unknown>>;

  constructor(context: Record<string, unknown> = {}) {
    this.runId = uuidv7();
    this._context = deepCloneAndFreeze(context);
  }

  /**
   * Register an event handler
   */
  onEvent(handler: EngineEventHandler): void {
    this.handlers.push(handler);
  }

  /**
   * Remove an event handler
   */
  offEvent(handler: EngineEventHandler): void {
    const index = this.handlers.indexOf(handler);
    if (index !== -1) {
      this.handlers.splice(index, 1);
    }
  }

  /**
   * Emit an event to all handlers
   * - Adds ts, runId, context automatically
   * - A failing handler is reported and the remaining handlers still run
   */
  emit(input: EngineEventInput): void {
    // Skip event creation if no handlers registered
    if (this.handlers.length === 0) return;

    const event: EngineEvent = {
      ...input,
      ts: Date.now(),
      runId: this.runId,
      context: this._context,
    };

    // Snapshot handlers to avoid issues if handlers modify the list during dispatch
    for (const handler of [...this.handlers]) {
      try {
        handler(event);
      } catch (error) {
        console.error(
          `Event handler error for ${event.type}:`,
          describeError(error),
        );
      }
    }
  }

  /**
   * Get the run ID for this engine
   */
  getRunId(): string {
    return this.runId;
  }

  /**
   * Get the context for this engine
   */
  getContext(): Readonly<Record<string, unknown>> {
    return this._context;
  }

  /**
   * Get the number of registered handlers
   */
  getHandlerCount(): number {
    return this.handlers.length;
  }
}

/**
 * Create an event dispatcher with the given context
 */
export function createEventDispatcher(
  context: Record<string, unknown> = {},
): EventDispatcher {
  return new EventDispatcher(context);
}
