/**
 * Event Handler Utilities
 *
 * Helpers for combining and composing engine event handlers.
 */

import type {
  EngineEvent,
  EngineEventHandler,
  EventType,
} from "../types/observability";
import { describeError } from "../utils/errors";

/**
 * Combine multiple event handlers into a single handler.
 *
 * @example
 * ```typescript
 * const engine = awkish(lines, {
 *   onEvent: combineEvents(
 *     (event) => console.log(event.type),
 *     filterEvents([EventType.RUN_ERROR], reportFailure),
 *   ),
 * });
 * ```
 */
export function combineEvents(
  ...handlers: Array<EngineEventHandler | undefined>
): EngineEventHandler {
  const validHandlers = handlers.filter(
    (h): h is EngineEventHandler => typeof h === "function",
  );

  if (validHandlers.length === 0) {
    return () => {};
  }

  const [only] = validHandlers;
  if (validHandlers.length === 1 && only) {
    return only;
  }

  return (event: EngineEvent) => {
    for (const handler of validHandlers) {
      try {
        handler(event);
      } catch (error) {
        // Log but don't throw - one handler failing shouldn't break others
        console.error(
          `Event handler error for ${event.type}:`,
          describeError(error),
        );
      }
    }
  };
}

/**
 * Create a filtered event handler that only receives specific event types.
 */
export function filterEvents(
  types: EventType[],
  handler: EngineEventHandler,
): EngineEventHandler {
  const typeSet = new Set<string>(types);
  return (event: EngineEvent) => {
    if (typeSet.has(event.type)) {
      handler(event);
    }
  };
}

/**
 * Create an event handler that excludes specific event types.
 */
export function excludeEvents(
  types: EventType[],
  handler: EngineEventHandler,
): EngineEventHandler {
  const typeSet = new Set<string>(types);
  return (event: EngineEvent) => {
    if (!typeSet.has(event.type)) {
      handler(event);
    }
  };
}
