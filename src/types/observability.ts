/**
 * Engine Observability Event System
 *
 * Unified event types for engine lifecycle events.
 * All events include: type, ts (Unix ms), runId (UUID v7), context (user-provided context)
 */

// ============================================================================
// Event Types
// ============================================================================

export const EventType = {
  RUN_START: "RUN_START",
  BEGIN_COMPLETE: "BEGIN_COMPLETE",
  RANGE_START: "RANGE_START",
  RANGE_END: "RANGE_END",
  DISPATCH_CONTINUE: "DISPATCH_CONTINUE",
  DISPATCH_REPLACE: "DISPATCH_REPLACE",
  RUN_END: "RUN_END",
  RUN_ERROR: "RUN_ERROR",
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

// ============================================================================
// Events
// ============================================================================

/**
 * Fields added to every event by the dispatcher
 */
export interface EngineEventBase {
  type: EventType;
  ts: number;
  runId: string;
  context: Readonly<Record<string, unknown>>;
}

export interface RunStartEvent extends EngineEventBase {
  type: typeof EventType.RUN_START;
  beginHandlers: number;
  mainHandlers: number;
}

export interface BeginCompleteEvent extends EngineEventBase {
  type: typeof EventType.BEGIN_COMPLETE;
  count: number;
}

export interface RangeStartEvent extends EngineEventBase {
  type: typeof EventType.RANGE_START;
  /** Source line that opened the range */
  lineNumber: number;
}

export interface RangeEndEvent extends EngineEventBase {
  type: typeof EventType.RANGE_END;
  /** Source line that closed the range */
  lineNumber: number;
}

export interface DispatchContinueEvent extends EngineEventBase {
  type: typeof EventType.DISPATCH_CONTINUE;
  lineNumber: number;
  /** Index of the handler that returned Continue */
  handlerIndex: number;
  /** Handlers skipped for this line */
  skipped: number;
}

export interface DispatchReplaceEvent extends EngineEventBase {
  type: typeof EventType.DISPATCH_REPLACE;
  lineNumber: number;
  handlerIndex: number;
}

export interface RunEndEvent extends EngineEventBase {
  type: typeof EventType.RUN_END;
  linesRead: number;
  linesDispatched: number;
  duration: number;
}

export interface RunErrorEvent extends EngineEventBase {
  type: typeof EventType.RUN_ERROR;
  error: string;
  /** Last line pulled before the failure, if any */
  lineNumber?: number;
}

export type EngineEvent =
  | RunStartEvent
  | BeginCompleteEvent
  | RangeStartEvent
  | RangeEndEvent
  | DispatchContinueEvent
  | DispatchReplaceEvent
  | RunEndEvent
  | RunErrorEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

/**
 * An event as emitted, before the dispatcher fills in ts, runId and context
 */
export type EngineEventInput = DistributiveOmit<
  EngineEvent,
  "ts" | "runId" | "context"
>;

export type EngineEventHandler = (event: EngineEvent) => void;
