// Core types for the awkish engine

import type { ProcessingContext } from "../runtime/context";
import type { TaggedLine } from "../runtime/line";
import type { MetricsSnapshot } from "../runtime/metrics";
import type { EngineEventHandler } from "./observability";

// ============================================================================
// Handler results
// ============================================================================

/**
 * Keep dispatching the remaining handlers with the same line
 */
export interface ProceedResult {
  readonly kind: "proceed";
}

/**
 * Stop dispatching handlers for the current line
 */
export interface ContinueResult {
  readonly kind: "continue";
}

/**
 * Hand a different line to the remaining handlers for this line.
 * A string keeps the current line number.
 */
export interface ReplaceResult {
  readonly kind: "replace";
  readonly line: TaggedLine | string;
}

export type HandlerResult = ProceedResult | ContinueResult | ReplaceResult;

// ============================================================================
// Handlers
// ============================================================================

/**
 * Handler invoked for a line. Returning nothing is the same as Proceed.
 */
export type LineHandler<S extends object> = (
  context: ProcessingContext<S>,
  line: TaggedLine,
) => HandlerResult | void;

/**
 * Handler invoked once before the first line of a run
 */
export type BeginHandler<S extends object> = (
  context: ProcessingContext<S>,
) => void;

/**
 * Caller-supplied condition for `when()` rules. Any truthy value selects
 * the line and is exposed to the handler as `context.predicateValue`.
 */
export type LinePredicate<S extends object> = (
  context: ProcessingContext<S>,
  line: TaggedLine,
) => unknown;

/**
 * Registers a handler for a rule and returns it. Called without a
 * handler, the engine's default print handler is registered.
 */
export type RuleDecorator<S extends object> = (
  handler?: LineHandler<S>,
) => LineHandler<S>;

// ============================================================================
// Configuration
// ============================================================================

/**
 * Where line rules live:
 * - "stage": each rule is a pipeline stage, observed while lines are pulled
 * - "central": each rule is a dispatch handler, run by `run()`
 */
export type RulePlacement = "stage" | "central";

/**
 * Destination for the default print handler
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

/**
 * Engine configuration other than the initial state
 */
export interface EngineSettings {
  /**
   * Where pattern/range/when/every rules are placed
   * @default "stage"
   */
  placement?: RulePlacement;

  /**
   * Sink for the default print handler
   * @default process.stdout
   */
  output?: OutputSink;

  /**
   * Observability event handler
   */
  onEvent?: EngineEventHandler;

  /**
   * User context attached to every event
   */
  context?: Record<string, unknown>;
}

export interface EngineOptions<S extends object> extends EngineSettings {
  /**
   * Initial shared state handed to every handler
   */
  state?: S;
}

// ============================================================================
// Results
// ============================================================================

export interface RunResult<S extends object> {
  /**
   * Identifier shared by every event of this engine
   */
  runId: string;

  /**
   * Lines numbered by the source stage, filtered or not
   */
  linesRead: number;

  /**
   * Lines that reached the dispatch loop during this run
   */
  linesDispatched: number;

  /**
   * Final shared state
   */
  state: S;

  metrics: MetricsSnapshot;

  /**
   * Wall-clock duration in milliseconds
   */
  duration: number;
}
