// awkish - awk-style rules for line-oriented text
// Main entry point
//
// Zod schemas for configuration live in a subpath:
//   import { EngineOptionsSchema } from "awkish/zod";

// Engine
export { LineEngine, awkish } from "./runtime/engine";
export type {
  BeginHandler,
  ContinueResult,
  EngineOptions,
  EngineSettings,
  HandlerResult,
  LineHandler,
  LinePredicate,
  OutputSink,
  ProceedResult,
  ReplaceResult,
  RuleDecorator,
  RulePlacement,
  RunResult,
} from "./types/engine";

// Lines and context
export { TaggedLine } from "./runtime/line";
export {
  ProcessingContext,
  createProcessingContext,
} from "./runtime/context";
export type { MatchScope, RangeScope } from "./runtime/context";

// Handler results
export { Continue, Proceed, replace } from "./runtime/flow";

// Rules (for central dispatch via main())
export {
  PatternRule,
  RangeRule,
  PredicateRule,
  EveryRule,
  patternHandler,
  rangeHandler,
  whenHandler,
} from "./runtime/rules";
export type { LineRule, RuleKind, RuleOptions } from "./runtime/rules";

// Pipeline stages
export {
  PipelineStage,
  LineNumberingStage,
  RuleStage,
  GrepStage,
  SplitStage,
} from "./runtime/stages";
export { dispatchLine } from "./runtime/dispatch";
export type { DispatchHooks, DispatchOutcome } from "./runtime/dispatch";

// Range state machine
export {
  RangeStateMachine,
  RangeStates,
  createRangeStateMachine,
} from "./runtime/state-machine";
export type { RangeState, RangeStateListener } from "./runtime/state-machine";

// Output
export { printLine, defaultOutput, BufferedOutput } from "./runtime/output";

// Input sources
export { linesFromText, linesFromChunks, linesFromFile } from "./sources";

// Observability
export { EventType } from "./types/observability";
export type {
  EngineEvent,
  EngineEventBase,
  EngineEventHandler,
  EngineEventInput,
  RunStartEvent,
  BeginCompleteEvent,
  RangeStartEvent,
  RangeEndEvent,
  DispatchContinueEvent,
  DispatchReplaceEvent,
  RunEndEvent,
  RunErrorEvent,
} from "./types/observability";
export {
  EventDispatcher,
  createEventDispatcher,
} from "./runtime/event-dispatcher";
export {
  combineEvents,
  filterEvents,
  excludeEvents,
} from "./runtime/event-handlers";
export { Metrics, createMetrics } from "./runtime/metrics";
export type { MetricsSnapshot } from "./runtime/metrics";

// Errors
export {
  EngineError,
  EngineErrorCodes,
  isEngineError,
} from "./utils/errors";
export type { EngineErrorCode, EngineErrorContext } from "./utils/errors";

// Utilities
export { compilePattern, search } from "./utils/regex";
export type { PatternSource } from "./utils/regex";
export { splitFields } from "./utils/split";
