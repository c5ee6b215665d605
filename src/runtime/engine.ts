// Main engine: rule registration, pipeline assembly and the run loop

import type {
  BeginHandler,
  EngineOptions,
  EngineSettings,
  LineHandler,
  LinePredicate,
  OutputSink,
  RuleDecorator,
  RulePlacement,
  RunResult,
} from "../types/engine";
import { EventType, type EngineEventHandler } from "../types/observability";
import { EngineOptionsSchema } from "../zod/engine";
import { EngineError, EngineErrorCodes, describeError } from "../utils/errors";
import { compilePattern, type PatternSource } from "../utils/regex";
import { ProcessingContext } from "./context";
import { dispatchLine, type DispatchHooks } from "./dispatch";
import { EventDispatcher } from "./event-dispatcher";
import type { TaggedLine } from "./line";
import { Metrics } from "./metrics";
import { defaultOutput, printLine } from "./output";
import {
  EveryRule,
  PatternRule,
  PredicateRule,
  RangeRule,
  type LineRule,
  type RuleOptions,
} from "./rules";
import {
  GrepStage,
  LineNumberingStage,
  RuleStage,
  SplitStage,
  type PipelineStage,
} from "./stages";
import { RangeStates } from "./state-machine";

/**
 * Rule engine over one sequence of text lines.
 *
 * Rules can live in two places:
 * - as pipeline stages (placement "stage", the default), where they run
 *   while lines are pulled, whether by `run()` or by iterating the engine;
 * - as central handlers (`main()`, or placement "central"), run by `run()`
 *   in registration order with Continue and Replace semantics.
 *
 * Stages observe each line in registration order: the first stage added
 * sits closest to the source and fires first.
 *
 * @example
 * ```typescript
 * const engine = awkish(linesFromFile("schema.sql"), { state: { sql: "" } });
 *
 * engine.range(/CREATE TABLE/, /\);/)((ctx, line) => {
 *   ctx.state.sql += `line ${ctx.range.lineNumber}: ${line.text}`;
 * });
 *
 * engine.run();
 * ```
 */
export class LineEngine<S extends object = Record<string, unknown>>
  implements Iterable<TaggedLine>
{
  readonly context: ProcessingContext<S>;
  readonly metrics = new Metrics();

  private readonly source: LineNumberingStage;
  private head: PipelineStage;
  private beginHandlers: BeginHandler<S>[] = [];
  private readonly mainHandlers: LineHandler<S>[] = [];
  private readonly placement: RulePlacement;
  private readonly output: OutputSink;
  private readonly dispatcher: EventDispatcher;
  private readonly ruleOptions: RuleOptions;
  private readonly dispatchHooks: DispatchHooks;

  constructor(
    source: Iterable<string>,
    state: S,
    settings: EngineSettings = {},
  ) {
    const parsed = EngineOptionsSchema.safeParse({ ...settings, state });
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new EngineError(`Invalid engine options: ${issues}`, {
        code: EngineErrorCodes.INVALID_OPTIONS,
        metadata: { issues: parsed.error.issues },
      });
    }

    this.context = new ProcessingContext(state);
    this.placement = settings.placement ?? "stage";
    this.output = settings.output ?? defaultOutput();
    this.dispatcher = new EventDispatcher(settings.context);
    if (settings.onEvent) this.dispatcher.onEvent(settings.onEvent);

    this.source = new LineNumberingStage(source, this.metrics);
    this.head = this.source;
    this.ruleOptions = { metrics: this.metrics };
    this.dispatchHooks = {
      metrics: this.metrics,
      onContinue: (line, handlerIndex, skipped) =>
        this.dispatcher.emit({
          type: EventType.DISPATCH_CONTINUE,
          lineNumber: line.lineNumber,
          handlerIndex,
          skipped,
        }),
      onReplace: (line, handlerIndex) =>
        this.dispatcher.emit({
          type: EventType.DISPATCH_REPLACE,
          lineNumber: line.lineNumber,
          handlerIndex,
        }),
    };
  }

  /**
   * Identifier attached to every event of this engine
   */
  get runId(): string {
    return this.dispatcher.getRunId();
  }

  /**
   * Lines numbered by the source so far
   */
  get linesRead(): number {
    return this.source.linesRead;
  }

  /**
   * Register an observability event handler
   */
  onEvent(handler: EngineEventHandler): void {
    this.dispatcher.onEvent(handler);
  }

  // ==========================================================================
  // Central handlers
  // ==========================================================================

  /**
   * Register a handler to run once, before the first line of `run()`
   */
  begin(handler: BeginHandler<S>): this {
    this.beginHandlers.push(handler);
    return this;
  }

  /**
   * Register a central handler, run by `run()` for every line
   */
  main(handler: LineHandler<S>): this {
    const rule = new EveryRule(handler, this.ruleOptions);
    this.mainHandlers.push(rule.asHandler());
    return this;
  }

  // ==========================================================================
  // Rules
  // ==========================================================================

  /**
   * Rule that fires on every line
   */
  every(handler: LineHandler<S> = this.defaultHandler()): LineHandler<S> {
    this.addRule(new EveryRule(handler, this.ruleOptions));
    return handler;
  }

  /**
   * Rule that fires on lines containing a match for `pattern`; the match is
   * available as `context.match`. An empty pattern matches every line.
   * A malformed pattern throws INVALID_PATTERN here, not on first use.
   */
  pattern(pattern: PatternSource = ""): RuleDecorator<S> {
    const compiled = compilePattern(pattern);
    return (handler = this.defaultHandler()) => {
      this.addRule(new PatternRule(compiled, handler, this.ruleOptions));
      return handler;
    };
  }

  /**
   * Rule that fires on each line from a `start` match through the next
   * `end` match. `context.range` holds the position within the range.
   */
  range(start: PatternSource, end: PatternSource): RuleDecorator<S> {
    const startPattern = compilePattern(start);
    const endPattern = compilePattern(end);
    return (handler = this.defaultHandler()) => {
      const rule = new RangeRule(
        startPattern,
        endPattern,
        handler,
        this.ruleOptions,
      );
      rule.stateMachine.subscribe((state, line) => {
        if (state === RangeStates.INSIDE) {
          this.dispatcher.emit({
            type: EventType.RANGE_START,
            lineNumber: line.lineNumber,
          });
        } else {
          this.dispatcher.emit({
            type: EventType.RANGE_END,
            lineNumber: line.lineNumber,
          });
        }
      });
      this.addRule(rule);
      return handler;
    };
  }

  /**
   * Rule that fires when `predicate` returns a truthy value, which is
   * available as `context.predicateValue`. Errors thrown by the predicate
   * reach the caller.
   */
  when(predicate: LinePredicate<S>): RuleDecorator<S> {
    return (handler = this.defaultHandler()) => {
      this.addRule(new PredicateRule(predicate, handler, this.ruleOptions));
      return handler;
    };
  }

  // ==========================================================================
  // Transforms
  // ==========================================================================

  /**
   * Keep only lines matching at least one of `patterns`
   */
  grep(...patterns: PatternSource[]): this {
    this.head = new GrepStage(this.head, patterns, this.metrics);
    return this;
  }

  /**
   * Attach `fields` to every line
   */
  split(separator?: string, maxSplit = -1): this {
    this.head = new SplitStage(this.head, separator, maxSplit);
    return this;
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  /**
   * Iterate the pipeline directly. Rules placed as stages still fire;
   * central handlers do not. The iterator is shared with `run()`, so lines
   * taken here are not seen by a later run.
   */
  [Symbol.iterator](): Iterator<TaggedLine> {
    return this.head;
  }

  /**
   * Run begin handlers (first call only), then pull every remaining line
   * through the pipeline and the central handlers.
   *
   * Errors from handlers and predicates abort the run and are rethrown
   * unchanged after a RUN_ERROR event.
   */
  run(): RunResult<S> {
    const startTime = Date.now();
    const dispatchedBefore = this.metrics.linesDispatched;
    let lineNumber: number | undefined;

    this.dispatcher.emit({
      type: EventType.RUN_START,
      beginHandlers: this.beginHandlers.length,
      mainHandlers: this.mainHandlers.length,
    });

    try {
      if (this.beginHandlers.length > 0) {
        const handlers = this.beginHandlers;
        for (const handler of handlers) {
          handler(this.context);
        }
        this.beginHandlers = [];
        this.dispatcher.emit({
          type: EventType.BEGIN_COMPLETE,
          count: handlers.length,
        });
      }

      for (
        let line = this.head.pull();
        line !== undefined;
        line = this.head.pull()
      ) {
        lineNumber = line.lineNumber;
        this.metrics.linesDispatched++;
        dispatchLine(
          this.mainHandlers,
          this.context,
          line,
          this.dispatchHooks,
        );
      }
    } catch (error) {
      this.dispatcher.emit({
        type: EventType.RUN_ERROR,
        error: describeError(error),
        lineNumber,
      });
      throw error;
    }

    const duration = Date.now() - startTime;
    const linesDispatched = this.metrics.linesDispatched - dispatchedBefore;

    this.dispatcher.emit({
      type: EventType.RUN_END,
      linesRead: this.source.linesRead,
      linesDispatched,
      duration,
    });

    return {
      runId: this.runId,
      linesRead: this.source.linesRead,
      linesDispatched,
      state: this.context.state,
      metrics: this.metrics.snapshot(),
      duration,
    };
  }

  private addRule(rule: LineRule<S>): void {
    if (this.placement === "central") {
      this.mainHandlers.push((context, line) => rule.apply(context, line));
    } else {
      this.head = new RuleStage(this.head, rule, this.context);
    }
  }

  private defaultHandler(): LineHandler<S> {
    return printLine(this.output);
  }
}

/**
 * Create an engine over a sequence of lines.
 *
 * @example
 * ```typescript
 * const engine = awkish(linesFromText(text), { state: { words: 0 } });
 *
 * engine.every((ctx, line) => {
 *   ctx.state.words += line.split().length;
 * });
 *
 * const { state } = engine.run();
 * ```
 */
export function awkish(
  source: Iterable<string>,
  options?: EngineSettings,
): LineEngine<Record<string, unknown>>;
export function awkish<S extends object>(
  source: Iterable<string>,
  options: EngineOptions<S> & { state: S },
): LineEngine<S>;
export function awkish<S extends object>(
  source: Iterable<string>,
  options: EngineOptions<S> = {},
): LineEngine<S> | LineEngine<Record<string, unknown>> {
  const { state, ...settings } = options;
  if (state !== undefined) {
    return new LineEngine(source, state, settings);
  }
  return new LineEngine<Record<string, unknown>>(source, {}, settings);
}
