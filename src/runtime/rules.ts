// Line rules: the matching logic shared by pipeline stages and the
// central dispatch loop

import type {
  HandlerResult,
  LineHandler,
  LinePredicate,
} from "../types/engine";
import { compilePattern, search, type PatternSource } from "../utils/regex";
import type { MatchScope, ProcessingContext, RangeScope } from "./context";
import type { TaggedLine } from "./line";
import type { Metrics } from "./metrics";
import { RangeStateMachine, RangeStates } from "./state-machine";

export type RuleKind = "pattern" | "range" | "predicate" | "every";

export interface RuleOptions {
  /**
   * Counters to update on every handler call and range transition
   */
  metrics?: Metrics;
}

/**
 * A rule decides whether its handler runs for a line and with which
 * match scope. The handler's result is passed back unchanged, or
 * `undefined` when the rule did not fire.
 */
export interface LineRule<S extends object> {
  readonly kind: RuleKind;
  apply(context: ProcessingContext<S>, line: TaggedLine): HandlerResult | void;
}

abstract class BaseRule<S extends object> implements LineRule<S> {
  abstract readonly kind: RuleKind;

  protected constructor(
    protected readonly handler: LineHandler<S>,
    protected readonly metrics: Metrics | undefined,
  ) {}

  abstract apply(
    context: ProcessingContext<S>,
    line: TaggedLine,
  ): HandlerResult | void;

  /**
   * This rule as a plain handler for `main()`
   */
  asHandler(): LineHandler<S> {
    return (context, line) => this.apply(context, line);
  }

  protected invoke(
    context: ProcessingContext<S>,
    line: TaggedLine,
    scope?: MatchScope,
  ): HandlerResult | void {
    if (this.metrics) this.metrics.handlerCalls++;
    if (!scope) return this.handler(context, line);
    return context.withScope(scope, () => this.handler(context, line));
  }
}

/**
 * Runs its handler on every line containing a match for the pattern.
 * An empty pattern matches every line.
 */
export class PatternRule<S extends object> extends BaseRule<S> {
  readonly kind = "pattern";
  private readonly pattern: RegExp;

  constructor(
    pattern: PatternSource,
    handler: LineHandler<S>,
    options: RuleOptions = {},
  ) {
    super(handler, options.metrics);
    this.pattern = compilePattern(pattern);
  }

  apply(
    context: ProcessingContext<S>,
    line: TaggedLine,
  ): HandlerResult | void {
    const match = search(this.pattern, line.text);
    if (!match) return undefined;
    return this.invoke(context, line, { kind: "pattern", match });
  }
}

interface ActiveRange {
  lineNumber: number;
  isLastLine: boolean;
  match: RegExpExecArray;
}

/**
 * Runs its handler on every line from a start-pattern match through the
 * next end-pattern match, both inclusive.
 *
 * The end pattern is tested on the opening line as well, so a line that
 * matches both patterns is a complete one-line range. The start pattern
 * is not tested again until the range has closed.
 *
 * @example
 * ```typescript
 * const rule = new RangeRule(/CREATE TABLE/, /\);/, (ctx, line) => {
 *   ctx.state.sql += line.text;
 *   if (ctx.range.isLastLine) flush(ctx.state);
 * });
 * ```
 */
export class RangeRule<S extends object> extends BaseRule<S> {
  readonly kind = "range";
  readonly stateMachine = new RangeStateMachine();
  private readonly start: RegExp;
  private readonly end: RegExp;
  private active: ActiveRange | undefined;

  constructor(
    start: PatternSource,
    end: PatternSource,
    handler: LineHandler<S>,
    options: RuleOptions = {},
  ) {
    super(handler, options.metrics);
    this.start = compilePattern(start);
    this.end = compilePattern(end);
  }

  get inRange(): boolean {
    return this.stateMachine.is(RangeStates.INSIDE);
  }

  apply(
    context: ProcessingContext<S>,
    line: TaggedLine,
  ): HandlerResult | void {
    let active = this.active;
    if (active === undefined) {
      const startMatch = search(this.start, line.text);
      if (!startMatch) return undefined;

      active = { lineNumber: 0, isLastLine: false, match: startMatch };
      this.active = active;
      if (this.metrics) this.metrics.rangesOpened++;
      this.stateMachine.transition(RangeStates.INSIDE, line);
    }

    active.lineNumber += 1;
    const endMatch = search(this.end, line.text);
    if (endMatch) {
      active.isLastLine = true;
      active.match = endMatch;
    }

    // Handlers get a snapshot so a retained reference does not move
    const range: RangeScope = Object.freeze({ ...active });
    const result = this.invoke(context, line, { kind: "range", range });

    if (endMatch) {
      this.active = undefined;
      if (this.metrics) this.metrics.rangesClosed++;
      this.stateMachine.transition(RangeStates.OUTSIDE, line);
    }
    return result;
  }
}

/**
 * Runs its handler when the predicate returns a truthy value
 */
export class PredicateRule<S extends object> extends BaseRule<S> {
  readonly kind = "predicate";

  constructor(
    private readonly predicate: LinePredicate<S>,
    handler: LineHandler<S>,
    options: RuleOptions = {},
  ) {
    super(handler, options.metrics);
  }

  apply(
    context: ProcessingContext<S>,
    line: TaggedLine,
  ): HandlerResult | void {
    const value = this.predicate(context, line);
    if (!value) return undefined;
    return this.invoke(context, line, { kind: "predicate", value });
  }
}

/**
 * Runs its handler on every line
 */
export class EveryRule<S extends object> extends BaseRule<S> {
  readonly kind = "every";

  constructor(handler: LineHandler<S>, options: RuleOptions = {}) {
    super(handler, options.metrics);
  }

  apply(
    context: ProcessingContext<S>,
    line: TaggedLine,
  ): HandlerResult | void {
    return this.invoke(context, line);
  }
}

/**
 * Wrap a handler so it only runs on lines matching `pattern`.
 * Use with `engine.main()` to mix central rules with pipeline stages.
 */
export function patternHandler<S extends object>(
  pattern: PatternSource,
  handler: LineHandler<S>,
): LineHandler<S> {
  return new PatternRule(pattern, handler).asHandler();
}

/**
 * Wrap a handler so it only runs inside `start`..`end` ranges
 */
export function rangeHandler<S extends object>(
  start: PatternSource,
  end: PatternSource,
  handler: LineHandler<S>,
): LineHandler<S> {
  return new RangeRule(start, end, handler).asHandler();
}

/**
 * Wrap a handler so it only runs when `predicate` is truthy
 */
export function whenHandler<S extends object>(
  predicate: LinePredicate<S>,
  handler: LineHandler<S>,
): LineHandler<S> {
  return new PredicateRule(predicate, handler).asHandler();
}
