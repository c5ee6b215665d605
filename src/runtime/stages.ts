// Pipeline stages: lazy, pull-based line transformers
//
// Every stage wraps exactly one upstream stage and hands on at most the
// line it just pulled. Chains are built by wrapping the current head.

import { compilePattern, search, type PatternSource } from "../utils/regex";
import { validateSplitArgs } from "../utils/split";
import type { ProcessingContext } from "./context";
import { TaggedLine } from "./line";
import type { Metrics } from "./metrics";
import type { LineRule } from "./rules";

/**
 * Base class for all stages. Subclasses implement `pull()`; the iterator
 * protocol is derived from it.
 */
export abstract class PipelineStage implements IterableIterator<TaggedLine> {
  /**
   * Next line, or undefined once the input is exhausted
   */
  abstract pull(): TaggedLine | undefined;

  next(): IteratorResult<TaggedLine> {
    const line = this.pull();
    return line === undefined
      ? { done: true, value: undefined }
      : { done: false, value: line };
  }

  [Symbol.iterator](): this {
    return this;
  }
}

/**
 * Innermost stage: tags raw source lines with their 1-based number.
 * Numbers are assigned here, before any filtering, so downstream stages
 * always see source positions.
 */
export class LineNumberingStage extends PipelineStage {
  private readonly source: Iterator<string>;
  private count = 0;

  constructor(
    source: Iterable<string>,
    private readonly metrics?: Metrics,
  ) {
    super();
    this.source = source[Symbol.iterator]();
  }

  /**
   * Lines numbered so far
   */
  get linesRead(): number {
    return this.count;
  }

  pull(): TaggedLine | undefined {
    const result = this.source.next();
    if (result.done) return undefined;

    this.count++;
    if (this.metrics) this.metrics.linesRead++;
    return new TaggedLine(result.value, this.count);
  }
}

/**
 * Applies a rule to every line as it passes. Never filters: the line is
 * handed on whether or not the rule fired, and handler results are
 * ignored.
 */
export class RuleStage<S extends object> extends PipelineStage {
  constructor(
    private readonly upstream: PipelineStage,
    readonly rule: LineRule<S>,
    private readonly context: ProcessingContext<S>,
  ) {
    super();
  }

  pull(): TaggedLine | undefined {
    const line = this.upstream.pull();
    if (line !== undefined) {
      this.rule.apply(this.context, line);
    }
    return line;
  }
}

/**
 * Hands on only the lines where at least one pattern matches.
 * With no patterns, nothing passes.
 */
export class GrepStage extends PipelineStage {
  private readonly patterns: RegExp[];

  constructor(
    private readonly upstream: PipelineStage,
    patterns: PatternSource[],
    private readonly metrics?: Metrics,
  ) {
    super();
    this.patterns = patterns.map(compilePattern);
  }

  pull(): TaggedLine | undefined {
    for (
      let line = this.upstream.pull();
      line !== undefined;
      line = this.upstream.pull()
    ) {
      const text = line.text;
      if (this.patterns.some((pattern) => search(pattern, text))) {
        return line;
      }
      if (this.metrics) this.metrics.linesFiltered++;
    }
    return undefined;
  }
}

/**
 * Attaches `fields` to every line
 */
export class SplitStage extends PipelineStage {
  constructor(
    private readonly upstream: PipelineStage,
    private readonly separator?: string,
    private readonly maxSplit = -1,
  ) {
    super();
    validateSplitArgs(separator, maxSplit);
  }

  pull(): TaggedLine | undefined {
    const line = this.upstream.pull();
    if (line !== undefined) {
      line.fields = line.split(this.separator, this.maxSplit);
    }
    return line;
  }
}
