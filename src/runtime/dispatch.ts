// Central dispatch: run ordered handlers over one line

import type { LineHandler } from "../types/engine";
import type { ProcessingContext } from "./context";
import { toResult } from "./flow";
import type { TaggedLine } from "./line";
import type { Metrics } from "./metrics";

/**
 * Callbacks for dispatch decisions, used for events and counters
 */
export interface DispatchHooks {
  metrics?: Metrics;
  onContinue?: (
    line: TaggedLine,
    handlerIndex: number,
    skipped: number,
  ) => void;
  onReplace?: (line: TaggedLine, handlerIndex: number) => void;
}

export interface DispatchOutcome {
  /**
   * The line as the last handler saw it
   */
  line: TaggedLine;

  /**
   * True when a handler returned Continue
   */
  continued: boolean;
}

/**
 * Run `handlers` in order over one line.
 *
 * - Continue stops the remaining handlers for this line only.
 * - Replace hands the new line to the remaining handlers; a string keeps
 *   the current line number.
 * - Anything else, including no return value, carries on unchanged.
 */
export function dispatchLine<S extends object>(
  handlers: readonly LineHandler<S>[],
  context: ProcessingContext<S>,
  line: TaggedLine,
  hooks: DispatchHooks = {},
): DispatchOutcome {
  const { metrics, onContinue, onReplace } = hooks;
  let current = line;

  for (const [index, handler] of handlers.entries()) {
    const result = toResult(handler(context, current));

    switch (result.kind) {
      case "continue":
        if (metrics) metrics.continues++;
        onContinue?.(current, index, handlers.length - index - 1);
        return { line: current, continued: true };

      case "replace":
        current =
          typeof result.line === "string"
            ? current.withText(result.line)
            : result.line;
        if (metrics) metrics.replacements++;
        onReplace?.(current, index);
        break;

      case "proceed":
        break;
    }
  }

  return { line: current, continued: false };
}
