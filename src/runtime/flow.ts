// Handler results for the dispatch loop

import type {
  ContinueResult,
  HandlerResult,
  ProceedResult,
  ReplaceResult,
} from "../types/engine";
import type { TaggedLine } from "./line";

/**
 * Keep going with the same line (same as returning nothing)
 */
export const Proceed: ProceedResult = Object.freeze({ kind: "proceed" });

/**
 * Skip the remaining handlers for the current line
 *
 * @example
 * ```typescript
 * engine.main((ctx, line) => {
 *   if (line.text.startsWith("#")) return Continue;
 * });
 * ```
 */
export const Continue: ContinueResult = Object.freeze({ kind: "continue" });

/**
 * Give the remaining handlers a different line
 */
export function replace(line: TaggedLine | string): ReplaceResult {
  return { kind: "replace", line };
}

/**
 * Normalize a handler return value
 */
export function toResult(value: HandlerResult | void): HandlerResult {
  return value ?? Proceed;
}
