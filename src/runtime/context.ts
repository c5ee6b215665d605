// Shared processing context with scoped match data

import { EngineError, EngineErrorCodes } from "../utils/errors";

/**
 * Position inside an active range
 */
export interface RangeScope {
  /**
   * Lines seen since the range opened, the opening line being 1
   */
  readonly lineNumber: number;

  /**
   * True only on the line that matched the end pattern
   */
  readonly isLastLine: boolean;

  /**
   * Start match, or the end match on the last line
   */
  readonly match: RegExpExecArray;
}

/**
 * Transient data visible to exactly one handler invocation
 */
export type MatchScope =
  | { kind: "pattern"; match: RegExpExecArray }
  | { kind: "range"; range: RangeScope }
  | { kind: "predicate"; value: unknown };

/**
 * Context handed to every handler of an engine.
 *
 * `state` is the persistent, caller-owned record. Match data is installed
 * by `withScope()` around a single handler call and is gone once that call
 * returns or throws, so a handler never sees another rule's match.
 */
export class ProcessingContext<S extends object> {
  private scope: MatchScope | undefined;

  constructor(readonly state: S) {}

  /**
   * Regex match of the rule that invoked the current handler
   */
  get match(): RegExpExecArray | undefined {
    const scope = this.scope;
    if (!scope) return undefined;
    switch (scope.kind) {
      case "pattern":
        return scope.match;
      case "range":
        return scope.range.match;
      default:
        return undefined;
    }
  }

  /**
   * Active range data. Throws RANGE_NOT_ACTIVE outside a range handler.
   */
  get range(): RangeScope {
    const scope = this.scope;
    if (scope?.kind !== "range") {
      throw new EngineError("No range is active for this handler", {
        code: EngineErrorCodes.RANGE_NOT_ACTIVE,
      });
    }
    return scope.range;
  }

  get inRange(): boolean {
    return this.scope?.kind === "range";
  }

  /**
   * Value returned by the predicate of the current `when()` rule
   */
  get predicateValue(): unknown {
    const scope = this.scope;
    return scope?.kind === "predicate" ? scope.value : undefined;
  }

  get scopeKind(): MatchScope["kind"] | undefined {
    return this.scope?.kind;
  }

  /**
   * Run `fn` with `scope` installed, restoring the previous scope after
   */
  withScope<T>(scope: MatchScope, fn: () => T): T {
    const previous = this.scope;
    this.scope = scope;
    try {
      return fn();
    } finally {
      this.scope = previous;
    }
  }
}

/**
 * Create a processing context around a state object
 */
export function createProcessingContext<S extends object>(
  state: S,
): ProcessingContext<S> {
  return new ProcessingContext(state);
}
