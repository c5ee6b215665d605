// Error types for the awkish engine

/**
 * Error codes for engine errors
 */
export const EngineErrorCodes = {
  INVALID_PATTERN: "INVALID_PATTERN",
  INVALID_SEPARATOR: "INVALID_SEPARATOR",
  INVALID_OPTIONS: "INVALID_OPTIONS",
  RANGE_NOT_ACTIVE: "RANGE_NOT_ACTIVE",
} as const;

export type EngineErrorCode =
  (typeof EngineErrorCodes)[keyof typeof EngineErrorCodes];

/**
 * Context information for engine errors
 */
export interface EngineErrorContext {
  /**
   * Error code for programmatic handling
   */
  code: EngineErrorCode;

  /**
   * Pattern text that failed to compile, if any
   */
  pattern?: string;

  /**
   * Line number being processed when the error occurred
   */
  lineNumber?: number;

  /**
   * Additional context data
   */
  metadata?: Record<string, unknown>;
}

/**
 * Error raised by the engine for usage mistakes: bad patterns, bad
 * options, or reading range data outside a range.
 *
 * Errors thrown by handlers and predicates are never wrapped in this
 * class; they reach the caller unchanged.
 */
export class EngineError extends Error {
  /**
   * Error code for programmatic handling
   */
  readonly code: EngineErrorCode;

  readonly context: EngineErrorContext;

  /**
   * Timestamp when error occurred
   */
  readonly timestamp: number;

  constructor(
    message: string,
    context: EngineErrorContext,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "EngineError";
    this.code = context.code;
    this.context = context;
    this.timestamp = Date.now();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /**
   * Create a descriptive string with context
   */
  toDetailedString(): string {
    const parts = [this.message];

    if (this.context.pattern !== undefined) {
      parts.push(`Pattern: ${this.context.pattern}`);
    }
    if (this.context.lineNumber !== undefined) {
      parts.push(`Line: ${this.context.lineNumber}`);
    }

    return parts.join(" | ");
  }

  /**
   * Serialize error for logging/transport
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      pattern: this.context.pattern,
      lineNumber: this.context.lineNumber,
      metadata: this.context.metadata,
    };
  }
}

/**
 * Type guard for EngineError
 */
export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

/**
 * Render an unknown thrown value as a message string
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
