// Simple metrics collection for the engine
// Lightweight counters, one set per engine

/**
 * Counters for one engine.
 * Just counters - no histograms, no timings.
 */
export class Metrics {
  /** Lines numbered by the source stage */
  linesRead = 0;

  /** Lines that reached the dispatch loop */
  linesDispatched = 0;

  /** Lines dropped by grep stages */
  linesFiltered = 0;

  /** Rule and main handler invocations */
  handlerCalls = 0;

  /** Dispatches cut short by Continue */
  continues = 0;

  /** Lines replaced by a handler */
  replacements = 0;

  /** Range activations */
  rangesOpened = 0;

  /** Ranges closed by their end pattern */
  rangesClosed = 0;

  /**
   * Reset all counters
   */
  reset(): void {
    this.linesRead = 0;
    this.linesDispatched = 0;
    this.linesFiltered = 0;
    this.handlerCalls = 0;
    this.continues = 0;
    this.replacements = 0;
    this.rangesOpened = 0;
    this.rangesClosed = 0;
  }

  /**
   * Get snapshot of all metrics
   */
  snapshot(): MetricsSnapshot {
    return {
      linesRead: this.linesRead,
      linesDispatched: this.linesDispatched,
      linesFiltered: this.linesFiltered,
      handlerCalls: this.handlerCalls,
      continues: this.continues,
      replacements: this.replacements,
      rangesOpened: this.rangesOpened,
      rangesClosed: this.rangesClosed,
    };
  }

  /**
   * Serialize for logging
   */
  toJSON(): MetricsSnapshot {
    return this.snapshot();
  }
}

/**
 * Metrics snapshot type
 */
export interface MetricsSnapshot {
  linesRead: number;
  linesDispatched: number;
  linesFiltered: number;
  handlerCalls: number;
  continues: number;
  replacements: number;
  rangesOpened: number;
  rangesClosed: number;
}

/**
 * Create a new metrics instance
 */
export function createMetrics(): Metrics {
  return new Metrics();
}
