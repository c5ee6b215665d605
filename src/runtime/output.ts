// Default print handler

import type { LineHandler, OutputSink } from "../types/engine";

/**
 * Handler that writes the raw line text, terminator included, to `sink`.
 * This is what a rule runs when it is registered without a handler.
 */
export function printLine<S extends object>(sink: OutputSink): LineHandler<S> {
  return (_context, line) => {
    sink.write(line.text);
  };
}

/**
 * Sink used when no `output` option is given
 */
export function defaultOutput(): OutputSink {
  return process.stdout;
}

/**
 * In-memory sink, handy for collecting printed lines
 */
export class BufferedOutput implements OutputSink {
  private chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  /**
   * Everything written so far
   */
  toString(): string {
    return this.chunks.join("");
  }

  clear(): void {
    this.chunks = [];
  }
}
