// Input sources: turn text into the line sequences the engine consumes
//
// Every line keeps its "\n" terminator. A final line without one is still
// yielded, unterminated.

import { readFileSync } from "fs";

/**
 * Lazily split text into lines
 *
 * @example
 * ```typescript
 * [...linesFromText("a\nb\nc")]; // ["a\n", "b\n", "c"]
 * ```
 */
export function* linesFromText(
  text: string,
): Generator<string, void, undefined> {
  let start = 0;
  while (start < text.length) {
    const end = text.indexOf("\n", start);
    if (end === -1) {
      yield text.slice(start);
      return;
    }
    yield text.slice(start, end + 1);
    start = end + 1;
  }
}

/**
 * Reassemble lines from text cut at arbitrary points, such as blocks
 * read from a file or chunks from a socket. A trailing partial line is
 * flushed once the chunks run out.
 */
export function* linesFromChunks(
  chunks: Iterable<string>,
): Generator<string, void, undefined> {
  let pending = "";
  for (const chunk of chunks) {
    pending += chunk;
    let end = pending.indexOf("\n");
    while (end !== -1) {
      yield pending.slice(0, end + 1);
      pending = pending.slice(end + 1);
      end = pending.indexOf("\n");
    }
  }
  if (pending.length > 0) {
    yield pending;
  }
}

/**
 * Read a whole file and split it into lines
 */
export function linesFromFile(
  path: string | URL,
  encoding: BufferEncoding = "utf8",
): Generator<string, void, undefined> {
  return linesFromText(readFileSync(path, encoding));
}
