// Tagged lines: the record type that flows through every stage

import { splitFields } from "../utils/split";

/**
 * One input line together with its position in the source.
 *
 * `text` keeps the line terminator. `toString()` returns the text, so
 * `[...engine].join("")` rebuilds the input when nothing filters it.
 */
export class TaggedLine {
  /**
   * Fields attached by a split stage
   */
  fields?: string[];

  constructor(
    readonly text: string,
    readonly lineNumber: number,
  ) {}

  /**
   * A new line with different text at the same position
   */
  withText(text: string): TaggedLine {
    return new TaggedLine(text, this.lineNumber);
  }

  /**
   * Split the text into fields without attaching them
   */
  split(separator?: string, maxSplit = -1): string[] {
    return splitFields(this.text, separator, maxSplit);
  }

  toString(): string {
    return this.text;
  }
}
