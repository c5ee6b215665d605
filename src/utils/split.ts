// Field splitting for lines

import { SplitArgsSchema } from "../zod/engine";
import { EngineError, EngineErrorCodes } from "./errors";

const WHITESPACE = /\s/;

function isSpace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

/**
 * Check split arguments up front so a bad call fails at registration
 */
export function validateSplitArgs(
  separator: string | undefined,
  maxSplit: number,
): void {
  const parsed = SplitArgsSchema.safeParse({ separator, maxSplit });
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = issue?.path.join(".") ?? "split";
    throw new EngineError(
      `Invalid split arguments: ${field}: ${issue?.message ?? "rejected"}`,
      {
        code: EngineErrorCodes.INVALID_SEPARATOR,
        metadata: { separator, maxSplit },
      },
    );
  }
}

/**
 * Split text into fields.
 *
 * Without a separator, runs of whitespace separate fields and leading or
 * trailing whitespace produces no empty fields. With a separator, every
 * occurrence splits and empty fields are kept. A non-negative `maxSplit`
 * caps the number of splits; the rest of the text becomes the last field
 * as is (minus leading whitespace in whitespace mode).
 *
 * @example
 * ```typescript
 * splitFields("  a  b c\n");        // ["a", "b", "c"]
 * splitFields("a b  c \n", undefined, 1); // ["a", "b  c \n"]
 * splitFields("a,,b", ",");         // ["a", "", "b"]
 * ```
 */
export function splitFields(
  text: string,
  separator?: string,
  maxSplit = -1,
): string[] {
  validateSplitArgs(separator, maxSplit);
  return separator === undefined
    ? splitWhitespace(text, maxSplit)
    : splitSeparator(text, separator, maxSplit);
}

function splitWhitespace(text: string, maxSplit: number): string[] {
  const fields: string[] = [];
  const length = text.length;
  let i = 0;

  while (i < length) {
    while (i < length && isSpace(text.charAt(i))) i++;
    if (i >= length) break;

    if (maxSplit >= 0 && fields.length === maxSplit) {
      fields.push(text.slice(i));
      break;
    }

    let j = i;
    while (j < length && !isSpace(text.charAt(j))) j++;
    fields.push(text.slice(i, j));
    i = j;
  }

  return fields;
}

function splitSeparator(
  text: string,
  separator: string,
  maxSplit: number,
): string[] {
  const fields: string[] = [];
  let start = 0;

  while (maxSplit < 0 || fields.length < maxSplit) {
    const index = text.indexOf(separator, start);
    if (index === -1) break;
    fields.push(text.slice(start, index));
    start = index + separator.length;
  }
  fields.push(text.slice(start));

  return fields;
}
