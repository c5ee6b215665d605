// Pattern compilation for line rules

import { EngineError, EngineErrorCodes, describeError } from "./errors";

/**
 * A rule pattern: regex source text or a prebuilt RegExp
 */
export type PatternSource = string | RegExp;

/**
 * Compile a pattern into a RegExp with search semantics.
 *
 * Strings go through `new RegExp`, so a malformed pattern fails here, at
 * registration, rather than on the first line. The global and sticky flags
 * are dropped from RegExp inputs: both make `exec` depend on `lastIndex`
 * and a rule must give the same answer for the same line every time.
 */
export function compilePattern(source: PatternSource): RegExp {
  if (source instanceof RegExp) {
    const flags = source.flags.replace(/[gy]/g, "");
    return flags === source.flags ? source : new RegExp(source.source, flags);
  }

  try {
    return new RegExp(source);
  } catch (error) {
    throw new EngineError(
      `Invalid pattern: ${describeError(error)}`,
      { code: EngineErrorCodes.INVALID_PATTERN, pattern: source },
      { cause: error },
    );
  }
}

/**
 * Search a line for a pattern, anywhere in the text
 */
export function search(
  pattern: RegExp,
  text: string,
): RegExpExecArray | undefined {
  return pattern.exec(text) ?? undefined;
}
