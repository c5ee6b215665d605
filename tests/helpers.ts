// Shared fixtures for engine tests

import { readFileSync } from "fs";
import { BufferedOutput } from "../src/runtime/output";

export const SAMPLE_PATH = new URL("./fixtures/lorem.txt", import.meta.url);

/**
 * The 13-line sample text, terminators included
 */
export const SAMPLE = readFileSync(SAMPLE_PATH, "utf8");

/**
 * The sample split into lines, each ending in "\n"
 */
export const SAMPLE_LINES = SAMPLE.split("\n")
  .slice(0, -1)
  .map((line) => `${line}\n`);

/**
 * A sink for tests that must not write to stdout
 */
export function createSink(): BufferedOutput {
  return new BufferedOutput();
}
