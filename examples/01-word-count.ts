// Word and line counts, like `wc -lw`
// Run: npx tsx examples/01-word-count.ts [file]

import { awkish, linesFromFile, linesFromText } from "../src/index";

const SAMPLE = `The quick brown fox
jumps over
the lazy dog
`;

function main() {
  const [path] = process.argv.slice(2);
  const source = path ? linesFromFile(path) : linesFromText(SAMPLE);

  const engine = awkish(source, { state: { lines: 0, words: 0 } });

  engine.every((ctx, line) => {
    ctx.state.lines++;
    ctx.state.words += line.split().length;
  });

  const { state, duration } = engine.run();
  console.log(`${state.lines} lines, ${state.words} words (${duration}ms)`);
}

main();
