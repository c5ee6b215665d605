// Tests for LineEngine and awkish()

import { describe, it, expect, vi } from "vitest";
import { awkish, LineEngine } from "../src/runtime/engine";
import { Continue, replace } from "../src/runtime/flow";
import type { TaggedLine } from "../src/runtime/line";
import { patternHandler, rangeHandler } from "../src/runtime/rules";
import { linesFromFile, linesFromText } from "../src/sources";
import { EngineError, EngineErrorCodes } from "../src/utils/errors";
import { SAMPLE, SAMPLE_LINES, SAMPLE_PATH, createSink } from "./helpers";

function sampleEngine() {
  return awkish(linesFromText(SAMPLE), { output: createSink() });
}

describe("iteration", () => {
  it("should reproduce the input when nothing filters", () => {
    const engine = sampleEngine();
    expect([...engine].join("")).toBe(SAMPLE);
  });

  it("should reproduce the input through observing stages", () => {
    const engine = awkish(linesFromText(SAMPLE), {
      state: { hits: 0 },
      output: createSink(),
    });
    engine.pattern("dolor")((ctx) => {
      ctx.state.hits++;
    });
    engine.range("aliqua", "consequat")(() => {});
    engine.when((_ctx, line) => line.text.length > 30)(() => {});
    engine.every(() => {});

    expect([...engine].join("")).toBe(SAMPLE);
    expect(engine.context.state.hits).toBe(4);
  });

  it("should number lines from 1 without gaps", () => {
    const numbers = [...sampleEngine()].map((line) => line.lineNumber);
    expect(numbers).toEqual(Array.from({ length: 13 }, (_, i) => i + 1));
  });

  it("should read lines from a file", () => {
    const engine = awkish(linesFromFile(SAMPLE_PATH));
    expect([...engine].map((line) => line.text)).toEqual(SAMPLE_LINES);
  });
});

describe("grep()", () => {
  it("should yield the single matching line with its source number", () => {
    const lines = [...sampleEngine().grep("anim")];
    expect(lines).toHaveLength(1);
    expect(lines[0]?.text).toBe("qui officia deserunt mollit anim id\n");
    expect(lines[0]?.lineNumber).toBe(12);
  });

  it("should yield every matching line in order", () => {
    const text = [...sampleEngine().grep("lit")].join("");
    expect(text).toBe(
      "adipiscing elit, sed do eiusmod tempor\n" +
        "in reprehenderit in voluptate velit\n" +
        "qui officia deserunt mollit anim id\n",
    );
  });

  it("should combine several patterns with OR", () => {
    const text = [...sampleEngine().grep("anim", "occaecat")].join("");
    expect(text).toBe(
      "pariatur. Excepteur sint occaecat\n" +
        "qui officia deserunt mollit anim id\n",
    );
  });

  it("should not duplicate lines for repeated patterns", () => {
    const once = [...sampleEngine().grep("dolor")].map((l) => l.lineNumber);
    const twice = [...sampleEngine().grep("dolor", "dolor")].map(
      (l) => l.lineNumber,
    );
    expect(once).toEqual([1, 3, 7, 9]);
    expect(twice).toEqual(once);
  });

  it("should yield nothing without patterns", () => {
    expect([...sampleEngine().grep()]).toEqual([]);
  });

  it("should keep source numbering after filtering twice", () => {
    const lines = [...sampleEngine().grep("dolor").grep("magna|nulla")];
    expect(lines.map((l) => l.lineNumber)).toEqual([3, 9]);
  });
});

describe("split()", () => {
  it("should attach whitespace fields", () => {
    const [line] = [...sampleEngine().grep("anim").split()];
    expect(line?.fields).toEqual([
      "qui",
      "officia",
      "deserunt",
      "mollit",
      "anim",
      "id",
    ]);
    expect(line?.fields?.[4]).toBe("anim");
  });

  it("should honor separator and maxSplit", () => {
    const [line] = [...sampleEngine().grep("^aliqua").split(" ", 2)];
    expect(line?.fields).toEqual(["aliqua.", "Ut", "enim ad minim veniam,\n"]);
  });

  it("should reject an empty separator at registration", () => {
    expect(() => sampleEngine().split("")).toThrow(EngineError);
  });
});

describe("run()", () => {
  it("should count 69 words over the sample", () => {
    const engine = awkish(linesFromText(SAMPLE), { state: { words: -1 } });

    engine.begin((ctx) => {
      ctx.state.words = 0;
    });
    engine.pattern()((ctx, line) => {
      ctx.state.words += line.split().length;
    });

    const result = engine.run();
    expect(result.state.words).toBe(69);
    expect(engine.context.state.words).toBe(69);
    expect(result.linesRead).toBe(13);
    expect(result.linesDispatched).toBe(13);
  });

  it("should collect pattern matches", () => {
    const engine = awkish(linesFromText(SAMPLE), { state: { data: "" } });
    engine.pattern(/(anim|occaecat)/)((ctx, line) => {
      ctx.state.data += line.text;
    });
    engine.run();

    expect(engine.context.state.data).toBe(
      "pariatur. Excepteur sint occaecat\n" +
        "qui officia deserunt mollit anim id\n",
    );
  });

  it("should expose capture groups on the context", () => {
    const words: string[] = [];
    const engine = awkish(linesFromText(SAMPLE), { state: { words } });
    engine.pattern(/mollit (\w+)/)((ctx) => {
      ctx.state.words.push(ctx.match?.[1] ?? "");
    });
    engine.run();

    expect(words).toEqual(["anim"]);
  });

  it("should track a multi-line range", () => {
    const seen: Array<[number, number, boolean]> = [];
    const engine = awkish(linesFromText(SAMPLE), { state: { data: "" } });

    engine.range("aliqua", "consequat")((ctx, line) => {
      ctx.state.data += line.text;
      seen.push([line.lineNumber, ctx.range.lineNumber, ctx.range.isLastLine]);
    });
    engine.run();

    expect(engine.context.state.data).toBe(
      "aliqua. Ut enim ad minim veniam,\n" +
        "quis nostrud exercitation ullamco\n" +
        "laboris nisi ut aliquip ex ea commodo\n" +
        "consequat. Duis aute irure dolor\n",
    );
    expect(seen).toEqual([
      [4, 1, false],
      [5, 2, false],
      [6, 3, false],
      [7, 4, true],
    ]);
  });

  it("should treat start and end on one line as a one-line range", () => {
    const seen: Array<[number, boolean]> = [];
    const engine = awkish(linesFromText(SAMPLE), { state: { data: "" } });

    engine.range("aliqua", "veniam")((ctx, line) => {
      ctx.state.data += line.text;
      seen.push([ctx.range.lineNumber, ctx.range.isLastLine]);
    });
    engine.run();

    expect(engine.context.state.data).toBe("aliqua. Ut enim ad minim veniam,\n");
    expect(seen).toEqual([[1, true]]);
  });

  it("should run begin handlers once across runs", () => {
    const begin = vi.fn();
    const engine = sampleEngine();
    engine.begin(begin).begin(begin);

    engine.run();
    engine.run();

    expect(begin).toHaveBeenCalledTimes(2);
    expect(begin).toHaveBeenCalledWith(engine.context);
  });

  it("should dispatch nothing on a second run over an exhausted source", () => {
    const engine = sampleEngine();
    const handler = vi.fn();
    engine.main(handler);

    expect(engine.run().linesDispatched).toBe(13);
    expect(engine.run().linesDispatched).toBe(0);
    expect(handler).toHaveBeenCalledTimes(13);
  });

  it("should run begin handlers before stage rules see the first line", () => {
    const order: string[] = [];
    const engine = sampleEngine();
    engine.every(() => {
      order.push("every");
    });
    engine.begin(() => {
      order.push("begin");
    });

    engine.run();
    expect(order[0]).toBe("begin");
    expect(order).toHaveLength(14);
  });

  it("should stop remaining main handlers on Continue for that line only", () => {
    const engine = awkish(linesFromText("keep\nskip\nkeep\n"), {
      state: { first: 0, second: 0 },
    });
    engine.main((ctx, line) => {
      ctx.state.first++;
      if (line.text.startsWith("skip")) return Continue;
    });
    engine.main((ctx) => {
      ctx.state.second++;
    });

    engine.run();
    expect(engine.context.state).toEqual({ first: 3, second: 2 });
  });

  it("should hand replaced lines to later main handlers", () => {
    const seen: TaggedLine[] = [];
    const engine = awkish(linesFromText("one\ntwo\n"));
    engine.main((_ctx, line) => replace(line.text.toUpperCase()));
    engine.main((_ctx, line) => {
      seen.push(line);
    });

    engine.run();
    expect(seen.map((line) => line.text)).toEqual(["ONE\n", "TWO\n"]);
    expect(seen.map((line) => line.lineNumber)).toEqual([1, 2]);
  });

  it("should propagate handler errors and stop the run", () => {
    const engine = awkish(linesFromText(SAMPLE), { state: { count: 0 } });
    engine.main((ctx, line) => {
      ctx.state.count++;
      if (line.lineNumber === 3) throw new Error("boom");
    });

    expect(() => engine.run()).toThrow("boom");
    expect(engine.context.state.count).toBe(3);
  });

  it("should propagate predicate errors", () => {
    const engine = sampleEngine();
    engine.when(() => {
      throw new TypeError("bad predicate");
    })(() => {});

    expect(() => engine.run()).toThrow(TypeError);
  });

  it("should report metrics in the result", () => {
    const engine = awkish(linesFromText(SAMPLE), { output: createSink() });
    engine.grep("dolor");
    engine.range("dolor", "magna")(() => {});
    engine.main(() => Continue);

    const { metrics } = engine.run();
    expect(metrics).toEqual({
      linesRead: 13,
      linesDispatched: 4,
      linesFiltered: 9,
      handlerCalls: 8,
      continues: 4,
      replacements: 0,
      rangesOpened: 2,
      rangesClosed: 1,
    });
  });
});

describe("default handler", () => {
  it("should print matched lines to the output sink", () => {
    const output = createSink();
    const engine = awkish(linesFromText(SAMPLE), { output });
    engine.pattern("anim|occaecat")();
    engine.run();

    expect(output.toString()).toBe(
      "pariatur. Excepteur sint occaecat\n" +
        "qui officia deserunt mollit anim id\n",
    );
  });

  it("should print range lines", () => {
    const output = createSink();
    const engine = awkish(linesFromText(SAMPLE), { output });
    engine.range("^quis", "^laboris")();
    engine.run();

    expect(output.toString()).toBe(
      "quis nostrud exercitation ullamco\n" +
        "laboris nisi ut aliquip ex ea commodo\n",
    );
  });

  it("should return the default handler from the decorator", () => {
    const output = createSink();
    const engine = awkish(linesFromText("x\n"), { output });
    const handler = engine.every();
    expect(typeof handler).toBe("function");
  });
});

describe("stage observation order", () => {
  it("should fire the first-registered stage first", () => {
    const order: string[] = [];
    const engine = awkish(linesFromText("a\nb\n"));

    engine.pattern("")((_ctx, line) => {
      order.push(`first:${line.lineNumber}`);
    });
    engine.pattern("")((_ctx, line) => {
      order.push(`second:${line.lineNumber}`);
    });
    engine.every((_ctx, line) => {
      order.push(`third:${line.lineNumber}`);
    });

    engine.run();
    expect(order).toEqual([
      "first:1",
      "second:1",
      "third:1",
      "first:2",
      "second:2",
      "third:2",
    ]);
  });

  it("should let stages before grep see every line", () => {
    const before: number[] = [];
    const after: number[] = [];
    const engine = sampleEngine();

    engine.every((_ctx, line) => {
      before.push(line.lineNumber);
    });
    engine.grep("dolor");
    engine.every((_ctx, line) => {
      after.push(line.lineNumber);
    });

    engine.run();
    expect(before).toHaveLength(13);
    expect(after).toEqual([1, 3, 7, 9]);
  });

  it("should run stages before central handlers for each line", () => {
    const order: string[] = [];
    const engine = awkish(linesFromText("a\nb\n"));

    engine.main((_ctx, line) => {
      order.push(`main:${line.lineNumber}`);
    });
    engine.every((_ctx, line) => {
      order.push(`stage:${line.lineNumber}`);
    });

    engine.run();
    expect(order).toEqual(["stage:1", "main:1", "stage:2", "main:2"]);
  });
});

describe("central placement", () => {
  it("should register rules as main handlers", () => {
    const engine = awkish(linesFromText(SAMPLE), {
      state: { data: "" },
      placement: "central",
    });
    engine.pattern("anim")((ctx, line) => {
      ctx.state.data += line.text;
    });

    // Central rules do not fire while iterating
    expect([...engine]).toHaveLength(13);
    expect(engine.context.state.data).toBe("");
  });

  it("should let a central rule stop later handlers", () => {
    const engine = awkish(linesFromText(SAMPLE), {
      state: { lines: 0 },
      placement: "central",
    });
    engine.pattern("dolor")(() => Continue);
    engine.every((ctx) => {
      ctx.state.lines++;
    });

    engine.run();
    expect(engine.context.state.lines).toBe(9);
  });

  it("should track ranges with the same numbering as stages", () => {
    const seen: Array<[number, boolean]> = [];
    const engine = awkish(linesFromText(SAMPLE), { placement: "central" });
    engine.range("aliqua", "consequat")((ctx) => {
      seen.push([ctx.range.lineNumber, ctx.range.isLastLine]);
    });

    engine.run();
    expect(seen).toEqual([
      [1, false],
      [2, false],
      [3, false],
      [4, true],
    ]);
  });

  it("should mix wrapped rule handlers with stages", () => {
    const matched: number[] = [];
    const ranged: number[] = [];
    const engine = awkish(linesFromText(SAMPLE), {
      state: { matched, ranged },
    });
    engine.main(
      patternHandler("occaecat", (ctx, line) => {
        ctx.state.matched.push(line.lineNumber);
      }),
    );
    engine.main(
      rangeHandler("^esse", "^cupidatat", (ctx, line) => {
        ctx.state.ranged.push(line.lineNumber);
      }),
    );

    engine.run();
    expect(matched).toEqual([10]);
    expect(ranged).toEqual([9, 10, 11]);
  });
});

describe("options", () => {
  it("should default to an empty state", () => {
    const engine = awkish(linesFromText(""));
    expect(engine.context.state).toEqual({});
    expect(engine).toBeInstanceOf(LineEngine);
  });

  it("should reject an invalid placement", () => {
    const options = JSON.parse('{"placement":"sideways"}');
    expect(() => awkish(linesFromText(""), options)).toThrow(
      expect.objectContaining({ code: EngineErrorCodes.INVALID_OPTIONS }),
    );
  });

  it("should reject an output without write()", () => {
    const output = JSON.parse('{"flush":true}');
    expect(() => awkish(linesFromText(""), { output })).toThrow(
      /output must have a write\(chunk\) method/,
    );
  });

  it("should reject malformed patterns at registration", () => {
    const engine = sampleEngine();
    expect(() => engine.pattern("(unclosed")).toThrow(
      expect.objectContaining({ code: EngineErrorCodes.INVALID_PATTERN }),
    );
    expect(() => engine.range("ok", "[")).toThrow(EngineError);
    expect(() => engine.grep("*")).toThrow(EngineError);
  });
});
