// Filter, split and dispatch access log lines
// Run: npx tsx examples/03-log-fields.ts

import {
  Continue,
  EventType,
  awkish,
  filterEvents,
  linesFromText,
} from "../src/index";

const LOG = `10.0.0.1 GET /index.html 200 512
10.0.0.2 GET /missing 404 0
# health check
10.0.0.1 POST /api/items 201 88
10.0.0.3 GET /api/items 500 0
`;

interface LogState {
  bytes: number;
  errors: string[];
}

function main() {
  const initial: LogState = { bytes: 0, errors: [] };
  const engine = awkish(linesFromText(LOG), {
    state: initial,
    context: { example: "03-log-fields" },
    onEvent: filterEvents([EventType.RUN_END], (event) => {
      console.log("event:", event.type);
    }),
  });

  engine.grep(/^\d/).split();

  // Errors are reported and skip the byte count
  engine.main((ctx, line) => {
    const status = Number(line.fields?.[3]);
    if (status >= 400) {
      ctx.state.errors.push(`${line.lineNumber}: ${line.fields?.[2]}`);
      return Continue;
    }
  });

  engine.main((ctx, line) => {
    ctx.state.bytes += Number(line.fields?.[4] ?? 0);
  });

  const { state, metrics } = engine.run();
  console.log("bytes served:", state.bytes);
  console.log("errors:", state.errors);
  console.log("metrics:", metrics);
}

main();
