// Collect CREATE TABLE statements with range rules
// Run: npx tsx examples/02-sql-ranges.ts

import { awkish, linesFromText } from "../src/index";

const SCHEMA = `-- accounts
CREATE TABLE account (
  id integer PRIMARY KEY,
  email text NOT NULL
);

INSERT INTO account VALUES (1, 'a@example.com');

CREATE TABLE session (
  token text PRIMARY KEY,
  account_id integer REFERENCES account (id)
);
`;

interface Table {
  name: string;
  columns: string[];
}

function main() {
  const tables: Table[] = [];
  const state: { current?: Table } = {};
  const engine = awkish(linesFromText(SCHEMA), { state });

  engine.range(/^CREATE TABLE (\w+)/, /^\);/)((ctx, line) => {
    const { range } = ctx;

    if (range.lineNumber === 1) {
      const table: Table = { name: range.match[1] ?? "?", columns: [] };
      ctx.state.current = table;
      tables.push(table);
    } else if (!range.isLastLine) {
      const [column] = line.split();
      if (column) ctx.state.current?.columns.push(column);
    }
  });

  engine.run();

  for (const table of tables) {
    console.log(`${table.name}: ${table.columns.join(", ")}`);
  }
}

main();
