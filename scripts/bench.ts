import { run, bench, group } from "mitata";

import {
  json,
  jsonActions,
  jsonErrors,
  jsonStats,
  type JsonStats,
} from "../src/grammars/json.js";
import { parse } from "../src/parse.js";

// Synthetic documents: wide and flat, and deeply nested.
function flatDocument(n: number) {
  const rows: string[] = [];
  for (let i = 0; i < n; i++) {
    rows.push(`{"id": ${i}, "name": "row ${i}", "score": ${i * 0.5}e1, "tags": ["a", "b"]}`);
  }
  return `[${rows.join(",\n ")}]`;
}

function nestedDocument(depth: number) {
  return "[".repeat(depth) + "0" + "]".repeat(depth);
}

const sources = {
  flat: flatDocument(2000),
  nested: nestedDocument(100),
};

const control = jsonErrors<JsonStats>();

// Warmup
parse(json, "[1]");

group("flat", () => {
  bench("match only", () => parse(json, sources.flat));
  bench("with actions", () =>
    parse(json, sources.flat, {
      state: jsonStats(),
      actions: jsonActions(),
      control,
    }),
  );
});

group("nested", () => {
  bench("match only", () => parse(json, sources.nested));
});

await run({
  avg: true, // enable/disable avg column (default: true)
  json: false, // enable/disable json output (default: false)
  colors: true, // enable/disable colors (default: true)
  min_max: true, // enable/disable min/max column (default: true)
  collect: false, // enable/disable collecting returned values into an array during the benchmark (default: false)
  percentiles: false, // enable/disable percentiles column (default: true)
});
