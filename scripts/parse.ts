import { Tracer } from "../src/control.js";
import {
  json,
  jsonActions,
  jsonErrors,
  jsonStats,
  type JsonStats,
} from "../src/grammars/json.js";
import { fileInput } from "../src/input.js";
import { parseResult } from "../src/parse.js";

// Usage: tsx scripts/parse.ts <file.json> [--trace]
const [path, flag] = process.argv.slice(2);
if (path === undefined) {
  console.log("usage: parse <file.json> [--trace]");
  process.exit(2);
}

const errors = jsonErrors<JsonStats>();
const stats = jsonStats();
const outcome = parseResult(json, fileInput(path), {
  state: stats,
  actions: jsonActions(),
  control: flag === "--trace" ? new Tracer<JsonStats>(errors) : errors,
});

switch (outcome.status) {
  case "match":
    console.log(
      `ok: ${stats.objects} objects, ${stats.arrays} arrays, ` +
        `${stats.strings.length} strings, ${stats.numbers.length} numbers`,
    );
    break;
  case "no-match":
    console.log(`no match at byte ${outcome.position.byte}`);
    process.exitCode = 1;
    break;
  case "error":
    console.log(outcome.error.message);
    process.exitCode = 1;
    break;
}
