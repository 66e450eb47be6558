import { test } from "uvu";
import * as assert from "uvu/assert";

import { json, jsonActions, jsonErrors, jsonStats, type JsonStats } from "../src/grammars/json.js";
import { parse, parseResult } from "../src/parse.js";
import { raised } from "./helpers.js";

function check(text: string) {
  return parse(json, text, { state: jsonStats(), control: jsonErrors<JsonStats>() });
}

function errorMessage(text: string) {
  return raised(() => check(text)).message;
}

test("basics", () => {
  assert.ok(check("0"));
  assert.ok(check(" [ ] "));
  assert.ok(check("{}"));
  assert.ok(check('"\\u00e9\\n"'));
  assert.ok(check("[true, false, null, -0.5E+3]"));
  assert.ok(check("[".repeat(50) + "0" + "]".repeat(50)));
});

test("collects values", () => {
  const stats = jsonStats();
  const doc = '{"a": [1, 2.5, -3e2], "b": {"c": null}, "d": "x\\"y"}';
  assert.ok(parse(json, doc, { state: stats, actions: jsonActions() }));
  assert.equal(stats, {
    numbers: [1, 2.5, -300],
    strings: ["a", "b", "c", "d", 'x\\"y'],
    arrays: 1,
    objects: 2,
  });
});

test("malformed documents", () => {
  assert.is(errorMessage(""), "<memory>:1:1: expected value");
  assert.is(errorMessage("[1"), "<memory>:1:3: expected ']'");
  assert.is(errorMessage("[1,]"), "<memory>:1:4: expected value");
  assert.is(errorMessage('{"a" 1}'), "<memory>:1:6: expected ':'");
  assert.is(errorMessage('{"a":1,}'), "<memory>:1:8: expected member");
  assert.is(errorMessage('{"a":1'), "<memory>:1:7: expected '}'");
  assert.is(errorMessage('"abc'), "<memory>:1:5: unterminated string");
  assert.is(errorMessage('"\\x"'), "<memory>:1:3: invalid escape sequence");
  assert.is(errorMessage("1."), "<memory>:1:3: expected digits");
  assert.is(errorMessage("1 2"), "<memory>:1:3: unexpected trailing input");
});

test("default messages name the rule", () => {
  const outcome = parseResult(json, "[1");
  assert.is(outcome.status, "error");
  if (outcome.status === "error") {
    assert.is(outcome.error.rule, "arrayEnd");
    assert.is(outcome.error.message, "<memory>:1:3: parse error matching arrayEnd");
  }
});

test.run();
