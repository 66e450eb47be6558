import { test } from "uvu";
import * as assert from "uvu/assert";

import { Actions } from "../src/actions.js";
import {
  app,
  at,
  disable,
  enable,
  listMust,
  must,
  named,
  notAt,
  plus,
  seq,
  sor,
} from "../src/combinators.js";
import { errorMessages, tracer } from "../src/control.js";
import { ParseError } from "../src/errors.js";
import { grammar } from "../src/grammar.js";
import { MemoryInput } from "../src/input.js";
import { parse, type ParseTarget } from "../src/parse.js";
import { digit, eof, eol, one, string } from "../src/rules.js";
import type { Position } from "../src/types.js";
import { raised } from "./helpers.js";

const digits = plus(digit);

function countDigits() {
  return new Actions<{ count: number }>().on(digit, (_input, state) => {
    state.count++;
  });
}

test("actions see the matched range", () => {
  const seen: string[] = [];
  const actions = new Actions<string[]>().on(digits, (input, state) => {
    state.push(input.string());
  });
  const sum = seq(digits, one("+"), digits);
  assert.ok(parse(sum, "12+345", { state: seen, actions }));
  assert.equal(seen, ["12", "345"]);
});

test("action positions", () => {
  const cd = string("cd");
  const ranges: Position[] = [];
  const actions = new Actions<undefined>().on(cd, (input) => {
    ranges.push(input.begin, input.end);
  });
  const input = new MemoryInput("ab\ncd", "doc.txt");
  assert.ok(parse(seq(string("ab"), eol, cd), input, { state: undefined, actions }));
  assert.equal(ranges, [
    { byte: 3, line: 2, column: 1, source: "doc.txt" },
    { byte: 5, line: 2, column: 3, source: "doc.txt" },
  ]);
});

test("lookahead does not run actions", () => {
  const state = { count: 0 };
  const actions = countDigits();
  assert.ok(parse(seq(at(digits), notAt(one("x")), digits), "123", { state, actions }));
  assert.is(state.count, 3);
});

test("enable and disable", () => {
  const state = { count: 0 };
  const actions = countDigits();
  assert.ok(parse(disable(digits), "12", { state, actions }));
  assert.is(state.count, 0);
  assert.ok(parse(at(enable(digit)), "5", { state, actions }));
  assert.is(state.count, 1);
});

test("an action can veto its match", () => {
  const small = named("small", digits);
  const actions = new Actions<undefined>().on(
    small,
    (input) => Number(input.string()) < 100,
  );
  const options = { state: undefined, actions };
  assert.ok(parse(seq(small, eof), "42", options));

  const input = new MemoryInput("420");
  assert.not.ok(parse(small, input, options));
  assert.is(input.byte, 0);

  const either = sor(small, string("420"));
  const input2 = new MemoryInput("420");
  assert.ok(parse(either, input2, options));
  assert.is(input2.byte, 3);
});

test("actions on grammar rules", () => {
  const items = grammar("items", {
    items: listMust(app("item"), one(",")),
    item: digits,
  });
  const found: string[] = [];
  const actions = new Actions<string[]>().on("item", (input, state) => {
    state.push(input.string());
  });
  assert.ok(parse(items, "1,22,333", { state: found, actions }));
  assert.equal(found, ["1", "22", "333"]);
});

test("error messages per rule", () => {
  const close = one(")");
  const control = errorMessages<undefined>({ [close.name]: "expected ')'" });
  const err = raised(() => parse(must(close), "x", { state: undefined, control }));
  assert.is(err.reason, "expected ')'");
  assert.is(err.message, "<memory>:1:1: expected ')'");

  const other = raised(() => parse(must(one("]")), "x", { state: undefined, control }));
  assert.is(other.reason, "parse error matching one<']'>");
});

test("parse errors", () => {
  const err = raised(() => parse(must(one("a")), "b"));
  assert.instance(err, ParseError);
  assert.instance(err, Error);
  assert.is(err.name, "ParseError");
});

function traced(rule: ParseTarget, text: string) {
  const lines: string[] = [];
  const control = tracer<undefined>(undefined, (line) => lines.push(line));
  let error: unknown;
  try {
    parse(rule, text, { state: undefined, control });
  } catch (err) {
    error = err;
  }
  return { lines, error };
}

test("tracer", () => {
  const { lines } = traced(seq(one("a"), one("b")), "ab");
  assert.equal(lines, [
    "start seq<one<'a'>, one<'b'>> at <memory>:1:1",
    "  start one<'a'> at <memory>:1:1",
    "  success one<'a'> at <memory>:1:2",
    "  start one<'b'> at <memory>:1:2",
    "  success one<'b'> at <memory>:1:3",
    "success seq<one<'a'>, one<'b'>> at <memory>:1:3",
  ]);
});

test("tracer on failure", () => {
  const { lines } = traced(one("a"), "b");
  assert.equal(lines, [
    "start one<'a'> at <memory>:1:1",
    "failure one<'a'> at <memory>:1:1",
  ]);
});

test("tracer on raise", () => {
  const { lines, error } = traced(seq(one("a"), must(one("b"))), "ax");
  assert.instance(error, ParseError);
  assert.equal(lines, [
    "start seq<one<'a'>, must<one<'b'>>> at <memory>:1:1",
    "  start one<'a'> at <memory>:1:1",
    "  success one<'a'> at <memory>:1:2",
    "  start one<'b'> at <memory>:1:2",
    "  failure one<'b'> at <memory>:1:2",
    "  raise one<'b'> at <memory>:1:2",
    "unwind seq<one<'a'>, must<one<'b'>>> at <memory>:1:1",
  ]);
});

test("must and lookahead are transparent to the control", () => {
  assert.equal(traced(must(one("a")), "b").lines, [
    "start one<'a'> at <memory>:1:1",
    "failure one<'a'> at <memory>:1:1",
    "raise one<'a'> at <memory>:1:1",
  ]);
  assert.equal(traced(at(one("a")), "a").lines, [
    "start one<'a'> at <memory>:1:1",
    "success one<'a'> at <memory>:1:2",
  ]);
  assert.equal(traced(notAt(one("a")), "b").lines, [
    "start one<'a'> at <memory>:1:1",
    "failure one<'a'> at <memory>:1:1",
  ]);
});

test("tracer keeps the base control's messages", () => {
  const close = one(")");
  const control = tracer(errorMessages<undefined>({ [close.name]: "expected ')'" }), () => {});
  const err = raised(() => parse(must(close), "", { state: undefined, control }));
  assert.is(err.reason, "expected ')'");
});

test.run();
