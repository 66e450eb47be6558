import { Actions } from "../actions.js";
import {
  app,
  ifMust,
  listMust,
  must,
  opt,
  padOpt,
  pad,
  plus,
  rep,
  seq,
  sor,
  star,
  until,
} from "../combinators.js";
import { errorMessages } from "../control.js";
import { grammar } from "../grammar.js";
import { digit, eof, one, range, ranges, string, xdigit } from "../rules.js";

// RFC 8259 JSON text, with commit points after every opening token.
export const json = grammar("text", {
  text: seq(star(app("ws")), must(app("value")), star(app("ws")), must(eof)),
  ws: one(" ", "\t", "\n", "\r"),

  value: sor(
    app("string"),
    app("number"),
    app("object"),
    app("array"),
    app("true"),
    app("false"),
    app("null"),
  ),
  true: string("true"),
  false: string("false"),
  null: string("null"),

  number: seq(
    opt(one("-")),
    sor(one("0"), seq(range("1", "9"), star(digit))),
    opt(one("."), must(app("digits"))),
    opt(one("e", "E"), opt(one("+", "-")), must(app("digits"))),
  ),
  digits: plus(digit),

  string: ifMust(one('"'), app("characters")),
  characters: until(one('"'), app("char")),
  char: sor(app("escaped"), app("unescaped")),
  escaped: ifMust(one("\\"), app("escape")),
  escape: sor(
    one('"', "\\", "/", "b", "f", "n", "r", "t"),
    seq(one("u"), rep(4, xdigit)),
  ),
  unescaped: ranges(" ", "!", "#", "[", "]", "\uffff"),

  array: ifMust(one("["), padOpt(app("elements"), app("ws")), app("arrayEnd")),
  elements: listMust(app("value"), one(","), app("ws")),
  arrayEnd: one("]"),

  object: ifMust(one("{"), padOpt(app("members"), app("ws")), app("objectEnd")),
  members: listMust(app("member"), one(","), app("ws")),
  member: ifMust(app("string"), app("colon"), app("value")),
  colon: pad(one(":"), app("ws")),
  objectEnd: one("}"),
});

export function jsonErrors<S>() {
  return errorMessages<S>({
    value: "expected value",
    member: "expected member",
    digits: "expected digits",
    characters: "unterminated string",
    escape: "invalid escape sequence",
    colon: "expected ':'",
    arrayEnd: "expected ']'",
    objectEnd: "expected '}'",
    eof: "unexpected trailing input",
  });
}

export interface JsonStats {
  numbers: number[];
  strings: string[];
  arrays: number;
  objects: number;
}

export function jsonStats(): JsonStats {
  return { numbers: [], strings: [], arrays: 0, objects: 0 };
}

// Collects what a document contains. Object keys count as strings.
export function jsonActions() {
  return new Actions<JsonStats>()
    .on("number", (input, stats) => {
      stats.numbers.push(Number(input.string()));
    })
    .on("string", (input, stats) => {
      stats.strings.push(input.string().slice(1, -1));
    })
    .on("array", (_input, stats) => {
      stats.arrays++;
    })
    .on("object", (_input, stats) => {
      stats.objects++;
    });
}
