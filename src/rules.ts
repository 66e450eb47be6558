import { GrammarError } from "./errors.js";
import type { MatchContext, Rule } from "./types.js";

// Leaf rules match directly against the input and never consume on failure.

export function quoteChar(c: string) {
  return `'${JSON.stringify(c).slice(1, -1)}'`;
}

// Matches a single character accepted by `test`.
export class CharClass implements Rule {
  readonly subs: readonly Rule[] = [];

  constructor(
    readonly name: string,
    private test: (c: string) => boolean,
  ) {}

  match(m: MatchContext): boolean {
    const c = m.input.peekChar();
    if (c !== undefined && this.test(c)) {
      m.input.bump(1);
      return true;
    }
    return false;
  }
}

export class Str implements Rule {
  readonly subs: readonly Rule[] = [];
  readonly name: string;

  constructor(
    public str: string,
    private caseInsensitive = false,
  ) {
    this.name = `${caseInsensitive ? "istring" : "string"}<${JSON.stringify(str)}>`;
  }

  match(m: MatchContext): boolean {
    const { input } = m;
    if (input.size() < this.str.length) {
      return false;
    }
    for (let i = 0; i < this.str.length; i++) {
      const c = input.peekChar(i);
      if (c === undefined || !this.equal(c, this.str[i])) {
        return false;
      }
    }
    input.bump(this.str.length);
    return true;
  }

  private equal(a: string, b: string) {
    return a === b || (this.caseInsensitive && asciiLower(a) === asciiLower(b));
  }
}

function asciiLower(c: string) {
  return c >= "A" && c <= "Z" ? c.toLowerCase() : c;
}

// Rules whose outcome depends only on where the cursor is.
class Predicate implements Rule {
  readonly subs: readonly Rule[] = [];

  constructor(
    readonly name: string,
    private consume: (m: MatchContext) => number | false,
  ) {}

  match(m: MatchContext): boolean {
    const n = this.consume(m);
    if (n === false) {
      return false;
    }
    m.input.bump(n);
    return true;
  }
}

export const any: Rule = new CharClass("any", () => true);

export const eof: Rule = new Predicate("eof", (m) => m.input.empty() && 0);

export const eol: Rule = new Predicate("eol", ({ input }) => {
  if (input.peekChar() === "\n") return 1;
  if (input.peekChar() === "\r" && input.peekChar(1) === "\n") return 2;
  return false;
});

export const bol: Rule = new Predicate(
  "bol",
  (m) => m.input.position().column === 1 && 0,
);

export const success: Rule = new Predicate("success", () => 0);

export const failure: Rule = new Predicate("failure", () => false);

export function bytes(n: number): Rule {
  checkCount(n, "bytes");
  return new Predicate(`bytes<${n}>`, (m) => m.input.size() >= n && n);
}

export function one(...chars: string[]): Rule {
  checkChars(chars);
  const set = new Set(chars);
  return new CharClass(`one<${chars.map(quoteChar).join(", ")}>`, (c) =>
    set.has(c),
  );
}

export function notOne(...chars: string[]): Rule {
  checkChars(chars);
  const set = new Set(chars);
  return new CharClass(`notOne<${chars.map(quoteChar).join(", ")}>`, (c) =>
    !set.has(c),
  );
}

export function range(lo: string, hi: string): Rule {
  checkChars([lo, hi]);
  return new CharClass(
    `range<${quoteChar(lo)}, ${quoteChar(hi)}>`,
    (c) => lo <= c && c <= hi,
  );
}

export function notRange(lo: string, hi: string): Rule {
  checkChars([lo, hi]);
  return new CharClass(
    `notRange<${quoteChar(lo)}, ${quoteChar(hi)}>`,
    (c) => c < lo || hi < c,
  );
}

// Pairs of inclusive bounds, optionally followed by one extra character.
export function ranges(...bounds: string[]): Rule {
  checkChars(bounds);
  const test = (c: string) => {
    let i = 0;
    for (; i + 1 < bounds.length; i += 2) {
      if (bounds[i] <= c && c <= bounds[i + 1]) return true;
    }
    return i < bounds.length && bounds[i] === c;
  };
  return new CharClass(`ranges<${bounds.map(quoteChar).join(", ")}>`, test);
}

export function string(str: string): Rule {
  return new Str(str);
}

export function istring(str: string): Rule {
  return new Str(str, true);
}

function checkChars(chars: string[]) {
  for (const c of chars) {
    if (c.length !== 1) {
      throw new GrammarError(`expected a single character, got ${JSON.stringify(c)}`);
    }
  }
}

export function checkCount(n: number, what: string) {
  if (!Number.isInteger(n) || n < 0) {
    throw new GrammarError(`${what}: count must be a non-negative integer, got ${n}`);
  }
}

// ASCII character classes.

const isUpper = (c: string) => c >= "A" && c <= "Z";
const isLower = (c: string) => c >= "a" && c <= "z";
const isDigit = (c: string) => c >= "0" && c <= "9";
const isAlpha = (c: string) => isUpper(c) || isLower(c);
const isIdentifierFirst = (c: string) => isAlpha(c) || c === "_";
const isIdentifierOther = (c: string) => isIdentifierFirst(c) || isDigit(c);

export const upper: Rule = new CharClass("upper", isUpper);
export const lower: Rule = new CharClass("lower", isLower);
export const digit: Rule = new CharClass("digit", isDigit);
export const alpha: Rule = new CharClass("alpha", isAlpha);
export const alnum: Rule = new CharClass("alnum", (c) => isAlpha(c) || isDigit(c));
export const xdigit: Rule = new CharClass(
  "xdigit",
  (c) => isDigit(c) || (c >= "a" && c <= "f") || (c >= "A" && c <= "F"),
);
export const blank: Rule = new CharClass("blank", (c) => c === " " || c === "\t");
export const space: Rule = new CharClass("space", (c) => " \t\n\r\v\f".includes(c));
export const identifierFirst: Rule = new CharClass("identifierFirst", isIdentifierFirst);
export const identifierOther: Rule = new CharClass("identifierOther", isIdentifierOther);

export const identifier: Rule = new Predicate("identifier", ({ input }) => {
  const first = input.peekChar();
  if (first === undefined || !isIdentifierFirst(first)) {
    return false;
  }
  let n = 1;
  while (true) {
    const c = input.peekChar(n);
    if (c === undefined || !isIdentifierOther(c)) {
      return n;
    }
    n++;
  }
});
