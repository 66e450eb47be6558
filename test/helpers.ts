import { ParseError } from "../src/errors.js";
import { MemoryInput } from "../src/input.js";
import { parse } from "../src/parse.js";
import type { Rule } from "../src/types.js";

// Runs `rule` from the start of `text` and reports where the cursor ended up.
export function run(rule: Rule, text: string) {
  const input = new MemoryInput(text);
  return { matched: parse(rule, input), byte: input.byte };
}

export function raised(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ParseError) {
      return err;
    }
    throw err;
  }
  throw new Error("expected a ParseError");
}
