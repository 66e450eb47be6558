import type { Actions } from "./actions.js";
import type { Control } from "./control.js";
import { ParseError } from "./errors.js";
import { Grammar } from "./grammar.js";
import { MemoryInput, type ParseInput } from "./input.js";
import { Matcher } from "./matcher.js";
import type { Position, Rule } from "./types.js";

export type ParseTarget = Rule | Grammar;

export interface ParseOptions<S> {
  state: S;
  actions?: Actions<S>;
  control?: Control<S>;
}

export type ParseOutcome =
  | { status: "match"; end: Position }
  | { status: "no-match"; position: Position }
  | { status: "error"; error: ParseError };

function toInput(input: ParseInput | string) {
  return typeof input === "string" ? new MemoryInput(input) : input;
}

function run<S>(target: ParseTarget, input: ParseInput, options: ParseOptions<S>) {
  const grammar = target instanceof Grammar ? target : undefined;
  const root = target instanceof Grammar ? target.root() : target;
  const matcher = new Matcher(input, { ...options, grammar });
  return matcher.invoke(root, "action", "required");
}

/**
 * Matches `target` at the start of `input`. Returns false when it does not
 * match, leaving the input where it was; throws a `ParseError` when a
 * mandatory rule fails. Input after the match is not inspected: end a
 * grammar with `eof` to require all of it.
 */
export function parse(target: ParseTarget, input: ParseInput | string): boolean;
export function parse<S>(
  target: ParseTarget,
  input: ParseInput | string,
  options: ParseOptions<S>,
): boolean;
export function parse<S>(
  target: ParseTarget,
  input: ParseInput | string,
  options?: ParseOptions<S>,
): boolean {
  const parseInput = toInput(input);
  if (options === undefined) {
    return run(target, parseInput, { state: undefined });
  }
  return run(target, parseInput, options);
}

// Like `parse`, but reports a raised error as an outcome instead of throwing.
export function parseResult(
  target: ParseTarget,
  input: ParseInput | string,
): ParseOutcome;
export function parseResult<S>(
  target: ParseTarget,
  input: ParseInput | string,
  options: ParseOptions<S>,
): ParseOutcome;
export function parseResult<S>(
  target: ParseTarget,
  input: ParseInput | string,
  options?: ParseOptions<S>,
): ParseOutcome {
  const parseInput = toInput(input);
  try {
    const matched =
      options === undefined
        ? run(target, parseInput, { state: undefined })
        : run(target, parseInput, options);
    return matched
      ? { status: "match", end: parseInput.position() }
      : { status: "no-match", position: parseInput.position() };
  } catch (err) {
    if (err instanceof ParseError) {
      return { status: "error", error: err };
    }
    throw err;
  }
}
