import { formatPosition } from "./input.js";
import type { Position } from "./types.js";

/**
 * Raised when a mandatory rule fails. Unlike an ordinary match failure this
 * is not backtracked over: it unwinds to the caller of `parse`, or to the
 * nearest `tryCatch`.
 */
export class ParseError extends Error {
  readonly reason: string;
  readonly position: Position;
  // Name of the rule that failed to match.
  readonly rule: string;

  constructor(reason: string, position: Position, rule: string) {
    super(`${formatPosition(position)}: ${reason}`);
    this.name = "ParseError";
    this.reason = reason;
    this.position = position;
    this.rule = rule;
  }
}

// A grammar that cannot be matched at all: bad bounds, unresolved references.
export class GrammarError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GrammarError";
  }
}
