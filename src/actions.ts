import type { ParseInput } from "./input.js";
import type { Position, Rule } from "./types.js";

// The range of input consumed by a successful match.
export class ActionInput {
  constructor(
    private readonly input: ParseInput,
    readonly begin: Position,
    readonly end: Position,
  ) {}

  get source() {
    return this.input.source;
  }

  string() {
    return this.input.slice(this.begin.byte, this.end.byte);
  }
}

// Returning `false` makes the match fail after all.
export type ActionHandler<S> = (input: ActionInput, state: S) => boolean | void;

/**
 * Side effects keyed by rule name. Structurally identical rules share a name,
 * so `one("x")` used in two places has one action.
 */
export class Actions<S> {
  private handlers = new Map<string, ActionHandler<S>>();

  on(rule: Rule | string, handler: ActionHandler<S>) {
    this.handlers.set(typeof rule === "string" ? rule : rule.name, handler);
    return this;
  }

  get(name: string) {
    return this.handlers.get(name);
  }
}
