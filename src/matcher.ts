import { ActionInput, Actions } from "./actions.js";
import { Normal, type Control } from "./control.js";
import { GrammarError } from "./errors.js";
import type { Grammar } from "./grammar.js";
import type { ParseInput } from "./input.js";
import type { ApplyMode, MatchContext, RewindMode, Rule } from "./types.js";

export interface MatcherOptions<S> {
  state: S;
  grammar?: Grammar;
  actions?: Actions<S>;
  control?: Control<S>;
}

// The mutable side of a parse. One matcher per parse invocation.
export class Matcher<S> implements MatchContext {
  state: S;
  grammar: Grammar | undefined;
  actions: Actions<S>;
  control: Control<S>;

  constructor(
    public input: ParseInput,
    options: MatcherOptions<S>,
  ) {
    this.state = options.state;
    this.grammar = options.grammar;
    this.actions = options.actions ?? new Actions<S>();
    this.control = options.control ?? new Normal<S>();
  }

  invoke(rule: Rule, applyMode: ApplyMode, rewindMode: RewindMode): boolean {
    if (rule.skipControl === true) {
      return rule.match(this, applyMode, rewindMode);
    }
    const { input, control, state } = this;
    control.start(rule, input, state);
    let result: boolean;
    try {
      result = this.matchRule(rule, applyMode, rewindMode);
    } catch (err) {
      control.unwind?.(rule, input, state);
      throw err;
    }
    if (result) {
      control.success(rule, input, state);
    } else {
      control.failure(rule, input, state);
    }
    return result;
  }

  private matchRule(rule: Rule, applyMode: ApplyMode, rewindMode: RewindMode) {
    const handler =
      applyMode === "action" ? this.actions.get(rule.name) : undefined;
    if (handler === undefined) {
      return rule.match(this, applyMode, rewindMode);
    }

    // An action may veto the match, so the consumed range has to be undone.
    const { input } = this;
    const begin = input.position();
    const marker = input.mark("required");
    try {
      if (!rule.match(this, applyMode, marker.nextRewindMode)) {
        return false;
      }
      const range = new ActionInput(input, begin, input.position());
      return marker.commit(handler(range, this.state) !== false);
    } finally {
      marker.release();
    }
  }

  lookup(name: string): Rule {
    if (this.grammar === undefined) {
      throw new GrammarError(`reference to rule "${name}" outside a grammar`);
    }
    return this.grammar.rule(name);
  }

  raise(rule: Rule): never {
    return this.control.raise(rule, this.input, this.state);
  }
}
