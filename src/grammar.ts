import { RuleApplication, app } from "./combinators.js";
import { GrammarError } from "./errors.js";
import type { Rule } from "./types.js";

/**
 * A table of named rules. Rule bodies refer to each other (and to
 * themselves) with `app(name)`, which is how recursive grammars are written.
 *
 * Every reference is checked when the grammar is built, so a typo surfaces as
 * a `GrammarError` here rather than in the middle of a parse.
 */
export class Grammar {
  readonly rules: ReadonlyMap<string, Rule>;

  constructor(
    readonly start: string,
    rules: { [name: string]: Rule },
  ) {
    this.rules = new Map(Object.entries(rules));
    if (!this.rules.has(start)) {
      throw new GrammarError(`start rule "${start}" is not defined`);
    }
    for (const [name, body] of this.rules) {
      for (const ref of references(body)) {
        if (!this.rules.has(ref)) {
          throw new GrammarError(`rule "${name}" refers to undefined rule "${ref}"`);
        }
      }
    }
  }

  rule(name: string): Rule {
    const rule = this.rules.get(name);
    if (rule === undefined) {
      throw new GrammarError(`unknown rule "${name}"`);
    }
    return rule;
  }

  // The rule a parse starts from: a reference, so actions and error
  // messages see the start rule's name.
  root(): Rule {
    return app(this.start);
  }
}

function references(rule: Rule, found = new Set<string>()) {
  if (rule instanceof RuleApplication) {
    found.add(rule.name);
  }
  for (const sub of rule.subs) {
    references(sub, found);
  }
  return found;
}

export function grammar(start: string, rules: { [name: string]: Rule }) {
  return new Grammar(start, rules);
}
