import { checkNotNull } from "./assert.js";
import { GrammarError, ParseError } from "./errors.js";
import { any, checkCount, failure, success } from "./rules.js";
import type { ApplyMode, MatchContext, RewindMode, Rule } from "./types.js";

function label(name: string, subs: readonly (Rule | number)[]) {
  const args = subs.map((s) => (typeof s === "number" ? String(s) : s.name));
  return `${name}<${args.join(", ")}>`;
}

/*
 * Arity is normalized in the factories: an empty rule list is the identity of
 * the combinator, a single rule is used as is, and only the general case
 * builds a node. `star(a, b)` and friends repeat `seq(a, b)`.
 */

class Sequence implements Rule {
  readonly name: string;

  constructor(readonly subs: readonly Rule[]) {
    this.name = label("seq", subs);
  }

  match(m: MatchContext, applyMode: ApplyMode, rewindMode: RewindMode): boolean {
    const marker = m.input.mark(rewindMode);
    try {
      for (const sub of this.subs) {
        if (!m.invoke(sub, applyMode, marker.nextRewindMode)) {
          return false;
        }
      }
      return marker.commit(true);
    } finally {
      marker.release();
    }
  }
}

class Choice implements Rule {
  readonly name: string;

  constructor(readonly subs: readonly Rule[]) {
    this.name = label("sor", subs);
  }

  match(m: MatchContext, applyMode: ApplyMode, rewindMode: RewindMode): boolean {
    // Every alternative but the last starts from the original position.
    const last = this.subs.length - 1;
    for (let i = 0; i < last; i++) {
      if (m.invoke(this.subs[i], applyMode, "required")) {
        return true;
      }
    }
    return m.invoke(checkNotNull(this.subs.at(-1)), applyMode, rewindMode);
  }
}

// Between `min` and `max` repetitions of `body`, greedily.
export class Repetition implements Rule {
  readonly subs: readonly Rule[];

  constructor(
    readonly name: string,
    private body: Rule,
    private min: number,
    private max: number,
  ) {
    this.subs = [body];
  }

  match(m: MatchContext, applyMode: ApplyMode, rewindMode: RewindMode): boolean {
    const marker = m.input.mark(this.min > 0 ? rewindMode : "dontcare");
    try {
      let count = 0;
      for (; count < this.min; count++) {
        if (!m.invoke(this.body, applyMode, marker.nextRewindMode)) {
          return false;
        }
      }
      // Each optional attempt rewinds itself, so a failed one leaves no trace.
      while (count < this.max && m.invoke(this.body, applyMode, "required")) {
        count++;
      }
      return marker.commit(true);
    } finally {
      marker.release();
    }
  }
}

class Lookahead implements Rule {
  readonly name: string;
  readonly subs: readonly Rule[];
  readonly skipControl = true;

  constructor(
    private body: Rule,
    private negate: boolean,
  ) {
    this.name = label(negate ? "notAt" : "at", [body]);
    this.subs = [body];
  }

  match(m: MatchContext): boolean {
    // Never committed: the cursor is restored whatever the outcome.
    const marker = m.input.mark("required");
    try {
      return m.invoke(this.body, "nothing", marker.nextRewindMode) !== this.negate;
    } finally {
      marker.release();
    }
  }
}

class Must implements Rule {
  readonly name: string;
  readonly subs: readonly Rule[];
  readonly skipControl = true;

  constructor(private body: Rule) {
    this.name = label("must", [body]);
    this.subs = [body];
  }

  match(m: MatchContext, applyMode: ApplyMode): boolean {
    // The failure is fatal, so nobody needs the position rewound before the
    // raise reports it.
    if (!m.invoke(this.body, applyMode, "dontcare")) {
      m.raise(this.body);
    }
    return true;
  }
}

class Raise implements Rule {
  readonly name: string;
  readonly subs: readonly Rule[];

  constructor(private body: Rule) {
    this.name = label("raise", [body]);
    this.subs = [body];
  }

  match(m: MatchContext): boolean {
    return m.raise(this.body);
  }
}

class IfThenElse implements Rule {
  readonly name: string;

  constructor(readonly subs: readonly [Rule, Rule, Rule]) {
    this.name = label("ifThenElse", subs);
  }

  match(m: MatchContext, applyMode: ApplyMode, rewindMode: RewindMode): boolean {
    const [cond, then, otherwise] = this.subs;
    const marker = m.input.mark(rewindMode);
    try {
      const branch = m.invoke(cond, applyMode, "required") ? then : otherwise;
      return marker.commit(m.invoke(branch, applyMode, marker.nextRewindMode));
    } finally {
      marker.release();
    }
  }
}

class Until implements Rule {
  readonly name: string;

  constructor(readonly subs: readonly [Rule, Rule]) {
    this.name = label("until", subs);
  }

  match(m: MatchContext, applyMode: ApplyMode, rewindMode: RewindMode): boolean {
    const [end, body] = this.subs;
    const marker = m.input.mark(rewindMode);
    try {
      while (!m.invoke(end, applyMode, "required")) {
        if (!m.invoke(body, applyMode, marker.nextRewindMode)) {
          return false;
        }
      }
      return marker.commit(true);
    } finally {
      marker.release();
    }
  }
}

// Turns a raised error inside `body` into an ordinary, rewound failure.
class TryCatch implements Rule {
  readonly name: string;
  readonly subs: readonly Rule[];

  constructor(private body: Rule) {
    this.name = label("tryCatch", [body]);
    this.subs = [body];
  }

  match(m: MatchContext, applyMode: ApplyMode): boolean {
    const marker = m.input.mark("required");
    try {
      return marker.commit(m.invoke(this.body, applyMode, marker.nextRewindMode));
    } catch (err) {
      if (err instanceof ParseError) {
        return false;
      }
      throw err;
    } finally {
      marker.release();
    }
  }
}

class Apply implements Rule {
  readonly name: string;
  readonly subs: readonly Rule[];

  constructor(
    private body: Rule,
    private mode: ApplyMode,
  ) {
    this.name = label(mode === "action" ? "enable" : "disable", [body]);
    this.subs = [body];
  }

  match(m: MatchContext, _applyMode: ApplyMode, rewindMode: RewindMode): boolean {
    return m.invoke(this.body, this.mode, rewindMode);
  }
}

// A new identity for an existing rule; it matches exactly like its body.
class Alias implements Rule {
  readonly subs: readonly Rule[];

  constructor(
    readonly name: string,
    private body: Rule,
  ) {
    this.subs = [body];
  }

  match(m: MatchContext, applyMode: ApplyMode, rewindMode: RewindMode): boolean {
    return this.body.match(m, applyMode, rewindMode);
  }
}

// A reference to a rule of the enclosing grammar, resolved when matched.
export class RuleApplication implements Rule {
  readonly subs: readonly Rule[] = [];

  constructor(readonly name: string) {}

  match(m: MatchContext, applyMode: ApplyMode, rewindMode: RewindMode): boolean {
    return m.lookup(this.name).match(m, applyMode, rewindMode);
  }
}

export function seq(...rules: Rule[]): Rule {
  if (rules.length === 0) return success;
  if (rules.length === 1) return rules[0];
  return new Sequence(rules);
}

export function sor(...rules: Rule[]): Rule {
  if (rules.length === 0) return failure;
  if (rules.length === 1) return rules[0];
  return new Choice(rules);
}

function repetition(name: string, min: number, max: number, rules: Rule[]) {
  const body = seq(...rules);
  return new Repetition(name, body, min, max);
}

export function star(...rules: Rule[]): Rule {
  return repetition(label("star", rules), 0, Infinity, rules);
}

export function plus(...rules: Rule[]): Rule {
  return repetition(label("plus", rules), 1, Infinity, rules);
}

export function opt(...rules: Rule[]): Rule {
  return repetition(label("opt", rules), 0, 1, rules);
}

export function rep(n: number, ...rules: Rule[]): Rule {
  checkCount(n, "rep");
  return repetition(label("rep", [n, ...rules]), n, n, rules);
}

export function repMin(min: number, ...rules: Rule[]): Rule {
  checkCount(min, "repMin");
  return repetition(label("repMin", [min, ...rules]), min, Infinity, rules);
}

export function repMax(max: number, ...rules: Rule[]): Rule {
  checkCount(max, "repMax");
  return repetition(label("repMax", [max, ...rules]), 0, max, rules);
}

export function repMinMax(min: number, max: number, ...rules: Rule[]): Rule {
  checkCount(min, "repMinMax");
  checkCount(max, "repMinMax");
  if (min > max) {
    throw new GrammarError(`repMinMax: minimum ${min} exceeds maximum ${max}`);
  }
  return repetition(label("repMinMax", [min, max, ...rules]), min, max, rules);
}

export function at(...rules: Rule[]): Rule {
  return rules.length === 0 ? success : new Lookahead(seq(...rules), false);
}

export function notAt(...rules: Rule[]): Rule {
  return rules.length === 0 ? failure : new Lookahead(seq(...rules), true);
}

/**
 * Commit point: every rule is wrapped on its own, so a failure raises for the
 * first rule that did not match, at the position where it stopped.
 */
export function must(...rules: Rule[]): Rule {
  return seq(...rules.map((r) => new Must(r)));
}

export function raise(rule: Rule): Rule {
  return new Raise(rule);
}

export function ifMust(cond: Rule, ...rules: Rule[]): Rule {
  return new Alias(label("ifMust", [cond, ...rules]), seq(cond, must(...rules)));
}

export function ifThenElse(cond: Rule, then: Rule, otherwise: Rule): Rule {
  return new IfThenElse([cond, then, otherwise]);
}

// Matches `rules` (any character by default) until `end` matches, then `end`.
export function until(end: Rule, ...rules: Rule[]): Rule {
  return new Until([end, rules.length === 0 ? any : seq(...rules)]);
}

export function pad(rule: Rule, left: Rule, right: Rule = left): Rule {
  return new Alias(
    label("pad", [rule, left, right]),
    seq(star(left), rule, star(right)),
  );
}

export function padOpt(rule: Rule, padding: Rule): Rule {
  return new Alias(
    label("padOpt", [rule, padding]),
    seq(star(padding), opt(rule, star(padding))),
  );
}

export function list(item: Rule, sep: Rule, padding?: Rule): Rule {
  const s = padding === undefined ? sep : pad(sep, padding);
  return new Alias(
    label("list", padding === undefined ? [item, sep] : [item, sep, padding]),
    seq(item, star(s, item)),
  );
}

// Like `list`, but an item must follow every separator.
export function listMust(item: Rule, sep: Rule, padding?: Rule): Rule {
  const s = padding === undefined ? sep : pad(sep, padding);
  return new Alias(
    label("listMust", padding === undefined ? [item, sep] : [item, sep, padding]),
    seq(item, star(s, must(item))),
  );
}

// A list with an optional trailing separator.
export function listTail(item: Rule, sep: Rule, padding?: Rule): Rule {
  const tail = padding === undefined ? opt(sep) : opt(star(padding), sep);
  return new Alias(
    label("listTail", padding === undefined ? [item, sep] : [item, sep, padding]),
    seq(list(item, sep, padding), tail),
  );
}

export function tryCatch(...rules: Rule[]): Rule {
  return new TryCatch(seq(...rules));
}

export function enable(...rules: Rule[]): Rule {
  return new Apply(seq(...rules), "action");
}

export function disable(...rules: Rule[]): Rule {
  return new Apply(seq(...rules), "nothing");
}

export function named(name: string, rule: Rule): Rule {
  return new Alias(name, rule);
}

export function app(name: string): Rule {
  return new RuleApplication(name);
}
