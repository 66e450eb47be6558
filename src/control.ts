import { ParseError } from "./errors.js";
import { formatPosition, type ParseInput } from "./input.js";
import type { Rule } from "./types.js";

/**
 * Hooks invoked around every rule match. The observers may not change the
 * outcome of a match; `raise` must throw.
 */
export interface Control<S> {
  start(rule: Rule, input: ParseInput, state: S): void;
  success(rule: Rule, input: ParseInput, state: S): void;
  failure(rule: Rule, input: ParseInput, state: S): void;
  raise(rule: Rule, input: ParseInput, state: S): never;
  // Called when an error propagates out of the rule's match.
  unwind?(rule: Rule, input: ParseInput, state: S): void;
}

export class Normal<S> implements Control<S> {
  start(): void {}

  success(): void {}

  failure(): void {}

  raise(rule: Rule, input: ParseInput): never {
    throw new ParseError(
      `parse error matching ${rule.name}`,
      input.position(),
      rule.name,
    );
  }
}

// Raises with a custom message for the rules named in `messages`.
export class ErrorMessages<S> extends Normal<S> {
  private readonly messages: Map<string, string>;

  constructor(messages: Record<string, string>) {
    super();
    this.messages = new Map(Object.entries(messages));
  }

  raise(rule: Rule, input: ParseInput): never {
    const message = this.messages.get(rule.name);
    if (message === undefined) {
      return super.raise(rule, input);
    }
    throw new ParseError(message, input.position(), rule.name);
  }
}

export class Tracer<S> implements Control<S> {
  private depth = 0;

  constructor(
    private readonly base: Control<S> = new Normal<S>(),
    private readonly log: (line: string) => void = console.log,
  ) {}

  private trace(event: string, rule: Rule, input: ParseInput) {
    const pos = formatPosition(input.position());
    this.log(`${"  ".repeat(this.depth)}${event} ${rule.name} at ${pos}`);
  }

  start(rule: Rule, input: ParseInput, state: S) {
    this.trace("start", rule, input);
    this.depth++;
    this.base.start(rule, input, state);
  }

  success(rule: Rule, input: ParseInput, state: S) {
    this.depth--;
    this.trace("success", rule, input);
    this.base.success(rule, input, state);
  }

  failure(rule: Rule, input: ParseInput, state: S) {
    this.depth--;
    this.trace("failure", rule, input);
    this.base.failure(rule, input, state);
  }

  raise(rule: Rule, input: ParseInput, state: S): never {
    this.trace("raise", rule, input);
    return this.base.raise(rule, input, state);
  }

  unwind(rule: Rule, input: ParseInput, state: S) {
    this.depth--;
    this.trace("unwind", rule, input);
    this.base.unwind?.(rule, input, state);
  }
}

export function errorMessages<S>(messages: Record<string, string>) {
  return new ErrorMessages<S>(messages);
}

export function tracer<S>(base?: Control<S>, log?: (line: string) => void) {
  return new Tracer<S>(base, log);
}
