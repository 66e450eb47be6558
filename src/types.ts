import type { ParseInput } from "./input.js";

// Whether actions fire for rules matched in the current subtree.
export type ApplyMode = "action" | "nothing";

// What a rule owes its caller when it fails after consuming input.
export type RewindMode = "required" | "active" | "dontcare";

export interface Position {
  byte: number;
  line: number;
  column: number;
  source: string;
}

// The view of a running parse that rules match against. Rules themselves are
// stateless; everything mutable lives behind this context.
export interface MatchContext {
  readonly input: ParseInput;
  invoke(rule: Rule, applyMode: ApplyMode, rewindMode: RewindMode): boolean;
  lookup(name: string): Rule;
  raise(rule: Rule): never;
}

export interface Rule {
  readonly name: string;
  readonly subs: readonly Rule[];
  // Matched without control hooks or actions, like a transparent wrapper.
  readonly skipControl?: boolean;
  match(m: MatchContext, applyMode: ApplyMode, rewindMode: RewindMode): boolean;
}
