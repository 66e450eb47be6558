export type { ApplyMode, MatchContext, Position, RewindMode, Rule } from "./types.js";
export type { InputIterator, ParseInput } from "./input.js";
export { Marker, MemoryInput, fileInput, formatPosition } from "./input.js";
export { ParseError, GrammarError } from "./errors.js";
export { ActionInput, Actions, type ActionHandler } from "./actions.js";
export {
  ErrorMessages,
  Normal,
  Tracer,
  errorMessages,
  tracer,
  type Control,
} from "./control.js";
export { Matcher, type MatcherOptions } from "./matcher.js";
export { Grammar, grammar } from "./grammar.js";
export {
  parse,
  parseResult,
  type ParseOptions,
  type ParseOutcome,
  type ParseTarget,
} from "./parse.js";
export {
  alnum,
  alpha,
  any,
  blank,
  bol,
  bytes,
  digit,
  eof,
  eol,
  failure,
  identifier,
  identifierFirst,
  identifierOther,
  istring,
  lower,
  notOne,
  notRange,
  one,
  range,
  ranges,
  space,
  string,
  success,
  upper,
  xdigit,
} from "./rules.js";
export {
  app,
  at,
  disable,
  enable,
  ifMust,
  ifThenElse,
  list,
  listMust,
  listTail,
  must,
  named,
  notAt,
  opt,
  pad,
  padOpt,
  plus,
  raise,
  rep,
  repMax,
  repMin,
  repMinMax,
  seq,
  sor,
  star,
  tryCatch,
  until,
} from "./combinators.js";
