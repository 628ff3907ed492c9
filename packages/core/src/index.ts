/**
 * @weft/core
 *
 * Parser-combinator engine: build grammars from literal, regex and predicate
 * primitives, combine them with sequence, alternation, repetition and bind,
 * and run them over text or token input.
 *
 * Provides:
 * - Parser nodes and their factories (`lit`, `reg`, `seq`, `first`, `rep`, ...)
 * - Forward references for recursive grammars (`fwd`)
 * - Whitespace-aware text contexts (`textParsers`)
 * - `parse` / `evaluate` entry points with `Result` and `ParseError`
 *
 * @module
 */

// Cursor & outcomes
export { Cursor, END, describeElement, describeByte } from "./cursor.js";
export type { Location, ByteExcerpt } from "./cursor.js";
export { matched, noMatch, mergeFailures, mergeAll, carry } from "./outcome.js";
export type { Matched, NoMatch, Outcome } from "./outcome.js";
export { rootFrame, descend } from "./frame.js";
export type { Frame } from "./frame.js";

// Parser nodes
export {
  Parser,
  LiteralParser,
  RegexParser,
  AnyElementParser,
  EndOfInputParser,
  SequenceParser,
  DiscardLeftParser,
  DiscardRightParser,
  FirstAlternativeParser,
  LongestAlternativeParser,
  OptionalParser,
  RepeatedParser,
  RepeatedSeparatedParser,
  ConversionParser,
  BindParser,
  PredicateParser,
  UntilParser,
  SuccessParser,
  FailureParser,
  DebugParser,
  skipWhitespace,
} from "./parsers.js";
export type { Whitespace, RepeatOptions, DebugOptions } from "./parsers.js";
export { ForwardParser, fwd } from "./forward.js";

// Combinator API
export {
  lit,
  litSeq,
  reg,
  any1,
  eof,
  seq,
  keepLeft,
  keepRight,
  first,
  longest,
  opt,
  rep,
  rep1,
  repsep,
  rep1sep,
  map,
  bind,
  pred,
  until,
  untilSeq,
  success,
  failure,
  debug,
} from "./parsers.js";
export { constant, splat, unsplat } from "./util.js";

// Whitespace-aware text parsers
export { textParsers, resolveWhitespace, DEFAULT_WHITESPACE } from "./whitespace.js";
export type { TextContext, TextContextOptions, WhitespaceSpec } from "./whitespace.js";

// Running grammars
export { parse, evaluate } from "./parse.js";
export type { ParseOptions, EvaluateOptions } from "./parse.js";
export { Success, Failure, isSuccess, isFailure, unwrap, unwrapOr, mapResult } from "./result.js";
export type { Result } from "./result.js";
export { ParseError, GrammarError, DepthLimitError } from "./errors.js";

// Configuration
export { config, defineConfig } from "./config.js";
export type { WeftConfig, LimitsConfig, ResolvedConfig } from "./config.js";
