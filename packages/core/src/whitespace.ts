/**
 * Whitespace-aware text parsers
 *
 * A `TextContext` builds terminals and sequences that share one whitespace
 * policy. Terminals skip the policy before and after their match; sequences
 * skip it between members.
 *
 * @example
 * ```typescript
 * const { lit, reg, seq, parse } = textParsers();            // policy: /\s*\/
 * const pair = seq(lit("("), reg(/\d+/), lit(","), reg(/\d+/), lit(")"));
 * parse(pair, "( 4 , 3 )");   // → Success(["(", "4", ",", "3", ")"])
 *
 * const tight = textParsers({ whitespace: null });
 * tight.parse(pair, "(4,3)");   // policies are fixed at construction
 * ```
 */

import type { ParseError } from "./errors.js";
import { parse as parseWith } from "./parse.js";
import type { ParseOptions } from "./parse.js";
import {
  AnyElementParser,
  DiscardLeftParser,
  DiscardRightParser,
  EndOfInputParser,
  LiteralParser,
  Parser,
  RegexParser,
  SequenceParser,
} from "./parsers.js";
import type { Whitespace } from "./parsers.js";
import type { Result } from "./result.js";

/** A parser, a regular expression, a pattern string, or `null` for none. */
export type WhitespaceSpec = Whitespace | RegExp | string | null;

export interface TextContextOptions {
  /** Default: `/\s*\/` */
  whitespace?: WhitespaceSpec;
}

export interface TextContext {
  /** The resolved policy, or `undefined` when the context skips nothing. */
  readonly whitespace: Whitespace | undefined;
  lit(text: string, ...texts: string[]): Parser<string, string>;
  reg(pattern: RegExp | string): Parser<string, string>;
  any1(): Parser<string, string>;
  eof(): Parser<string, null>;
  seq<T extends unknown[]>(...parsers: { [K in keyof T]: Parser<string, T[K]> }): Parser<string, T>;
  keepLeft<V>(left: Parser<string, V>, right: Parser<string, unknown>): Parser<string, V>;
  keepRight<V>(left: Parser<string, unknown>, right: Parser<string, V>): Parser<string, V>;
  /** `parse` with this context's policy before the end-of-input check. */
  parse<V>(grammar: Parser<string, V>, input: string, options?: ParseOptions): Result<V, ParseError>;
}

export const DEFAULT_WHITESPACE = /\s*/;

export function resolveWhitespace(spec: WhitespaceSpec | undefined): Whitespace | undefined {
  if (spec === null) return undefined;
  if (spec === undefined) return new RegexParser(DEFAULT_WHITESPACE);
  if (spec instanceof Parser) return spec;
  return new RegexParser(spec);
}

export function textParsers(options: TextContextOptions = {}): TextContext {
  const policy = resolveWhitespace(options.whitespace);

  return {
    whitespace: policy,
    lit: (text, ...texts) => new LiteralParser<string, string>([text, ...texts], policy),
    reg: (pattern) => new RegexParser(pattern, policy),
    any1: () => new AnyElementParser<string>(policy),
    eof: () => new EndOfInputParser<string>(policy),
    seq: <T extends unknown[]>(...parsers: { [K in keyof T]: Parser<string, T[K]> }) =>
      new SequenceParser<string, T>(parsers, policy),
    keepLeft: (left, right) => new DiscardRightParser(left, right, policy),
    keepRight: (left, right) => new DiscardLeftParser(left, right, policy),
    parse: (grammar, input, parseOptions = {}) =>
      parseWith(grammar, input, { ...parseOptions, whitespace: parseOptions.whitespace ?? policy }),
  };
}
