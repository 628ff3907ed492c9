/**
 * Entry points
 *
 * `parse` runs a grammar over a whole input and converts the outcome into a
 * public `Result`. `evaluate` runs a parser at a cursor and returns the raw
 * outcome, without requiring the input to be fully consumed.
 */

import { Cursor } from "./cursor.js";
import { ParseError } from "./errors.js";
import { rootFrame } from "./frame.js";
import type { Outcome } from "./outcome.js";
import { DiscardRightParser, EndOfInputParser } from "./parsers.js";
import type { Parser, Whitespace } from "./parsers.js";
import { Failure, Success } from "./result.js";
import type { Result } from "./result.js";

export interface EvaluateOptions {
  /** Forward-reference nesting bound; 0 is unbounded. Defaults to `limits.depth`. */
  maxDepth?: number;
}

export interface ParseOptions extends EvaluateOptions {
  /** Policy skipped before the end-of-input check. Defaults to the grammar's own. */
  whitespace?: Whitespace;
}

export function evaluate<E, V>(
  parser: Parser<E, V>,
  cursor: Cursor<E>,
  options: EvaluateOptions = {}
): Outcome<E, V> {
  return parser.consume(cursor, rootFrame(options.maxDepth));
}

/**
 * Parse all of `input` with `grammar`.
 *
 * @example
 * ```typescript
 * const digits = reg(/\d+/).map(Number);
 * parse(digits, "42");   // → { _tag: "Success", value: 42 }
 * parse(digits, "42x");  // → Failure: Expected end of source but found "x"
 * ```
 */
export function parse<E, V>(
  grammar: Parser<E, V>,
  input: ArrayLike<E>,
  options: ParseOptions = {}
): Result<V, ParseError> {
  const whole = new DiscardRightParser<E, V>(
    grammar,
    new EndOfInputParser<E>(options.whitespace ?? grammar.whitespace)
  );
  const outcome = evaluate(whole, new Cursor(input, 0), options);
  return outcome.ok ? Success(outcome.value) : Failure(ParseError.fromFailure(outcome));
}
