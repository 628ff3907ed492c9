/**
 * Error types for @weft/core
 *
 * `ParseError` describes input that does not match a grammar and is returned
 * inside a `Failure`. `GrammarError` and `DepthLimitError` are thrown: the
 * first signals a defect in the grammar itself, the second input nesting
 * beyond the configured bound.
 */

import type { ByteExcerpt, Cursor } from "./cursor.js";
import type { NoMatch } from "./outcome.js";

/** Terminal parse failure with position context. */
export class ParseError extends Error {
  /** What would have succeeded at the failure position, deduplicated, in discovery order. */
  readonly expected: readonly string[];
  /** Description of what was found instead. */
  readonly found: string;
  /** Zero-based index into the input. */
  readonly position: number;
  /** Zero-based line, or `undefined` for token input. */
  readonly line: number | undefined;
  /** Zero-based column, or `undefined` for token input. */
  readonly column: number | undefined;
  /** Text of the offending line, or `undefined` for token input. */
  readonly lineText: string | undefined;
  /** Bytes around the failure, or `undefined` unless the input is a `Uint8Array`. */
  readonly excerpt: ByteExcerpt | undefined;

  constructor(at: Cursor<unknown>, expected: Iterable<string>) {
    const list = [...new Set(expected)];
    const found = at.describeNext();
    super(`Expected ${list.join(" or ")} but found ${found}`);
    this.name = "ParseError";
    this.expected = list;
    this.found = found;
    this.position = at.position;
    const location = at.locate();
    this.line = location?.line;
    this.column = location?.column;
    this.lineText = location?.lineText;
    this.excerpt = at.byteExcerpt();
  }

  static fromFailure(failure: NoMatch<unknown>): ParseError {
    return new ParseError(failure.at, failure.expected);
  }

  /**
   * Multi-line rendering with a caret under the failing column:
   *
   * ```
   * Expected "b" but found "c"
   * Line 1, character 3
   *
   * abc
   *   ^
   * ```
   *
   * Byte input gets an excerpt in place of the line, and other token input
   * only the index.
   */
  format(): string {
    if (this.excerpt !== undefined) {
      const { text, pointer } = this.excerpt;
      return `${this.message} at index ${this.position}\n\n${text}\n${pointer}`;
    }
    if (this.line === undefined || this.column === undefined || this.lineText === undefined) {
      return `${this.message} at index ${this.position}`;
    }
    const pointer = " ".repeat(this.column) + "^";
    return `${this.message}\nLine ${this.line + 1}, character ${this.column + 1}\n\n${this.lineText}\n${pointer}`;
  }
}

/** A grammar was built or wired incorrectly. Never caused by the input alone. */
export class GrammarError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GrammarError";
  }
}

/** Evaluation nested through more forward references than `maxDepth` allows. */
export class DepthLimitError extends Error {
  readonly maxDepth: number;
  readonly position: number;

  constructor(maxDepth: number, at: Cursor<unknown>) {
    super(`Grammar nesting exceeded the limit of ${maxDepth} at index ${at.position}`);
    this.name = "DepthLimitError";
    this.maxDepth = maxDepth;
    this.position = at.position;
  }
}
