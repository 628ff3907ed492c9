/**
 * Parser nodes for @weft/core
 *
 * Every grammar is a graph of `Parser<E, V>` nodes: `E` is the input element
 * type (`string` for text), `V` the produced value. A node's `consume` is
 * its evaluation rule; nodes hold no evaluation-time state, so a grammar can
 * be run any number of times once it is wired.
 *
 * Alternation comes in two flavours: `first` returns the first branch that
 * matches, `longest` runs every branch and keeps the one that got farthest.
 */

import { Cursor, describeElement, sliceElements, sliceText } from "./cursor.js";
import { config } from "./config.js";
import { GrammarError } from "./errors.js";
import type { Frame } from "./frame.js";
import { carry, matched, mergeFailures, noMatch } from "./outcome.js";
import type { Matched, NoMatch, Outcome } from "./outcome.js";

/** A parser recognising insignificant text between tokens. */
export type Whitespace = Parser<string, unknown>;

export interface RepeatOptions {
  /** Minimum number of matches (default 0). */
  min?: number;
  /** Maximum number of matches (default unbounded). */
  max?: number;
}

export interface DebugOptions<E, V> {
  /** Log before and after evaluation. Defaults to the `debug` config key. */
  verbose?: boolean;
  /** Invoked with the wrapped parser and cursor before each evaluation. */
  callback?: (parser: Parser<E, V>, cursor: Cursor<E>) => void;
  /** Log sink (default: console.log) */
  writer?: (line: string) => void;
}

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

export abstract class Parser<E, V> {
  /** Display name used by `toString()` and debug output. */
  name: string | undefined = undefined;

  /** Evaluate this node at `cursor`. */
  abstract consume(cursor: Cursor<E>, frame: Frame): Outcome<E, V>;

  /** Structural description, used when the node has no name. */
  protected abstract describe(): string;

  /**
   * Whitespace policy this node was built under. Composite nodes report the
   * policy of their first member that has one. The search visits each node
   * once, so shared members and cycles through forward references are cheap.
   */
  get whitespace(): Whitespace | undefined {
    return this.findWhitespace(new Set());
  }

  /** Policy given to this node at construction, if any. */
  protected get ownWhitespace(): Whitespace | undefined {
    return undefined;
  }

  /** Members searched in order for a policy when the node has none of its own. */
  protected get members(): readonly Parser<E, unknown>[] {
    return [];
  }

  private findWhitespace(seen: Set<object>): Whitespace | undefined {
    if (seen.has(this)) return undefined;
    seen.add(this);
    const own = this.ownWhitespace;
    if (own !== undefined) return own;
    for (const member of this.members) {
      const policy = member.findWhitespace(seen);
      if (policy !== undefined) return policy;
    }
    return undefined;
  }

  /** Give the node a display name. Meant for grammar construction time. */
  named(name: string): this {
    this.name = name;
    return this;
  }

  toString(): string {
    return this.name ?? this.describe();
  }

  map<U>(f: (value: V) => U): Parser<E, U> {
    return new ConversionParser(this, f);
  }

  bind<U>(f: (value: V) => Parser<E, U>): Parser<E, U> {
    return new BindParser(this, f);
  }

  /** First-match alternation with `other`. */
  or<U>(other: Parser<E, U>): Parser<E, V | U> {
    const branches: Parser<E, V | U>[] = [this, other];
    return new FirstAlternativeParser(branches);
  }

  and<U>(other: Parser<E, U>): Parser<E, [V, U]> {
    return new SequenceParser<E, [V, U]>([this, other], this.whitespace);
  }

  /** Sequence with `other`, keeping only `other`'s value. */
  then<U>(other: Parser<E, U>): Parser<E, U> {
    return new DiscardLeftParser(this, other, this.whitespace);
  }

  /** Sequence with `other`, keeping only this parser's value. */
  skip(other: Parser<E, unknown>): Parser<E, V> {
    return new DiscardRightParser(this, other, this.whitespace);
  }

  opt(): Parser<E, V[]> {
    return new OptionalParser(this);
  }

  many(options: RepeatOptions = {}): Parser<E, V[]> {
    return new RepeatedParser(this, options);
  }

  many1(): Parser<E, V[]> {
    return new RepeatedParser(this, { min: 1 });
  }

  sepBy(separator: Parser<E, unknown>, options: RepeatOptions = {}): Parser<E, V[]> {
    return new RepeatedSeparatedParser(this, separator, options);
  }

  filter(test: (value: V) => boolean, description: string): Parser<E, V> {
    return new PredicateParser(this, test, description);
  }

  debug(options: DebugOptions<E, V> = {}): Parser<E, V> {
    return new DebugParser(this, options);
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Run the whitespace policy at `cursor`; a failing policy consumes nothing. */
export function skipWhitespace<E>(
  policy: Whitespace | undefined,
  cursor: Cursor<E>,
  frame: Frame
): Cursor<E> {
  if (policy === undefined) return cursor;
  const source = cursor.source;
  if (typeof source !== "string") return cursor;
  const outcome = policy.consume(new Cursor<string>(source, cursor.position), frame);
  return outcome.ok ? cursor.at(outcome.next.position) : cursor;
}

/** End position of `pattern` matched at `cursor`, or `undefined`. */
function matchPattern<E>(cursor: Cursor<E>, pattern: ArrayLike<unknown>): number | undefined {
  const source: ArrayLike<unknown> = cursor.source;
  const start = cursor.position;
  if (typeof source === "string" && typeof pattern === "string") {
    return source.startsWith(pattern, start) ? start + pattern.length : undefined;
  }
  if (start + pattern.length > source.length) return undefined;
  for (let i = 0; i < pattern.length; i++) {
    if (source[start + i] !== pattern[i]) return undefined;
  }
  return start + pattern.length;
}

function describePattern(pattern: ArrayLike<unknown>): string {
  if (typeof pattern === "string") return JSON.stringify(pattern);
  return Array.from(pattern, describeElement).join(" ");
}

function describeValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map(describeValue).join(", ")}]`;
  return String(value);
}

function describeOutcome(outcome: Outcome<unknown, unknown>): string {
  if (outcome.ok) {
    return `matched ${describeValue(outcome.value)} up to index ${outcome.next.position}`;
  }
  return `failed at index ${outcome.at.position}, expected ${[...outcome.expected].join(" or ")}`;
}

function checkBounds(min: number, max: number | undefined, parser: Parser<unknown, unknown>): void {
  if (!Number.isInteger(min) || min < 0) {
    throw new GrammarError(`Invalid minimum ${min} for repetition of ${parser}`);
  }
  if (max !== undefined && (!Number.isInteger(max) || max < min)) {
    throw new GrammarError(`Invalid maximum ${max} (minimum ${min}) for repetition of ${parser}`);
  }
}

function stalled(repeated: Parser<unknown, unknown>, at: Cursor<unknown>): GrammarError {
  return new GrammarError(
    `Infinite repetition in ${repeated}: matched without consuming input at index ${at.position} (${at.describeNext()})`
  );
}

// ---------------------------------------------------------------------------
// Terminals
// ---------------------------------------------------------------------------

export class LiteralParser<E, P extends ArrayLike<E>> extends Parser<E, P> {
  readonly patterns: readonly P[];
  private readonly policy: Whitespace | undefined;

  constructor(patterns: readonly P[], policy?: Whitespace) {
    super();
    if (patterns.length === 0) throw new GrammarError("A literal needs at least one pattern");
    this.patterns = patterns;
    this.policy = policy;
  }

  protected override get ownWhitespace(): Whitespace | undefined {
    return this.policy;
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, P> {
    const start = skipWhitespace(this.policy, cursor, frame);
    for (const pattern of this.patterns) {
      const end = matchPattern(start, pattern);
      if (end !== undefined) {
        return matched(pattern, skipWhitespace(this.policy, start.at(end), frame));
      }
    }
    return noMatch(start, ...this.patterns.map(describePattern));
  }

  protected describe(): string {
    const described = this.patterns.map(describePattern);
    return described.length === 1 ? described[0] : `lit(${described.join(", ")})`;
  }
}

/** Anchored regular expression over text input. */
export class RegexParser extends Parser<string, string> {
  readonly pattern: RegExp;
  private readonly sticky: RegExp;
  private readonly policy: Whitespace | undefined;

  constructor(pattern: RegExp | string, policy?: Whitespace) {
    super();
    this.pattern = typeof pattern === "string" ? new RegExp(pattern) : pattern;
    this.sticky = new RegExp(this.pattern.source, this.pattern.flags.replace(/[gy]/g, "") + "y");
    this.policy = policy;
  }

  protected override get ownWhitespace(): Whitespace | undefined {
    return this.policy;
  }

  consume(cursor: Cursor<string>, frame: Frame): Outcome<string, string> {
    const text = cursor.source;
    if (typeof text !== "string") {
      throw new GrammarError(`${this} can only run on text input`);
    }
    const start = skipWhitespace(this.policy, cursor, frame);
    this.sticky.lastIndex = start.position;
    const m = this.sticky.exec(text);
    if (m === null) return noMatch(start, `/${this.pattern.source}/`);
    return matched(m[0], skipWhitespace(this.policy, start.at(start.position + m[0].length), frame));
  }

  protected describe(): string {
    return `reg(/${this.pattern.source}/)`;
  }
}

export class AnyElementParser<E> extends Parser<E, E> {
  private readonly policy: Whitespace | undefined;

  constructor(policy?: Whitespace) {
    super();
    this.policy = policy;
  }

  protected override get ownWhitespace(): Whitespace | undefined {
    return this.policy;
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, E> {
    const start = skipWhitespace(this.policy, cursor, frame);
    if (start.atEnd()) return noMatch(start, "any element");
    return matched(start.source[start.position], skipWhitespace(this.policy, start.advance(), frame));
  }

  protected describe(): string {
    return "any1";
  }
}

export class EndOfInputParser<E> extends Parser<E, null> {
  private readonly policy: Whitespace | undefined;

  constructor(policy?: Whitespace) {
    super();
    this.policy = policy;
  }

  protected override get ownWhitespace(): Whitespace | undefined {
    return this.policy;
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, null> {
    const start = skipWhitespace(this.policy, cursor, frame);
    return start.atEnd() ? matched(null, start) : noMatch(start, "end of source");
  }

  protected describe(): string {
    return "eof";
  }
}

// ---------------------------------------------------------------------------
// Sequence
// ---------------------------------------------------------------------------

export class SequenceParser<E, T extends readonly unknown[]> extends Parser<E, T> {
  readonly parsers: readonly Parser<E, unknown>[];
  private readonly policy: Whitespace | undefined;

  constructor(parsers: readonly Parser<E, unknown>[], policy?: Whitespace) {
    super();
    this.parsers = parsers;
    this.policy = policy;
  }

  protected override get ownWhitespace(): Whitespace | undefined {
    return this.policy;
  }

  protected override get members(): readonly Parser<E, unknown>[] {
    return this.parsers;
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, T> {
    const values: unknown[] = [];
    let current = cursor;
    let farthest: NoMatch<E> | undefined;

    for (let i = 0; i < this.parsers.length; i++) {
      if (i > 0) current = skipWhitespace(this.policy, current, frame);
      const outcome = this.parsers[i].consume(current, frame);
      if (!outcome.ok) return mergeFailures(farthest, outcome);
      values.push(outcome.value);
      current = outcome.next;
      farthest = mergeFailures(farthest, outcome.farthest);
    }

    return matched(values as T, current, farthest);
  }

  protected describe(): string {
    return this.parsers.map(String).join(" & ");
  }
}

/** `left` then `right`, producing `right`'s value. */
export class DiscardLeftParser<E, V> extends Parser<E, V> {
  private readonly pair: SequenceParser<E, [unknown, V]>;

  constructor(left: Parser<E, unknown>, right: Parser<E, V>, policy?: Whitespace) {
    super();
    this.pair = new SequenceParser<E, [unknown, V]>([left, right], policy);
  }

  protected override get members(): readonly Parser<E, unknown>[] {
    return [this.pair];
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, V> {
    const outcome = this.pair.consume(cursor, frame);
    return outcome.ok ? matched(outcome.value[1], outcome.next, outcome.farthest) : outcome;
  }

  protected describe(): string {
    const [left, right] = this.pair.parsers;
    return `${left} >> ${right}`;
  }
}

/** `left` then `right`, producing `left`'s value. */
export class DiscardRightParser<E, V> extends Parser<E, V> {
  private readonly pair: SequenceParser<E, [V, unknown]>;

  constructor(left: Parser<E, V>, right: Parser<E, unknown>, policy?: Whitespace) {
    super();
    this.pair = new SequenceParser<E, [V, unknown]>([left, right], policy);
  }

  protected override get members(): readonly Parser<E, unknown>[] {
    return [this.pair];
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, V> {
    const outcome = this.pair.consume(cursor, frame);
    return outcome.ok ? matched(outcome.value[0], outcome.next, outcome.farthest) : outcome;
  }

  protected describe(): string {
    const [left, right] = this.pair.parsers;
    return `${left} << ${right}`;
  }
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/** Ordered alternation: the first branch that matches wins. */
export class FirstAlternativeParser<E, V> extends Parser<E, V> {
  readonly parsers: readonly Parser<E, V>[];

  constructor(parsers: readonly Parser<E, V>[]) {
    super();
    if (parsers.length === 0) throw new GrammarError("An alternation needs at least one branch");
    this.parsers = parsers;
  }

  protected override get members(): readonly Parser<E, unknown>[] {
    return this.parsers;
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, V> {
    let farthest: NoMatch<E> | undefined;
    for (const parser of this.parsers) {
      const outcome = parser.consume(cursor, frame);
      if (outcome.ok) return carry(outcome, farthest);
      farthest = mergeFailures(farthest, outcome);
    }
    return farthest ?? noMatch(cursor);
  }

  protected describe(): string {
    return this.parsers.map(String).join(" | ");
  }
}

/**
 * Longest-match alternation: every branch runs from the same cursor and the
 * one ending farthest wins, the earliest branch on a tie.
 */
export class LongestAlternativeParser<E, V> extends Parser<E, V> {
  readonly parsers: readonly Parser<E, V>[];

  constructor(parsers: readonly Parser<E, V>[]) {
    super();
    if (parsers.length === 0) throw new GrammarError("An alternation needs at least one branch");
    this.parsers = parsers;
  }

  protected override get members(): readonly Parser<E, unknown>[] {
    return this.parsers;
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, V> {
    let best: Matched<E, V> | undefined;
    let farthest: NoMatch<E> | undefined;

    for (const parser of this.parsers) {
      const outcome = parser.consume(cursor, frame);
      if (outcome.ok) {
        farthest = mergeFailures(farthest, outcome.farthest);
        if (best === undefined || outcome.next.position > best.next.position) best = outcome;
      } else {
        farthest = mergeFailures(farthest, outcome);
      }
    }

    if (best !== undefined) return matched(best.value, best.next, farthest);
    return farthest ?? noMatch(cursor);
  }

  protected describe(): string {
    return `longest(${this.parsers.map(String).join(", ")})`;
  }
}

// ---------------------------------------------------------------------------
// Optional & repetition
// ---------------------------------------------------------------------------

export class OptionalParser<E, V> extends Parser<E, V[]> {
  readonly parser: Parser<E, V>;

  constructor(parser: Parser<E, V>) {
    super();
    this.parser = parser;
  }

  protected override get members(): readonly Parser<E, unknown>[] {
    return [this.parser];
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, V[]> {
    const outcome = this.parser.consume(cursor, frame);
    if (outcome.ok) return matched([outcome.value], outcome.next, outcome.farthest);
    return matched([], cursor, outcome);
  }

  protected describe(): string {
    return `opt(${this.parser})`;
  }
}

export class RepeatedParser<E, V> extends Parser<E, V[]> {
  readonly parser: Parser<E, V>;
  readonly min: number;
  readonly max: number | undefined;

  constructor(parser: Parser<E, V>, { min = 0, max }: RepeatOptions = {}) {
    super();
    checkBounds(min, max, parser);
    this.parser = parser;
    this.min = min;
    this.max = max;
  }

  protected override get members(): readonly Parser<E, unknown>[] {
    return [this.parser];
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, V[]> {
    const values: V[] = [];
    let current = cursor;
    let farthest: NoMatch<E> | undefined;

    while (this.max === undefined || values.length < this.max) {
      const outcome = this.parser.consume(current, frame);
      if (!outcome.ok) {
        farthest = mergeFailures(farthest, outcome);
        break;
      }
      if (outcome.next.position === current.position) throw stalled(this, current);
      values.push(outcome.value);
      current = outcome.next;
      farthest = mergeFailures(farthest, outcome.farthest);
    }

    if (values.length >= this.min) return matched(values, current, farthest);
    return farthest ?? noMatch(current);
  }

  protected describe(): string {
    const min = this.min > 0 ? `, min=${this.min}` : "";
    const max = this.max !== undefined ? `, max=${this.max}` : "";
    return `rep(${this.parser}${min}${max})`;
  }
}

/**
 * Repetition with a separator between items. A separator that is not
 * followed by an item is left unconsumed.
 */
export class RepeatedSeparatedParser<E, V> extends Parser<E, V[]> {
  readonly parser: Parser<E, V>;
  readonly separator: Parser<E, unknown>;
  readonly min: number;
  readonly max: number | undefined;

  constructor(
    parser: Parser<E, V>,
    separator: Parser<E, unknown>,
    { min = 0, max }: RepeatOptions = {}
  ) {
    super();
    checkBounds(min, max, parser);
    this.parser = parser;
    this.separator = separator;
    this.min = min;
    this.max = max;
  }

  protected override get members(): readonly Parser<E, unknown>[] {
    return [this.parser, this.separator];
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, V[]> {
    if (this.max === 0) return matched([], cursor);

    const initial = this.parser.consume(cursor, frame);
    if (!initial.ok) {
      return this.min === 0 ? matched([], cursor, initial) : initial;
    }

    const values: V[] = [initial.value];
    let current = initial.next;
    let farthest = initial.farthest;

    while (this.max === undefined || values.length < this.max) {
      const separated = this.separator.consume(current, frame);
      if (!separated.ok) {
        farthest = mergeFailures(farthest, separated);
        break;
      }
      farthest = mergeFailures(farthest, separated.farthest);

      // Items resume from after the separator, but `current` only moves once
      // the item has matched too.
      const item = this.parser.consume(separated.next, frame);
      if (!item.ok) {
        farthest = mergeFailures(farthest, item);
        break;
      }
      if (item.next.position === current.position) throw stalled(this, current);
      values.push(item.value);
      current = item.next;
      farthest = mergeFailures(farthest, item.farthest);
    }

    if (values.length >= this.min) return matched(values, current, farthest);
    return farthest ?? noMatch(current);
  }

  protected describe(): string {
    const min = this.min > 0 ? `, min=${this.min}` : "";
    const max = this.max !== undefined ? `, max=${this.max}` : "";
    return `repsep(${this.parser}, ${this.separator}${min}${max})`;
  }
}

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

export class ConversionParser<E, V, U> extends Parser<E, U> {
  readonly parser: Parser<E, V>;
  readonly converter: (value: V) => U;

  constructor(parser: Parser<E, V>, converter: (value: V) => U) {
    super();
    this.parser = parser;
    this.converter = converter;
  }

  protected override get members(): readonly Parser<E, unknown>[] {
    return [this.parser];
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, U> {
    const outcome = this.parser.consume(cursor, frame);
    if (!outcome.ok) return outcome;
    return matched(this.converter(outcome.value), outcome.next, outcome.farthest);
  }

  protected describe(): string {
    return this.parser.toString();
  }
}

/**
 * Monadic bind: the value of `parser` picks the parser that continues from
 * where it stopped.
 */
export class BindParser<E, V, U> extends Parser<E, U> {
  readonly parser: Parser<E, V>;
  readonly transformer: (value: V) => Parser<E, U>;

  constructor(parser: Parser<E, V>, transformer: (value: V) => Parser<E, U>) {
    super();
    this.parser = parser;
    this.transformer = transformer;
  }

  protected override get members(): readonly Parser<E, unknown>[] {
    return [this.parser];
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, U> {
    const outcome = this.parser.consume(cursor, frame);
    if (!outcome.ok) return outcome;
    const next = this.transformer(outcome.value);
    return carry(next.consume(outcome.next, frame), outcome.farthest);
  }

  protected describe(): string {
    return `bind(${this.parser})`;
  }
}

/**
 * Match `parser` only when its value passes `test`. A rejected value fails
 * at the position where the predicate started.
 */
export class PredicateParser<E, V> extends Parser<E, V> {
  readonly parser: Parser<E, V>;
  readonly test: (value: V) => boolean;
  readonly description: string;

  constructor(parser: Parser<E, V>, test: (value: V) => boolean, description: string) {
    super();
    this.parser = parser;
    this.test = test;
    this.description = description;
  }

  protected override get members(): readonly Parser<E, unknown>[] {
    return [this.parser];
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, V> {
    const outcome = this.parser.consume(cursor, frame);
    if (!outcome.ok || this.test(outcome.value)) return outcome;
    return carry<E, V>(noMatch(cursor, this.description), outcome.farthest);
  }

  protected describe(): string {
    return `pred(${this.parser}, ${this.description})`;
  }
}

/**
 * Everything up to the first position where `parser` matches. The match
 * itself is not consumed.
 */
export class UntilParser<E, S> extends Parser<E, S> {
  readonly parser: Parser<E, unknown>;
  private readonly span: (source: ArrayLike<E>, start: number, end: number) => S;

  constructor(
    parser: Parser<E, unknown>,
    span: (source: ArrayLike<E>, start: number, end: number) => S
  ) {
    super();
    this.parser = parser;
    this.span = span;
  }

  protected override get members(): readonly Parser<E, unknown>[] {
    return [this.parser];
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, S> {
    let current = cursor;
    let farthest: NoMatch<E> | undefined;

    for (;;) {
      const outcome = this.parser.consume(current, frame);
      if (outcome.ok) {
        return matched(this.span(cursor.source, cursor.position, current.position), current, farthest);
      }
      farthest = mergeFailures(farthest, outcome);
      if (current.atEnd()) return farthest;
      current = current.advance();
    }
  }

  protected describe(): string {
    return `until(${this.parser})`;
  }
}

// ---------------------------------------------------------------------------
// Constants & debugging
// ---------------------------------------------------------------------------

export class SuccessParser<E, V> extends Parser<E, V> {
  readonly value: V;

  constructor(value: V) {
    super();
    this.value = value;
  }

  consume(cursor: Cursor<E>): Outcome<E, V> {
    return matched(this.value, cursor);
  }

  protected describe(): string {
    return `success(${describeValue(this.value)})`;
  }
}

export class FailureParser<E> extends Parser<E, never> {
  readonly expected: string;

  constructor(expected: string) {
    super();
    this.expected = expected;
  }

  consume(cursor: Cursor<E>): Outcome<E, never> {
    return noMatch(cursor, this.expected);
  }

  protected describe(): string {
    return `failure(${JSON.stringify(this.expected)})`;
  }
}

/** Transparent wrapper that logs and calls back around `parser`. */
export class DebugParser<E, V> extends Parser<E, V> {
  readonly parser: Parser<E, V>;
  readonly verbose: boolean;
  private readonly callback: ((parser: Parser<E, V>, cursor: Cursor<E>) => void) | undefined;
  private readonly writer: (line: string) => void;

  constructor(parser: Parser<E, V>, options: DebugOptions<E, V> = {}) {
    super();
    this.parser = parser;
    this.verbose = options.verbose ?? config.get().debug;
    this.callback = options.callback;
    this.writer = options.writer ?? ((line: string) => console.log(line));
  }

  protected override get members(): readonly Parser<E, unknown>[] {
    return [this.parser];
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, V> {
    if (this.verbose) {
      this.writer(
        `[weft] Evaluating ${cursor.describeNext()} at index ${cursor.position} using ${this.parser}`
      );
    }
    this.callback?.(this.parser, cursor);

    const outcome = this.parser.consume(cursor, frame);

    if (this.verbose) {
      this.writer(`[weft] Result of ${this.parser}: ${describeOutcome(outcome)}`);
    }
    return outcome;
  }

  protected describe(): string {
    return `debug(${this.parser})`;
  }
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

/** Match one of several strings, trying them in order. */
export function lit(text: string, ...texts: string[]): Parser<string, string> {
  return new LiteralParser<string, string>([text, ...texts]);
}

/** Match one of several element sequences, trying them in order. */
export function litSeq<E>(
  pattern: readonly E[],
  ...patterns: (readonly E[])[]
): Parser<E, readonly E[]> {
  return new LiteralParser<E, readonly E[]>([pattern, ...patterns]);
}

/** Match a regular expression anchored at the current position. */
export function reg(pattern: RegExp | string): Parser<string, string> {
  return new RegexParser(pattern);
}

export function any1<E = string>(): Parser<E, E> {
  return new AnyElementParser<E>();
}

export function eof<E = string>(): Parser<E, null> {
  return new EndOfInputParser<E>();
}

/**
 * Sequence of parsers producing the tuple of their values. The array half
 * of the parameter type is what lets `E` be inferred from the arguments.
 */
export function seq<E, T extends unknown[]>(
  ...parsers: { [K in keyof T]: Parser<E, T[K]> } & Parser<E, unknown>[]
): Parser<E, T> {
  return new SequenceParser<E, T>(parsers);
}

export function keepLeft<E, V>(left: Parser<E, V>, right: Parser<E, unknown>): Parser<E, V> {
  return new DiscardRightParser(left, right);
}

export function keepRight<E, V>(left: Parser<E, unknown>, right: Parser<E, V>): Parser<E, V> {
  return new DiscardLeftParser(left, right);
}

/** Ordered alternation. Branches of different value types need an explicit `V`. */
export function first<E, V>(parser: Parser<E, V>, ...parsers: Parser<E, V>[]): Parser<E, V> {
  return new FirstAlternativeParser([parser, ...parsers]);
}

/** Longest-match alternation. Branches of different value types need an explicit `V`. */
export function longest<E, V>(parser: Parser<E, V>, ...parsers: Parser<E, V>[]): Parser<E, V> {
  return new LongestAlternativeParser([parser, ...parsers]);
}

export function opt<E, V>(parser: Parser<E, V>): Parser<E, V[]> {
  return new OptionalParser(parser);
}

export function rep<E, V>(parser: Parser<E, V>, options: RepeatOptions = {}): Parser<E, V[]> {
  return new RepeatedParser(parser, options);
}

export function rep1<E, V>(parser: Parser<E, V>): Parser<E, V[]> {
  return new RepeatedParser(parser, { min: 1 });
}

export function repsep<E, V>(
  parser: Parser<E, V>,
  separator: Parser<E, unknown>,
  options: RepeatOptions = {}
): Parser<E, V[]> {
  return new RepeatedSeparatedParser(parser, separator, options);
}

export function rep1sep<E, V>(parser: Parser<E, V>, separator: Parser<E, unknown>): Parser<E, V[]> {
  return new RepeatedSeparatedParser(parser, separator, { min: 1 });
}

export function map<E, V, U>(parser: Parser<E, V>, f: (value: V) => U): Parser<E, U> {
  return new ConversionParser(parser, f);
}

export function bind<E, V, U>(
  parser: Parser<E, V>,
  f: (value: V) => Parser<E, U>
): Parser<E, U> {
  return new BindParser(parser, f);
}

export function pred<E, V>(
  parser: Parser<E, V>,
  test: (value: V) => boolean,
  description: string
): Parser<E, V> {
  return new PredicateParser(parser, test, description);
}

/** Text up to (not including) the first place `parser` matches. */
export function until(parser: Parser<string, unknown>): Parser<string, string> {
  return new UntilParser(parser, sliceText);
}

/** Elements up to (not including) the first place `parser` matches. */
export function untilSeq<E>(parser: Parser<E, unknown>): Parser<E, E[]> {
  return new UntilParser<E, E[]>(parser, sliceElements);
}

/** Always succeed with `value`, consuming nothing. */
export function success<V, E = never>(value: V): Parser<E, V> {
  return new SuccessParser<E, V>(value);
}

/** Always fail, expecting `expected`. */
export function failure<E = never>(expected: string): Parser<E, never> {
  return new FailureParser<E>(expected);
}

export function debug<E, V>(parser: Parser<E, V>, options: DebugOptions<E, V> = {}): Parser<E, V> {
  return new DebugParser(parser, options);
}
