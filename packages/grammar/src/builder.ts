/**
 * Programmatic grammar assembly.
 *
 * `GrammarBuilder` collects named rules written with weft combinators. Rules
 * that refer to each other are declared first and defined later, and
 * `build()` reports any declaration that was never given a definition.
 *
 * @example
 * ```typescript
 * const g = new GrammarBuilder();
 * const { lit, reg, seq } = g.text;
 * const list = g.declare<unknown[]>("list");
 * const item = g.rule("item", first<string, unknown>(reg(/\d+/).map(Number), list));
 * g.define(list, keepRight(lit("["), keepLeft(repsep(item, lit(",")), lit("]"))));
 * g.parse("list", "[1, [2, 3]]");   // → Success([1, [2, 3]])
 * ```
 */

import { GrammarError, fwd, textParsers } from "@weft/core";
import type {
  ForwardParser,
  ParseError,
  Parser,
  Result,
  TextContext,
  TextContextOptions,
} from "@weft/core";

export class GrammarBuilder {
  /** Terminals and sequences sharing this builder's whitespace policy. */
  readonly text: TextContext;
  private readonly rules = new Map<string, Parser<string, unknown>>();
  private readonly pending = new Map<string, ForwardParser<string, unknown>>();

  constructor(options: TextContextOptions = {}) {
    this.text = textParsers(options);
  }

  /** Reserve a rule name for a parser defined later with `define`. */
  declare<V>(name: string): ForwardParser<string, V> {
    this.claim(name);
    const ref = fwd<string, V>().named(name);
    this.rules.set(name, ref);
    this.pending.set(name, ref);
    return ref;
  }

  define<V>(ref: ForwardParser<string, V>, parser: Parser<string, V>): ForwardParser<string, V> {
    ref.define(parser);
    if (ref.name !== undefined) this.pending.delete(ref.name);
    return ref;
  }

  /** Register `parser` under `name`; error messages will use the name. */
  rule<V>(name: string, parser: Parser<string, V>): Parser<string, V> {
    this.claim(name);
    const named = parser.named(name);
    this.rules.set(name, named);
    return named;
  }

  get(name: string): Parser<string, unknown> {
    const parser = this.rules.get(name);
    if (parser === undefined) {
      throw new GrammarError(`Rule '${name}' not found in grammar`);
    }
    return parser;
  }

  /** All rules, once every declaration is defined. */
  build(): ReadonlyMap<string, Parser<string, unknown>> {
    const missing = [...this.pending.keys()];
    if (missing.length > 0) {
      throw new GrammarError(`Rules declared but never defined: ${missing.join(", ")}`);
    }
    return new Map(this.rules);
  }

  parse(name: string, input: string): Result<unknown, ParseError> {
    this.build();
    return this.text.parse(this.get(name), input);
  }

  private claim(name: string): void {
    if (this.rules.has(name)) {
      throw new GrammarError(`Rule '${name}' is defined more than once`);
    }
  }
}
