/**
 * Forward references
 *
 * A forward parser is declared before its definition exists, which is how
 * recursive grammars are tied together:
 *
 * ```typescript
 * const expr = fwd<string, number>();
 * const atom = first(reg(/\d+/).map(Number), keepRight(lit("("), keepLeft(expr, lit(")"))));
 * expr.define(atom);
 * ```
 */

import type { Cursor } from "./cursor.js";
import { GrammarError } from "./errors.js";
import { descend } from "./frame.js";
import type { Frame } from "./frame.js";
import type { Outcome } from "./outcome.js";
import { Parser } from "./parsers.js";

export class ForwardParser<E, V> extends Parser<E, V> {
  private target: Parser<E, V> | undefined = undefined;

  /** Bind the definition. A forward parser can be defined once. */
  define(parser: Parser<E, V>): this {
    if (this.target !== undefined) {
      throw new GrammarError(`Forward parser ${this} is already defined`);
    }
    this.target = parser;
    return this;
  }

  get defined(): boolean {
    return this.target !== undefined;
  }

  protected override get members(): readonly Parser<E, unknown>[] {
    return this.target === undefined ? [] : [this.target];
  }

  consume(cursor: Cursor<E>, frame: Frame): Outcome<E, V> {
    if (this.target === undefined) {
      throw new GrammarError(`Forward parser ${this} was used before it was defined`);
    }
    return this.target.consume(cursor, descend(frame, cursor));
  }

  protected describe(): string {
    return "fwd";
  }
}

/** Declare a parser whose definition is supplied later via `define`. */
export function fwd<E = string, V = unknown>(): ForwardParser<E, V> {
  return new ForwardParser<E, V>();
}
