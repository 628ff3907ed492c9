/**
 * Core types for @weft/grammar
 *
 * Defines the grammar IR produced by the notation reader and the compiled
 * grammar returned by `buildParser`.
 */

import type { ParseError, Parser, Result, WhitespaceSpec } from "@weft/core";

/** Grammar rule IR nodes: the intermediate representation for PEG grammars. */
export type GrammarRule =
  | { type: "literal"; value: string }
  | { type: "charRange"; from: string; to: string }
  | { type: "sequence"; rules: GrammarRule[] }
  | { type: "alternation"; rules: GrammarRule[] }
  | { type: "longest"; rules: GrammarRule[] }
  | { type: "repetition"; rule: GrammarRule; min: number; max: number | null }
  | { type: "optional"; rule: GrammarRule }
  | { type: "reference"; name: string }
  | { type: "any" };

export interface BuildOptions {
  /** Entry rule (defaults to the first rule defined). */
  start?: string;
  /** Whitespace skipped around terminals and between sequence items (default: none). */
  whitespace?: WhitespaceSpec;
}

/** A compiled grammar with named rules and a start rule. */
export interface CompiledGrammar {
  /** All named rules in the grammar. */
  readonly rules: ReadonlyMap<string, GrammarRule>;
  /** The name of the start rule. */
  readonly startRule: string;
  /** Engine node for the start rule. */
  readonly parser: Parser<string, unknown>;
  /** Engine node for any rule, for use inside larger grammars. */
  rule(name: string): Parser<string, unknown>;
  /** Parse all of `input` from the start rule. */
  parse(input: string): Result<unknown, ParseError>;
}
