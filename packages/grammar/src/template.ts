/**
 * Tagged template entry points for PEG grammar definitions.
 *
 * Usage:
 * ```ts
 * import { grammar } from "@weft/grammar";
 *
 * const list = grammar`
 *   list   = "[" (item ("," item)*)? "]"
 *   item   = digit+
 *   digit  = '0'..'9'
 * `;
 * list.parse("[1,23]");
 * ```
 */

import type { BuildOptions, CompiledGrammar } from "./types.js";
import { parseGrammarDef, buildParser } from "./grammar.js";

/** Read and compile a grammar definition string. */
export function defineGrammar(source: string, options: BuildOptions = {}): CompiledGrammar {
  return buildParser(parseGrammarDef(source), options);
}

/**
 * `grammar` tagged template.
 *
 * The template is read raw, so `"\n"` inside it reaches the definition
 * reader as an escape. Interpolated strings are spliced in as grammar text.
 */
export function grammar(strings: TemplateStringsArray, ...values: string[]): CompiledGrammar {
  return defineGrammar(String.raw({ raw: strings.raw }, ...values));
}

/** A `grammar` tag that builds with the given options. */
export function grammarWith(
  options: BuildOptions
): (strings: TemplateStringsArray, ...values: string[]) => CompiledGrammar {
  return (strings, ...values) => defineGrammar(String.raw({ raw: strings.raw }, ...values), options);
}
