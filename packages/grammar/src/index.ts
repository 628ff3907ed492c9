/**
 * @weft/grammar
 *
 * PEG grammar definitions on top of @weft/core.
 *
 * Provides:
 * - A PEG notation read into a `GrammarRule` IR (`parseGrammarDef`)
 * - Compilation of that IR into engine nodes (`buildParser`)
 * - The `grammar` tagged template
 * - `GrammarBuilder` for assembling named rules from combinators
 *
 * @module
 */

export type { GrammarRule, BuildOptions, CompiledGrammar } from "./types.js";

export { parseGrammarDef, buildParser } from "./grammar.js";

export { grammar, grammarWith, defineGrammar } from "./template.js";

export { GrammarBuilder } from "./builder.js";
