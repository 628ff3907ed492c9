/**
 * PEG grammar reader and builder for @weft/grammar
 *
 * Reads PEG grammar definition strings into a `GrammarRule` IR, then
 * compiles that IR into @weft/core parser nodes. The definition reader is
 * itself a weft grammar.
 */

import {
  FirstAlternativeParser,
  GrammarError,
  LongestAlternativeParser,
  first,
  fwd,
  isFailure,
  opt,
  pred,
  rep,
  rep1,
  rep1sep,
  textParsers,
} from "@weft/core";
import type { ForwardParser, Parser, TextContext } from "@weft/core";
import type { BuildOptions, CompiledGrammar, GrammarRule } from "./types.js";

// ---------------------------------------------------------------------------
// Definition syntax
// ---------------------------------------------------------------------------

// Line breaks and `//` comments may appear between any two tokens
const notation = textParsers({ whitespace: /(?:\s|\/\/[^\n]*)*/ });
const { lit: token, reg: pattern, seq, keepLeft, keepRight } = notation;

const ESCAPES: Record<string, string> = { n: "\n", r: "\r", t: "\t" };

function unquote(quoted: string): string {
  return quoted.slice(1, -1).replace(/\\(.)/gs, (_, escaped: string) => ESCAPES[escaped] ?? escaped);
}

const identifier = pattern(/[a-zA-Z_][a-zA-Z0-9_]*/).named("rule name");

const quoted = pattern(/"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'/s)
  .map(unquote)
  .named("string literal");

const alternation = fwd<string, GrammarRule>().named("expression");

/** `"text"`, or `'a'..'z'` for a character range */
const literalOrRange = seq(quoted, opt(keepRight(token(".."), quoted))).map(
  ([from, range]): GrammarRule =>
    range.length === 0 ? { type: "literal", value: from } : { type: "charRange", from, to: range[0] }
);

const group = keepRight(token("("), keepLeft(alternation, token(")")));

const anyChar = token(".").map((): GrammarRule => ({ type: "any" }));

/** A rule name, unless it starts the next definition (`name =`). */
const reference = pred(
  seq(identifier, opt(token("="))),
  ([, equals]) => equals.length === 0,
  "rule reference"
).map(([name]): GrammarRule => ({ type: "reference", name }));

const primary = first(group, literalOrRange, anyChar, reference);

/** Suffixed: primary ('*' | '+' | '?')? */
const suffixed = seq(primary, opt(token("*", "+", "?"))).map(([rule, suffix]): GrammarRule => {
  switch (suffix[0]) {
    case "*":
      return { type: "repetition", rule, min: 0, max: null };
    case "+":
      return { type: "repetition", rule, min: 1, max: null };
    case "?":
      return { type: "optional", rule };
    default:
      return rule;
  }
});

/** Sequence: suffixed+ */
const sequence = rep1(suffixed).map(
  (items): GrammarRule => (items.length === 1 ? items[0] : { type: "sequence", rules: items })
);

/** Longest-match choice: sequence ('/' sequence)*, binding tighter than '|' */
const longestChoice = rep1sep(sequence, token("/")).map(
  (rules): GrammarRule => (rules.length === 1 ? rules[0] : { type: "longest", rules })
);

/** Alternation: longestChoice ('|' longestChoice)* */
alternation.define(
  rep1sep(longestChoice, token("|")).map(
    (rules): GrammarRule => (rules.length === 1 ? rules[0] : { type: "alternation", rules })
  )
);

const definition = seq(identifier, token("="), alternation);

const definitions = rep(definition);

// ---------------------------------------------------------------------------
// Top-level grammar reader
// ---------------------------------------------------------------------------

/**
 * Parse a PEG grammar definition string into a map of named rules.
 *
 * Grammar syntax:
 * - `rule = expr`: rule definition
 * - `a b c`: sequence
 * - `a | b`: ordered alternation (first match wins)
 * - `a / b`: longest-match alternation
 * - `a*`: zero or more
 * - `a+`: one or more
 * - `a?`: optional
 * - `"literal"` or `'literal'`: string literal
 * - `'a'..'z'`: character range
 * - `.`: any character
 * - `(group)`: grouping
 * - `ruleName`: reference to another rule
 * - `// text`: comment
 *
 * @throws GrammarError on invalid grammar syntax, undefined rules or left recursion
 */
export function parseGrammarDef(source: string): Map<string, GrammarRule> {
  const result = notation.parse(definitions, source);
  if (isFailure(result)) {
    const { line = 0, column = 0, message } = result.error;
    throw new GrammarError(
      `Grammar syntax error at line ${line + 1}, character ${column + 1}: ${message}`
    );
  }

  const rules = new Map<string, GrammarRule>();
  for (const [name, , rule] of result.value) {
    if (rules.has(name)) {
      throw new GrammarError(`Rule '${name}' is defined more than once`);
    }
    rules.set(name, rule);
  }

  if (rules.size === 0) {
    throw new GrammarError("Grammar is empty: no rules defined");
  }

  // Validate references and ranges
  for (const [name, rule] of rules) {
    validateRule(rule, rules, name);
  }

  // Check for left recursion
  detectLeftRecursion(rules);

  return rules;
}

/** Check that references point to defined rules and range bounds are single characters. */
function validateRule(
  rule: GrammarRule,
  allRules: ReadonlyMap<string, GrammarRule>,
  context: string
): void {
  switch (rule.type) {
    case "reference":
      if (!allRules.has(rule.name)) {
        throw new GrammarError(`Undefined rule '${rule.name}' referenced in '${context}'`);
      }
      break;
    case "sequence":
    case "alternation":
    case "longest":
      for (const r of rule.rules) validateRule(r, allRules, context);
      break;
    case "repetition":
    case "optional":
      validateRule(rule.rule, allRules, context);
      break;
    case "charRange":
      if (rule.from.length !== 1 || rule.to.length !== 1) {
        throw new GrammarError(
          `Character range bounds must be single characters, got '${rule.from}'..'${rule.to}'`
        );
      }
      break;
    case "literal":
    case "any":
      break;
  }
}

/**
 * Detect direct and indirect left recursion in the grammar.
 * Throws a descriptive error if found.
 */
function detectLeftRecursion(rules: ReadonlyMap<string, GrammarRule>): void {
  for (const [name, rule] of rules) {
    checkLeftmost(rule, rules, new Set<string>(), [name]);
  }
}

/** Follow every reference that can be reached without consuming input. */
function checkLeftmost(
  rule: GrammarRule,
  rules: ReadonlyMap<string, GrammarRule>,
  visited: Set<string>,
  path: string[]
): void {
  switch (rule.type) {
    case "reference": {
      if (rule.name === path[0]) {
        throw new GrammarError(
          `Left recursion detected: ${path.join(" -> ")} -> ${rule.name}. ` +
            `PEG parsers cannot handle left recursion. ` +
            `Rewrite using iteration (e.g., 'a (op a)*' instead of 'a = a op a').`
        );
      }
      if (visited.has(rule.name)) return;
      visited.add(rule.name);
      const target = rules.get(rule.name);
      if (target) checkLeftmost(target, rules, visited, [...path, rule.name]);
      return;
    }
    case "sequence":
      for (const item of rule.rules) {
        checkLeftmost(item, rules, visited, path);
        if (!matchesEmpty(item, rules, new Set())) return;
      }
      return;
    case "alternation":
    case "longest":
      for (const r of rule.rules) checkLeftmost(r, rules, new Set(visited), path);
      return;
    case "optional":
    case "repetition":
      checkLeftmost(rule.rule, rules, visited, path);
      return;
    default:
      return;
  }
}

function matchesEmpty(
  rule: GrammarRule,
  rules: ReadonlyMap<string, GrammarRule>,
  seen: ReadonlySet<string>
): boolean {
  switch (rule.type) {
    case "literal":
      return rule.value === "";
    case "charRange":
    case "any":
      return false;
    case "sequence":
      return rule.rules.every((r) => matchesEmpty(r, rules, seen));
    case "alternation":
    case "longest":
      return rule.rules.some((r) => matchesEmpty(r, rules, seen));
    case "optional":
      return true;
    case "repetition":
      return rule.min === 0 || matchesEmpty(rule.rule, rules, seen);
    case "reference": {
      const target = rules.get(rule.name);
      if (target === undefined || seen.has(rule.name)) return false;
      return matchesEmpty(target, rules, new Set(seen).add(rule.name));
    }
  }
}

// ---------------------------------------------------------------------------
// Parser builder: compile GrammarRule IR into engine nodes
// ---------------------------------------------------------------------------

/**
 * Build a `CompiledGrammar` from a map of grammar rules.
 *
 * Every rule is wired through a forward parser named after the rule, so
 * rules may refer to each other in any order.
 *
 * @param rules - Named grammar rules (from `parseGrammarDef`)
 * @param options - Start rule (defaults to the first rule) and whitespace policy (default: none)
 */
export function buildParser(
  rules: ReadonlyMap<string, GrammarRule>,
  options: BuildOptions = {}
): CompiledGrammar {
  if (rules.size === 0) {
    throw new GrammarError("Grammar is empty: no rules defined");
  }
  const [firstRule] = rules.keys();
  const start = options.start ?? firstRule;
  if (!rules.has(start)) {
    throw new GrammarError(`Start rule '${start}' not found in grammar`);
  }

  const context = textParsers({ whitespace: options.whitespace ?? null });
  const refs = new Map<string, ForwardParser<string, unknown>>();
  for (const name of rules.keys()) {
    refs.set(name, fwd<string, unknown>().named(name));
  }
  for (const [name, rule] of rules) {
    lookup(refs, name).define(buildRule(rule, context, refs));
  }

  const parser = lookup(refs, start);

  return {
    rules,
    startRule: start,
    parser,
    rule: (name) => lookup(refs, name),
    parse: (input) => context.parse(parser, input),
  };
}

function lookup(
  refs: ReadonlyMap<string, ForwardParser<string, unknown>>,
  name: string
): ForwardParser<string, unknown> {
  const ref = refs.get(name);
  if (ref === undefined) {
    throw new GrammarError(`Rule '${name}' not found in grammar`);
  }
  return ref;
}

/** Compile a single GrammarRule into a parser node. */
function buildRule(
  rule: GrammarRule,
  context: TextContext,
  refs: ReadonlyMap<string, ForwardParser<string, unknown>>
): Parser<string, unknown> {
  const build = (r: GrammarRule) => buildRule(r, context, refs);

  switch (rule.type) {
    case "literal":
      return context.lit(rule.value);

    case "charRange": {
      const { from, to } = rule;
      return pred(context.any1(), (c) => c >= from && c <= to, `'${from}'..'${to}'`);
    }

    case "any":
      return context.any1();

    case "sequence":
      return context.seq(...rule.rules.map(build));

    case "alternation":
      return new FirstAlternativeParser(rule.rules.map(build));

    case "longest":
      return new LongestAlternativeParser(rule.rules.map(build));

    case "repetition":
      return rep(build(rule.rule), { min: rule.min, max: rule.max ?? undefined });

    case "optional":
      return opt(build(rule.rule));

    case "reference":
      return lookup(refs, rule.name);
  }
}
