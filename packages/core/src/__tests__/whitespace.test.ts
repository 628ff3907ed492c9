import { describe, it, expect } from "vitest";
import { Cursor } from "../cursor.js";
import { evaluate, parse } from "../parse.js";
import { lit as plainLit, reg as plainReg, RegexParser } from "../parsers.js";
import { DEFAULT_WHITESPACE, resolveWhitespace, textParsers } from "../whitespace.js";

describe("textParsers", () => {
  const { lit, reg, seq, keepLeft, keepRight, any1, eof } = textParsers();

  it("skips whitespace around terminals", () => {
    const outcome = evaluate(lit("a"), new Cursor("  a  b"));
    expect(outcome.ok && outcome.value).toBe("a");
    expect(outcome.ok && outcome.next.position).toBe(5);
  });

  it("skips whitespace between sequence members", () => {
    const pair = seq(lit("("), reg(/\d+/), lit(","), reg(/\d+/), lit(")"));
    expect(parse(pair, "( 4 , 3 )")).toEqual({
      _tag: "Success",
      value: ["(", "4", ",", "3", ")"],
    });
  });

  it("skips whitespace in keepLeft and keepRight", () => {
    const statement = keepLeft(keepRight(lit("let"), reg(/[a-z]+/)), lit(";"));
    expect(parse(statement, "let  x ;")).toEqual({ _tag: "Success", value: "x" });
  });

  it("skips whitespace before any1 and eof", () => {
    expect(parse(any1(), " z ")).toEqual({ _tag: "Success", value: "z" });
    expect(parse(eof(), "   ")).toEqual({ _tag: "Success", value: null });
  });

  it("reports a failure after the skipped whitespace", () => {
    const outcome = evaluate(lit("a"), new Cursor("   b"));
    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.at.position).toBe(3);
  });

  it("uses the grammar's policy for the end-of-input check", () => {
    expect(parse(lit("a"), " a ")).toEqual({ _tag: "Success", value: "a" });
  });

  it("leaves parsers built outside the context alone", () => {
    const result = parse(plainLit("a"), " a");
    expect(result._tag).toBe("Failure");
    if (result._tag === "Failure") {
      expect(result.error.message).toBe('Expected "a" but found " "');
    }
  });

  it("mixes context and plain parsers", () => {
    const mixed = seq(lit("a"), plainReg(/b/));
    expect(parse(mixed, "a b")).toEqual({ _tag: "Success", value: ["a", "b"] });
  });
});

describe("whitespace policies", () => {
  it("accepts null for no whitespace", () => {
    const { lit, reg, seq, parse: parseTight } = textParsers({ whitespace: null });
    const pair = seq(lit("("), reg(/\d+/), lit(","), reg(/\d+/), lit(")"));
    expect(parseTight(pair, "(4,3)")).toEqual({ _tag: "Success", value: ["(", "4", ",", "3", ")"] });
    const result = parseTight(pair, "(4, 3)");
    expect(result._tag === "Failure" && result.error.message).toBe('Expected /\\d+/ but found " "');
  });

  it("accepts a regular expression", () => {
    const { lit, seq } = textParsers({ whitespace: /(?:\s|#[^\n]*)*/ });
    expect(parse(seq(lit("a"), lit("b")), "a # note\n b")).toEqual({
      _tag: "Success",
      value: ["a", "b"],
    });
  });

  it("accepts a pattern string", () => {
    const { lit, seq } = textParsers({ whitespace: "[ \\t]*" });
    expect(parse(seq(lit("a"), lit("b")), "a \t b")._tag).toBe("Success");
    expect(parse(seq(lit("a"), lit("b")), "a\nb")._tag).toBe("Failure");
  });

  it("accepts a parser", () => {
    const spaces = plainReg(/ */);
    const { whitespace } = textParsers({ whitespace: spaces });
    expect(whitespace).toBe(spaces);
  });

  it("defaults to any whitespace", () => {
    const policy = resolveWhitespace(undefined);
    expect(policy).toBeInstanceOf(RegexParser);
    expect(policy instanceof RegexParser && policy.pattern).toBe(DEFAULT_WHITESPACE);
    expect(resolveWhitespace(null)).toBeUndefined();
  });

  it("lets the context's parse override a grammar without a policy", () => {
    const context = textParsers();
    expect(context.parse(plainLit("a"), "a  ")).toEqual({ _tag: "Success", value: "a" });
  });
});
