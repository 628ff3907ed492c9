import { describe, it, expect } from "vitest";
import { Cursor } from "../cursor.js";
import { GrammarError } from "../errors.js";
import { evaluate } from "../parse.js";
import { FirstAlternativeParser, first, lit, longest, opt, reg, rep, seq } from "../parsers.js";
import type { Parser } from "../parsers.js";

function run<E, V>(parser: Parser<E, V>, input: ArrayLike<E>, position = 0) {
  const outcome = evaluate(parser, new Cursor(input, position));
  return outcome.ok
    ? { ok: true, value: outcome.value, pos: outcome.next.position }
    : { ok: false, pos: outcome.at.position, expected: [...outcome.expected] };
}

describe("first", () => {
  it("returns the first branch that matches", () => {
    expect(run(first(lit("a"), lit("ab")), "ab")).toEqual({ ok: true, value: "a", pos: 1 });
  });

  it("falls through to later branches", () => {
    expect(run(first(lit("x"), lit("a")), "ab")).toEqual({ ok: true, value: "a", pos: 1 });
  });

  it("merges failures at the same position", () => {
    const p = first(seq(lit("a"), lit("b")), seq(lit("a"), lit("c")));
    expect(run(p, "ad")).toEqual({ ok: false, pos: 1, expected: ['"b"', '"c"'] });
  });

  it("reports the failure that got farthest", () => {
    const p = first<string, unknown>(seq(lit("a"), lit("b")), lit("x"));
    expect(run(p, "az")).toEqual({ ok: false, pos: 1, expected: ['"b"'] });
  });

  it("rejects an empty branch list", () => {
    expect(() => new FirstAlternativeParser<string, string>([])).toThrow(GrammarError);
  });
});

describe("longest", () => {
  it("returns the branch that consumed most", () => {
    expect(run(longest(reg(/a/), reg(/ab/)), "abc")).toEqual({ ok: true, value: "ab", pos: 2 });
  });

  it("breaks ties by source order", () => {
    const a = reg(/a./).map(() => "first branch");
    const b = reg(/ab/).map(() => "second branch");
    expect(run(longest(a, b), "ab")).toEqual({ ok: true, value: "first branch", pos: 2 });
    expect(run(longest(b, a), "ab")).toEqual({ ok: true, value: "second branch", pos: 2 });
  });

  it("merges failures of all branches", () => {
    const p = longest(seq(lit("a"), lit("b")), seq(lit("a"), lit("c")));
    expect(run(p, "ad")).toEqual({ ok: false, pos: 1, expected: ['"b"', '"c"'] });
  });

  it("carries a deeper branch failure on success", () => {
    const p = longest<string, unknown>(lit("a"), seq(lit("a"), lit("b"), lit("c")));
    const outcome = evaluate(p, new Cursor("abd"));
    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.next.position).toBe(1);
      expect(outcome.farthest?.at.position).toBe(2);
      expect([...(outcome.farthest?.expected ?? [])]).toEqual(['"c"']);
    }
  });
});

describe("failures carried by successes", () => {
  it("reports a discarded optional when the sequence fails there", () => {
    const p = seq(opt(seq(lit("-"), lit("-"))), lit("x"));
    expect(run(p, "-y")).toEqual({ ok: false, pos: 1, expected: ['"-"'] });
  });

  it("merges a discarded optional at the same position", () => {
    const p = seq(opt(lit("-")), lit("x"));
    expect(run(p, "y")).toEqual({ ok: false, pos: 0, expected: ['"-"', '"x"'] });
  });

  it("merges the failure that ended a repetition", () => {
    const p = seq(rep(lit("a")), lit(";"));
    expect(run(p, "aab")).toEqual({ ok: false, pos: 2, expected: ['"a"', '";"'] });
  });
});
