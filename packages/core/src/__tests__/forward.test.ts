import { describe, it, expect, afterEach } from "vitest";
import { config } from "../config.js";
import { Cursor } from "../cursor.js";
import { DepthLimitError, GrammarError } from "../errors.js";
import { fwd } from "../forward.js";
import { evaluate, parse } from "../parse.js";
import { first, keepLeft, keepRight, lit, seq, success } from "../parsers.js";
import { textParsers } from "../whitespace.js";

/** nested = "(" nested ")" | <nothing>, counting the levels. */
function nesting() {
  const nested = fwd<string, number>().named("nested");
  const body = first(
    keepRight(lit("("), keepLeft(nested, lit(")"))).map((n) => n + 1),
    success(0)
  );
  nested.define(body);
  return { nested, body };
}

describe("fwd", () => {
  afterEach(() => {
    config.reset();
  });

  it("supports recursive grammars", () => {
    const { nested } = nesting();
    const outcome = evaluate(nested, new Cursor("((()))"));
    expect(outcome.ok && outcome.value).toBe(3);
    expect(outcome.ok && outcome.next.position).toBe(6);
  });

  it("throws when used before it is defined", () => {
    const expr = fwd<string, number>().named("expr");
    expect(() => evaluate(expr, new Cursor("1"))).toThrow(GrammarError);
    expect(() => evaluate(expr, new Cursor("1"))).toThrow(
      "Forward parser expr was used before it was defined"
    );
  });

  it("can be defined only once", () => {
    const p = fwd<string, string>();
    p.define(lit("a"));
    expect(p.defined).toBe(true);
    expect(() => p.define(lit("b"))).toThrow("Forward parser fwd is already defined");
  });

  it("prints recursive grammars without looping", () => {
    const { nested, body } = nesting();
    expect(String(nested)).toBe("nested");
    expect(String(body)).toBe('"(" >> nested << ")" | success(0)');
  });

  it("reports the whitespace policy of its definition", () => {
    const text = textParsers();
    const list = fwd<string, unknown>();
    list.define(first<string, unknown>(text.seq(list, text.lit(",")), text.lit("x")));
    expect(list.whitespace).toBe(text.whitespace);
  });
});

describe("depth limit", () => {
  afterEach(() => {
    config.reset();
  });

  it("throws once nesting passes maxDepth", () => {
    const { nested } = nesting();
    expect(() => evaluate(nested, new Cursor("((()))"), { maxDepth: 2 })).toThrow(DepthLimitError);
  });

  it("allows nesting up to maxDepth", () => {
    const { nested } = nesting();
    const outcome = evaluate(nested, new Cursor("((()))"), { maxDepth: 4 });
    expect(outcome.ok && outcome.value).toBe(3);
  });

  it("takes the default bound from limits.depth", () => {
    const { nested } = nesting();
    config.set({ limits: { depth: 2 } });
    expect(() => parse(nested, "((()))")).toThrow(
      "Grammar nesting exceeded the limit of 2 at index 2"
    );
  });

  it("is unbounded by default", () => {
    const { nested } = nesting();
    const deep = "(".repeat(200) + ")".repeat(200);
    expect(parse(nested, deep)).toEqual({ _tag: "Success", value: 200 });
  });
});

describe("whitespace through forward references", () => {
  it("finds the policy across a cycle and leaves the grammar intact", () => {
    const context = textParsers();
    const expr = fwd<string, unknown>();
    const looped = seq(expr, context.lit("+"));
    expr.define(first<string, unknown>(looped, context.lit("x")));

    expect(expr.whitespace).toBe(context.whitespace);
    expect(looped.whitespace).toBe(context.whitespace);
    expect(expr.defined).toBe(true);
  });

  it("reports no policy for an undefined reference", () => {
    expect(fwd().whitespace).toBeUndefined();
  });
});
