import { describe, it, expect } from "vitest";
import { first, keepLeft, keepRight, repsep } from "@weft/core";
import { GrammarBuilder } from "../builder.js";

function nestedLists(): GrammarBuilder {
  const g = new GrammarBuilder();
  const { lit, reg } = g.text;
  const list = g.declare<unknown[]>("list");
  const item = g.rule("item", first<string, unknown>(reg(/\d+/).map(Number), list));
  g.define(list, keepRight(lit("["), keepLeft(repsep(item, lit(",")), lit("]"))));
  return g;
}

describe("GrammarBuilder", () => {
  it("parses with mutually recursive rules", () => {
    expect(nestedLists().parse("list", "[1, [2, 3]]")).toEqual({
      _tag: "Success",
      value: [1, [2, 3]],
    });
  });

  it("skips whitespace after the last token", () => {
    expect(nestedLists().parse("item", " 4 ")).toEqual({ _tag: "Success", value: 4 });
  });

  it("reports failures in terms of the grammar's terminals", () => {
    const r = nestedLists().parse("list", "[1 2]");
    expect(r._tag).toBe("Failure");
    if (r._tag === "Failure") {
      expect(r.error.message).toBe(`Expected "," or "]" but found "2"`);
    }
  });

  it("names registered rules", () => {
    const g = nestedLists();
    expect(String(g.get("item"))).toBe("item");
    expect(String(g.get("list"))).toBe("list");
  });

  it("returns every rule from build", () => {
    expect([...nestedLists().build().keys()]).toEqual(["list", "item"]);
  });

  it("uses the configured whitespace policy", () => {
    const g = new GrammarBuilder({ whitespace: null });
    const { lit, seq } = g.text;
    g.rule("ab", seq(lit("a"), lit("b")));
    expect(g.parse("ab", "ab")).toEqual({ _tag: "Success", value: ["a", "b"] });
    expect(g.parse("ab", "a b")._tag).toBe("Failure");
  });

  it("rejects a name used twice", () => {
    const g = new GrammarBuilder();
    g.declare("value");
    expect(() => g.rule("value", g.text.lit("x"))).toThrow("Rule 'value' is defined more than once");
  });

  it("rejects rules declared but never defined", () => {
    const g = new GrammarBuilder();
    g.declare("a");
    g.declare("b");
    g.rule("c", g.text.lit("c"));
    expect(() => g.build()).toThrow("Rules declared but never defined: a, b");
    expect(() => g.parse("c", "c")).toThrow("Rules declared but never defined: a, b");
  });

  it("throws for an unknown rule", () => {
    expect(() => new GrammarBuilder().get("missing")).toThrow("Rule 'missing' not found in grammar");
  });
});
