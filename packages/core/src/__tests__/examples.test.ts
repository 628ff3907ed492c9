import { describe, it, expect } from "vitest";
import { parseExpression } from "../../examples/expressions.js";
import { parseJson } from "../../examples/json.js";

describe("expressions example", () => {
  it.each([
    ["2+(1+2)+3", 8],
    ["2 * (3 + 4) - 5", 9],
    ["1 + 2 * 3", 7],
    ["8 / 4 / 2", 1],
    ["1.5 * 2", 3],
  ])("evaluates %s", (source, expected) => {
    expect(parseExpression(source)).toEqual({ _tag: "Success", value: expected });
  });

  it("reports a missing operand", () => {
    const result = parseExpression("1 +");
    expect(result._tag === "Failure" && result.error.message).toBe(
      'Expected /\\d+(\\.\\d+)?/ or "(" but found end of source'
    );
  });
});

describe("json example", () => {
  it("parses nested documents", () => {
    expect(parseJson(' { "a" : [1, 2.5, true], "b": null } ')).toEqual({
      _tag: "Success",
      value: { a: [1, 2.5, true], b: null },
    });
  });

  it("parses empty containers", () => {
    expect(parseJson("[]")).toEqual({ _tag: "Success", value: [] });
    expect(parseJson("{ }")).toEqual({ _tag: "Success", value: {} });
  });

  it("parses numbers and escapes", () => {
    expect(parseJson("-1.5e2")).toEqual({ _tag: "Success", value: -150 });
    expect(parseJson('"a\\nb \\u0041"')).toEqual({ _tag: "Success", value: "a\nb A" });
  });

  it("reports an unterminated array", () => {
    const result = parseJson("[1, 2");
    expect(result._tag === "Failure" && result.error.message).toBe(
      'Expected "," or "]" but found end of source'
    );
  });

  it("rejects a trailing comma", () => {
    const result = parseJson('{"a": 1,}');
    expect(result._tag).toBe("Failure");
  });
});
