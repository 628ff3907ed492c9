/**
 * JSON
 *
 * A complete JSON reader built from a whitespace-aware text context. The
 * `value` rule is recursive through a forward reference.
 *
 * Run: parseJson('{ "a": [1, 2.5, true] }')  // → Success({ a: [1, 2.5, true] })
 */

import { constant, first, fwd, parse, repsep, textParsers } from "../src/index.js";
import type { ParseError, Result } from "../src/index.js";

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

const { lit, reg, seq, keepLeft, keepRight } = textParsers();

const ESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

function unescape(body: string): string {
  return body.replace(/\\(u[0-9a-fA-F]{4}|["\\/bfnrt])/g, (_, escape: string) =>
    escape.length > 1 ? String.fromCharCode(parseInt(escape.slice(1), 16)) : ESCAPES[escape]
  );
}

export const value = fwd<string, JsonValue>().named("value");

const string = reg(/"(?:[^"\\\u0000-\u001f]|\\(?:["\\/bfnrt]|u[0-9a-fA-F]{4}))*"/)
  .map((quoted) => unescape(quoted.slice(1, -1)))
  .named("string");

const number = reg(/-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/)
  .map(Number)
  .named("number");

const array = keepRight(lit("["), keepLeft(repsep(value, lit(",")), lit("]"))).named("array");

const member = seq(keepLeft(string, lit(":")), value);

const object = keepRight(lit("{"), keepLeft(repsep(member, lit(",")), lit("}")))
  .map((entries) => Object.fromEntries(entries))
  .named("object");

value.define(
  first<string, JsonValue>(
    object,
    array,
    string,
    number,
    lit("true").map(constant(true)),
    lit("false").map(constant(false)),
    lit("null").map(constant(null))
  )
);

export function parseJson(text: string): Result<JsonValue, ParseError> {
  return parse(value, text);
}
