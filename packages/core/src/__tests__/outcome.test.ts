import { describe, it, expect } from "vitest";
import { Cursor } from "../cursor.js";
import { carry, matched, mergeAll, mergeFailures, noMatch } from "../outcome.js";

const source = "abcdef";
const at = (position: number) => new Cursor(source, position);

describe("mergeFailures", () => {
  it("keeps the farther failure", () => {
    const a = noMatch(at(2), "x");
    const b = noMatch(at(3), "y");
    expect(mergeFailures(a, b)).toBe(b);
    expect(mergeFailures(b, a)).toBe(b);
  });

  it("unions expectations at the same position in order", () => {
    const merged = mergeFailures(noMatch(at(2), "x", "y"), noMatch(at(2), "z", "x"));
    expect(merged.at.position).toBe(2);
    expect([...merged.expected]).toEqual(["x", "y", "z"]);
  });

  it("treats undefined as absent", () => {
    const a = noMatch(at(1), "x");
    expect(mergeFailures(undefined, a)).toBe(a);
    expect(mergeFailures(a, undefined)).toBe(a);
    expect(mergeFailures(undefined, undefined)).toBeUndefined();
  });

  it("merges many failures", () => {
    const merged = mergeAll([noMatch(at(1), "a"), undefined, noMatch(at(4), "b"), noMatch(at(4), "c")]);
    expect(merged?.at.position).toBe(4);
    expect([...(merged?.expected ?? [])]).toEqual(["b", "c"]);
  });
});

describe("matched", () => {
  it("drops a carried failure behind the next position", () => {
    expect(matched("v", at(3), noMatch(at(2), "x")).farthest).toBeUndefined();
  });

  it("keeps a carried failure at or beyond the next position", () => {
    const failure = noMatch(at(3), "x");
    expect(matched("v", at(3), failure).farthest).toBe(failure);
  });
});

describe("carry", () => {
  it("attaches an earlier failure to a match", () => {
    const earlier = noMatch(at(4), "x");
    const outcome = carry(matched("v", at(2)), earlier);
    expect(outcome.ok && outcome.farthest).toBe(earlier);
  });

  it("merges an earlier failure into a failure", () => {
    const outcome = carry(noMatch(at(1), "y"), noMatch(at(1), "x"));
    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && [...outcome.expected]).toEqual(["x", "y"]);
  });
});
