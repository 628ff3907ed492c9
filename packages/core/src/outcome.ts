/**
 * Evaluation outcomes for @weft/core
 *
 * An outcome is the internal result of running one parser at one cursor.
 * Failures are plain data so alternation and repetition can compare them;
 * nothing on the backtracking path throws.
 */

import type { Cursor } from "./cursor.js";

/** The parser matched, producing `value` and leaving the input at `next`. */
export interface Matched<E, V> {
  readonly ok: true;
  readonly value: V;
  readonly next: Cursor<E>;
  /**
   * Farthest failure seen while producing this match (a discarded optional,
   * the attempt that ended a repetition, a losing branch). Only kept when it
   * lies at or beyond `next`, where it can still win a later merge.
   */
  readonly farthest: NoMatch<E> | undefined;
}

/** The parser failed. `at` is the deepest position reached. */
export interface NoMatch<E> {
  readonly ok: false;
  readonly at: Cursor<E>;
  readonly expected: ReadonlySet<string>;
}

export type Outcome<E, V> = Matched<E, V> | NoMatch<E>;

export function matched<E, V>(
  value: V,
  next: Cursor<E>,
  farthest?: NoMatch<E>
): Matched<E, V> {
  const kept = farthest !== undefined && farthest.at.position >= next.position ? farthest : undefined;
  return { ok: true, value, next, farthest: kept };
}

export function noMatch<E>(at: Cursor<E>, ...expected: string[]): NoMatch<E> {
  return { ok: false, at, expected: new Set(expected) };
}

/**
 * Farthest-failure merge: the result sits at the greatest position among the
 * inputs and expects the union of exactly the inputs at that position.
 */
export function mergeFailures<E>(a: NoMatch<E>, b: NoMatch<E> | undefined): NoMatch<E>;
export function mergeFailures<E>(a: NoMatch<E> | undefined, b: NoMatch<E>): NoMatch<E>;
export function mergeFailures<E>(
  a: NoMatch<E> | undefined,
  b: NoMatch<E> | undefined
): NoMatch<E> | undefined;
export function mergeFailures<E>(
  a: NoMatch<E> | undefined,
  b: NoMatch<E> | undefined
): NoMatch<E> | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  if (a.at.position > b.at.position) return a;
  if (b.at.position > a.at.position) return b;
  const expected = new Set(a.expected);
  for (const e of b.expected) expected.add(e);
  return { ok: false, at: a.at, expected };
}

/** Merge any number of failures; `undefined` entries are skipped. */
export function mergeAll<E>(failures: Iterable<NoMatch<E> | undefined>): NoMatch<E> | undefined {
  let merged: NoMatch<E> | undefined;
  for (const f of failures) merged = mergeFailures(merged, f);
  return merged;
}

/**
 * Fold a failure observed earlier in the same evaluation into `outcome`:
 * a match keeps it as its farthest failure, a failure merges with it.
 */
export function carry<E, V>(outcome: Outcome<E, V>, earlier: NoMatch<E> | undefined): Outcome<E, V> {
  if (earlier === undefined) return outcome;
  if (outcome.ok) return matched(outcome.value, outcome.next, mergeFailures(earlier, outcome.farthest));
  return mergeFailures(earlier, outcome);
}
