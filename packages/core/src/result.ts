/**
 * Public parse result
 *
 * `Result<V>` is what `parse` hands back to callers: either `Success` with
 * the produced value or `Failure` with a `ParseError`. Evaluation itself
 * never builds these; see `Outcome`.
 */

import type { ParseError } from "./errors.js";

export interface Success<V> {
  readonly _tag: "Success";
  readonly value: V;
}

export interface Failure<Err> {
  readonly _tag: "Failure";
  readonly error: Err;
}

export type Result<V, Err = ParseError> = Success<V> | Failure<Err>;

// ============================================================================
// Constructors
// ============================================================================

export function Success<V>(value: V): Success<V> {
  return { _tag: "Success", value };
}

export function Failure<Err>(error: Err): Failure<Err> {
  return { _tag: "Failure", error };
}

// ============================================================================
// Guards & extraction
// ============================================================================

export function isSuccess<V, Err>(result: Result<V, Err>): result is Success<V> {
  return result._tag === "Success";
}

export function isFailure<V, Err>(result: Result<V, Err>): result is Failure<Err> {
  return result._tag === "Failure";
}

/** Return the value, or throw the failure's error. */
export function unwrap<V, Err extends Error>(result: Result<V, Err>): V {
  if (result._tag === "Success") return result.value;
  throw result.error;
}

export function unwrapOr<V, Err, D>(result: Result<V, Err>, fallback: D): V | D {
  return result._tag === "Success" ? result.value : fallback;
}

export function mapResult<V, U, Err>(result: Result<V, Err>, f: (value: V) => U): Result<U, Err> {
  return result._tag === "Success" ? Success(f(result.value)) : result;
}
