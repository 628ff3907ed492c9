/**
 * Small helpers for use with `map`.
 */

/** A function that ignores its argument and returns `value`. */
export function constant<T>(value: T): (ignored?: unknown) => T {
  return () => value;
}

/**
 * Spread a tuple into the arguments of `f`.
 *
 * @example
 * ```typescript
 * seq(num, lit("+"), num).map(splat((a, _, b) => a + b));
 * ```
 */
export function splat<T extends readonly unknown[], R>(f: (...args: T) => R): (args: T) => R {
  return (args) => f(...args);
}

/**
 * The inverse of `splat`: gather the arguments into one tuple for `f`.
 *
 * @example
 * ```typescript
 * const sum = unsplat((xs: [number, number, number]) => xs[0] + xs[1] + xs[2]);
 * sum(1, 2, 3); // → 6
 * ```
 */
export function unsplat<T extends readonly unknown[], R>(f: (args: T) => R): (...args: T) => R {
  return (...args) => f(args);
}
