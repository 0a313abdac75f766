/**
 * Finite views: the only places a series turns into ordinary data.
 * Each reads a bounded prefix and always terminates (given that every
 * coefficient it reads is itself computable).
 */

import { config } from "@powser/core";
import { showCoefficient, type CoefficientRing } from "./ring.js";
import type { Series } from "./series.js";

/**
 * The first n coefficients. Forces exactly n-1 tails; n <= 0 gives [].
 *
 * @throws RangeError for a non-integer n
 */
export function take<A>(n: number, f: Series<A>): A[] {
  if (!Number.isSafeInteger(n)) {
    throw new RangeError(`take: count must be an integer, got ${n}`);
  }
  const out: A[] = [];
  let current = f;
  for (let i = 0; i < n; i++) {
    if (i > 0) current = current.tail;
    out.push(current.head);
  }
  return out;
}

/**
 * Every coefficient in order. Infinite; pair it with a bound.
 */
export function* coefficients<A>(f: Series<A>): Generator<A, never, undefined> {
  let current = f;
  for (;;) {
    yield current.head;
    current = current.tail;
  }
}

/**
 * Σ_{i<n} f[i]·xⁱ, folded Horner-style from the highest term down.
 *
 * @throws RangeError for a non-integer n
 */
export function evaluate<A>(n: number, x: A, f: Series<A>, R: CoefficientRing<A>): A {
  const coeffs = take(n, f);
  let acc = R.zero();
  for (let i = coeffs.length - 1; i >= 0; i--) {
    acc = R.add(coeffs[i], R.mul(x, acc));
  }
  return acc;
}

/**
 * Whether f and g agree on their first n coefficients.
 */
export function prefixEquals<A>(n: number, f: Series<A>, g: Series<A>, R: CoefficientRing<A>): boolean {
  const fs = take(n, f);
  const gs = take(n, g);
  return fs.every((c, i) => R.equals(c, gs[i]));
}

/**
 * Debug rendering of the leading coefficients: "[1, 1, 1/2, ...]".
 * The number of terms comes from `display.terms` unless given.
 */
export function toString<A>(f: Series<A>, R: CoefficientRing<A>, terms: number = config.displayTerms()): string {
  const shown = take(terms, f).map((c) => showCoefficient(c, R));
  return `[${[...shown, "..."].join(", ")}]`;
}
