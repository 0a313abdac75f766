/**
 * Typeclass instances for series, making Series<A> itself a coefficient
 * type for generic code written against Numeric and Fractional.
 */

import type { Fractional, Numeric } from "@powser/std";
import { add, constant, negate, one, sub, zero } from "./arithmetic.js";
import { divide, multiply, reciprocal } from "./convolution.js";
import type { CoefficientRing } from "./ring.js";
import type { Series } from "./series.js";

/**
 * Numeric instance for series over R: the ring R[[x]].
 */
export function numericSeries<A>(R: CoefficientRing<A>): Numeric<Series<A>> {
  return {
    add: (f, g) => add(f, g, R),
    sub: (f, g) => sub(f, g, R),
    mul: (f, g) => multiply(f, g, R),
    negate: (f) => negate(f, R),
    abs: (f) => f, // formal series carry no order
    signum: () => one(R),
    fromNumber: (n) => constant(R.fromNumber(n), R),
    toNumber: (f) => R.toNumber(f.head),
    zero: () => zero(R),
    one: () => one(R),
  };
}

/**
 * Fractional instance for series over R. Division follows `divide`,
 * including its errors.
 */
export function fractionalSeries<A>(R: CoefficientRing<A>): Fractional<Series<A>> {
  return {
    div: (f, g) => divide(f, g, R),
    recip: (f) => reciprocal(f, R),
    fromRational: (num, den) => constant(R.fromRational(num, den), R),
  };
}
