/**
 * Convolution engine: products, quotients and powers.
 *
 * Both multiply and divide are written co-recursively. Coefficient n of a
 * result is built from the first n+1 coefficients of the operands, each
 * of which is forced at most once thanks to the memoized tails.
 */

import { createLogger } from "@powser/core";
import { constant, add, one, scale, sub } from "./arithmetic.js";
import { UnsupportedOperationError } from "./errors.js";
import { isZero, showCoefficient, type CoefficientRing } from "./ring.js";
import { cons, type Series } from "./series.js";

const log = createLogger("series");

/**
 * f·g
 *
 *   (f0 + x·F)(g0 + x·G) = f0·g0 + x·(f0·G + F·g)
 */
export function multiply<A>(f: Series<A>, g: Series<A>, R: CoefficientRing<A>): Series<A> {
  return cons(R.mul(f.head, g.head), () => add(scale(f.head, g.tail, R), multiply(f.tail, g, R), R));
}

/**
 * f/g
 *
 * Leading zeros shared by both operands are cancelled first (f = x·F,
 * g = x·G gives F/G). After that the quotient q = f0/g0 is emitted and the
 * rest is (F - q·G)/g.
 *
 * Known limitation: if f and g are both identically zero from some index
 * onward, the cancelling loop never ends. This is not detected.
 *
 * @throws UnsupportedOperationError when f has a nonzero coefficient where g's
 *   remaining leading coefficient is zero (the quotient has a pole)
 */
export function divide<A>(f: Series<A>, g: Series<A>, R: CoefficientRing<A>): Series<A> {
  let num = f;
  let den = g;
  let cancelled = 0;
  while (isZero(num.head, R) && isZero(den.head, R)) {
    num = num.tail;
    den = den.tail;
    cancelled++;
  }
  if (cancelled > 0) {
    log.debug(`divide: cancelled x^${cancelled} from numerator and denominator`);
  }

  if (isZero(den.head, R)) {
    throw new UnsupportedOperationError(
      "divide",
      `divisor has a zero leading coefficient where the dividend has ${showCoefficient(num.head, R)}`
    );
  }

  const q = R.div(num.head, den.head);
  const divisor = den;
  const remainder = num;
  return cons(q, () => divide(sub(remainder.tail, scale(q, divisor.tail, R), R), divisor, R));
}

/**
 * 1/f
 */
export function reciprocal<A>(f: Series<A>, R: CoefficientRing<A>): Series<A> {
  return divide(one(R), f, R);
}

/**
 * f^n by repeated multiplication.
 *
 * @throws UnsupportedOperationError for negative n
 * @throws RangeError for non-integer n
 */
export function power<A>(n: number, f: Series<A>, R: CoefficientRing<A>): Series<A> {
  if (!Number.isSafeInteger(n)) {
    throw new RangeError(`power: exponent must be an integer, got ${n}`);
  }
  if (n < 0) {
    throw new UnsupportedOperationError("power", `negative exponents are not supported, got ${n}`);
  }
  let result = one(R);
  for (let i = 0; i < n; i++) {
    result = multiply(f, result, R);
  }
  return result;
}

/**
 * c·f as a product with the constant series c.
 */
export function mulConstant<A>(c: A, f: Series<A>, R: CoefficientRing<A>): Series<A> {
  return multiply(constant(c, R), f, R);
}

/**
 * c/f
 */
export function divConstant<A>(c: A, f: Series<A>, R: CoefficientRing<A>): Series<A> {
  return divide(constant(c, R), f, R);
}
