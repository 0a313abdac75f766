/**
 * Ring-lifted arithmetic
 *
 * The basic series and the coefficient-wise operations. Each result
 * computes its head immediately and everything after it on demand, one
 * coefficient per forced tail.
 */

import { cons, fix, type Series } from "./series.js";
import type { CoefficientRing } from "./ring.js";

// ============================================================================
// Constructors
// ============================================================================

/**
 * 0 + 0x + 0x² + ... (a single node whose tail is itself)
 */
export function zero<A>(R: CoefficientRing<A>): Series<A> {
  return fix("zero", (self) => cons(R.zero(), self));
}

/**
 * c + 0x + 0x² + ...
 */
export function constant<A>(c: A, R: CoefficientRing<A>): Series<A> {
  return cons(c, () => zero(R));
}

export function one<A>(R: CoefficientRing<A>): Series<A> {
  return constant(R.one(), R);
}

/**
 * The series x: 0 + 1x + 0x² + ...
 */
export function identity<A>(R: CoefficientRing<A>): Series<A> {
  return cons(R.zero(), () => one(R));
}

/**
 * c·x^k
 *
 * @throws RangeError for a negative or non-integer k
 */
export function monomial<A>(c: A, k: number, R: CoefficientRing<A>): Series<A> {
  if (!Number.isSafeInteger(k) || k < 0) {
    throw new RangeError(`monomial: degree must be a non-negative integer, got ${k}`);
  }
  return k === 0 ? constant(c, R) : cons(R.zero(), () => monomial(c, k - 1, R));
}

/**
 * A series starting with the given coefficients and zero afterwards.
 */
export function ofSequence<A>(coeffs: Iterable<A>, R: CoefficientRing<A>): Series<A> {
  const items = Array.from(coeffs);
  const from = (i: number): Series<A> =>
    i >= items.length ? zero(R) : cons(items[i], () => from(i + 1));
  return from(0);
}

// ============================================================================
// Coefficient-wise operations
// ============================================================================

export function negate<A>(f: Series<A>, R: CoefficientRing<A>): Series<A> {
  return cons(R.negate(f.head), () => negate(f.tail, R));
}

/**
 * c·f, multiplying every coefficient by c.
 */
export function scale<A>(c: A, f: Series<A>, R: CoefficientRing<A>): Series<A> {
  return cons(R.mul(c, f.head), () => scale(c, f.tail, R));
}

export function add<A>(f: Series<A>, g: Series<A>, R: CoefficientRing<A>): Series<A> {
  return cons(R.add(f.head, g.head), () => add(f.tail, g.tail, R));
}

export function sub<A>(f: Series<A>, g: Series<A>, R: CoefficientRing<A>): Series<A> {
  return add(f, negate(g, R), R);
}

// ============================================================================
// Mixed constant/series forms
// ============================================================================

/**
 * c + f
 */
export function addConstant<A>(c: A, f: Series<A>, R: CoefficientRing<A>): Series<A> {
  return add(constant(c, R), f, R);
}

/**
 * c - f
 */
export function subFromConstant<A>(c: A, f: Series<A>, R: CoefficientRing<A>): Series<A> {
  return sub(constant(c, R), f, R);
}
