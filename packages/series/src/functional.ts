/**
 * Functional operators: composition, reversion, derivative, integral.
 */

import { one } from "./arithmetic.js";
import { divide, multiply } from "./convolution.js";
import { UnsupportedOperationError } from "./errors.js";
import { Lazy } from "./lazy.js";
import { isZero, showCoefficient, type CoefficientRing } from "./ring.js";
import { cons, fix, type Series } from "./series.js";

/**
 * f(g(x)).
 *
 * With g = x·G, f(g) = f0 + g·F(g) = f0 + x·(G · F(g)), so every output
 * coefficient needs only finitely many terms of f. That is why g must have
 * a zero constant term.
 *
 * @throws UnsupportedOperationError if g's constant term is nonzero
 */
export function compose<A>(f: Series<A>, g: Series<A>, R: CoefficientRing<A>): Series<A> {
  if (!isZero(g.head, R)) {
    throw new UnsupportedOperationError(
      "compose",
      `inner series must have a zero constant term, got ${showCoefficient(g.head, R)}`
    );
  }
  return composeTail(f, g, R);
}

function composeTail<A>(f: Series<A>, g: Series<A>, R: CoefficientRing<A>): Series<A> {
  return cons(f.head, () => multiply(g.tail, composeTail(f.tail, g, R), R));
}

/**
 * The compositional inverse r of f, so that f(r(x)) = x.
 *
 * With f = x·F and r = x·Q: x = r·F(r), hence Q = 1 / F(r). The tail of r
 * is defined through r itself.
 *
 * @throws UnsupportedOperationError if f's constant term is nonzero
 */
export function revert<A>(f: Series<A>, R: CoefficientRing<A>): Series<A> {
  if (!isZero(f.head, R)) {
    throw new UnsupportedOperationError(
      "revert",
      `series must have a zero constant term, got ${showCoefficient(f.head, R)}`
    );
  }
  return fix("revert", (self) =>
    cons(R.zero(), () => divide(one(R), compose(f.tail, self.force(), R), R))
  );
}

/**
 * d/dx f: coefficient n is (n+1)·f[n+1].
 */
export function derivative<A>(f: Series<A>, R: CoefficientRing<A>): Series<A> {
  const walk = (g: Series<A>, n: A): Series<A> =>
    cons(R.mul(n, g.head), () => walk(g.tail, R.add(n, R.one())));
  return walk(f.tail, R.one());
}

/**
 * ∫f from 0: constant term 0, coefficient n+1 is f[n]/(n+1).
 *
 * In a ring where some n+1 is zero (characteristic p), the ring's
 * division error surfaces when that coefficient is forced.
 */
export function integral<A>(f: Series<A>, R: CoefficientRing<A>): Series<A> {
  return integralOf(Lazy.of(f), R);
}

/**
 * ∫f for an integrand that may not exist yet.
 *
 * Nothing of `f` is read until the tail of the result is forced, so the
 * integrand can be the series that is currently being defined.
 */
export function integralOf<A>(f: Lazy<Series<A>>, R: CoefficientRing<A>): Series<A> {
  const walk = (g: Series<A>, n: A): Series<A> =>
    cons(R.div(g.head, n), () => walk(g.tail, R.add(n, R.one())));
  return cons(R.zero(), () => walk(f.force(), R.one()));
}
