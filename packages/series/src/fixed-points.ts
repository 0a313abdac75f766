/**
 * Closed-form fixed points
 *
 * The elementary functions, each defined by the differential equation it
 * satisfies and solved by integrating itself:
 *
 *   exp = 1 + ∫exp
 *   sin = ∫cos,  cos = 1 - ∫sin
 *   tan = sin / cos
 *   √f  = 1 + ∫(f' / 2√f)     when f0 = 1
 */

import { createLogger } from "@powser/core";
import { add, one, sub } from "./arithmetic.js";
import { divide } from "./convolution.js";
import { UnsupportedOperationError } from "./errors.js";
import { derivative, integralOf } from "./functional.js";
import { Knot, lazy } from "./lazy.js";
import { isZero, showCoefficient, type CoefficientRing } from "./ring.js";
import { cons, fix, type Series } from "./series.js";

const log = createLogger("series");

/**
 * e^x = Σ xⁿ/n!
 */
export function expSeries<A>(R: CoefficientRing<A>): Series<A> {
  return fix("exp", (self) => add(one(R), integralOf(self, R), R));
}

export interface SinCos<A> {
  readonly sin: Series<A>;
  readonly cos: Series<A>;
}

/**
 * sin and cos, defined through each other.
 */
export function sinCosSeries<A>(R: CoefficientRing<A>): SinCos<A> {
  const sinKnot = new Knot<Series<A>>("sin");
  const cosKnot = new Knot<Series<A>>("cos");
  const sin = sinKnot.tie(integralOf(cosKnot.ref, R));
  const cos = cosKnot.tie(sub(one(R), integralOf(sinKnot.ref, R), R));
  return { sin, cos };
}

export function sinSeries<A>(R: CoefficientRing<A>): Series<A> {
  return sinCosSeries(R).sin;
}

export function cosSeries<A>(R: CoefficientRing<A>): Series<A> {
  return sinCosSeries(R).cos;
}

export function tanSeries<A>(R: CoefficientRing<A>): Series<A> {
  const { sin, cos } = sinCosSeries(R);
  return divide(sin, cos, R);
}

/**
 * The square root q of f with q² = f.
 *
 * - f = x²·g: the root is x·√g.
 * - f0 = 1: q = 1 + ∫(f' / 2q), from differentiating q² = f.
 *
 * @throws UnsupportedOperationError when f has odd valuation or its first
 *   nonzero coefficient is not 1
 */
export function sqrt<A>(f: Series<A>, R: CoefficientRing<A>): Series<A> {
  if (isZero(f.head, R)) {
    const next = f.tail;
    if (!isZero(next.head, R)) {
      throw new UnsupportedOperationError(
        "sqrt",
        `series has odd valuation (x·${showCoefficient(next.head, R)} after a zero)`
      );
    }
    log.debug("sqrt: factored out x^2");
    return cons(R.zero(), () => sqrt(next.tail, R));
  }

  if (R.equals(f.head, R.one())) {
    const df = derivative(f, R);
    return fix("sqrt", (self) =>
      add(
        one(R),
        integralOf(
          lazy(() => {
            const q = self.force();
            return divide(df, add(q, q, R), R);
          }),
          R
        ),
        R
      )
    );
  }

  throw new UnsupportedOperationError(
    "sqrt",
    `leading coefficient must be 0 or 1, got ${showCoefficient(f.head, R)}`
  );
}
