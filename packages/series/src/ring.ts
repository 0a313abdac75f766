/**
 * Coefficient rings
 *
 * Everything the series engine needs from a coefficient type, bundled
 * into one instance: ring operations from Numeric, division from
 * Fractional, equality from Eq, and an optional renderer.
 */

import {
  eqNumber,
  fractionalNumber,
  numericNumber,
  showNumber,
  type Eq,
  type Fractional,
  type Numeric,
  type Show,
} from "@powser/std";
import {
  eqMod,
  eqRational,
  fractionalMod,
  fractionalRational,
  numericMod,
  numericRational,
  showMod,
  showRational,
  type Mod,
  type Rational,
} from "@powser/math";

/**
 * A commutative ring with exact division by its nonzero elements (a field,
 * in every instance shipped here).
 *
 * @typeclass
 */
export interface CoefficientRing<A> extends Numeric<A>, Fractional<A>, Eq<A> {
  show?(a: A): string;
}

export function coefficientRing<A>(
  N: Numeric<A>,
  Fr: Fractional<A>,
  E: Eq<A>,
  S?: Show<A>
): CoefficientRing<A> {
  const ring: CoefficientRing<A> = {
    add: N.add,
    sub: N.sub,
    mul: N.mul,
    negate: N.negate,
    abs: N.abs,
    signum: N.signum,
    fromNumber: N.fromNumber,
    toNumber: N.toNumber,
    zero: N.zero,
    one: N.one,
    div: Fr.div,
    recip: Fr.recip,
    fromRational: Fr.fromRational,
    equals: E.equals,
    notEquals: E.notEquals,
  };
  if (S !== undefined) {
    ring.show = S.show;
  }
  return ring;
}

export function isZero<A>(a: A, R: CoefficientRing<A>): boolean {
  return R.equals(a, R.zero());
}

export function showCoefficient<A>(a: A, R: CoefficientRing<A>): string {
  return R.show !== undefined ? R.show(a) : String(a);
}

/** Exact rationals. */
export const rationalRing: CoefficientRing<Rational> = coefficientRing(
  numericRational,
  fractionalRational,
  eqRational,
  showRational
);

/** Floating point. Equality is exact, so use it for evaluation rather than identities. */
export const numberRing: CoefficientRing<number> = coefficientRing(
  numericNumber,
  fractionalNumber,
  eqNumber,
  showNumber
);

/**
 * Integers modulo a prime p.
 *
 * @throws RangeError if p is not prime
 */
export function modRing<P extends number>(p: P): CoefficientRing<Mod<P>> {
  return coefficientRing(numericMod(p), fractionalMod(p), eqMod<P>(), showMod<P>());
}
