/**
 * Shared test data: rationals by shorthand and small series over them.
 */

import { rat, type Rational } from "@powser/math";
import { cons, ofSequence, rationalRing, type Series } from "../src/index.js";

export const R = rationalRing;

export type Coeff = number | readonly [number, number];

export function q(num: number, den: number = 1): Rational {
  return rat(num, den);
}

/** qs(1, [1, 2], 0) is [1, 1/2, 0] */
export function qs(...values: Coeff[]): Rational[] {
  return values.map((v) => (typeof v === "number" ? q(v) : q(v[0], v[1])));
}

/** A polynomial, zero after the given coefficients */
export function poly(...values: Coeff[]): Series<Rational> {
  return ofSequence(qs(...values), R);
}

/** start + (start+1)x + (start+2)x² + ..., never zero from any point on */
export function counting(start: number = 1): Series<Rational> {
  return cons(q(start), () => counting(start + 1));
}

/** A few series of different shapes for the algebraic laws */
export function samples(): Array<[string, Series<Rational>]> {
  return [
    ["polynomial", poly(2, -1, [1, 3])],
    ["counting", counting()],
    ["alternating", alternating(0)],
  ];
}

function alternating(n: number): Series<Rational> {
  return cons(q(n % 2 === 0 ? 1 : -1, n + 1), () => alternating(n + 1));
}
