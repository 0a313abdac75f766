/**
 * Rational Numbers
 *
 * Exact rational arithmetic using bigint numerator and denominator.
 * All operations return normalized (reduced) form with positive denominator,
 * so structural equality is numeric equality.
 *
 * @example
 * ```typescript
 * const half = rational(1n, 2n);
 * const third = rational(1n, 3n);
 * const sum = numericRational.add(half, third); // 5/6
 * ```
 */

import { makeEq } from "@powser/std";
import type { Eq, Numeric, Fractional, Show } from "@powser/std";

/**
 * Exact rational number represented as num/den.
 * Invariants:
 * - den > 0 (denominator always positive)
 * - gcd(|num|, den) = 1 (always in reduced form)
 */
export interface Rational {
  readonly num: bigint;
  readonly den: bigint;
}

/**
 * Compute GCD of two bigints using Euclidean algorithm.
 */
function gcd(a: bigint, b: bigint): bigint {
  a = a < 0n ? -a : a;
  b = b < 0n ? -b : b;
  while (b !== 0n) {
    const t = b;
    b = a % b;
    a = t;
  }
  return a;
}

/**
 * Normalize a rational: reduce to lowest terms, ensure positive denominator.
 */
function normalize(num: bigint, den: bigint): Rational {
  if (den === 0n) {
    throw new RangeError("Rational: denominator cannot be zero");
  }

  if (num === 0n) {
    return ZERO;
  }

  if (den < 0n) {
    num = -num;
    den = -den;
  }

  const g = gcd(num, den);
  return { num: num / g, den: den / g };
}

const ZERO: Rational = { num: 0n, den: 1n };
const ONE: Rational = { num: 1n, den: 1n };

/**
 * Create a rational number from numerator and denominator.
 * Auto-reduces and normalizes sign.
 *
 * @throws RangeError if the denominator is zero or a number argument is not an integer
 */
export function rational(num: bigint | number, den: bigint | number = 1n): Rational {
  return normalize(toBigInt(num), toBigInt(den));
}

function toBigInt(n: bigint | number): bigint {
  if (typeof n === "bigint") return n;
  if (!Number.isSafeInteger(n)) {
    throw new RangeError(`Rational: expected a safe integer, got ${n}`);
  }
  return BigInt(n);
}

/**
 * Shorthand for rational(num, den) with number arguments.
 */
export function rat(num: number, den: number = 1): Rational {
  return rational(num, den);
}

/**
 * Convert a finite float to the rational it denotes exactly.
 * Every finite double is a dyadic fraction m / 2^k, so no approximation happens:
 * fromNumber(0.1) is 3602879701896397/36028797018963968, not 1/10.
 *
 * @throws RangeError for NaN and infinities
 */
export function fromNumber(n: number): Rational {
  if (!Number.isFinite(n)) {
    throw new RangeError("fromNumber: cannot convert non-finite number");
  }
  if (Number.isInteger(n)) {
    return normalize(BigInt(n), 1n);
  }

  let scaled = n;
  let den = 1n;
  while (!Number.isInteger(scaled)) {
    scaled *= 2;
    den *= 2n;
  }
  return normalize(BigInt(scaled), den);
}

/**
 * Convert a rational to a floating-point number.
 * May lose precision for large numerators/denominators.
 */
export function toNumber(r: Rational): number {
  return Number(r.num) / Number(r.den);
}

/**
 * Check if a rational represents an integer (denominator is 1).
 */
export function isInteger(r: Rational): boolean {
  return r.den === 1n;
}

/**
 * Format a rational as "num/den", or just "num" if integer.
 */
export function toString(r: Rational): string {
  if (r.den === 1n) {
    return r.num.toString();
  }
  return `${r.num}/${r.den}`;
}

/**
 * Numeric instance for Rational numbers.
 */
export const numericRational: Numeric<Rational> = {
  add: (a, b) => normalize(a.num * b.den + b.num * a.den, a.den * b.den),

  sub: (a, b) => normalize(a.num * b.den - b.num * a.den, a.den * b.den),

  mul: (a, b) => normalize(a.num * b.num, a.den * b.den),

  negate: (a) => (a.num === 0n ? ZERO : { num: -a.num, den: a.den }),

  abs: (a) => (a.num < 0n ? { num: -a.num, den: a.den } : a),

  signum: (a) => (a.num < 0n ? rational(-1n) : a.num > 0n ? ONE : ZERO),

  fromNumber,

  toNumber,

  zero: () => ZERO,

  one: () => ONE,
};

/**
 * Fractional instance for Rational numbers.
 * Division is exact; dividing by zero throws.
 */
export const fractionalRational: Fractional<Rational> = {
  div: (a, b) => {
    if (b.num === 0n) {
      throw new RangeError("Rational division by zero");
    }
    return normalize(a.num * b.den, a.den * b.num);
  },

  recip: (a) => {
    if (a.num === 0n) {
      throw new RangeError("Rational reciprocal of zero");
    }
    return normalize(a.den, a.num);
  },

  fromRational: (num, den) => rational(num, den),
};

/**
 * Check equality of two rationals.
 * Normalized form makes this a field-wise comparison.
 */
export function equals(a: Rational, b: Rational): boolean {
  return a.num === b.num && a.den === b.den;
}

/**
 * Eq instance for Rational numbers.
 */
export const eqRational: Eq<Rational> = makeEq(equals);

export const showRational: Show<Rational> = { show: toString };

export function isZero(r: Rational): boolean {
  return r.num === 0n;
}
