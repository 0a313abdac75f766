/**
 * Standard Typeclasses
 *
 * The capabilities a coefficient type provides: equality, ring
 * arithmetic, division and rendering. Instances are plain objects handed
 * to the functions that need them as trailing parameters.
 */

// ============================================================================
// Eq
// ============================================================================

/**
 * Equality.
 *
 * Laws: reflexive, symmetric, transitive; `notEquals` is its negation.
 *
 * @typeclass
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

/**
 * An Eq whose `notEquals` is derived from `eq`.
 */
export function makeEq<A>(eq: (a: A, b: A) => boolean): Eq<A> {
  return {
    equals: eq,
    notEquals: (a, b) => !eq(a, b),
  };
}

export const eqNumber: Eq<number> = makeEq((a, b) => a === b);

// ============================================================================
// Numeric
// ============================================================================

/**
 * A commutative ring with identities `zero()` and `one()`.
 *
 * `abs` and `signum` satisfy `mul(abs(a), signum(a))` equals `a` where the
 * type has an order; unordered types use the identity and a unit.
 *
 * @typeclass
 */
export interface Numeric<A> {
  add(a: A, b: A): A;
  sub(a: A, b: A): A;
  mul(a: A, b: A): A;
  negate(a: A): A;
  abs(a: A): A;
  signum(a: A): A;
  fromNumber(n: number): A;
  toNumber(a: A): number;
  zero(): A;
  one(): A;
}

export const numericNumber: Numeric<number> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  negate: (a) => -a,
  abs: Math.abs,
  signum: Math.sign,
  fromNumber: (n) => n,
  toNumber: (a) => a,
  zero: () => 0,
  one: () => 1,
};

// ============================================================================
// Fractional
// ============================================================================

/**
 * Division by nonzero elements. Together with Numeric, a field.
 *
 * @typeclass
 */
export interface Fractional<A> {
  div(a: A, b: A): A;
  recip(a: A): A;
  fromRational(num: number, den: number): A;
}

export const fractionalNumber: Fractional<number> = {
  div: (a, b) => a / b,
  recip: (a) => 1 / a,
  fromRational: (num, den) => num / den,
};

// ============================================================================
// Show
// ============================================================================

/**
 * @typeclass
 */
export interface Show<A> {
  show(a: A): string;
}

export const showNumber: Show<number> = { show: String };
