/**
 * Mod<N> - Modular arithmetic over Z/nZ
 *
 * The modulus is carried at the type level, so values with different
 * moduli do not mix. For prime N, Z/NZ is a field and can serve as the
 * coefficient ring of a power series.
 *
 * @example
 * ```typescript
 * const a = mod(5, 7);  // 5 mod 7
 * const b = mod(3, 7);  // 3 mod 7
 * modAdd(a, b);         // 1 mod 7
 * modDiv(a, b);         // 4 mod 7, since 3 * 4 = 12 = 5 (mod 7)
 * ```
 */

import type { Eq, Numeric, Fractional, Show } from "@powser/std";

// ============================================================================
// Type Definition
// ============================================================================

/**
 * A value in Z/nZ, normalized to [0, modulus).
 */
export interface Mod<N extends number> {
  readonly value: number;
  readonly modulus: N;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a value in Z/nZ.
 *
 * @throws RangeError if the modulus is not a positive safe integer
 */
export function mod<N extends number>(value: number, modulus: N): Mod<N> {
  if (!Number.isSafeInteger(modulus) || modulus <= 0) {
    throw new RangeError(`Modulus must be a positive integer, got ${modulus}`);
  }
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Mod value must be an integer, got ${value}`);
  }
  return { value: ((value % modulus) + modulus) % modulus, modulus };
}

// ============================================================================
// Basic Operations
// ============================================================================

export function modAdd<N extends number>(a: Mod<N>, b: Mod<N>): Mod<N> {
  return mod(a.value + b.value, a.modulus);
}

export function modSub<N extends number>(a: Mod<N>, b: Mod<N>): Mod<N> {
  return mod(a.value - b.value, a.modulus);
}

/**
 * Modular multiplication. Goes through bigint when the product could
 * leave the safe-integer range.
 */
export function modMul<N extends number>(a: Mod<N>, b: Mod<N>): Mod<N> {
  const product = a.value * b.value;
  if (Number.isSafeInteger(product)) {
    return mod(product, a.modulus);
  }
  return mod(Number((BigInt(a.value) * BigInt(b.value)) % BigInt(a.modulus)), a.modulus);
}

export function modNegate<N extends number>(a: Mod<N>): Mod<N> {
  return mod(-a.value, a.modulus);
}

// ============================================================================
// Inverses
// ============================================================================

/**
 * Extended Euclidean algorithm.
 * Returns [gcd, x, y] such that gcd = a*x + b*y
 */
function extendedGcd(a: number, b: number): [number, number, number] {
  let [oldR, r] = [a, b];
  let [oldS, s] = [1, 0];
  let [oldT, t] = [0, 1];

  while (r !== 0) {
    const q = Math.floor(oldR / r);
    [oldR, r] = [r, oldR - q * r];
    [oldS, s] = [s, oldS - q * s];
    [oldT, t] = [t, oldT - q * t];
  }

  return [oldR, oldS, oldT];
}

/**
 * Modular inverse of a, or null if a and the modulus are not coprime.
 */
export function modInverse<N extends number>(a: Mod<N>): Mod<N> | null {
  const [g, x] = extendedGcd(a.value, a.modulus);
  if (g !== 1) {
    return null;
  }
  return mod(x, a.modulus);
}

/**
 * Modular division (multiply by inverse), or null if the divisor has no inverse.
 */
export function modDiv<N extends number>(a: Mod<N>, b: Mod<N>): Mod<N> | null {
  const bInv = modInverse(b);
  if (bInv === null) return null;
  return modMul(a, bInv);
}

/**
 * Check if a number is prime (trial division).
 */
export function isPrime(n: number): boolean {
  if (!Number.isSafeInteger(n) || n < 2) return false;
  if (n % 2 === 0) return n === 2;
  for (let i = 3; i * i <= n; i += 2) {
    if (n % i === 0) return false;
  }
  return true;
}

// ============================================================================
// Typeclass Instances
// ============================================================================

/**
 * Numeric instance for Mod<N>: the ring Z/nZ.
 */
export function numericMod<N extends number>(modulus: N): Numeric<Mod<N>> {
  const zero = mod(0, modulus);
  const one = mod(1, modulus);
  return {
    add: modAdd,
    sub: modSub,
    mul: modMul,
    negate: modNegate,
    abs: (a) => a, // no order on Z/nZ
    signum: (a) => (a.value === 0 ? zero : one),
    fromNumber: (n) => mod(Math.trunc(n), modulus),
    toNumber: (a) => a.value,
    zero: () => zero,
    one: () => one,
  };
}

/**
 * Fractional instance for Mod<N>.
 * Only valid when N is prime (Z/pZ is a field).
 *
 * @throws RangeError if the modulus is not prime
 */
export function fractionalMod<N extends number>(modulus: N): Fractional<Mod<N>> {
  if (!isPrime(modulus)) {
    throw new RangeError(`Fractional instance requires prime modulus, got ${modulus}`);
  }

  const recip = (a: Mod<N>): Mod<N> => {
    const result = modInverse(a);
    if (result === null) {
      throw new RangeError(`Division by zero mod ${modulus}`);
    }
    return result;
  };

  return {
    div: (a, b) => modMul(a, recip(b)),
    recip,
    fromRational: (num, den) => modMul(mod(Math.trunc(num), modulus), recip(mod(Math.trunc(den), modulus))),
  };
}

/**
 * Check if two Mod values are equal.
 */
export function equals<N extends number>(a: Mod<N>, b: Mod<N>): boolean {
  return a.value === b.value && a.modulus === b.modulus;
}

export function eqMod<N extends number>(): Eq<Mod<N>> {
  return {
    equals,
    notEquals: (a, b) => !equals(a, b),
  };
}

/**
 * Pretty-print a Mod value.
 */
export function toString<N extends number>(a: Mod<N>): string {
  return `${a.value} (mod ${a.modulus})`;
}

/**
 * Show instance rendering the bare residue; the modulus is implied by context.
 */
export function showMod<N extends number>(): Show<Mod<N>> {
  return { show: (a) => String(a.value) };
}
