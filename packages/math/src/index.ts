/**
 * @powser/math: Exact coefficient types
 *
 * This package provides:
 * - **Rational**: exact bigint fractions, always in lowest terms
 * - **Mod<N>**: integers modulo N; a field when N is prime
 *
 * Both implement the typeclasses from @powser/std (Numeric, Fractional, Eq, Show).
 *
 * @example
 * ```typescript
 * import { rational, numericRational, mod, fractionalMod } from "@powser/math";
 *
 * numericRational.add(rational(1n, 2n), rational(1n, 3n)); // 5/6
 * fractionalMod(7).div(mod(5, 7), mod(3, 7));              // 4 mod 7
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Rational Numbers
// ============================================================================

export {
  // Type
  type Rational,
  // Constructors
  rational,
  rat,
  fromNumber as rationalFromNumber,
  // Typeclass instances
  numericRational,
  fractionalRational,
  eqRational,
  showRational,
  // Operations
  toNumber as rationalToNumber,
  toString as rationalToString,
  isInteger as rationalIsInteger,
  equals as rationalEquals,
  isZero as rationalIsZero,
} from "./types/rational.js";

// ============================================================================
// Modular Arithmetic (Z/nZ)
// ============================================================================

export {
  // Type
  type Mod,
  // Constructors
  mod,
  // Operations
  modAdd,
  modSub,
  modMul,
  modNegate,
  modInverse,
  modDiv,
  isPrime,
  // Typeclass instances
  numericMod,
  fractionalMod,
  eqMod,
  showMod,
  // Utilities
  equals as modEquals,
  toString as modToString,
} from "./types/modular.js";
