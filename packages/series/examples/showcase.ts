/**
 * @powser/series Showcase
 *
 * Prints the first few coefficients of the classic series and a couple of
 * derived ones.
 *
 * Build: npm run build && node dist/packages/series/examples/showcase.js
 */

import { mod, rat, rationalToString } from "@powser/math";
import {
  compose,
  cos,
  evalSeries,
  exp,
  expSeries,
  modRing,
  ofSequence,
  rationalRing,
  revert,
  seriesToString,
  sin,
  sqrt,
  tan,
  take,
} from "@powser/series";

const R = rationalRing;

// ============================================================================
// 1. ELEMENTARY FUNCTIONS - defined by their differential equations
// ============================================================================

console.log("exp =", seriesToString(exp, R, 6));
console.log("sin =", seriesToString(sin, R, 6));
console.log("cos =", seriesToString(cos, R, 6));
console.log("tan =", seriesToString(tan, R, 8));

// ============================================================================
// 2. ALGEBRA ON SERIES
// ============================================================================

// (1 + x)² and its square root
const square = ofSequence([rat(1), rat(2), rat(1)], R);
console.log("√(1 + 2x + x²) =", seriesToString(sqrt(square, R), R, 4));

// Catalan numbers (with signs) from inverting x + x²
const catalan = revert(ofSequence([rat(0), rat(1), rat(1)], R), R);
console.log("revert(x + x²) =", take(7, catalan).map(rationalToString).join(", "));

// exp(2x)
console.log("exp(2x) =", seriesToString(compose(exp, ofSequence([rat(0), rat(2)], R), R), R, 5));

// ============================================================================
// 3. EVALUATION
// ============================================================================

console.log("e ≈", rationalToString(evalSeries(12, rat(1), exp, R)));

// ============================================================================
// 4. OTHER COEFFICIENT RINGS
// ============================================================================

const Z7 = modRing(7);
console.log("exp over Z/7 =", seriesToString(expSeries(Z7), Z7, 7));
console.log("3 * 5 mod 7 =", Z7.mul(mod(3, 7), mod(5, 7)).value);
