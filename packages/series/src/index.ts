/**
 * @powser/series: Lazy formal power series
 *
 * Infinite coefficient sequences a0 + a1·x + a2·x² + ... with exact
 * arithmetic over any coefficient ring. Only the prefix you read is ever
 * computed; recursive definitions (exp = 1 + ∫exp) are first-class.
 *
 * Every operation takes its coefficient ring as the last argument.
 *
 * @example
 * ```typescript
 * import { rat } from "@powser/math";
 * import { exp, take, rationalRing, sqrt, ofSequence, seriesToString } from "@powser/series";
 *
 * take(5, exp);                                     // [1, 1, 1/2, 1/6, 1/24]
 * const f = ofSequence([rat(1), rat(2), rat(1)], rationalRing); // (1 + x)²
 * seriesToString(sqrt(f, rationalRing), rationalRing);          // "[1, 1, 0, ...]"
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Lazy sequence core
// ============================================================================

export { Lazy, lazy, Knot } from "./lazy.js";
export {
  Series,
  cons,
  head,
  tail,
  drop,
  coefficient,
  fix,
  type TailThunk,
} from "./series.js";

// ============================================================================
// Coefficient rings
// ============================================================================

export {
  type CoefficientRing,
  coefficientRing,
  rationalRing,
  numberRing,
  modRing,
  isZero as isZeroCoefficient,
  showCoefficient,
} from "./ring.js";

// ============================================================================
// Errors
// ============================================================================

export {
  SeriesError,
  UnsupportedOperationError,
  ConstructionOrderError,
  type SeriesOperation,
} from "./errors.js";

// ============================================================================
// Arithmetic
// ============================================================================

export {
  zero,
  constant,
  one,
  identity,
  monomial,
  ofSequence,
  negate,
  scale,
  add,
  sub,
  addConstant,
  subFromConstant,
} from "./arithmetic.js";

export {
  multiply,
  divide,
  reciprocal,
  power,
  mulConstant,
  divConstant,
} from "./convolution.js";

// ============================================================================
// Functional operators
// ============================================================================

export { compose, revert, derivative, integral, integralOf } from "./functional.js";

// ============================================================================
// Fixed points
// ============================================================================

export {
  expSeries,
  sinCosSeries,
  sinSeries,
  cosSeries,
  tanSeries,
  sqrt,
  type SinCos,
} from "./fixed-points.js";

export { exp, sin, cos, tan } from "./constants.js";

// ============================================================================
// Finite views
// ============================================================================

export {
  take,
  coefficients,
  evaluate,
  evaluate as evalSeries,
  prefixEquals,
  toString as seriesToString,
} from "./views.js";

// ============================================================================
// Typeclass instances
// ============================================================================

export { numericSeries, fractionalSeries } from "./instances.js";
