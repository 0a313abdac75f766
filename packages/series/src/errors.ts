/**
 * Series Error Types
 *
 * Every error raised by the engine itself extends SeriesError. Errors
 * raised by a coefficient type (for example a RangeError from dividing
 * a Rational by zero) pass through unchanged.
 */

/**
 * Base class for all power-series errors.
 */
export class SeriesError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SeriesError";
  }
}

/** Operations that can refuse their input. */
export type SeriesOperation = "power" | "divide" | "compose" | "revert" | "sqrt";

/**
 * Thrown when an operation is not defined for its argument: a negative
 * exponent, a composition or reversion whose inner series has a nonzero
 * constant term, a division that is not exact at the current valuation,
 * or a square root with no computable branch.
 */
export class UnsupportedOperationError extends SeriesError {
  constructor(
    readonly operation: SeriesOperation,
    message: string
  ) {
    super(`${operation}: ${message}`);
    this.name = "UnsupportedOperationError";
  }
}

/**
 * Thrown when a self-referential definition reads its own value before
 * that value exists: a placeholder forced before it is tied, a placeholder
 * tied twice, or a lazy cell forced again while its own recipe is running.
 */
export class ConstructionOrderError extends SeriesError {
  constructor(message: string) {
    super(message);
    this.name = "ConstructionOrderError";
  }
}
