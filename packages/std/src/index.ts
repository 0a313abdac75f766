/**
 * @powser/std: Standard Typeclasses
 *
 * Eq, Ord, Numeric, Fractional and Show, with instances for the
 * primitive numeric types. Richer coefficient types live in @powser/math.
 *
 * @example
 * ```ts
 * import { numericNumber, fractionalNumber } from "@powser/std";
 *
 * numericNumber.add(1, 2); // 3
 * fractionalNumber.recip(4); // 0.25
 * ```
 */

export * from "./typeclasses/index.js";
