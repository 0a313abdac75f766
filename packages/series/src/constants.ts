/**
 * The elementary series over exact rationals, built once.
 */

import type { Rational } from "@powser/math";
import { divide } from "./convolution.js";
import { expSeries, sinCosSeries } from "./fixed-points.js";
import { rationalRing } from "./ring.js";
import type { Series } from "./series.js";

export const exp: Series<Rational> = expSeries(rationalRing);

const trig = sinCosSeries(rationalRing);

export const sin: Series<Rational> = trig.sin;

export const cos: Series<Rational> = trig.cos;

export const tan: Series<Rational> = divide(sin, cos, rationalRing);
