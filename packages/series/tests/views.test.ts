import { describe, it, expect, afterEach } from "vitest";
import { config } from "@powser/core";
import {
  coefficients,
  evalSeries,
  evaluate,
  exp,
  expSeries,
  numberRing,
  prefixEquals,
  seriesToString,
  take,
} from "../src/index.js";
import type { Rational } from "@powser/math";
import { R, counting, poly, q, qs } from "./fixtures.js";

describe("take", () => {
  it("returns the first n coefficients", () => {
    expect(take(3, counting())).toEqual(qs(1, 2, 3));
  });

  it("n <= 0 gives an empty prefix", () => {
    expect(take(0, counting())).toEqual([]);
    expect(take(-2, counting())).toEqual([]);
  });

  it("rejects a fractional count", () => {
    expect(() => take(2.5, counting())).toThrow(RangeError);
    expect(() => take(2.5, counting())).toThrow("take: count must be an integer, got 2.5");
    expect(() => take(Number.NaN, counting())).toThrow(RangeError);
  });
});

describe("coefficients", () => {
  it("yields coefficients in order", () => {
    const out: Rational[] = [];
    for (const c of coefficients(counting())) {
      if (out.length === 4) break;
      out.push(c);
    }
    expect(out).toEqual(qs(1, 2, 3, 4));
  });
});

describe("evaluate", () => {
  it("sums a truncated series", () => {
    expect(evaluate(3, q(1, 2), exp, R)).toEqual(q(13, 8));
  });

  it("ten terms of exp at 1", () => {
    expect(evaluate(10, q(1), exp, R)).toEqual(q(98641, 36288));
  });

  it("rejects a fractional term count", () => {
    expect(() => evaluate(1.5, q(1), exp, R)).toThrow(RangeError);
  });

  it("zero terms sum to zero", () => {
    expect(evaluate(0, q(5), counting(), R)).toEqual(q(0));
  });

  it("evaluates a polynomial exactly once all terms are included", () => {
    // 1 + 2x + 3x² at x = 2
    expect(evaluate(5, q(2), poly(1, 2, 3), R)).toEqual(q(17));
  });

  it("approximates e over floating point", () => {
    expect(evalSeries(20, 1, expSeries(numberRing), numberRing)).toBeCloseTo(Math.E, 12);
  });
});

describe("prefixEquals", () => {
  it("compares only the given prefix", () => {
    expect(prefixEquals(2, poly(1, 2, 3), poly(1, 2, 4), R)).toBe(true);
    expect(prefixEquals(3, poly(1, 2, 3), poly(1, 2, 4), R)).toBe(false);
  });
});

describe("seriesToString", () => {
  afterEach(() => {
    config.reset();
  });

  it("shows three terms by default", () => {
    expect(seriesToString(exp, R)).toBe("[1, 1, 1/2, ...]");
  });

  it("follows display.terms", () => {
    config.set({ display: { terms: 5 } });
    expect(seriesToString(exp, R)).toBe("[1, 1, 1/2, 1/6, 1/24, ...]");
  });

  it("takes an explicit term count", () => {
    expect(seriesToString(poly(-1, [2, 3]), R, 2)).toBe("[-1, 2/3, ...]");
    expect(seriesToString(exp, R, 0)).toBe("[...]");
  });

  it("shows floating-point coefficients", () => {
    expect(seriesToString(expSeries(numberRing), numberRing)).toBe("[1, 1, 0.5, ...]");
  });
});
