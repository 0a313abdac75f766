import { describe, it, expect } from "vitest";
import {
  rational,
  rat,
  rationalFromNumber,
  numericRational as N,
  fractionalRational as F,
  eqRational,
  showRational,
  rationalToNumber,
  rationalToString,
  rationalIsInteger,
  rationalIsZero,
} from "../src/index.js";

describe("Rational", () => {
  describe("constructors", () => {
    it("reduces to lowest terms", () => {
      expect(rational(6n, 8n)).toEqual({ num: 3n, den: 4n });
    });

    it("moves the sign to the numerator", () => {
      expect(rational(1n, -2n)).toEqual({ num: -1n, den: 2n });
      expect(rat(-3, -9)).toEqual({ num: 1n, den: 3n });
    });

    it("normalizes zero", () => {
      expect(rational(0n, -5n)).toEqual({ num: 0n, den: 1n });
    });

    it("throws on a zero denominator", () => {
      expect(() => rational(1n, 0n)).toThrow(RangeError);
    });

    it("rejects non-integer number arguments", () => {
      expect(() => rat(1.5, 2)).toThrow(RangeError);
    });

    it("converts floats exactly", () => {
      expect(rationalFromNumber(0.75)).toEqual({ num: 3n, den: 4n });
      expect(rationalFromNumber(-2.5)).toEqual({ num: -5n, den: 2n });
      expect(rationalFromNumber(0.1)).toEqual({
        num: 3602879701896397n,
        den: 36028797018963968n,
      });
      expect(() => rationalFromNumber(Infinity)).toThrow(RangeError);
    });
  });

  describe("arithmetic", () => {
    const half = rat(1, 2);
    const third = rat(1, 3);

    it("adds and subtracts", () => {
      expect(N.add(half, third)).toEqual(rat(5, 6));
      expect(N.sub(third, half)).toEqual(rat(-1, 6));
    });

    it("multiplies and divides", () => {
      expect(N.mul(half, third)).toEqual(rat(1, 6));
      expect(F.div(half, third)).toEqual(rat(3, 2));
      expect(F.recip(rat(-2, 5))).toEqual(rat(-5, 2));
    });

    it("throws on division by zero", () => {
      expect(() => F.div(half, N.zero())).toThrow("Rational division by zero");
      expect(() => F.recip(N.zero())).toThrow(RangeError);
    });

    it("negates, abs and signum", () => {
      expect(N.negate(half)).toEqual(rat(-1, 2));
      expect(N.negate(N.zero())).toEqual(N.zero());
      expect(N.abs(rat(-3, 4))).toEqual(rat(3, 4));
      expect(N.signum(rat(-3, 4))).toEqual(rat(-1));
      expect(N.signum(N.zero())).toEqual(N.zero());
    });

    it("fromRational builds exact fractions", () => {
      expect(F.fromRational(2, 4)).toEqual(half);
    });
  });

  describe("equality and display", () => {
    it("Eq compares normalized fields", () => {
      expect(eqRational.equals(rat(2, 4), rat(1, 2))).toBe(true);
      expect(eqRational.notEquals(rat(1, 3), rat(1, 2))).toBe(true);
    });

    it("renders integers without a denominator", () => {
      expect(rationalToString(rat(4, 2))).toBe("2");
      expect(showRational.show(rat(-1, 6))).toBe("-1/6");
    });

    it("queries", () => {
      expect(rationalIsInteger(rat(4, 2))).toBe(true);
      expect(rationalIsZero(rat(0, 3))).toBe(true);
      expect(rationalToNumber(rat(1, 4))).toBe(0.25);
    });
  });
});
