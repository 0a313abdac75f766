import { describe, it, expect } from "vitest";
import {
  mod,
  modAdd,
  modSub,
  modMul,
  modNegate,
  modInverse,
  modDiv,
  isPrime,
  numericMod,
  fractionalMod,
  eqMod,
  showMod,
  modToString,
} from "../src/index.js";

describe("Mod", () => {
  it("normalizes into [0, modulus)", () => {
    expect(mod(-1, 7).value).toBe(6);
    expect(mod(15, 7).value).toBe(1);
  });

  it("rejects bad moduli", () => {
    expect(() => mod(1, 0)).toThrow(RangeError);
    expect(() => mod(1.5, 7)).toThrow(RangeError);
  });

  it("ring operations", () => {
    const a = mod(5, 7);
    const b = mod(3, 7);
    expect(modAdd(a, b).value).toBe(1);
    expect(modSub(b, a).value).toBe(5);
    expect(modMul(a, b).value).toBe(1);
    expect(modNegate(a).value).toBe(2);
  });

  it("multiplies large residues exactly", () => {
    const p = 2147483647;
    const a = mod(p - 1, p);
    // (-1) * (-1) = 1
    expect(modMul(a, a).value).toBe(1);
  });

  it("inverses", () => {
    expect(modInverse(mod(3, 7))?.value).toBe(5);
    expect(modInverse(mod(2, 4))).toBeNull();
    expect(modDiv(mod(5, 7), mod(3, 7))?.value).toBe(4);
  });

  it("isPrime", () => {
    expect([2, 3, 5, 7, 11, 13].every(isPrime)).toBe(true);
    expect([0, 1, 4, 9, 15].some(isPrime)).toBe(false);
  });

  describe("instances", () => {
    const N = numericMod(7);
    const F = fractionalMod(7);

    it("Numeric identities", () => {
      expect(N.zero().value).toBe(0);
      expect(N.one().value).toBe(1);
      expect(N.fromNumber(-3).value).toBe(4);
    });

    it("Fractional divides by inverses", () => {
      expect(F.div(mod(1, 7), mod(2, 7)).value).toBe(4);
      expect(F.fromRational(1, 3).value).toBe(5);
      expect(() => F.div(mod(1, 7), mod(0, 7))).toThrow(RangeError);
    });

    it("Fractional requires a prime modulus", () => {
      expect(() => fractionalMod(8)).toThrow(RangeError);
    });

    it("Eq and Show", () => {
      expect(eqMod<7>().equals(mod(8, 7), mod(1, 7))).toBe(true);
      expect(showMod<7>().show(mod(10, 7))).toBe("3");
      expect(modToString(mod(10, 7))).toBe("3 (mod 7)");
    });
  });
});
