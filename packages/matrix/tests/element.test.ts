import { describe, it, expect } from "vitest";
import {
  element,
  parseElement,
  elementToString,
  toNumber,
  add,
  sub,
  mul,
  div,
  round,
  roundToPrecision,
  compare,
  equals,
  isInteger,
  isNegative,
  isNegligible,
  snap,
  tolerance,
  ordElement,
  numericElement,
  fractionalElement,
  showElement,
  ZERO,
  TypeMismatch,
} from "../src/index.js";

describe("Element", () => {
  describe("construction", () => {
    it("converts integers exactly", () => {
      expect(element(3)).toEqual({ unscaled: 3n, scale: 0 });
      expect(element(12345678901234567890n)).toEqual({
        unscaled: 12345678901234567890n,
        scale: 0,
      });
    });

    it("converts fractional numbers through their decimal string", () => {
      expect(element(0.1)).toEqual({ unscaled: 1n, scale: 1 });
      expect(element(-2.75)).toEqual({ unscaled: -275n, scale: 2 });
    });

    it("rejects values that are not finite reals", () => {
      expect(() => element(NaN)).toThrow(TypeMismatch);
      expect(() => element(Infinity)).toThrow("Matrix elements can only be real numbers.");
    });

    it("parses decimal strings", () => {
      expect(parseElement("1.2300")).toEqual({ unscaled: 123n, scale: 2 });
      expect(parseElement("-0.001")).toEqual({ unscaled: -1n, scale: 3 });
      expect(elementToString(parseElement("1e-5"))).toBe("0.00001");
      expect(elementToString(parseElement("2.5E3"))).toBe("2500");
    });

    it("rejects malformed strings", () => {
      expect(() => parseElement("1.2.3")).toThrow(TypeMismatch);
      expect(() => parseElement("abc")).toThrow("'abc' is not a decimal number.");
    });
  });

  describe("arithmetic", () => {
    it("adds decimals without binary error", () => {
      expect(elementToString(add(element(0.1), element(0.2)))).toBe("0.3");
      expect(elementToString(sub(element(1), element(0.9)))).toBe("0.1");
    });

    it("multiplies and normalizes", () => {
      expect(mul(element(1.5), element(2))).toEqual({ unscaled: 3n, scale: 0 });
    });

    it("divides to 28 significant digits", () => {
      expect(elementToString(div(element(1), element(3)))).toBe(
        "0.3333333333333333333333333333"
      );
      expect(elementToString(div(element(2), element(3)))).toBe(
        "0.6666666666666666666666666667"
      );
      expect(elementToString(div(element(10), element(4)))).toBe("2.5");
    });

    it("honours a smaller precision", () => {
      expect(elementToString(div(element(1), element(3), 5))).toBe("0.33333");
    });

    it("throws on division by zero", () => {
      expect(() => div(element(1), element(0))).toThrow(RangeError);
    });
  });

  describe("rounding", () => {
    it("rounds half to even", () => {
      expect(round(parseElement("2.5"), 0)).toEqual({ unscaled: 2n, scale: 0 });
      expect(round(parseElement("3.5"), 0)).toEqual({ unscaled: 4n, scale: 0 });
      expect(round(parseElement("-2.5"), 0)).toEqual({ unscaled: -2n, scale: 0 });
      expect(round(parseElement("1.251"), 1)).toEqual({ unscaled: 13n, scale: 1 });
    });

    it("rounds to significant digits", () => {
      expect(elementToString(roundToPrecision(parseElement("123456"), 3))).toBe("123000");
      expect(elementToString(roundToPrecision(parseElement("0.0012345"), 2))).toBe("0.0012");
    });
  });

  describe("tolerance", () => {
    const tol = tolerance(3, 28);

    it("treats magnitudes below the limit as negligible", () => {
      expect(isNegligible(parseElement("0.0009"), tol)).toBe(true);
      expect(isNegligible(parseElement("-0.0009"), tol)).toBe(true);
      expect(isNegligible(parseElement("0.001"), tol)).toBe(false);
    });

    it("snaps values close to an integer", () => {
      expect(snap(parseElement("1.9999"), tol)).toEqual({ unscaled: 2n, scale: 0 });
      expect(snap(parseElement("-0.0004"), tol)).toEqual({ unscaled: 0n, scale: 0 });
      expect(elementToString(snap(parseElement("1.99"), tol))).toBe("1.99");
    });

    it("rejects invalid limits", () => {
      expect(() => tolerance(-1, 28)).toThrow(RangeError);
      expect(() => tolerance(3, 0)).toThrow(RangeError);
    });
  });

  describe("comparison", () => {
    it("compares across scales", () => {
      expect(compare(parseElement("1.50"), element(1.5))).toBe(0);
      expect(compare(element(2), element(10))).toBe(-1);
      expect(equals(parseElement("0.10"), element(0.1))).toBe(true);
      expect(isInteger(parseElement("4.000"))).toBe(true);
    });

    it("tests the sign", () => {
      expect(isNegative(parseElement("-0.001"))).toBe(true);
      expect(isNegative(ZERO)).toBe(false);
      expect(isNegative(element(3))).toBe(false);
    });

    it("provides typeclass instances", () => {
      expect(ordElement.lessThan(element(1), element(2))).toBe(true);
      expect(numericElement.toNumber(numericElement.add(element(1), element(2)))).toBe(3);
      expect(toNumber(fractionalElement.fromRational(1, 4))).toBe(0.25);
      expect(showElement.show(parseElement("-0.50"))).toBe("-0.5");
    });
  });
});
