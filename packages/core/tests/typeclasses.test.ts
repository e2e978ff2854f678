import { describe, it, expect } from "vitest";
import { EQ, GT, LT, makeOrd, productWith, sumWith, type Ring } from "@decimatrix/core";

const numberRing: Ring<number> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  negate: (a) => -a,
  zero: () => 0,
  one: () => 1,
};

describe("makeOrd", () => {
  const ord = makeOrd<number>((a, b) => (a < b ? LT : a > b ? GT : EQ));

  it("derives every comparison from compare", () => {
    expect(ord.lessThan(1, 2)).toBe(true);
    expect(ord.lessThanOrEqual(2, 2)).toBe(true);
    expect(ord.greaterThan(1, 2)).toBe(false);
    expect(ord.greaterThanOrEqual(3, 2)).toBe(true);
    expect(ord.equals(4, 4)).toBe(true);
    expect(ord.notEquals(4, 5)).toBe(true);
  });
});

describe("ring folds", () => {
  it("sums from zero", () => {
    expect(sumWith([1, 2, 3], numberRing)).toBe(6);
    expect(sumWith([], numberRing)).toBe(0);
  });

  it("multiplies from one", () => {
    expect(productWith([2, 3, 4], numberRing)).toBe(24);
    expect(productWith([], numberRing)).toBe(1);
  });
});
