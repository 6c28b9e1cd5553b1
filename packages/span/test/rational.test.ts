import { describe, it, expect } from "vitest";
import { ceilDiv, divRoundHalfEven, floorDiv, gcd, ratioToNumber, reduce, toInteger } from "../src/rational.js";

describe("rational helpers", () => {
  it("should compute the greatest common divisor", () => {
    expect(gcd(0n, 5n)).toBe(5n);
    expect(gcd(12n, -18n)).toBe(6n);
    expect(gcd(1_000_000_000n, 16_000_000n)).toBe(8_000_000n);
  });

  it("should round half to even", () => {
    expect(divRoundHalfEven(5n, 2n)).toBe(2n);
    expect(divRoundHalfEven(7n, 2n)).toBe(4n);
    expect(divRoundHalfEven(-5n, 2n)).toBe(-2n);
    expect(divRoundHalfEven(-7n, 2n)).toBe(-4n);
    expect(divRoundHalfEven(5n, -2n)).toBe(-2n);
  });

  it("should round to nearest off the midpoint", () => {
    expect(divRoundHalfEven(10n, 3n)).toBe(3n);
    expect(divRoundHalfEven(11n, 3n)).toBe(4n);
    expect(divRoundHalfEven(-11n, 3n)).toBe(-4n);
    expect(divRoundHalfEven(9n, 3n)).toBe(3n);
  });

  it("should floor and ceil for positive divisors", () => {
    expect(floorDiv(-7n, 2n)).toBe(-4n);
    expect(floorDiv(7n, 2n)).toBe(3n);
    expect(ceilDiv(7n, 2n)).toBe(4n);
    expect(ceilDiv(-7n, 2n)).toBe(-3n);
    expect(ceilDiv(8n, 2n)).toBe(4n);
  });

  it("should reduce with a positive denominator", () => {
    expect(reduce(6n, -4n)).toEqual({ numerator: -3n, denominator: 2n });
    expect(reduce(0n, 5n)).toEqual({ numerator: 0n, denominator: 1n });
  });

  it("should approximate a ratio for display", () => {
    expect(ratioToNumber({ numerator: 1n, denominator: 4n })).toBe(0.25);
    expect(ratioToNumber({ numerator: 9n, denominator: 4n })).toBe(2.25);
  });

  it("should accept only safe integers from numbers", () => {
    expect(toInteger(42)).toBe(42n);
    expect(toInteger(7n)).toBe(7n);
    expect(toInteger(0.5)).toBeUndefined();
    expect(toInteger(Number.MAX_SAFE_INTEGER + 1)).toBeUndefined();
  });
});
