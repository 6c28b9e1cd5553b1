import type { Integer, Ratio } from "./types.js";

export const I64_MIN = -(1n << 63n);
export const I64_MAX = (1n << 63n) - 1n;
export const U64_MAX = (1n << 64n) - 1n;

export const NANOS_PER_MICRO = 1_000n;
export const NANOS_PER_MILLI = 1_000_000n;
export const NANOS_PER_SECOND = 1_000_000_000n;
export const NANOS_PER_MINUTE = 60n * NANOS_PER_SECOND;
export const NANOS_PER_HOUR = 60n * NANOS_PER_MINUTE;
export const NANOS_PER_DAY = 24n * NANOS_PER_HOUR;
export const NANOS_PER_WEEK = 7n * NANOS_PER_DAY;

export function isI64(value: bigint): boolean {
  return value >= I64_MIN && value <= I64_MAX;
}

export function isU64(value: bigint): boolean {
  return value >= 0n && value <= U64_MAX;
}

/**
 * Converts boundary input to bigint. Returns undefined for non-integral numbers.
 */
export function toInteger(value: Integer): bigint | undefined {
  if (typeof value === "bigint") return value;
  if (!Number.isSafeInteger(value)) return undefined;
  return BigInt(value);
}

export function abs(value: bigint): bigint {
  return value < 0n ? -value : value;
}

export function gcd(a: bigint, b: bigint): bigint {
  let x = abs(a);
  let y = abs(b);
  while (y !== 0n) {
    const t = x % y;
    x = y;
    y = t;
  }
  return x;
}

/**
 * Integer division rounded to nearest, ties to even. `d` must be non-zero.
 */
export function divRoundHalfEven(n: bigint, d: bigint): bigint {
  if (d < 0n) {
    n = -n;
    d = -d;
  }

  const q = n / d;
  const r = n % d;
  if (r === 0n) return q;

  const twice = 2n * abs(r);
  const away = n < 0n ? q - 1n : q + 1n;

  if (twice < d) return q;
  if (twice > d) return away;
  return q % 2n === 0n ? q : away;
}

/** Floor division for a positive divisor. */
export function floorDiv(n: bigint, d: bigint): bigint {
  const q = n / d;
  return n % d !== 0n && n < 0n ? q - 1n : q;
}

/** Ceiling division for a positive divisor. */
export function ceilDiv(n: bigint, d: bigint): bigint {
  const q = n / d;
  return n % d !== 0n && n > 0n ? q + 1n : q;
}

export function reduce(numerator: bigint, denominator: bigint): Ratio {
  if (denominator < 0n) {
    numerator = -numerator;
    denominator = -denominator;
  }
  if (numerator === 0n) return { numerator: 0n, denominator: 1n };

  const g = gcd(numerator, denominator);
  return { numerator: numerator / g, denominator: denominator / g };
}

/**
 * Lossy conversion for presentation, e.g. render interpolation weights.
 */
export function ratioToNumber(ratio: Ratio): number {
  const whole = ratio.numerator / ratio.denominator;
  const rest = ratio.numerator % ratio.denominator;
  return Number(whole) + Number(rest) / Number(ratio.denominator);
}
