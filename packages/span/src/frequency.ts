import { TimeSpan } from "./time-span.js";
import { divRoundHalfEven, isI64, isU64, reduce, toInteger } from "./rational.js";
import type { Integer, Ratio } from "./types.js";
import { ArithmeticOverflowError, InvalidArgumentError, InvalidFrequencyError, ParseError } from "./types.js";

const FREQUENCY_PATTERN = /^(\d+)\s*(?:\/\s*(\d+)\s*)?Hz$/;

/**
 * Tick rate as an exact ratio: `ticks` ticks per `per` seconds.
 *
 * Terms are kept in lowest form, so two frequencies describing the same rate
 * are structurally equal. Nothing here goes through floating point.
 */
export class Frequency {
  readonly ticks: bigint;
  readonly per: bigint;

  constructor(ticks: Integer, per: Integer = 1n) {
    const t = toInteger(ticks);
    const p = toInteger(per);

    if (t === undefined || p === undefined) {
      throw new InvalidFrequencyError(`Frequency terms must be integers, got ${ticks}/${per}`);
    }
    if (p <= 0n || !isU64(p)) {
      throw new InvalidFrequencyError(`Frequency denominator must be in 1..2^64-1, got ${p}`);
    }
    if (t <= 0n || !isU64(t)) {
      throw new InvalidFrequencyError(`Frequency tick count must be in 1..2^64-1, got ${t}`);
    }

    const reduced = reduce(t, p);
    this.ticks = reduced.numerator;
    this.per = reduced.denominator;
    Object.freeze(this);
  }

  static of(ticks: Integer, per: Integer = 1n): Frequency {
    return new Frequency(ticks, per);
  }

  static hz(value: Integer): Frequency {
    return Frequency.perUnit(value, 1n);
  }

  static khz(value: Integer): Frequency {
    return Frequency.perUnit(value, 1_000n);
  }

  static mhz(value: Integer): Frequency {
    return Frequency.perUnit(value, 1_000_000n);
  }

  static ghz(value: Integer): Frequency {
    return Frequency.perUnit(value, 1_000_000_000n);
  }

  /**
   * One tick every `span`.
   */
  static fromPeriod(span: TimeSpan): Frequency {
    if (!span.isPositive()) {
      throw new InvalidFrequencyError(`Frequency period must be positive, got ${span.ticks}ns`);
    }
    return new Frequency(1_000_000_000n, span.ticks);
  }

  /**
   * Rescales `count` ticks of `from` into ticks of `to`.
   *
   * The product is formed in arbitrary precision before the single division,
   * which rounds to nearest with ties to even.
   */
  static convert(count: Integer, from: Frequency, to: Frequency): bigint {
    const n = toInteger(count);
    if (n === undefined || !isI64(n)) {
      throw new InvalidArgumentError(`Tick count must be a 64-bit signed integer, got ${count}`);
    }

    const result = divRoundHalfEven(n * to.ticks * from.per, to.per * from.ticks);
    if (!isI64(result)) {
      throw new ArithmeticOverflowError("Frequency.convert");
    }
    return result;
  }

  static parse(text: string): Frequency {
    const match = FREQUENCY_PATTERN.exec(text.trim());
    if (!match?.[1]) {
      throw new ParseError("syntax", text, `Expected "<ticks> Hz" or "<ticks>/<per> Hz", got "${text}"`);
    }
    return new Frequency(BigInt(match[1]), match[2] === undefined ? 1n : BigInt(match[2]));
  }

  /**
   * Multiplies the rate by `numerator / denominator`.
   */
  scale(numerator: Integer, denominator: Integer = 1n): Frequency {
    const n = toInteger(numerator);
    const d = toInteger(denominator);
    if (n === undefined || d === undefined || n <= 0n || d <= 0n) {
      throw new InvalidArgumentError(`Scale terms must be positive integers, got ${numerator}/${denominator}`);
    }

    const reduced = reduce(this.ticks * n, this.per * d);
    if (!isU64(reduced.numerator) || !isU64(reduced.denominator)) {
      throw new ArithmeticOverflowError("Frequency.scale");
    }
    return new Frequency(reduced.numerator, reduced.denominator);
  }

  /**
   * The period as a rate: `per` ticks every `ticks` seconds
   */
  reciprocal(): Frequency {
    return new Frequency(this.per, this.ticks);
  }

  /**
   * Duration of a single tick, rounded to the nearest nanosecond.
   */
  period(): TimeSpan {
    return TimeSpan.fromFrequency(1n, this);
  }

  /**
   * Ticks per second as an exact ratio
   */
  asRatio(): Ratio {
    return { numerator: this.ticks, denominator: this.per };
  }

  compare(other: Frequency): -1 | 0 | 1 {
    const lhs = this.ticks * other.per;
    const rhs = other.ticks * this.per;
    if (lhs < rhs) return -1;
    if (lhs > rhs) return 1;
    return 0;
  }

  equals(other: Frequency): boolean {
    return this.ticks === other.ticks && this.per === other.per;
  }

  toString(): string {
    return this.per === 1n ? `${this.ticks} Hz` : `${this.ticks}/${this.per} Hz`;
  }

  toJSON(): string {
    return this.toString();
  }

  private static perUnit(value: Integer, unitsPerSecond: bigint): Frequency {
    const v = toInteger(value);
    if (v === undefined) {
      throw new InvalidFrequencyError(`Frequency must be an integer, got ${value}`);
    }
    return new Frequency(v * unitsPerSecond, 1n);
  }
}

/**
 * Resolution of every TimeSpan: one tick per nanosecond.
 */
export const REFERENCE_FREQUENCY = Frequency.ghz(1);
