import { formatSpan } from "./format.js";
import { Frequency, REFERENCE_FREQUENCY } from "./frequency.js";
import {
  I64_MAX,
  I64_MIN,
  NANOS_PER_DAY,
  NANOS_PER_HOUR,
  NANOS_PER_MICRO,
  NANOS_PER_MILLI,
  NANOS_PER_MINUTE,
  NANOS_PER_SECOND,
  NANOS_PER_WEEK,
  floorDiv,
  isI64,
  toInteger,
} from "./rational.js";
import type { Integer } from "./types.js";
import { ArithmeticOverflowError, InvalidArgumentError } from "./types.js";

function scalar(value: Integer, operation: string): bigint {
  const n = toInteger(value);
  if (n === undefined) {
    throw new InvalidArgumentError(`${operation} expects an integer, got ${value}`);
  }
  return n;
}

function clamp(value: bigint): bigint {
  if (value > I64_MAX) return I64_MAX;
  if (value < I64_MIN) return I64_MIN;
  return value;
}

/**
 * Signed duration counted in nanosecond ticks.
 *
 * The tick count always fits a 64-bit signed integer. Plain operations throw
 * ArithmeticOverflowError when a result would leave that range, `checked*`
 * variants return undefined instead and `saturating*` variants clamp to
 * MIN or MAX.
 */
export class TimeSpan {
  static readonly ZERO = new TimeSpan(0n);
  static readonly MIN = new TimeSpan(I64_MIN);
  static readonly MAX = new TimeSpan(I64_MAX);

  static readonly NANOSECOND = new TimeSpan(1n);
  static readonly MICROSECOND = new TimeSpan(NANOS_PER_MICRO);
  static readonly MILLISECOND = new TimeSpan(NANOS_PER_MILLI);
  static readonly SECOND = new TimeSpan(NANOS_PER_SECOND);
  static readonly MINUTE = new TimeSpan(NANOS_PER_MINUTE);
  static readonly HOUR = new TimeSpan(NANOS_PER_HOUR);
  static readonly DAY = new TimeSpan(NANOS_PER_DAY);
  static readonly WEEK = new TimeSpan(NANOS_PER_WEEK);

  readonly ticks: bigint;

  private constructor(ticks: bigint) {
    this.ticks = ticks;
    Object.freeze(this);
  }

  static of(ticks: Integer): TimeSpan {
    return TimeSpan.fromTicks(scalar(ticks, "TimeSpan.of"), "TimeSpan.of");
  }

  static nanos(value: Integer): TimeSpan {
    return TimeSpan.inUnit(value, 1n, "TimeSpan.nanos");
  }

  static micros(value: Integer): TimeSpan {
    return TimeSpan.inUnit(value, NANOS_PER_MICRO, "TimeSpan.micros");
  }

  static millis(value: Integer): TimeSpan {
    return TimeSpan.inUnit(value, NANOS_PER_MILLI, "TimeSpan.millis");
  }

  static seconds(value: Integer): TimeSpan {
    return TimeSpan.inUnit(value, NANOS_PER_SECOND, "TimeSpan.seconds");
  }

  static minutes(value: Integer): TimeSpan {
    return TimeSpan.inUnit(value, NANOS_PER_MINUTE, "TimeSpan.minutes");
  }

  static hours(value: Integer): TimeSpan {
    return TimeSpan.inUnit(value, NANOS_PER_HOUR, "TimeSpan.hours");
  }

  static days(value: Integer): TimeSpan {
    return TimeSpan.inUnit(value, NANOS_PER_DAY, "TimeSpan.days");
  }

  static weeks(value: Integer): TimeSpan {
    return TimeSpan.inUnit(value, NANOS_PER_WEEK, "TimeSpan.weeks");
  }

  /**
   * `count` ticks of `frequency` expressed as a span. This and
   * {@link TimeSpan.toFrequency} are how external units enter and leave.
   */
  static fromFrequency(count: Integer, frequency: Frequency): TimeSpan {
    return new TimeSpan(Frequency.convert(count, frequency, REFERENCE_FREQUENCY));
  }

  static min(a: TimeSpan, b: TimeSpan): TimeSpan {
    return a.ticks <= b.ticks ? a : b;
  }

  static max(a: TimeSpan, b: TimeSpan): TimeSpan {
    return a.ticks >= b.ticks ? a : b;
  }

  /**
   * Number of `frequency` ticks in this span, rounded half to even
   */
  toFrequency(frequency: Frequency): bigint {
    return Frequency.convert(this.ticks, REFERENCE_FREQUENCY, frequency);
  }

  /** Throws ArithmeticOverflowError past MIN or MAX. */
  add(other: TimeSpan): TimeSpan {
    return TimeSpan.fromTicks(this.ticks + other.ticks, "TimeSpan.add");
  }

  sub(other: TimeSpan): TimeSpan {
    return TimeSpan.fromTicks(this.ticks - other.ticks, "TimeSpan.sub");
  }

  /** Negating MIN overflows. */
  neg(): TimeSpan {
    return TimeSpan.fromTicks(-this.ticks, "TimeSpan.neg");
  }

  abs(): TimeSpan {
    return this.ticks < 0n ? TimeSpan.fromTicks(-this.ticks, "TimeSpan.abs") : this;
  }

  /**
   * Multiply by an integer factor
   */
  mul(factor: Integer): TimeSpan {
    return TimeSpan.fromTicks(this.ticks * scalar(factor, "TimeSpan.mul"), "TimeSpan.mul");
  }

  /**
   * Truncates toward zero.
   */
  div(divisor: Integer): TimeSpan {
    return TimeSpan.fromTicks(this.ticks / nonZero(scalar(divisor, "TimeSpan.div"), "TimeSpan.div"), "TimeSpan.div");
  }

  /**
   * Remainder of {@link div}; takes the sign of this span.
   */
  rem(divisor: Integer): TimeSpan {
    return new TimeSpan(this.ticks % nonZero(scalar(divisor, "TimeSpan.rem"), "TimeSpan.rem"));
  }

  /**
   * Whole number of `span`s in this span, rounded toward negative infinity,
   * so `-5ns / 2ns` is -3.
   */
  divSpan(span: TimeSpan): bigint {
    return floorSpans(this.ticks, nonZero(span.ticks, "TimeSpan.divSpan"));
  }

  /**
   * What is left after {@link divSpan}. Never negative for a positive `span`.
   */
  remSpan(span: TimeSpan): TimeSpan {
    const divisor = nonZero(span.ticks, "TimeSpan.remSpan");
    return new TimeSpan(this.ticks - floorSpans(this.ticks, divisor) * divisor);
  }

  /**
   * Like {@link add}, returning undefined instead of throwing
   */
  checkedAdd(other: TimeSpan): TimeSpan | undefined {
    return TimeSpan.orUndefined(this.ticks + other.ticks);
  }

  checkedSub(other: TimeSpan): TimeSpan | undefined {
    return TimeSpan.orUndefined(this.ticks - other.ticks);
  }

  checkedMul(factor: Integer): TimeSpan | undefined {
    return TimeSpan.orUndefined(this.ticks * scalar(factor, "TimeSpan.checkedMul"));
  }

  checkedNeg(): TimeSpan | undefined {
    return TimeSpan.orUndefined(-this.ticks);
  }

  /**
   * Like {@link add}, clamped to MIN or MAX
   */
  saturatingAdd(other: TimeSpan): TimeSpan {
    return new TimeSpan(clamp(this.ticks + other.ticks));
  }

  saturatingSub(other: TimeSpan): TimeSpan {
    return new TimeSpan(clamp(this.ticks - other.ticks));
  }

  saturatingMul(factor: Integer): TimeSpan {
    return new TimeSpan(clamp(this.ticks * scalar(factor, "TimeSpan.saturatingMul")));
  }

  saturatingNeg(): TimeSpan {
    return new TimeSpan(clamp(-this.ticks));
  }

  /**
   * Total order on tick counts, for `Array.prototype.sort`
   */
  compare(other: TimeSpan): -1 | 0 | 1 {
    if (this.ticks < other.ticks) return -1;
    if (this.ticks > other.ticks) return 1;
    return 0;
  }

  equals(other: TimeSpan): boolean {
    return this.ticks === other.ticks;
  }

  lt(other: TimeSpan): boolean {
    return this.ticks < other.ticks;
  }

  lte(other: TimeSpan): boolean {
    return this.ticks <= other.ticks;
  }

  gt(other: TimeSpan): boolean {
    return this.ticks > other.ticks;
  }

  gte(other: TimeSpan): boolean {
    return this.ticks >= other.ticks;
  }

  isZero(): boolean {
    return this.ticks === 0n;
  }

  isNegative(): boolean {
    return this.ticks < 0n;
  }

  isPositive(): boolean {
    return this.ticks > 0n;
  }

  // Readers truncate toward zero.
  asNanos(): bigint {
    return this.ticks;
  }

  asMicros(): bigint {
    return this.ticks / NANOS_PER_MICRO;
  }

  asMillis(): bigint {
    return this.ticks / NANOS_PER_MILLI;
  }

  asSeconds(): bigint {
    return this.ticks / NANOS_PER_SECOND;
  }

  asMinutes(): bigint {
    return this.ticks / NANOS_PER_MINUTE;
  }

  asHours(): bigint {
    return this.ticks / NANOS_PER_HOUR;
  }

  asDays(): bigint {
    return this.ticks / NANOS_PER_DAY;
  }

  asWeeks(): bigint {
    return this.ticks / NANOS_PER_WEEK;
  }

  /** Lossy, for display and rendering only. */
  asSecondsFloat(): number {
    return Number(this.ticks / NANOS_PER_SECOND) + Number(this.ticks % NANOS_PER_SECOND) / 1e9;
  }

  /**
   * Compact human-readable form such as `"16ms"` or `"1:02:11"`
   */
  toString(): string {
    return formatSpan(this);
  }

  toJSON(): string {
    return `${this.ticks}ns`;
  }

  private static fromTicks(ticks: bigint, operation: string): TimeSpan {
    if (!isI64(ticks)) {
      throw new ArithmeticOverflowError(operation);
    }
    return new TimeSpan(ticks);
  }

  private static inUnit(value: Integer, nanosPerUnit: bigint, operation: string): TimeSpan {
    return TimeSpan.fromTicks(scalar(value, operation) * nanosPerUnit, operation);
  }

  private static orUndefined(ticks: bigint): TimeSpan | undefined {
    return isI64(ticks) ? new TimeSpan(ticks) : undefined;
  }
}

function floorSpans(ticks: bigint, divisor: bigint): bigint {
  return divisor < 0n ? floorDiv(-ticks, -divisor) : floorDiv(ticks, divisor);
}

function nonZero(divisor: bigint, operation: string): bigint {
  if (divisor === 0n) {
    throw new InvalidArgumentError(`${operation}: division by zero`);
  }
  return divisor;
}
