import { InvalidArgumentError, reduce, TimeSpan, TimeStamp, toInteger } from "@chronal/span";
import type { Frequency, Integer, Ratio } from "@chronal/span";
import { FixedTimer } from "./fixed-timer.js";
import type { ClockRateOptions, ClockStep, EmitFn, FixedTimerOptions } from "./types.js";

/**
 * Scaled timeline for slow motion, fast forward and pause.
 *
 * Real deltas are multiplied by an exact rate; the sub-nanosecond part of each
 * scaled delta is carried into the next step.
 */
export class ClockRate {
  private readonly emit: EmitFn | undefined;
  private current: TimeStamp;
  private numerator = 1n;
  private denominator = 1n;
  private carry = 0n;

  constructor(options?: ClockRateOptions) {
    this.current = options?.now ?? TimeStamp.EPOCH;
    this.emit = options?.emit;
  }

  /**
   * Scaled time runs at `numerator / denominator` of real time. Any carried
   * remainder is dropped.
   */
  setRate(numerator: Integer, denominator: Integer = 1n): void {
    const n = toInteger(numerator);
    const d = toInteger(denominator);
    if (n === undefined || d === undefined || n < 0n || d <= 0n) {
      throw new InvalidArgumentError(`Rate must be a non-negative ratio, got ${numerator}/${denominator}`);
    }

    const from = this.rate();
    const to = reduce(n, d);
    this.numerator = to.numerator;
    this.denominator = to.denominator;
    this.carry = 0n;

    this.emit?.({ type: "rate:change", from, to, at: this.current });
  }

  /** Rate 0: steps return a zero span until the rate changes. */
  pause(): void {
    this.setRate(0n, 1n);
  }

  isPaused(): boolean {
    return this.numerator === 0n;
  }

  rate(): Ratio {
    return { numerator: this.numerator, denominator: this.denominator };
  }

  now(): TimeStamp {
    return this.current;
  }

  /**
   * Jump scaled time to `stamp`
   */
  setNow(stamp: TimeStamp): void {
    this.current = stamp;
    this.carry = 0n;
  }

  /**
   * Scale a real delta and advance `now` by the result. Nothing changes when
   * it throws.
   */
  step(real: TimeSpan): ClockStep {
    if (real.isNegative()) {
      throw new InvalidArgumentError(`Cannot scale a negative span: ${real.toString()}`);
    }

    const scaled = real.ticks * this.numerator + this.carry;
    const step = TimeSpan.nanos(scaled / this.denominator);
    const now = this.current.add(step);

    this.carry = scaled % this.denominator;
    this.current = now;
    return { now, step };
  }

  /**
   * A timer stepping at `frequency` in scaled time, fed with real deltas.
   * Its real-time rate is `frequency * rate`, so it cannot be built while
   * paused.
   */
  timer(frequency: Frequency, options?: Omit<FixedTimerOptions, "step">): FixedTimer {
    if (this.isPaused()) {
      throw new InvalidArgumentError("Cannot build a timer on a paused clock rate");
    }
    return FixedTimer.fromFrequency(frequency.scale(this.numerator, this.denominator), options);
  }

  /**
   * Back to the epoch (or `now`), keeping the current rate
   */
  reset(now: TimeStamp = TimeStamp.EPOCH): void {
    this.current = now;
    this.carry = 0n;
  }
}

export function createClockRate(options?: ClockRateOptions): ClockRate {
  return new ClockRate(options);
}
