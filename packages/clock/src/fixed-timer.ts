import { ceilDiv, I64_MAX, InvalidArgumentError, reduce, TimeSpan, toInteger } from "@chronal/span";
import type { Frequency, Integer, Ratio } from "@chronal/span";
import type { EmitFn, FixedStep, FixedTimerOptions, RetimeOptions, StepBatch } from "./types.js";

const NANOS_PER_SECOND = 1_000_000_000n;
const DEFAULT_MAX_STEPS = 5;

function stepTerms(step: TimeSpan | Ratio): Ratio {
  if (step instanceof TimeSpan) {
    if (!step.isPositive()) {
      throw new InvalidArgumentError(`Fixed step must be positive, got ${step.toString()}`);
    }
    return { numerator: step.ticks, denominator: 1n };
  }

  if (step.denominator <= 0n || step.numerator <= 0n) {
    throw new InvalidArgumentError(`Fixed step must be a positive ratio, got ${step.numerator}/${step.denominator}`);
  }
  const terms = reduce(step.numerator, step.denominator);
  if (terms.numerator < terms.denominator) {
    throw new InvalidArgumentError(`Fixed step must be at least 1ns, got ${terms.numerator}/${terms.denominator}ns`);
  }
  if (terms.numerator / terms.denominator > I64_MAX) {
    throw new InvalidArgumentError(`Fixed step does not fit a span: ${terms.numerator}/${terms.denominator}ns`);
  }
  return terms;
}

/**
 * One period of `frequency` in nanoseconds, as an exact ratio
 */
function periodTerms(frequency: Frequency): Ratio {
  const rate = frequency.asRatio();
  return reduce(NANOS_PER_SECOND * rate.denominator, rate.numerator);
}

function stepCap(value: number | undefined): number {
  const cap = value ?? DEFAULT_MAX_STEPS;
  if (!Number.isSafeInteger(cap) || cap <= 0) {
    throw new InvalidArgumentError(`maxStepsPerUpdate must be a positive integer, got ${cap}`);
  }
  return cap;
}

function delaySteps(value: Integer | undefined): bigint {
  const delay = toInteger(value ?? 0n);
  if (delay === undefined || delay < 0n) {
    throw new InvalidArgumentError(`delay must be a non-negative whole number of steps, got ${value}`);
  }
  return delay;
}

function saturate(nanos: bigint): TimeSpan {
  return TimeSpan.nanos(nanos > I64_MAX ? I64_MAX : nanos);
}

/**
 * Fixed-timestep accumulator.
 *
 * Irregular deltas go in, a deterministic run of equal steps comes out. The
 * step may be an exact fraction of a nanosecond count (e.g. 1/60s), in which
 * case individual step spans alternate so that their running sum never drifts.
 *
 * At most `maxStepsPerUpdate` steps leave a single `advance`; further whole
 * steps are discarded and only the sub-step remainder is carried.
 *
 * Simulated time (`FixedStep.at`) saturates at TimeSpan.MAX, so `advance`
 * never fails on a non-negative delta.
 */
export class FixedTimer {
  // The step is exactly stepNanos / scale nanoseconds. The accumulator is
  // kept in the same 1/scale ns units and is below stepNanos after every
  // advance; it is negative only while a start delay is pending.
  private stepNanos: bigint;
  private scale: bigint;
  private readonly cap: number;
  private readonly emit: EmitFn | undefined;

  private acc: bigint;
  private total = 0n;
  private fed = 0n;

  // `at` of step `baseIndex`, in whole ns; moves when the step changes
  private baseAt = 0n;
  private baseIndex = 0n;

  constructor(options: FixedTimerOptions) {
    const terms = stepTerms(options.step);
    this.stepNanos = terms.numerator;
    this.scale = terms.denominator;
    this.cap = stepCap(options.maxStepsPerUpdate);
    this.acc = -delaySteps(options.delay) * this.stepNanos;
    this.emit = options.emit;
  }

  /**
   * Timer whose step is exactly one period of `frequency`
   */
  static fromFrequency(frequency: Frequency, options?: Omit<FixedTimerOptions, "step">): FixedTimer {
    return new FixedTimer({ ...options, step: periodTerms(frequency) });
  }

  get maxStepsPerUpdate(): number {
    return this.cap;
  }

  /**
   * Feed elapsed time and collect the steps it completes
   */
  advance(delta: TimeSpan): StepBatch {
    if (delta.isNegative()) {
      throw new InvalidArgumentError(`Fixed timer cannot advance by a negative span: ${delta.toString()}`);
    }

    const pending = this.acc + delta.ticks * this.scale;
    const whole = pending < 0n ? 0n : pending / this.stepNanos;

    const cap = BigInt(this.cap);
    const emitted = whole < cap ? whole : cap;
    const dropped = whole - emitted;

    const steps: FixedStep[] = [];
    let total = this.total;
    let previous = this.offsetOf(total);
    for (let i = 0n; i < emitted; i++) {
      total += 1n;
      const at = this.offsetOf(total);
      steps.push({ index: total, span: at.sub(previous), at });
      previous = at;
    }

    this.acc = pending - whole * this.stepNanos;
    this.total = total;
    this.fed += delta.ticks;

    this.emit?.({
      type: "timer:advance",
      delta,
      steps: steps.length,
      dropped,
      accumulator: this.accumulator(),
      total: this.total,
    });
    if (dropped > 0n) {
      this.emit?.({ type: "timer:drop", dropped, cap: this.cap });
    }

    return { steps, count: steps.length, dropped };
  }

  /**
   * Change the step of a running timer. The next step still lands where it
   * would have; with `clip` it lands no later than one new step from now.
   */
  setStep(step: TimeSpan | Ratio, options?: RetimeOptions): void {
    const terms = stepTerms(step);
    const clip = options?.clip ?? false;
    const from = this.stepRatio();

    const remaining = ceilDiv((this.stepNanos - this.acc) * terms.denominator, this.scale);
    let acc = terms.numerator - remaining;
    if (clip && acc < 0n) {
      acc = 0n;
    }

    this.baseAt = this.offsetOf(this.total).ticks;
    this.baseIndex = this.total;
    this.stepNanos = terms.numerator;
    this.scale = terms.denominator;
    this.acc = acc;

    this.emit?.({ type: "timer:retime", from, to: this.stepRatio(), clip });
  }

  /**
   * Step at exactly one period of `frequency`; see {@link setStep}
   */
  setFrequency(frequency: Frequency, options?: RetimeOptions): void {
    this.setStep(periodTerms(frequency), options);
  }

  /**
   * Unconsumed time, rounded down to whole nanoseconds. Zero while a start
   * delay is pending.
   */
  accumulator(): TimeSpan {
    return this.acc < 0n ? TimeSpan.ZERO : TimeSpan.nanos(this.acc / this.scale);
  }

  /**
   * Interpolation weight in [0, 1): the unconsumed fraction of one step
   */
  alpha(): Ratio {
    return this.acc < 0n ? { numerator: 0n, denominator: 1n } : reduce(this.acc, this.stepNanos);
  }

  /**
   * Time still to feed before the next step completes, rounded up
   */
  untilNext(): TimeSpan {
    return saturate(ceilDiv(this.stepNanos - this.acc, this.scale));
  }

  /**
   * Total time fed since construction or reset
   */
  elapsed(): TimeSpan {
    return saturate(this.fed);
  }

  /**
   * Point in fed time, measured like {@link elapsed}, at which the next step
   * completes
   */
  nextTickAt(): TimeSpan {
    return saturate(this.fed + ceilDiv(this.stepNanos - this.acc, this.scale));
  }

  /**
   * Step length, rounded down to whole nanoseconds. Use {@link stepRatio} for
   * the exact value.
   */
  stepSize(): TimeSpan {
    return TimeSpan.nanos(this.stepNanos / this.scale);
  }

  stepRatio(): Ratio {
    return { numerator: this.stepNanos, denominator: this.scale };
  }

  totalSteps(): bigint {
    return this.total;
  }

  /**
   * Drop the remainder and restart step numbering. A start delay is not
   * re-applied.
   */
  reset(): void {
    this.acc = 0n;
    this.total = 0n;
    this.fed = 0n;
    this.baseAt = 0n;
    this.baseIndex = 0n;
  }

  // Simulated time at the end of step `k`
  private offsetOf(k: bigint): TimeSpan {
    return saturate(this.baseAt + ceilDiv((k - this.baseIndex) * this.stepNanos, this.scale));
  }
}

export function createFixedTimer(options: FixedTimerOptions): FixedTimer {
  return new FixedTimer(options);
}
