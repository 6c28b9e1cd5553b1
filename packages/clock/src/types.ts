import type { Frequency, Integer, Ratio, TimeSpan, TimeStamp } from "@chronal/span";
import { TimeError } from "@chronal/span";

/**
 * Raw reading of a monotonic counter, in the source's own units
 */
export type RawInstant = bigint;

/**
 * Host-supplied monotonic counter
 */
export interface ClockSource {
  /** Current raw instant. Must never decrease on a well-behaved source. */
  read(): RawInstant;

  /** Raw ticks per second */
  frequency(): Frequency;
}

/**
 * Result of a clock step: the new "now" and the span since the previous step
 */
export interface ClockStep {
  readonly now: TimeStamp;
  readonly step: TimeSpan;
}

/**
 * How the first step after construction or reset is handled.
 * - `auto`: the first step samples the origin and returns a zero delta
 * - `explicit`: stepping before `start()` is an error
 */
export type StartPolicy = "auto" | "explicit";

/**
 * What to do when the source reports an instant earlier than the last one.
 * - `reject`: throw NonMonotonicSourceError, leaving the clock untouched
 * - `clamp`: report a zero delta and keep the latest reading
 */
export type BackwardsPolicy = "reject" | "clamp";

export interface ClockOptions {
  source: ClockSource;
  startPolicy?: StartPolicy;
  backwardsPolicy?: BackwardsPolicy;
  emit?: EmitFn;
}

/**
 * One fixed simulation step
 */
export interface FixedStep {
  /** 1-based position over the timer's lifetime */
  readonly index: bigint;
  /** Length of this step; spans of a rational step differ by at most 1ns until `at` saturates */
  readonly span: TimeSpan;
  /** Simulated time at the end of this step */
  readonly at: TimeSpan;
}

export interface StepBatch {
  readonly steps: ReadonlyArray<FixedStep>;
  readonly count: number;
  /** Whole steps discarded by the per-update cap */
  readonly dropped: bigint;
}

export interface FixedTimerOptions {
  /** Step length, either a span or an exact rational number of nanoseconds */
  step: TimeSpan | Ratio;
  /** Upper bound on steps emitted by one `advance` (default 5) */
  maxStepsPerUpdate?: number;
  /** Whole steps to wait before the first one completes (default 0) */
  delay?: Integer;
  emit?: EmitFn;
}

export interface RetimeOptions {
  /** Bring the next step within one new step of now (default false) */
  clip?: boolean;
}

export interface ClockRateOptions {
  now?: TimeStamp;
  emit?: EmitFn;
}

// Events - discriminated union for type safety
export type ClockEvent =
  | {
      type: "clock:start";
      raw: RawInstant;
      at: TimeStamp;
    }
  | {
      type: "clock:step";
      raw: RawInstant;
      delta: TimeSpan;
      at: TimeStamp;
    }
  | {
      type: "clock:backwards";
      policy: BackwardsPolicy;
      lastRaw: RawInstant;
      raw: RawInstant;
      at: TimeStamp;
    }
  | {
      type: "clock:reset";
      at: TimeStamp;
    }
  | {
      type: "timer:advance";
      delta: TimeSpan;
      steps: number;
      dropped: bigint;
      accumulator: TimeSpan;
      total: bigint;
    }
  | {
      type: "timer:drop";
      dropped: bigint;
      cap: number;
    }
  | {
      type: "timer:retime";
      from: Ratio;
      to: Ratio;
      clip: boolean;
    }
  | {
      type: "rate:change";
      from: Ratio;
      to: Ratio;
      at: TimeStamp;
    };

export type EmitFn = (event: ClockEvent) => void;

// Errors
export class NonMonotonicSourceError extends TimeError {
  readonly lastRaw: RawInstant;
  readonly raw: RawInstant;

  constructor(lastRaw: RawInstant, raw: RawInstant) {
    super("NON_MONOTONIC_SOURCE", `Clock source went backwards: ${raw} after ${lastRaw}`);
    this.name = "NonMonotonicSourceError";
    this.lastRaw = lastRaw;
    this.raw = raw;
  }
}
