import { ArithmeticOverflowError, I64_MAX, I64_MIN, InvalidArgumentError, TimeSpan, TimeStamp } from "@chronal/span";
import type { Frequency } from "@chronal/span";
import { NonMonotonicSourceError } from "./types.js";
import type {
  BackwardsPolicy,
  ClockOptions,
  ClockSource,
  ClockStep,
  EmitFn,
  RawInstant,
  StartPolicy,
} from "./types.js";

const START_POLICIES: ReadonlyArray<StartPolicy> = ["auto", "explicit"];
const BACKWARDS_POLICIES: ReadonlyArray<BackwardsPolicy> = ["reject", "clamp"];

function checkPolicy<T extends string>(value: T, allowed: ReadonlyArray<T>, what: string): T {
  if (!allowed.includes(value)) {
    throw new InvalidArgumentError(`Unknown ${what}: ${String(value)}`);
  }
  return value;
}

interface Origin {
  raw: RawInstant;
  frequency: Frequency;
}

/**
 * Turns raw readings of a monotonic source into a sequence of stamps and deltas.
 *
 * Every reading is converted from the origin in one step, so rounding in the
 * frequency conversion never accumulates across calls.
 */
export class Clock {
  private readonly source: ClockSource;
  private readonly startPolicy: StartPolicy;
  private readonly backwardsPolicy: BackwardsPolicy;
  private readonly emit: EmitFn | undefined;

  private origin: Origin | undefined;
  private lastRaw: RawInstant = 0n;
  private lastStamp: TimeStamp = TimeStamp.EPOCH;

  constructor(options: ClockOptions) {
    this.source = options.source;
    this.startPolicy = checkPolicy(options.startPolicy ?? "auto", START_POLICIES, "start policy");
    this.backwardsPolicy = checkPolicy(options.backwardsPolicy ?? "reject", BACKWARDS_POLICIES, "backwards policy");
    this.emit = options.emit;
  }

  /**
   * Sample the origin. Restarting an already started clock moves the origin
   * to the current reading and rewinds `now()` to the epoch.
   */
  start(): TimeStamp {
    const raw = this.source.read();
    this.origin = { raw, frequency: this.source.frequency() };
    this.lastRaw = raw;
    this.lastStamp = TimeStamp.EPOCH;

    this.emit?.({ type: "clock:start", raw, at: this.lastStamp });
    return this.lastStamp;
  }

  /**
   * Read the source once and advance `now` to the reading
   */
  tick(): ClockStep {
    const origin = this.origin;
    if (!origin) {
      if (this.startPolicy === "explicit") {
        throw new InvalidArgumentError("Clock stepped before start()");
      }
      return { now: this.start(), step: TimeSpan.ZERO };
    }

    const raw = this.source.read();
    if (raw < this.lastRaw) {
      this.emit?.({
        type: "clock:backwards",
        policy: this.backwardsPolicy,
        lastRaw: this.lastRaw,
        raw,
        at: this.lastStamp,
      });
      if (this.backwardsPolicy === "reject") {
        throw new NonMonotonicSourceError(this.lastRaw, raw);
      }
      return { now: this.lastStamp, step: TimeSpan.ZERO };
    }

    const now = this.stampFrom(origin, raw);
    const delta = now.sub(this.lastStamp);
    this.lastRaw = raw;
    this.lastStamp = now;

    this.emit?.({ type: "clock:step", raw, delta, at: now });
    return { now, step: delta };
  }

  step(): TimeSpan {
    return this.tick().step;
  }

  /** Stamp of the last reading; the epoch before the first. */
  now(): TimeStamp {
    return this.lastStamp;
  }

  isStarted(): boolean {
    return this.origin !== undefined;
  }

  /**
   * Stamp a raw reading against this clock's origin without stepping
   */
  stampOf(raw: RawInstant): TimeStamp {
    if (!this.origin) {
      throw new InvalidArgumentError("Clock has no origin; call start() first");
    }
    return this.stampFrom(this.origin, raw);
  }

  /**
   * Forget the origin. The next step or start() samples a fresh one.
   */
  reset(): void {
    const at = this.lastStamp;
    this.origin = undefined;
    this.lastRaw = 0n;
    this.lastStamp = TimeStamp.EPOCH;
    this.emit?.({ type: "clock:reset", at });
  }

  private stampFrom(origin: Origin, raw: RawInstant): TimeStamp {
    const gap = raw - origin.raw;
    if (gap > I64_MAX || gap < I64_MIN) {
      throw new ArithmeticOverflowError("Clock.stamp");
    }
    return TimeStamp.nowFrom(TimeSpan.fromFrequency(gap, origin.frequency));
  }
}

/**
 * Create a clock over the given source
 */
export function createClock(options: ClockOptions): Clock {
  return new Clock(options);
}
