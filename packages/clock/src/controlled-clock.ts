import { InvalidArgumentError, REFERENCE_FREQUENCY, toInteger } from "@chronal/span";
import type { Frequency, Integer } from "@chronal/span";
import type { ClockSource, RawInstant } from "./types.js";

function rawValue(value: Integer, what: string): bigint {
  const raw = toInteger(value);
  if (raw === undefined) {
    throw new InvalidArgumentError(`${what} must be an integer, got ${value}`);
  }
  return raw;
}

/**
 * Controlled clock source for deterministic testing
 */
class ControlledClockSource implements ClockSource {
  private raw: RawInstant;
  private readonly freq: Frequency;
  private reads = 0;

  constructor(options?: { initialRaw?: Integer; frequency?: Frequency }) {
    // Default to 0 for deterministic tests
    this.raw = rawValue(options?.initialRaw ?? 0n, "initialRaw");
    this.freq = options?.frequency ?? REFERENCE_FREQUENCY;
  }

  read(): RawInstant {
    this.reads++;
    return this.raw;
  }

  frequency(): Frequency {
    return this.freq;
  }

  /**
   * Advance the counter by a number of raw ticks
   */
  advanceBy(ticks: Integer): void {
    const delta = rawValue(ticks, "ticks");
    if (delta < 0n) {
      throw new InvalidArgumentError(`Cannot advance by a negative tick count: ${delta}`);
    }
    this.raw += delta;
  }

  /**
   * Move the counter to a specific raw value. Moving backwards simulates a
   * misbehaving counter and must be requested explicitly.
   */
  set(raw: Integer, options?: { allowBackwards?: boolean }): void {
    const next = rawValue(raw, "raw");
    if (next < this.raw && !options?.allowBackwards) {
      throw new InvalidArgumentError(`Cannot move counter back from ${this.raw} to ${next}`);
    }
    this.raw = next;
  }

  current(): RawInstant {
    return this.raw;
  }

  /**
   * Number of times read() has been called
   */
  getReadCount(): number {
    return this.reads;
  }
}

export type { ControlledClockSource };

/**
 * Create a new controlled clock source instance
 */
export function createControlledClockSource(options?: {
  initialRaw?: Integer;
  frequency?: Frequency;
}): ControlledClockSource {
  return new ControlledClockSource(options);
}
