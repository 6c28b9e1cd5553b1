import { hrtime } from "node:process";
import { REFERENCE_FREQUENCY, TimeSpan, TimeStamp } from "@chronal/span";
import type { Frequency } from "@chronal/span";
import type { ClockSource, RawInstant } from "./types.js";

/**
 * Node's high-resolution monotonic counter, in nanoseconds
 */
export class SystemClockSource implements ClockSource {
  read(): RawInstant {
    return hrtime.bigint();
  }

  frequency(): Frequency {
    return REFERENCE_FREQUENCY;
  }
}

export function createSystemClockSource(): SystemClockSource {
  return new SystemClockSource();
}

// Process-wide reference, fixed by the first call that needs it
let reference: RawInstant | undefined;

function referenceAndNow(): [RawInstant, RawInstant] {
  const now = hrtime.bigint();
  if (reference === undefined) {
    reference = now;
  }
  return [reference, now];
}

/**
 * The system counter reading every {@link systemNow} is measured from
 */
export function systemReference(): RawInstant {
  return referenceAndNow()[0];
}

/**
 * Time since the process-wide reference. The first call in the process sets
 * the reference and returns zero.
 */
export function systemElapsed(): TimeSpan {
  const [origin, now] = referenceAndNow();
  return TimeSpan.nanos(now - origin);
}

/**
 * Current system time as a stamp on the process-wide timeline
 */
export function systemNow(): TimeStamp {
  return TimeStamp.nowFrom(systemElapsed());
}
