export type {
  BackwardsPolicy,
  ClockEvent,
  ClockOptions,
  ClockRateOptions,
  ClockSource,
  ClockStep,
  EmitFn,
  FixedStep,
  FixedTimerOptions,
  RawInstant,
  RetimeOptions,
  StartPolicy,
  StepBatch,
} from "./types.js";
export { NonMonotonicSourceError } from "./types.js";
export { Clock, createClock } from "./clock.js";
export { FixedTimer, createFixedTimer } from "./fixed-timer.js";
export { ClockRate, createClockRate } from "./clock-rate.js";
export { SystemClockSource, createSystemClockSource, systemElapsed, systemNow, systemReference } from "./system-clock.js";
export type { ControlledClockSource } from "./controlled-clock.js";
export { createControlledClockSource } from "./controlled-clock.js";
