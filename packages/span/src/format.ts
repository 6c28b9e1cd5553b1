import { TimeSpan } from "./time-span.js";
import {
  NANOS_PER_DAY,
  NANOS_PER_HOUR,
  NANOS_PER_MICRO,
  NANOS_PER_MILLI,
  NANOS_PER_MINUTE,
  NANOS_PER_SECOND,
  abs,
} from "./rational.js";
import { ParseError } from "./types.js";

const MAX_SPAN_TEXT = 48;

const UNIT_PATTERN = /^(\d+)(?:\.(\d+))?\s*(ns|us|ms|s)$/;
const SECONDS_PATTERN = /^(\d+)(?:\.(\d+))?$/;
const CLOCK_PATTERN = /^(?:(\d+)\s*[dDtT]\s*)?(\d+):(\d+)(?::(\d+))?(?:\.(\d+))?$/;

const UNIT_NANOS: Record<string, bigint> = {
  ns: 1n,
  us: NANOS_PER_MICRO,
  ms: NANOS_PER_MILLI,
  s: NANOS_PER_SECOND,
};

function pad(value: bigint, width: number): string {
  return value.toString().padStart(width, "0");
}

/**
 * Compact human-readable form: "0", "750ns", "1.500us", "16ms", "1.250s",
 * "2:11.011", "1:02:11", "1d00:00". Sub-unit digits are truncated.
 */
export function formatSpan(span: TimeSpan): string {
  if (span.isZero()) return "0";

  const sign = span.isNegative() ? "-" : "";
  let rest = abs(span.ticks);

  if (rest >= NANOS_PER_DAY) {
    const days = rest / NANOS_PER_DAY;
    rest %= NANOS_PER_DAY;
    const { hours, minutes, seconds, millis } = clockFields(rest);
    const head = `${sign}${days}d${pad(hours, 2)}:${pad(minutes, 2)}`;
    if (millis > 0n) return `${head}:${pad(seconds, 2)}.${pad(millis, 3)}`;
    if (seconds > 0n) return `${head}:${pad(seconds, 2)}`;
    return head;
  }

  if (rest >= NANOS_PER_HOUR) {
    const { hours, minutes, seconds, millis } = clockFields(rest);
    return `${sign}${hours}:${pad(minutes, 2)}:${pad(seconds, 2)}${fraction(millis)}`;
  }

  if (rest >= NANOS_PER_MINUTE) {
    const { minutes, seconds, millis } = clockFields(rest);
    return `${sign}${minutes}:${pad(seconds, 2)}${fraction(millis)}`;
  }

  if (rest >= NANOS_PER_SECOND) {
    return `${sign}${rest / NANOS_PER_SECOND}${fraction((rest % NANOS_PER_SECOND) / NANOS_PER_MILLI)}s`;
  }

  if (rest >= NANOS_PER_MILLI) {
    return `${sign}${rest / NANOS_PER_MILLI}${fraction((rest % NANOS_PER_MILLI) / NANOS_PER_MICRO)}ms`;
  }

  if (rest >= NANOS_PER_MICRO) {
    return `${sign}${rest / NANOS_PER_MICRO}${fraction(rest % NANOS_PER_MICRO)}us`;
  }

  return `${sign}${rest}ns`;
}

/**
 * Fixed-width form with full nanosecond precision: "0d00:00:01.500000000".
 */
export function formatSpanFull(span: TimeSpan): string {
  const sign = span.isNegative() ? "-" : "";
  let rest = abs(span.ticks);
  const days = rest / NANOS_PER_DAY;
  rest %= NANOS_PER_DAY;
  const hours = rest / NANOS_PER_HOUR;
  rest %= NANOS_PER_HOUR;
  const minutes = rest / NANOS_PER_MINUTE;
  rest %= NANOS_PER_MINUTE;
  const seconds = rest / NANOS_PER_SECOND;
  const nanos = rest % NANOS_PER_SECOND;

  return `${sign}${days}d${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(nanos, 9)}`;
}

/**
 * Parses the forms produced by {@link formatSpan} plus a few conveniences:
 * "<n>[.<f>]ns|us|ms|s", bare seconds "1.5", "m:ss", "h:mm:ss" and
 * "<d>d<hh>:<mm>[:<ss>]", each with an optional fraction and leading "-".
 * Digits beyond nanosecond precision are truncated.
 */
export function parseSpan(text: string): TimeSpan {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new ParseError("empty", text, "Time span text is empty");
  }
  if (trimmed.length > MAX_SPAN_TEXT) {
    throw new ParseError("too-long", text, `Time span text may not exceed ${MAX_SPAN_TEXT} characters`);
  }

  const negative = trimmed.startsWith("-");
  const body = negative ? trimmed.slice(1).trimStart() : trimmed;
  const nanos = parseMagnitude(body, text);

  return TimeSpan.of(negative ? -nanos : nanos);
}

function parseMagnitude(body: string, input: string): bigint {
  const unit = UNIT_PATTERN.exec(body);
  if (unit) {
    const [, whole = "0", frac, suffix = "s"] = unit;
    const scale = UNIT_NANOS[suffix] ?? NANOS_PER_SECOND;
    if (frac !== undefined && scale === 1n) {
      throw new ParseError("syntax", input, "Nanoseconds cannot have a fractional part");
    }
    return BigInt(whole) * scale + fractionNanos(frac, scale);
  }

  const seconds = SECONDS_PATTERN.exec(body);
  if (seconds) {
    const [, whole = "0", frac] = seconds;
    return BigInt(whole) * NANOS_PER_SECOND + fractionNanos(frac, NANOS_PER_SECOND);
  }

  const clock = CLOCK_PATTERN.exec(body);
  if (clock) {
    const [, days, first = "0", second = "0", third, frac] = clock;

    let d = 0n;
    let h = 0n;
    let m: bigint;
    let s = 0n;

    if (days !== undefined) {
      if (third === undefined && frac !== undefined) {
        throw new ParseError("syntax", input, "A fraction needs a seconds field when days are given");
      }
      d = BigInt(days);
      h = BigInt(first);
      m = BigInt(second);
      s = third === undefined ? 0n : BigInt(third);
      if (h > 23n) {
        throw new ParseError("field-range", input, `Hours must be in 0-23 when days are given, got ${h}`);
      }
      if (m > 59n) {
        throw new ParseError("field-range", input, `Minutes must be in 0-59 when hours are given, got ${m}`);
      }
    } else if (third !== undefined) {
      h = BigInt(first);
      m = BigInt(second);
      s = BigInt(third);
      if (m > 59n) {
        throw new ParseError("field-range", input, `Minutes must be in 0-59 when hours are given, got ${m}`);
      }
    } else {
      m = BigInt(first);
      s = BigInt(second);
    }

    if (s > 59n) {
      throw new ParseError("field-range", input, `Seconds must be in 0-59 when minutes are given, got ${s}`);
    }

    return (
      d * NANOS_PER_DAY +
      h * NANOS_PER_HOUR +
      m * NANOS_PER_MINUTE +
      s * NANOS_PER_SECOND +
      fractionNanos(frac, NANOS_PER_SECOND)
    );
  }

  throw new ParseError("syntax", input, `Unrecognized time span "${input}"`);
}

function fractionNanos(digits: string | undefined, unitNanos: bigint): bigint {
  if (digits === undefined) return 0n;
  return (BigInt(digits) * unitNanos) / 10n ** BigInt(digits.length);
}

function fraction(value: bigint): string {
  return value > 0n ? `.${pad(value, 3)}` : "";
}

function clockFields(rest: bigint): { hours: bigint; minutes: bigint; seconds: bigint; millis: bigint } {
  return {
    hours: rest / NANOS_PER_HOUR,
    minutes: (rest % NANOS_PER_HOUR) / NANOS_PER_MINUTE,
    seconds: (rest % NANOS_PER_MINUTE) / NANOS_PER_SECOND,
    millis: (rest % NANOS_PER_SECOND) / NANOS_PER_MILLI,
  };
}
