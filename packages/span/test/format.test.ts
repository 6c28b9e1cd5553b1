import { describe, it, expect } from "vitest";
import { formatSpan, formatSpanFull, parseSpan } from "../src/format.js";
import { TimeSpan } from "../src/time-span.js";
import { ArithmeticOverflowError, ParseError } from "../src/types.js";

const hms = (h: number, m: number, s: number): TimeSpan =>
  TimeSpan.hours(h).add(TimeSpan.minutes(m)).add(TimeSpan.seconds(s));

function parseFailure(text: string): unknown {
  try {
    parseSpan(text);
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("formatSpan()", () => {
  it("should pick the largest fitting unit", () => {
    expect(formatSpan(TimeSpan.ZERO)).toBe("0");
    expect(formatSpan(TimeSpan.nanos(750))).toBe("750ns");
    expect(formatSpan(TimeSpan.micros(1))).toBe("1us");
    expect(formatSpan(TimeSpan.millis(16))).toBe("16ms");
    expect(formatSpan(TimeSpan.SECOND)).toBe("1s");
    expect(formatSpan(TimeSpan.MINUTE)).toBe("1:00");
    expect(formatSpan(TimeSpan.HOUR)).toBe("1:00:00");
    expect(formatSpan(TimeSpan.DAY)).toBe("1d00:00");
  });

  it("should show three truncated sub-unit digits", () => {
    expect(formatSpan(TimeSpan.nanos(1_500))).toBe("1.500us");
    expect(formatSpan(TimeSpan.micros(16_500))).toBe("16.500ms");
    expect(formatSpan(TimeSpan.nanos(16_666_667))).toBe("16.666ms");
    expect(formatSpan(TimeSpan.millis(1_250))).toBe("1.250s");
  });

  it("should use clock notation above a minute", () => {
    expect(formatSpan(hms(1, 2, 11))).toBe("1:02:11");
    expect(formatSpan(hms(0, 2, 11).add(TimeSpan.millis(11)))).toBe("2:11.011");
    expect(formatSpan(TimeSpan.DAY.add(TimeSpan.seconds(5)))).toBe("1d00:00:05");
    expect(formatSpan(TimeSpan.DAY.add(TimeSpan.millis(5)))).toBe("1d00:00:00.005");
  });

  it("should prefix negative spans", () => {
    expect(formatSpan(TimeSpan.millis(-16))).toBe("-16ms");
    expect(formatSpan(hms(-1, 0, 0))).toBe("-1:00:00");
  });
});

describe("formatSpanFull()", () => {
  it("should print every field at nanosecond precision", () => {
    expect(formatSpanFull(TimeSpan.millis(1_500))).toBe("0d00:00:01.500000000");
    expect(formatSpanFull(TimeSpan.DAY.add(TimeSpan.HOUR))).toBe("1d01:00:00.000000000");
    expect(formatSpanFull(TimeSpan.seconds(-90))).toBe("-0d00:01:30.000000000");
  });
});

describe("parseSpan()", () => {
  it("should read the compact forms", () => {
    expect(parseSpan("1d00:00").equals(TimeSpan.DAY)).toBe(true);
    expect(parseSpan("1:00:00").equals(TimeSpan.HOUR)).toBe(true);
    expect(parseSpan("1:00").equals(TimeSpan.MINUTE)).toBe(true);
    expect(parseSpan("1s").equals(TimeSpan.SECOND)).toBe(true);
    expect(parseSpan("1:02:11").equals(hms(1, 2, 11))).toBe(true);
    expect(parseSpan("2:11.011").equals(hms(0, 2, 11).add(TimeSpan.millis(11)))).toBe(true);
  });

  it("should read unit suffixes with optional fractions", () => {
    expect(parseSpan("16ms").equals(TimeSpan.millis(16))).toBe(true);
    expect(parseSpan("250us").equals(TimeSpan.micros(250))).toBe(true);
    expect(parseSpan("1.5us").equals(TimeSpan.nanos(1_500))).toBe(true);
    expect(parseSpan("1.5s").equals(TimeSpan.millis(1_500))).toBe(true);
    expect(parseSpan(" 42 ns ").equals(TimeSpan.nanos(42))).toBe(true);
  });

  it("should read bare seconds", () => {
    expect(parseSpan("1.5").equals(TimeSpan.millis(1_500))).toBe(true);
    expect(parseSpan("3").equals(TimeSpan.seconds(3))).toBe(true);
  });

  it("should read days with seconds and a fraction", () => {
    const expected = TimeSpan.DAY.add(TimeSpan.seconds(5)).add(TimeSpan.millis(500));

    expect(parseSpan("1d00:00:05.5").equals(expected)).toBe(true);
  });

  it("should truncate digits below a nanosecond", () => {
    expect(parseSpan("0.0000000019").equals(TimeSpan.NANOSECOND)).toBe(true);
  });

  it("should read a leading minus", () => {
    expect(parseSpan("-16ms").equals(TimeSpan.millis(-16))).toBe(true);
    expect(parseSpan("-1:00").equals(TimeSpan.minutes(-1))).toBe(true);
  });

  it("should read back what it formats", () => {
    const spans = [TimeSpan.millis(16), TimeSpan.seconds(75), hms(3, 4, 5), TimeSpan.DAY.add(TimeSpan.millis(5))];

    for (const span of spans) {
      expect(parseSpan(formatSpan(span)).equals(span)).toBe(true);
    }
  });

  it("should classify malformed input", () => {
    expect(parseFailure("")).toHaveProperty("reason", "empty");
    expect(parseFailure("1".repeat(49))).toHaveProperty("reason", "too-long");
    expect(parseFailure("1h")).toHaveProperty("reason", "syntax");
    expect(parseFailure("1.5ns")).toHaveProperty("reason", "syntax");
    expect(parseFailure("1d00:00.5")).toHaveProperty("reason", "syntax");
  });

  it("should check field bounds", () => {
    expect(parseFailure("1:60")).toHaveProperty("reason", "field-range");
    expect(parseFailure("1:60:00")).toHaveProperty("reason", "field-range");
    expect(parseFailure("1d24:00")).toHaveProperty("reason", "field-range");
    expect(parseFailure("1:60")).toBeInstanceOf(ParseError);
  });

  it("should fail on spans that do not fit", () => {
    expect(() => parseSpan("9999999999999d00:00")).toThrow(ArithmeticOverflowError);
  });
});
