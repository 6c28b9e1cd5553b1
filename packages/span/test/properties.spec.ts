import { describe, it, expect } from "vitest";
import { Frequency, REFERENCE_FREQUENCY, TimeSpan, TimeStamp } from "../src/index.js";

describe("Value properties", () => {
  describe("conversion round trip", () => {
    const counts = [0n, 1n, 59n, 60n, 61n, 1_000_003n, -17n];

    it("should recover frame counts through nanoseconds", () => {
      const frames = Frequency.hz(60);

      for (const n of counts) {
        const nanos = Frequency.convert(n, frames, REFERENCE_FREQUENCY);
        expect(Frequency.convert(nanos, REFERENCE_FREQUENCY, frames)).toBe(n);
      }
    });

    it("should recover counts of a fractional rate", () => {
      const ntsc = Frequency.of(30_000, 1_001);

      for (const n of counts) {
        const nanos = Frequency.convert(n, ntsc, REFERENCE_FREQUENCY);
        expect(Frequency.convert(nanos, REFERENCE_FREQUENCY, ntsc)).toBe(n);
      }
    });

    it("should recover counts between two hardware rates", () => {
      const millis = Frequency.khz(1);
      const audio = Frequency.khz(48);

      for (const n of counts) {
        expect(Frequency.convert(Frequency.convert(n, millis, audio), audio, millis)).toBe(n);
      }
    });

    it("should not drift over many conversions", () => {
      const frames = Frequency.hz(60);
      let total = TimeSpan.ZERO;

      for (let frame = 1; frame <= 3_600; frame++) {
        const now = TimeSpan.fromFrequency(frame, frames);
        const previous = TimeSpan.fromFrequency(frame - 1, frames);
        total = total.add(now.sub(previous));
      }

      expect(total.equals(TimeSpan.MINUTE)).toBe(true);
    });
  });

  describe("span arithmetic", () => {
    it("should undo an addition exactly", () => {
      const pairs: Array<[TimeSpan, TimeSpan]> = [
        [TimeSpan.millis(16), TimeSpan.nanos(666_667)],
        [TimeSpan.seconds(-3), TimeSpan.HOUR],
        [TimeSpan.MAX.sub(TimeSpan.SECOND), TimeSpan.SECOND],
        [TimeSpan.MIN, TimeSpan.MAX],
      ];

      for (const [a, b] of pairs) {
        expect(a.add(b).sub(b).equals(a)).toBe(true);
      }
    });
  });

  describe("stamp differences", () => {
    it("should be antisymmetric", () => {
      const stamps = [TimeSpan.ZERO, TimeSpan.millis(16), TimeSpan.seconds(-2), TimeSpan.DAY].map((span) =>
        TimeStamp.nowFrom(span),
      );

      for (const t1 of stamps) {
        for (const t2 of stamps) {
          expect(t1.sub(t2).equals(t2.sub(t1).neg())).toBe(true);
        }
      }
    });
  });
});
