import { describe, it, expect } from "vitest";
import { Frequency, TimeSpan } from "@chronal/span";
import { createClock, createClockRate, createControlledClockSource, FixedTimer } from "../src/index.js";

describe("Acceptance Gate Tests", () => {
  describe("Determinism", () => {
    it("should step a minute of 60Hz frames with no drift", () => {
      const frames = createControlledClockSource({ frequency: Frequency.hz(60) });
      const clock = createClock({ source: frames });
      const timer = FixedTimer.fromFrequency(Frequency.hz(60));

      let total = 0;
      timer.advance(clock.step());
      for (let frame = 0; frame < 3_600; frame++) {
        frames.advanceBy(1);
        const batch = timer.advance(clock.step());
        expect(batch.dropped).toBe(0n);
        total += batch.count;
      }

      expect(total).toBe(3_600);
      expect(timer.accumulator().equals(TimeSpan.ZERO)).toBe(true);
      expect(clock.now().sinceEpoch.equals(TimeSpan.MINUTE)).toBe(true);
    });

    it("should replay the same readings into the same steps", () => {
      const readings = [0n, 16_000_000n, 33_500_000n, 34_000_000n, 120_000_000n, 121_000_001n, 500_000_000n];

      const run = (): Array<[number, bigint, bigint]> => {
        const source = createControlledClockSource();
        const clock = createClock({ source });
        const timer = FixedTimer.fromFrequency(Frequency.hz(60), { maxStepsPerUpdate: 8 });

        return readings.map((raw) => {
          source.set(raw);
          const batch = timer.advance(clock.step());
          return [batch.count, batch.dropped, timer.accumulator().asNanos()];
        });
      };

      const first = run();
      expect(first).toEqual(run());
      expect(first.reduce((sum, [count, dropped]) => sum + count + Number(dropped), 0)).toBe(30);
    });
  });

  describe("Stalls", () => {
    it("should bound catch-up work after a long pause", () => {
      const source = createControlledClockSource();
      const clock = createClock({ source });
      const timer = FixedTimer.fromFrequency(Frequency.hz(60));
      clock.step();

      source.advanceBy(2_000_000_000n);
      const batch = timer.advance(clock.step());

      expect(batch.count).toBe(5);
      expect(batch.dropped).toBe(115n);
      expect(timer.accumulator().equals(TimeSpan.ZERO)).toBe(true);
    });
  });

  describe("Scaled time", () => {
    it("should run half as many steps at half speed", () => {
      const source = createControlledClockSource();
      const clock = createClock({ source });
      const rate = createClockRate();
      const timer = FixedTimer.fromFrequency(Frequency.hz(60), { maxStepsPerUpdate: 100 });
      rate.setRate(1, 2);
      clock.step();

      source.advanceBy(1_000_000_000n);
      const scaled = rate.step(clock.step());
      const batch = timer.advance(scaled.step);

      expect(scaled.now.sinceEpoch.equals(TimeSpan.millis(500))).toBe(true);
      expect(batch.count).toBe(30);
    });
  });
});
