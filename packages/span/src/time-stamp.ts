import { TimeSpan } from "./time-span.js";
import { ArithmeticOverflowError } from "./types.js";

/**
 * A point on a timeline, stored as the span since that timeline's epoch.
 *
 * The epoch carries no calendar meaning. Stamps taken from different clocks
 * can be compared, but the result only means something if the caller knows
 * the two timelines share an epoch.
 */
export class TimeStamp {
  static readonly EPOCH = new TimeStamp(TimeSpan.ZERO);

  readonly sinceEpoch: TimeSpan;

  private constructor(sinceEpoch: TimeSpan) {
    this.sinceEpoch = sinceEpoch;
    Object.freeze(this);
  }

  static nowFrom(sinceEpoch: TimeSpan): TimeStamp {
    return sinceEpoch.isZero() ? TimeStamp.EPOCH : new TimeStamp(sinceEpoch);
  }

  /**
   * Exact span from `earlier` to this stamp; negative when `earlier` is later.
   */
  sub(earlier: TimeStamp): TimeSpan {
    const span = this.checkedSub(earlier);
    if (!span) throw new ArithmeticOverflowError("TimeStamp.sub");
    return span;
  }

  checkedSub(earlier: TimeStamp): TimeSpan | undefined {
    return this.sinceEpoch.checkedSub(earlier.sinceEpoch);
  }

  add(span: TimeSpan): TimeStamp {
    const stamp = this.checkedAdd(span);
    if (!stamp) throw new ArithmeticOverflowError("TimeStamp.add");
    return stamp;
  }

  checkedAdd(span: TimeSpan): TimeStamp | undefined {
    const sum = this.sinceEpoch.checkedAdd(span);
    return sum && TimeStamp.nowFrom(sum);
  }

  subSpan(span: TimeSpan): TimeStamp {
    const stamp = this.checkedSubSpan(span);
    if (!stamp) throw new ArithmeticOverflowError("TimeStamp.subSpan");
    return stamp;
  }

  checkedSubSpan(span: TimeSpan): TimeStamp | undefined {
    const diff = this.sinceEpoch.checkedSub(span);
    return diff && TimeStamp.nowFrom(diff);
  }

  compare(other: TimeStamp): -1 | 0 | 1 {
    return this.sinceEpoch.compare(other.sinceEpoch);
  }

  equals(other: TimeStamp): boolean {
    return this.sinceEpoch.equals(other.sinceEpoch);
  }

  isBefore(other: TimeStamp): boolean {
    return this.sinceEpoch.lt(other.sinceEpoch);
  }

  isAfter(other: TimeStamp): boolean {
    return this.sinceEpoch.gt(other.sinceEpoch);
  }

  toString(): string {
    return `${this.sinceEpoch.toString()} since epoch`;
  }

  toJSON(): string {
    return this.sinceEpoch.toJSON();
  }
}
