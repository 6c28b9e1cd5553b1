export { Frequency, REFERENCE_FREQUENCY } from "./frequency.js";
export { TimeSpan } from "./time-span.js";
export { TimeStamp } from "./time-stamp.js";
export { formatSpan, formatSpanFull, parseSpan } from "./format.js";
export { ceilDiv, divRoundHalfEven, floorDiv, gcd, ratioToNumber, reduce, toInteger, I64_MAX, I64_MIN, U64_MAX } from "./rational.js";
export type { Integer, Ratio, TimeErrorCode, ParseErrorReason } from "./types.js";
export { TimeError, InvalidFrequencyError, ArithmeticOverflowError, InvalidArgumentError, ParseError } from "./types.js";
