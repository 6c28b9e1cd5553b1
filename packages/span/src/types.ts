/**
 * Integer input accepted at API boundaries. Numbers must be safe integers.
 */
export type Integer = bigint | number;

/**
 * Exact rational value, always reduced with a positive denominator
 */
export interface Ratio {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

export type TimeErrorCode =
  | "INVALID_FREQUENCY"
  | "ARITHMETIC_OVERFLOW"
  | "NON_MONOTONIC_SOURCE"
  | "INVALID_ARGUMENT"
  | "PARSE_ERROR";

export type ParseErrorReason = "empty" | "too-long" | "syntax" | "field-range";

// Errors
export class TimeError extends Error {
  readonly code: TimeErrorCode;

  constructor(code: TimeErrorCode, message: string) {
    super(message);
    this.name = "TimeError";
    this.code = code;
  }
}

export class InvalidFrequencyError extends TimeError {
  constructor(message: string) {
    super("INVALID_FREQUENCY", message);
    this.name = "InvalidFrequencyError";
  }
}

export class ArithmeticOverflowError extends TimeError {
  readonly operation: string;

  constructor(operation: string) {
    super("ARITHMETIC_OVERFLOW", `Arithmetic overflow in ${operation}`);
    this.name = "ArithmeticOverflowError";
    this.operation = operation;
  }
}

export class InvalidArgumentError extends TimeError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }
}

export class ParseError extends TimeError {
  readonly reason: ParseErrorReason;
  readonly input: string;

  constructor(reason: ParseErrorReason, input: string, message: string) {
    super("PARSE_ERROR", message);
    this.name = "ParseError";
    this.reason = reason;
    this.input = input;
  }
}
