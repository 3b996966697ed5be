/**
 * Error types for the length and tolerance values.
 *
 * `ParseError` and `OverflowError` are thrown by the fallible entry points
 * (string, byte and wire decoding, narrowing conversions). A
 * `ContractViolationError` marks a programming error, such as a tolerance
 * whose plus lies below its minus, and is not meant to be caught.
 */

export type ToleranceErrorKind = "ParseError" | "Overflow" | "ContractViolation";

/**
 * Base error class for all dimtol errors.
 */
export class ToleranceError extends Error {
  readonly kind: ToleranceErrorKind;

  constructor(message: string, kind: ToleranceErrorKind) {
    super(message);
    this.name = "ToleranceError";
    this.kind = kind;
  }
}

/**
 * Malformed textual, byte or structured input.
 */
export class ParseError extends ToleranceError {
  constructor(message: string) {
    super(message, "ParseError");
    this.name = "ParseError";
  }
}

/**
 * A value that does not fit into the target width.
 */
export class OverflowError extends ToleranceError {
  readonly typeName: string;

  constructor(message: string, typeName: string) {
    super(message, "Overflow");
    this.name = "OverflowError";
    this.typeName = typeName;
  }
}

/**
 * Thrown when a caller breaks a documented precondition.
 */
export class ContractViolationError extends ToleranceError {
  constructor(message: string) {
    super(message, "ContractViolation");
    this.name = "ContractViolationError";
  }
}
