export type AmortizationErrorCode = "INVALID_PARAMETER" | "NUMERIC_OVERFLOW";

export class AmortizationError extends Error {
  constructor(
    message: string,
    readonly code: AmortizationErrorCode
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when an input lies outside the domain the calculation accepts
 */
export class InvalidParameterError extends AmortizationError {
  constructor(
    readonly parameter: string,
    readonly value: unknown,
    reason: string
  ) {
    super(`Invalid ${parameter} (${String(value)}): ${reason}`, "INVALID_PARAMETER");
  }
}

export class NumericOverflowError extends AmortizationError {
  constructor(readonly quantity: string) {
    super(`${quantity} is not a finite number`, "NUMERIC_OVERFLOW");
  }
}
