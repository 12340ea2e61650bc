// src/domain/errors.ts
import type { Money } from "./types";

export type LoanErrorKind = "InvalidInput" | "UnsatisfiableConstraint";

export abstract class LoanCalculationError extends Error {
  abstract readonly kind: LoanErrorKind;
}

/**
 * Raised before any computation when a loan parameter is out of range.
 */
export class InvalidInputError extends LoanCalculationError {
  readonly kind = "InvalidInput";

  constructor(readonly field: string, message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/**
 * Raised when no term up to the allowed maximum keeps the monthly payment
 * at or under the cap.
 */
export class UnsatisfiableConstraintError extends LoanCalculationError {
  readonly kind = "UnsatisfiableConstraint";

  constructor(
    readonly maxMonthlyPayment: Money,
    readonly lowestAchievablePayment: Money,
    readonly maxTermMonths: number
  ) {
    super(
      `max monthly payment ${maxMonthlyPayment} is below the lowest payment ${lowestAchievablePayment.toFixed(
        2
      )} achievable within ${maxTermMonths} months`
    );
    this.name = "UnsatisfiableConstraintError";
  }
}
