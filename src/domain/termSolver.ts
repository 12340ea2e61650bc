// src/domain/termSolver.ts
import type { LoanTerms, Money, PaymentRecord, TermSolveInput } from "./types";
import { InvalidInputError, UnsatisfiableConstraintError } from "./errors";
import {
  buildLoanTerms,
  computeMonthlyPaymentAmount,
  generateScheduleForTerms,
} from "./amortizationEngine";
import logger from "../lib/logger";

function totalMonthlyPayment(terms: LoanTerms, termMonths: number): Money {
  return (
    computeMonthlyPaymentAmount(
      terms.principal,
      terms.annualRatePercent,
      termMonths
    ) + terms.monthlyEscrow
  );
}

/**
 * Smallest term in [1, terms.termMonths] whose P&I plus escrow stays at or
 * under the cap.
 *
 * The payment is non-increasing in the term for a fixed principal, so the
 * satisfying terms form a suffix of the range and we bisect for its start.
 */
export function findMinimalTermMonths(
  terms: LoanTerms,
  maxMonthlyPayment: Money
): number {
  if (!Number.isFinite(maxMonthlyPayment)) {
    throw new InvalidInputError(
      "maxMonthlyPayment",
      "maxMonthlyPayment must be a finite number"
    );
  }

  const maxTermMonths = terms.termMonths;
  const lowest = totalMonthlyPayment(terms, maxTermMonths);
  // A non-finite payment never satisfies the cap.
  if (!(Number.isFinite(lowest) && lowest <= maxMonthlyPayment)) {
    logger.warn(
      { maxMonthlyPayment, lowest, maxTermMonths },
      "payment cap cannot be met within the maximum term"
    );
    throw new UnsatisfiableConstraintError(
      maxMonthlyPayment,
      lowest,
      maxTermMonths
    );
  }

  // Invariant: hi satisfies the cap, every term below lo does not.
  let lo = 1;
  let hi = maxTermMonths;
  while (lo < hi) {
    const mid = Math.floor((lo + hi) / 2);
    const payment = totalMonthlyPayment(terms, mid);
    if (Number.isFinite(payment) && payment <= maxMonthlyPayment) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }

  return hi;
}

/**
 * Schedule for the shortest term, capped at input.termYears, whose total
 * monthly payment does not exceed input.maxMonthlyPayment.
 */
export function findMinimalSatisfyingTerm(
  input: TermSolveInput
): PaymentRecord[] {
  const terms = buildLoanTerms(input);
  const termMonths = findMinimalTermMonths(terms, input.maxMonthlyPayment);

  logger.debug(
    {
      maxMonthlyPayment: input.maxMonthlyPayment,
      termMonths,
      maxTermMonths: terms.termMonths,
    },
    "minimal satisfying term found"
  );

  return generateScheduleForTerms({ ...terms, termMonths });
}
