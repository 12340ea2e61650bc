// src/domain/amortizationEngine.ts
import type {
  LoanInput,
  LoanTerms,
  PaymentRecord,
  ScheduleSummary,
  Money,
} from "./types";
import { InvalidInputError } from "./errors";
import { addMonths, isValidISODate } from "./dateUtils";
import logger from "../lib/logger";

function requireFinite(field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(field, `${field} must be a finite number`);
  }
}

function requireNonNegative(field: string, value: number): void {
  requireFinite(field, value);
  if (value < 0) {
    throw new InvalidInputError(field, `${field} must be >= 0`);
  }
}

function requireAmortizable(
  principal: Money,
  annualRatePercent: number,
  termMonths: number
): void {
  requireFinite("principal", principal);
  if (principal <= 0) {
    throw new InvalidInputError("principal", "principal must be > 0");
  }
  if (!Number.isInteger(termMonths) || termMonths <= 0) {
    throw new InvalidInputError(
      "termMonths",
      "termMonths must be a positive integer"
    );
  }
  requireNonNegative("annualRatePercent", annualRatePercent);
}

function monthlyRateOf(annualRatePercent: number): number {
  return annualRatePercent / 100 / 12;
}

/**
 * Fixed principal-and-interest payment of a standard amortizing loan.
 */
export function computeMonthlyPaymentAmount(
  principal: Money,
  annualRatePercent: number,
  termMonths: number
): Money {
  requireAmortizable(principal, annualRatePercent, termMonths);

  const r = monthlyRateOf(annualRatePercent);

  if (r === 0) {
    return principal / termMonths;
  }

  // P*r / (1 - (1+r)^-n), in log space so extreme rates neither overflow
  // nor cancel to zero.
  return (principal * r) / -Math.expm1(-termMonths * Math.log1p(r));
}

/**
 * Validate caller input and resolve it into the terms the schedule runs on:
 * principal net of the down payment, term in months and monthly escrow.
 */
export function buildLoanTerms(input: LoanInput): LoanTerms {
  const {
    loanValue,
    annualRatePercent,
    termYears,
    downPayment = 0,
    propertyTaxes = 0,
    homeInsurance = 0,
    hoaFees = 0,
    pmi = 0,
    startDate,
  } = input;

  requireFinite("loanValue", loanValue);
  requireNonNegative("downPayment", downPayment);
  requireNonNegative("annualRatePercent", annualRatePercent);
  requireNonNegative("propertyTaxes", propertyTaxes);
  requireNonNegative("homeInsurance", homeInsurance);
  requireNonNegative("hoaFees", hoaFees);
  requireNonNegative("pmi", pmi);

  if (!Number.isInteger(termYears) || termYears <= 0) {
    throw new InvalidInputError(
      "termYears",
      "termYears must be a positive integer"
    );
  }

  const principal = loanValue - downPayment;
  if (principal <= 0) {
    throw new InvalidInputError(
      "downPayment",
      "loanValue must exceed downPayment"
    );
  }

  requireStartDate(startDate);

  return {
    principal,
    annualRatePercent,
    termMonths: termYears * 12,
    monthlyEscrow: (propertyTaxes + homeInsurance + hoaFees + pmi) / 12,
    startDate,
  };
}

function requireStartDate(startDate: string | undefined): void {
  if (startDate !== undefined && !isValidISODate(startDate)) {
    throw new InvalidInputError("startDate", "startDate must be YYYY-MM-DD");
  }
}

/**
 * Amortize resolved terms at a given fixed P&I payment. A payment above the
 * contractual one retires the loan early; the remaining months then carry
 * only escrow. The final month pays off whatever balance is left so the
 * schedule always ends at exactly 0.
 */
export function amortizeWithPayment(
  terms: LoanTerms,
  fixedPrincipalAndInterest: Money
): PaymentRecord[] {
  const { principal, annualRatePercent, termMonths, monthlyEscrow, startDate } =
    terms;

  requireAmortizable(principal, annualRatePercent, termMonths);
  requireNonNegative("monthlyEscrow", monthlyEscrow);
  requireStartDate(startDate);

  const r = monthlyRateOf(annualRatePercent);
  const fixedPI = fixedPrincipalAndInterest;
  requireFinite("fixedPrincipalAndInterest", fixedPI);
  if (fixedPI <= 0 || fixedPI < principal * r) {
    throw new InvalidInputError(
      "fixedPrincipalAndInterest",
      "fixedPrincipalAndInterest must cover the first month's interest"
    );
  }

  const schedule: PaymentRecord[] = [];
  let balance = principal;

  for (let month = 1; month <= termMonths; month++) {
    const interestPaid = balance * r;
    let principalPaid = fixedPI - interestPaid;
    let payment = fixedPI + monthlyEscrow;

    if (month === termMonths || principalPaid > balance) {
      principalPaid = balance;
      payment = principalPaid + interestPaid + monthlyEscrow;
    }

    balance = Math.max(0, balance - principalPaid);

    const record: PaymentRecord = {
      month,
      payment,
      principalPaid,
      interestPaid,
      escrow: monthlyEscrow,
      remainingBalance: balance,
    };
    if (startDate !== undefined) {
      record.paymentDate = addMonths(startDate, month - 1);
    }

    schedule.push(record);
  }

  logger.debug(
    { principal, annualRatePercent, termMonths, fixedPI, monthlyEscrow },
    "amortization schedule generated"
  );

  return schedule;
}

/**
 * Month-by-month schedule for already resolved terms at the contractual
 * fixed payment.
 */
export function generateScheduleForTerms(terms: LoanTerms): PaymentRecord[] {
  const fixedPI = computeMonthlyPaymentAmount(
    terms.principal,
    terms.annualRatePercent,
    terms.termMonths
  );
  return amortizeWithPayment(terms, fixedPI);
}

export function generateSchedule(input: LoanInput): PaymentRecord[] {
  return generateScheduleForTerms(buildLoanTerms(input));
}

export function summarizeSchedule(schedule: PaymentRecord[]): ScheduleSummary {
  if (schedule.length === 0) {
    throw new InvalidInputError("schedule", "Schedule is empty");
  }

  const first = schedule[0];
  const last = schedule[schedule.length - 1];

  let totalPaid = 0;
  let totalInterest = 0;
  let totalPrincipal = 0;
  let totalEscrow = 0;
  for (const entry of schedule) {
    totalPaid += entry.payment;
    totalInterest += entry.interestPaid;
    totalPrincipal += entry.principalPaid;
    totalEscrow += entry.escrow;
  }

  return {
    termMonths: schedule.length,
    fixedPrincipalAndInterest: first.principalPaid + first.interestPaid,
    monthlyEscrow: first.escrow,
    totalPaid,
    totalInterest,
    totalPrincipal,
    totalEscrow,
    payoffDate: last.paymentDate,
  };
}
