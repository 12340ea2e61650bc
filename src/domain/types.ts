// src/domain/types.ts

// Primitive aliases
export type ISODate = string; // "YYYY-MM-DD"
export type Money = number;

// ------------------------
// Inputs
// ------------------------

/**
 * Loan parameters as a caller supplies them. Escrow components are annual
 * amounts; omitted ones count as 0.
 */
export interface LoanInput {
  loanValue: Money;
  annualRatePercent: number; // e.g. 9.5 for 9.5%
  termYears: number;
  downPayment?: Money;
  propertyTaxes?: Money;
  homeInsurance?: Money;
  hoaFees?: Money;
  pmi?: Money;
  startDate?: ISODate; // first payment date
}

export interface TermSolveInput extends LoanInput {
  maxMonthlyPayment: Money;
}

// ------------------------
// Resolved terms
// ------------------------

export interface LoanTerms {
  readonly principal: Money;
  readonly annualRatePercent: number;
  readonly termMonths: number;
  readonly monthlyEscrow: Money;
  readonly startDate?: ISODate;
}

// ------------------------
// Outputs
// ------------------------

export interface PaymentRecord {
  month: number; // 1-based
  payment: Money; // P&I + escrow
  principalPaid: Money;
  interestPaid: Money;
  escrow: Money;
  remainingBalance: Money;
  paymentDate?: ISODate;
}

export interface ScheduleSummary {
  termMonths: number;
  fixedPrincipalAndInterest: Money;
  monthlyEscrow: Money;
  totalPaid: Money;
  totalInterest: Money;
  totalPrincipal: Money;
  totalEscrow: Money;
  payoffDate?: ISODate;
}
