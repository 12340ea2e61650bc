export type {
  ISODate,
  Money,
  LoanInput,
  TermSolveInput,
  LoanTerms,
  PaymentRecord,
  ScheduleSummary,
} from "./domain/types";
export {
  LoanCalculationError,
  InvalidInputError,
  UnsatisfiableConstraintError,
} from "./domain/errors";
export type { LoanErrorKind } from "./domain/errors";
export {
  amortizeWithPayment,
  buildLoanTerms,
  computeMonthlyPaymentAmount,
  generateSchedule,
  generateScheduleForTerms,
  summarizeSchedule,
} from "./domain/amortizationEngine";
export {
  findMinimalSatisfyingTerm,
  findMinimalTermMonths,
} from "./domain/termSolver";
export { round2, serializePaymentRecord } from "./domain/paymentRecordFormat";
export type { SerializedPaymentRecord } from "./domain/paymentRecordFormat";
