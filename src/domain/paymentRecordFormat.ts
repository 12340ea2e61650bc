// src/domain/paymentRecordFormat.ts
import type { ISODate, Money, PaymentRecord } from "./types";

/**
 * Flat, display-ready view of a PaymentRecord with money rounded to cents.
 */
export interface SerializedPaymentRecord {
  month: number;
  payment: Money;
  principalPaid: Money;
  interestPaid: Money;
  escrow: Money;
  remainingBalance: Money;
  paymentDate?: ISODate;
}

// Half away from zero; EPSILON nudges values like 1.005 that sit just under
// the midpoint in binary.
export function round2(value: number): number {
  const sign = value < 0 ? -1 : 1;
  return (sign * Math.round((Math.abs(value) + Number.EPSILON) * 100)) / 100;
}

export function serializePaymentRecord(
  record: PaymentRecord
): SerializedPaymentRecord {
  const out: SerializedPaymentRecord = {
    month: record.month,
    payment: round2(record.payment),
    principalPaid: round2(record.principalPaid),
    interestPaid: round2(record.interestPaid),
    escrow: round2(record.escrow),
    remainingBalance: round2(record.remainingBalance),
  };
  if (record.paymentDate !== undefined) {
    out.paymentDate = record.paymentDate;
  }
  return out;
}
