// src/domain/paymentRecordFormat.test.ts
import { round2, serializePaymentRecord } from "./paymentRecordFormat";
import { generateSchedule } from "./amortizationEngine";

describe("paymentRecordFormat", () => {
  test("round2 rounds to cents half away from zero", () => {
    expect(round2(1261.2813107681247)).toBe(1261.28);
    expect(round2(73.78131076812474)).toBe(73.78);
    expect(round2(2.345)).toBe(2.35);
    expect(round2(-2.345)).toBe(-2.35);
    expect(round2(750)).toBe(750);
  });

  test("serializes the first month of a 30-year loan", () => {
    const [first] = generateSchedule({
      loanValue: 300_000,
      annualRatePercent: 9.5,
      termYears: 30,
      downPayment: 150_000,
      propertyTaxes: 7_000,
      homeInsurance: 2_000,
    });

    expect(serializePaymentRecord(first)).toEqual({
      month: 1,
      payment: 2011.28,
      principalPaid: 73.78,
      interestPaid: 1187.5,
      escrow: 750,
      remainingBalance: 149_926.22,
    });
  });

  test("keeps the payment date when the schedule is dated", () => {
    const schedule = generateSchedule({
      loanValue: 12_000,
      annualRatePercent: 6,
      termYears: 1,
      startDate: "2025-01-15",
    });

    const last = serializePaymentRecord(schedule[11]);
    expect(last.paymentDate).toBe("2025-12-15");
    expect(last.remainingBalance).toBe(0);
    expect(last.interestPaid).toBe(5.14);
    expect(last.principalPaid).toBe(1027.66);
  });
});
