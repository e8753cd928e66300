/**
 * Indicative pricing for a scored application. Not a rate quote.
 */

import { roundTo } from '../utils/math';
import type { LoanEstimate, LoanRecord, LoanType, RiskAssessment } from '../types';

export interface PricingPolicy {
  readonly baseRatePercent: number;
  /** Added at a composite score of 0, scaled linearly to nothing at 100 */
  readonly maxRiskPremiumPercent: number;
  readonly productAdjustments: Readonly<Partial<Record<LoanType, number>>>;
  readonly termMonths: Readonly<Partial<Record<LoanType, number>>>;
  readonly defaultTermMonths: number;
}

export const DEFAULT_PRICING_POLICY: PricingPolicy = Object.freeze({
  baseRatePercent: 6.5,
  maxRiskPremiumPercent: 2.5,
  productAdjustments: Object.freeze({
    conventional_15: -0.5,
    arm_7_1: -0.75,
    arm_5_1: -0.75,
  }),
  termMonths: Object.freeze({ conventional_15: 180 }),
  defaultTermMonths: 360,
});

export function monthlyPayment(principal: number, annualRatePercent: number, termMonths: number): number {
  const monthlyRate = annualRatePercent / 100 / 12;
  if (monthlyRate === 0) {
    return principal / termMonths;
  }
  const growth = (1 + monthlyRate) ** termMonths;
  return (principal * monthlyRate * growth) / (growth - 1);
}

export function estimateLoanTerms(
  loan: LoanRecord,
  assessment: RiskAssessment,
  pricing: PricingPolicy = DEFAULT_PRICING_POLICY
): LoanEstimate {
  const riskPremium = ((100 - assessment.composite_score) / 100) * pricing.maxRiskPremiumPercent;
  const rate = pricing.baseRatePercent + (pricing.productAdjustments[loan.loan_type] ?? 0) + riskPremium;
  const termMonths = pricing.termMonths[loan.loan_type] ?? pricing.defaultTermMonths;

  return {
    estimated_interest_rate: roundTo(rate, 3),
    estimated_monthly_payment: roundTo(monthlyPayment(loan.loan_amount, rate, termMonths), 2),
    term_months: termMonths,
  };
}
