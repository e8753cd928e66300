/**
 * Loan Estimate Tests
 */

import { estimateLoanTerms, monthlyPayment, type RiskAssessment } from '@riskline/shared';
import { makeLoan } from './fixtures';

function assessmentWithScore(composite_score: number): RiskAssessment {
  return {
    sub_scores: { credit: composite_score, capacity: composite_score, collateral: composite_score },
    composite_score,
    tier: 'Low',
    weights: { credit: 0.35 / 0.9, capacity: 0.3 / 0.9, collateral: 0.25 / 0.9 },
    factors: [],
    dti_ratio: 0.2,
    ltv_ratio: 0.8,
  };
}

describe('Loan estimate', () => {
  it('should amortize a fixed-rate loan', () => {
    expect(monthlyPayment(100_000, 6, 360)).toBeCloseTo(599.55, 2);
  });

  it('should divide evenly at a zero rate', () => {
    expect(monthlyPayment(36_000, 0, 360)).toBe(100);
  });

  it('should price a perfect score at the base rate', () => {
    const estimate = estimateLoanTerms(makeLoan({ loan_amount: 100_000 }), assessmentWithScore(100));

    expect(estimate.estimated_interest_rate).toBe(6.5);
    expect(estimate.term_months).toBe(360);
  });

  it('should add the full risk premium at a score of 0', () => {
    const estimate = estimateLoanTerms(makeLoan(), assessmentWithScore(0));
    expect(estimate.estimated_interest_rate).toBe(9);
  });

  it('should shorten the term and lower the rate for 15-year loans', () => {
    const estimate = estimateLoanTerms(makeLoan({ loan_type: 'conventional_15' }), assessmentWithScore(100));

    expect(estimate.term_months).toBe(180);
    expect(estimate.estimated_interest_rate).toBe(6);
  });

  it('should discount ARM products', () => {
    const estimate = estimateLoanTerms(makeLoan({ loan_type: 'arm_5_1' }), assessmentWithScore(100));
    expect(estimate.estimated_interest_rate).toBe(5.75);
  });
});
