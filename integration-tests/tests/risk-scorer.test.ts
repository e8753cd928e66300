/**
 * Risk Scorer Tests
 */

import {
  DEFAULT_SCORING_POLICY,
  ConfigurationDefectError,
  FeatureNormalizer,
  RiskScorer,
  computeDtiRatio,
  computeLtvRatio,
  parseProfileNarrative,
  validateScoringPolicy,
  type ApplicantRecord,
  type FeatureVector,
  type LoanRecord,
  type ProfileAnalysis,
  type PropertyRecord,
  type RiskAssessment,
} from '@riskline/shared';
import { LINKEDIN_NARRATIVE, INSTAGRAM_NARRATIVE, makeApplicant, makeLoan, makeProperty } from './fixtures';

const normalizer = new FeatureNormalizer();
const scorer = new RiskScorer();

function assess(
  applicant: ApplicantRecord = makeApplicant(),
  property: PropertyRecord = makeProperty(),
  loan: LoanRecord = makeLoan(),
  analyses: ProfileAnalysis[] = []
): RiskAssessment {
  const vector = normalizer.extract(applicant, property, loan, analyses);
  return scorer.score(vector, computeDtiRatio(applicant), computeLtvRatio(loan, property));
}

function sumOfWeights(assessment: RiskAssessment): number {
  return Object.values(assessment.weights).reduce((sum, weight) => sum + weight, 0);
}

describe('Sub-scores', () => {
  it('should score the baseline applicant without profile evidence', () => {
    const assessment = assess();

    expect(assessment.sub_scores).toEqual({ credit: 83.45, capacity: 100, collateral: 55.56 });
    expect(assessment.composite_score).toBe(81.22);
    expect(assessment.tier).toBe('Low');
    expect(assessment.dti_ratio).toBe(0.0632);
    expect(assessment.ltv_ratio).toBe(0.7778);
  });

  it('should renormalize the weights over the three traditional sub-scores', () => {
    const assessment = assess();

    expect(Object.keys(assessment.weights)).toEqual(['credit', 'capacity', 'collateral']);
    expect(assessment.weights.credit).toBeCloseTo(0.35 / 0.9, 10);
    expect(assessment.weights.capacity).toBeCloseTo(0.3 / 0.9, 10);
    expect(assessment.weights.collateral).toBeCloseTo(0.25 / 0.9, 10);
    expect(sumOfWeights(assessment)).toBeCloseTo(1, 10);
  });

  it('should add the fourth factor when a profile group is present', () => {
    const analysis = parseProfileNarrative('linkedin', 'linkedin.com/in/jordan', LINKEDIN_NARRATIVE);
    const assessment = assess(makeApplicant(), makeProperty(), makeLoan(), [analysis]);

    expect(assessment.sub_scores.fourth_factor).toBe(61.67);
    expect(assessment.weights.credit).toBeCloseTo(0.35, 10);
    expect(assessment.weights.capacity).toBeCloseTo(0.3, 10);
    expect(assessment.weights.collateral).toBeCloseTo(0.25, 10);
    expect(assessment.weights.fourth_factor).toBeCloseTo(0.1, 10);
    expect(assessment.composite_score).toBe(79.26);
    expect(assessment.tier).toBe('Moderate');
  });

  it('should average group means across present groups', () => {
    const analyses = [
      parseProfileNarrative('linkedin', 'linkedin.com/in/jordan', LINKEDIN_NARRATIVE),
      parseProfileNarrative('instagram', '@jordan', INSTAGRAM_NARRATIVE),
    ];
    const assessment = assess(makeApplicant(), makeProperty(), makeLoan(), analyses);

    // professional mean 0.6167, lifestyle mean 0.25
    expect(assessment.sub_scores.fourth_factor).toBe(43.33);
    expect(sumOfWeights(assessment)).toBeCloseTo(1, 10);
  });

  it('should blend credit score and employment stability into the credit sub-score', () => {
    const assessment = assess(makeApplicant({ credit_score: 850, years_employed: 0 }));
    expect(assessment.sub_scores.credit).toBe(70);
  });

  it('should floor capacity at 0 when debts meet or exceed income', () => {
    const applicant = makeApplicant({
      annual_income: 60_000,
      declared_debts: [{ type: 'other', monthly_payment: 6_000 }],
    });
    const assessment = assess(applicant);

    expect(assessment.sub_scores.capacity).toBe(0);
    expect(assessment.dti_ratio).toBe(1.2);
    expect(assessment.factors).toContainEqual({
      sub_score: 'capacity',
      direction: 'negative',
      code: 'EXTREME_DTI',
      reason: 'Debt-to-income ratio of 120.0% is at or above 100%; capacity scored 0',
      feature: 'traditional.dti_ratio',
    });
  });

  it('should score collateral 100 at or below 60% LTV', () => {
    const assessment = assess(makeApplicant(), makeProperty(), makeLoan({ loan_amount: 270_000 }));
    expect(assessment.sub_scores.collateral).toBe(100);
  });

  it('should keep every score inside [0, 100]', () => {
    const assessment = assess(
      makeApplicant({
        credit_score: 300,
        years_employed: 0,
        declared_debts: [{ type: 'other', monthly_payment: 20_000 }],
      }),
      makeProperty({ estimated_value: 100_000 }),
      makeLoan({ loan_amount: 400_000 })
    );

    expect(assessment.sub_scores).toEqual({ credit: 0, capacity: 0, collateral: 0 });
    expect(assessment.composite_score).toBe(0);
    expect(assessment.tier).toBe('High');
  });
});

describe('Tiers', () => {
  it.each<[number, string]>([
    [100, 'Low'],
    [80, 'Low'],
    [79.99, 'Moderate'],
    [60, 'Moderate'],
    [59.99, 'Elevated'],
    [40, 'Elevated'],
    [39.99, 'High'],
    [0, 'High'],
  ])('should map composite %p to %s', (composite, tier) => {
    expect(scorer.tierFor(composite)).toBe(tier);
  });
});

describe('Factors', () => {
  it('should explain the baseline applicant', () => {
    const codes = assess().factors.map((factor) => factor.code);
    expect(codes).toEqual(['EMPLOYMENT_STABLE', 'DTI_STRONG', 'LTV_WITHIN_LIMIT']);
  });

  it('should flag weak credit, short employment, high DTI and high LTV', () => {
    const assessment = assess(
      makeApplicant({
        credit_score: 600,
        years_employed: 1,
        annual_income: 60_000,
        declared_debts: [{ type: 'other', monthly_payment: 2_500 }],
      }),
      makeProperty(),
      makeLoan({ loan_amount: 405_000 })
    );

    expect(assessment.factors.map((f) => [f.code, f.direction])).toEqual([
      ['CREDIT_BELOW_FLOOR', 'negative'],
      ['EMPLOYMENT_SHORT', 'negative'],
      ['DTI_ABOVE_WARNING', 'negative'],
      ['LTV_ABOVE_WARNING', 'negative'],
    ]);
    expect(assessment.factors[0].reason).toBe('Credit score 600 is below 620');
    expect(assessment.factors[2].reason).toBe('Debt-to-income ratio of 50.0% exceeds 43%');
    expect(assessment.factors[3].reason).toBe('Loan-to-value ratio of 90.0% exceeds 80%');
  });

  it('should credit a strong score', () => {
    const factor = assess(makeApplicant({ credit_score: 760 })).factors[0];
    expect(factor).toEqual({
      sub_score: 'credit',
      direction: 'positive',
      code: 'CREDIT_STRONG',
      reason: 'Credit score 760 is at or above 740',
      feature: 'traditional.credit_score_normalized',
    });
  });

  it('should tag profile contributions as fourth-factor factors', () => {
    const analysis = parseProfileNarrative('instagram', '@jordan', INSTAGRAM_NARRATIVE);
    const profileFactors = assess(makeApplicant(), makeProperty(), makeLoan(), [analysis]).factors.filter(
      (factor) => factor.sub_score === 'fourth_factor'
    );

    expect(profileFactors).toHaveLength(4);
    expect(profileFactors[0]).toEqual({
      sub_score: 'fourth_factor',
      direction: 'negative',
      code: 'PROFILE_RED_FLAG',
      reason: 'Red flag on instagram profile: Frequent luxury vacations abroad',
      feature: 'lifestyle.spending_alignment',
      platform: 'instagram',
    });
    expect(profileFactors.every((factor) => factor.direction === 'negative')).toBe(true);
  });
});

describe('Scoring policy', () => {
  it('should accept the default policy', () => {
    expect(() => validateScoringPolicy(DEFAULT_SCORING_POLICY)).not.toThrow();
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(DEFAULT_SCORING_POLICY)).toBe(true);
    expect(Object.isFrozen(DEFAULT_SCORING_POLICY.weights)).toBe(true);
  });

  it('should reject weights that do not sum to 1', () => {
    const policy = {
      ...DEFAULT_SCORING_POLICY,
      weights: { credit: 0.5, capacity: 0.3, collateral: 0.25, fourth_factor: 0.1 },
    };
    expect(() => validateScoringPolicy(policy)).toThrow(ConfigurationDefectError);
  });

  it('should reject tiers that do not end at 0', () => {
    const policy = {
      ...DEFAULT_SCORING_POLICY,
      tiers: [
        { tier: 'Low' as const, minScore: 80 },
        { tier: 'High' as const, minScore: 10 },
      ],
    };
    expect(() => validateScoringPolicy(policy)).toThrow('the last tier band must start at 0');
  });

  it('should reject a stability horizon shorter than the stable-employment threshold', () => {
    const policy = {
      ...DEFAULT_SCORING_POLICY,
      normalization: { ...DEFAULT_SCORING_POLICY.normalization, stabilityHorizonYears: 4 },
    };
    expect(() => validateScoringPolicy(policy)).toThrow(
      'Scoring policy is invalid: thresholds.employmentStrongYears must not exceed normalization.stabilityHorizonYears'
    );
  });

  it('should apply a custom vector without profile groups', () => {
    const vector: FeatureVector = {
      values: {
        'traditional.dti_ratio': 0.2,
        'traditional.ltv_ratio': 0.6,
        'traditional.credit_score_normalized': 1,
        'traditional.employment_stability': 1,
        'traditional.annual_income_normalized': 0.5,
        'traditional.is_primary_residence': 1,
        'traditional.is_cash_out': 0,
      },
      groups: { traditional: true, professional: false, lifestyle: false, social: false },
      contributions: [],
    };
    const assessment = scorer.score(vector, 0.2, 0.6);

    expect(assessment.sub_scores).toEqual({ credit: 100, capacity: 100, collateral: 100 });
    expect(assessment.composite_score).toBe(100);
  });
});
