/**
 * Scoring policy: normalization ceilings, sub-score weights, tier bands and
 * factor thresholds. Immutable once loaded; checked at pipeline construction.
 */

import { ConfigurationDefectError } from '../errors';
import type { RiskTier, SubScoreName } from '../types';

export interface NormalizationPolicy {
  /** DTI ratio at which the normalized feature reaches 1 */
  readonly dtiCeiling: number;
  /** LTV ratio at which the normalized feature reaches 1 */
  readonly ltvCeiling: number;
  readonly minCreditScore: number;
  readonly maxCreditScore: number;
  /** Years of employment treated as fully stable */
  readonly stabilityHorizonYears: number;
  readonly incomeCeiling: number;
}

export interface TierBand {
  readonly tier: RiskTier;
  readonly minScore: number;
}

export interface FactorThresholds {
  readonly dtiWarning: number;
  readonly dtiStrong: number;
  readonly ltvWarning: number;
  readonly creditFloor: number;
  readonly creditStrong: number;
  readonly employmentMinYears: number;
  readonly employmentStrongYears: number;
}

export interface ScoringPolicy {
  readonly normalization: NormalizationPolicy;
  /** Blend of the two traditional features behind the credit sub-score */
  readonly creditBlend: { readonly creditScore: number; readonly employmentStability: number };
  /** Normalized DTI/LTV at or below which capacity/collateral score 100 */
  readonly comfort: { readonly dti: number; readonly ltv: number };
  readonly weights: Readonly<Record<SubScoreName, number>>;
  /** Highest band first; the last band must start at 0 */
  readonly tiers: readonly TierBand[];
  readonly thresholds: FactorThresholds;
}

export const DEFAULT_SCORING_POLICY: ScoringPolicy = Object.freeze({
  normalization: Object.freeze({
    dtiCeiling: 1.0,
    ltvCeiling: 1.0,
    minCreditScore: 300,
    maxCreditScore: 850,
    stabilityHorizonYears: 5,
    incomeCeiling: 500_000,
  }),
  creditBlend: Object.freeze({ creditScore: 0.7, employmentStability: 0.3 }),
  comfort: Object.freeze({ dti: 0.2, ltv: 0.6 }),
  weights: Object.freeze({
    credit: 0.35,
    capacity: 0.3,
    collateral: 0.25,
    fourth_factor: 0.1,
  }),
  tiers: Object.freeze([
    Object.freeze({ tier: 'Low', minScore: 80 }),
    Object.freeze({ tier: 'Moderate', minScore: 60 }),
    Object.freeze({ tier: 'Elevated', minScore: 40 }),
    Object.freeze({ tier: 'High', minScore: 0 }),
  ] satisfies TierBand[]),
  thresholds: Object.freeze({
    dtiWarning: 0.43,
    dtiStrong: 0.28,
    ltvWarning: 0.8,
    creditFloor: 620,
    creditStrong: 740,
    employmentMinYears: 2,
    employmentStrongYears: 5,
  }),
});

const EPSILON = 1e-9;

/**
 * Throws ConfigurationDefectError listing every problem with the policy.
 */
export function validateScoringPolicy(policy: ScoringPolicy): void {
  const problems: string[] = [];
  const n = policy.normalization;

  if (!(n.dtiCeiling > 0)) problems.push('normalization.dtiCeiling must be positive');
  if (!(n.ltvCeiling > 0)) problems.push('normalization.ltvCeiling must be positive');
  if (!(n.maxCreditScore > n.minCreditScore)) {
    problems.push('normalization.maxCreditScore must exceed minCreditScore');
  }
  if (!(n.stabilityHorizonYears > 0)) problems.push('normalization.stabilityHorizonYears must be positive');
  if (!(n.incomeCeiling > 0)) problems.push('normalization.incomeCeiling must be positive');

  const blend = policy.creditBlend.creditScore + policy.creditBlend.employmentStability;
  if (Math.abs(blend - 1) > EPSILON) problems.push(`creditBlend must sum to 1, got ${blend}`);

  for (const [name, value] of Object.entries(policy.comfort)) {
    if (!(value >= 0 && value < 1)) problems.push(`comfort.${name} must be in [0, 1)`);
  }

  const weights = Object.entries(policy.weights);
  for (const [name, weight] of weights) {
    if (!(weight > 0)) problems.push(`weight ${name} must be positive`);
  }
  const total = weights.reduce((sum, [, weight]) => sum + weight, 0);
  if (Math.abs(total - 1) > EPSILON) problems.push(`weights must sum to 1, got ${total}`);

  const tiers = policy.tiers;
  if (tiers.length === 0) {
    problems.push('at least one tier band is required');
  } else {
    tiers.forEach((band, index) => {
      if (index > 0 && !(band.minScore < tiers[index - 1].minScore)) {
        problems.push(`tier ${band.tier} must start below tier ${tiers[index - 1].tier}`);
      }
    });
    if (tiers[tiers.length - 1].minScore !== 0) problems.push('the last tier band must start at 0');
    if (new Set(tiers.map((band) => band.tier)).size !== tiers.length) {
      problems.push('tier names must be unique');
    }
  }

  const t = policy.thresholds;
  if (!(t.dtiStrong < t.dtiWarning)) problems.push('thresholds.dtiStrong must be below dtiWarning');
  if (!(t.creditFloor < t.creditStrong)) problems.push('thresholds.creditFloor must be below creditStrong');
  if (!(t.employmentMinYears < t.employmentStrongYears)) {
    problems.push('thresholds.employmentMinYears must be below employmentStrongYears');
  }
  // years are read back as feature × horizon, so nothing past the horizon is visible
  if (!(t.employmentStrongYears <= n.stabilityHorizonYears)) {
    problems.push('thresholds.employmentStrongYears must not exceed normalization.stabilityHorizonYears');
  }

  if (problems.length > 0) {
    throw new ConfigurationDefectError('Scoring policy is invalid', problems);
  }
}
