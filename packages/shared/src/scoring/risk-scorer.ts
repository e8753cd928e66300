/**
 * Risk Scorer
 *
 * Turns a feature vector into three or four sub-scores, a weighted composite
 * and a tier. The fourth factor exists only when at least one profile group
 * is present; weights are renormalized over the sub-scores that exist.
 */

import { groupValues, isGroupPresent } from '../features/normalizer';
import { clampUnit, formatPercent, mean, roundTo } from '../utils/math';
import {
  PROFILE_FEATURE_GROUPS,
  type FeatureContribution,
  type FeatureVector,
  type RiskAssessment,
  type RiskFactor,
  type RiskTier,
  type SubScoreName,
  type SubScores,
} from '../types';
import { DEFAULT_SCORING_POLICY, type ScoringPolicy } from './policy';

const SUB_SCORE_NAMES: readonly SubScoreName[] = ['credit', 'capacity', 'collateral', 'fourth_factor'];

const SCORE_DECIMALS = 2;
const RATIO_DECIMALS = 4;

function describeContribution(contribution: FeatureContribution): RiskFactor {
  const { platform, text, feature, delta } = contribution;
  const direction = delta >= 0 ? 'positive' : 'negative';

  switch (contribution.source) {
    case 'positive_indicator':
      return {
        sub_score: 'fourth_factor',
        direction,
        code: 'PROFILE_POSITIVE_INDICATOR',
        reason: `Positive indicator on ${platform} profile: ${text}`,
        feature,
        platform,
      };
    case 'red_flag':
      return {
        sub_score: 'fourth_factor',
        direction,
        code: 'PROFILE_RED_FLAG',
        reason: `Red flag on ${platform} profile: ${text}`,
        feature,
        platform,
      };
    case 'narrative':
      return {
        sub_score: 'fourth_factor',
        direction,
        code: 'PROFILE_NARRATIVE_SIGNAL',
        reason: `${platform} profile narrative mentions "${text}"`,
        feature,
        platform,
      };
  }
}

export class RiskScorer {
  constructor(private readonly policy: ScoringPolicy = DEFAULT_SCORING_POLICY) {}

  /**
   * @param dtiRaw - unclamped debt-to-income ratio, used for the capacity floor
   * @param ltvRaw - unclamped loan-to-value ratio, used for the collateral floor
   */
  score(vector: FeatureVector, dtiRaw: number, ltvRaw: number): RiskAssessment {
    const { normalization, creditBlend, comfort } = this.policy;
    const values = vector.values;

    const credit =
      100 *
      (creditBlend.creditScore * values['traditional.credit_score_normalized'] +
        creditBlend.employmentStability * values['traditional.employment_stability']);

    const capacity =
      dtiRaw >= normalization.dtiCeiling
        ? 0
        : inverseScore(values['traditional.dti_ratio'], comfort.dti);

    const collateral =
      ltvRaw >= normalization.ltvCeiling
        ? 0
        : inverseScore(values['traditional.ltv_ratio'], comfort.ltv);

    const presentGroups = PROFILE_FEATURE_GROUPS.filter((group) => isGroupPresent(values, group));
    const fourthFactor =
      presentGroups.length > 0
        ? 100 * mean(presentGroups.map((group) => mean(groupValues(values, group))))
        : undefined;

    const raw: Partial<Record<SubScoreName, number>> = { credit, capacity, collateral };
    if (fourthFactor !== undefined) raw.fourth_factor = fourthFactor;

    const weights = this.effectiveWeights(raw);
    let composite = 0;
    for (const name of SUB_SCORE_NAMES) {
      const weight = weights[name];
      const value = raw[name];
      if (weight !== undefined && value !== undefined) composite += weight * value;
    }
    composite = roundTo(Math.min(100, Math.max(0, composite)), SCORE_DECIMALS);

    const subScores: SubScores = {
      credit: roundTo(credit, SCORE_DECIMALS),
      capacity: roundTo(capacity, SCORE_DECIMALS),
      collateral: roundTo(collateral, SCORE_DECIMALS),
    };
    if (fourthFactor !== undefined) subScores.fourth_factor = roundTo(fourthFactor, SCORE_DECIMALS);

    return {
      sub_scores: subScores,
      composite_score: composite,
      tier: this.tierFor(composite),
      weights,
      factors: [
        ...this.traditionalFactors(vector, dtiRaw, ltvRaw),
        ...vector.contributions.map(describeContribution),
      ],
      dti_ratio: roundTo(dtiRaw, RATIO_DECIMALS),
      ltv_ratio: roundTo(ltvRaw, RATIO_DECIMALS),
    };
  }

  tierFor(composite: number): RiskTier {
    const band = this.policy.tiers.find((candidate) => composite >= candidate.minScore);
    return band ? band.tier : this.policy.tiers[this.policy.tiers.length - 1].tier;
  }

  private effectiveWeights(
    present: Partial<Record<SubScoreName, number>>
  ): Partial<Record<SubScoreName, number>> {
    const names = SUB_SCORE_NAMES.filter((name) => present[name] !== undefined);
    const total = names.reduce((sum, name) => sum + this.policy.weights[name], 0);
    const weights: Partial<Record<SubScoreName, number>> = {};
    for (const name of names) {
      weights[name] = this.policy.weights[name] / total;
    }
    return weights;
  }

  private traditionalFactors(vector: FeatureVector, dtiRaw: number, ltvRaw: number): RiskFactor[] {
    const { thresholds: t, normalization: n } = this.policy;
    const values = vector.values;
    const factors: RiskFactor[] = [];

    const creditScore = Math.round(
      n.minCreditScore +
        values['traditional.credit_score_normalized'] * (n.maxCreditScore - n.minCreditScore)
    );
    if (creditScore < t.creditFloor) {
      factors.push({
        sub_score: 'credit',
        direction: 'negative',
        code: 'CREDIT_BELOW_FLOOR',
        reason: `Credit score ${creditScore} is below ${t.creditFloor}`,
        feature: 'traditional.credit_score_normalized',
      });
    } else if (creditScore >= t.creditStrong) {
      factors.push({
        sub_score: 'credit',
        direction: 'positive',
        code: 'CREDIT_STRONG',
        reason: `Credit score ${creditScore} is at or above ${t.creditStrong}`,
        feature: 'traditional.credit_score_normalized',
      });
    }

    const years = values['traditional.employment_stability'] * n.stabilityHorizonYears;
    if (years < t.employmentMinYears) {
      factors.push({
        sub_score: 'credit',
        direction: 'negative',
        code: 'EMPLOYMENT_SHORT',
        reason: `Less than ${t.employmentMinYears} years with current employment`,
        feature: 'traditional.employment_stability',
      });
    } else if (years >= t.employmentStrongYears) {
      factors.push({
        sub_score: 'credit',
        direction: 'positive',
        code: 'EMPLOYMENT_STABLE',
        reason: `${t.employmentStrongYears}+ years with current employment`,
        feature: 'traditional.employment_stability',
      });
    }

    if (dtiRaw >= n.dtiCeiling) {
      factors.push({
        sub_score: 'capacity',
        direction: 'negative',
        code: 'EXTREME_DTI',
        reason: `Debt-to-income ratio of ${formatPercent(dtiRaw)} is at or above ${formatPercent(n.dtiCeiling, 0)}; capacity scored 0`,
        feature: 'traditional.dti_ratio',
      });
    } else if (dtiRaw > t.dtiWarning) {
      factors.push({
        sub_score: 'capacity',
        direction: 'negative',
        code: 'DTI_ABOVE_WARNING',
        reason: `Debt-to-income ratio of ${formatPercent(dtiRaw)} exceeds ${formatPercent(t.dtiWarning, 0)}`,
        feature: 'traditional.dti_ratio',
      });
    } else if (dtiRaw <= t.dtiStrong) {
      factors.push({
        sub_score: 'capacity',
        direction: 'positive',
        code: 'DTI_STRONG',
        reason: `Debt-to-income ratio of ${formatPercent(dtiRaw)} is at or below ${formatPercent(t.dtiStrong, 0)}`,
        feature: 'traditional.dti_ratio',
      });
    }

    if (ltvRaw >= n.ltvCeiling) {
      factors.push({
        sub_score: 'collateral',
        direction: 'negative',
        code: 'EXTREME_LTV',
        reason: `Loan-to-value ratio of ${formatPercent(ltvRaw)} is at or above ${formatPercent(n.ltvCeiling, 0)}; collateral scored 0`,
        feature: 'traditional.ltv_ratio',
      });
    } else if (ltvRaw > t.ltvWarning) {
      factors.push({
        sub_score: 'collateral',
        direction: 'negative',
        code: 'LTV_ABOVE_WARNING',
        reason: `Loan-to-value ratio of ${formatPercent(ltvRaw)} exceeds ${formatPercent(t.ltvWarning, 0)}`,
        feature: 'traditional.ltv_ratio',
      });
    } else {
      factors.push({
        sub_score: 'collateral',
        direction: 'positive',
        code: 'LTV_WITHIN_LIMIT',
        reason: `Loan-to-value ratio of ${formatPercent(ltvRaw)} is at or below ${formatPercent(t.ltvWarning, 0)}`,
        feature: 'traditional.ltv_ratio',
      });
    }

    return factors;
  }
}

function inverseScore(feature: number, comfort: number): number {
  return 100 * clampUnit((1 - feature) / (1 - comfort));
}
