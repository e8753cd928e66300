/**
 * Feature Normalizer
 *
 * Maps raw applicant, property and loan fields plus profile analyses into a
 * feature vector with every value in [0, 1]. Traditional features are always
 * present. A profile group is present only when at least one analysis from a
 * platform of that group was collected; it is never imputed.
 */

import { DEFAULT_SCORING_POLICY, type NormalizationPolicy } from '../scoring/policy';
import { clampUnit, roundTo } from '../utils/math';
import { logger } from '../logger';
import {
  FEATURE_NAMES,
  PROFILE_FEATURE_GROUPS,
  type ApplicantRecord,
  type FeatureContribution,
  type FeatureGroup,
  type FeatureValues,
  type FeatureVector,
  type LoanRecord,
  type ProfileAnalysis,
  type ProfileFeatureGroup,
  type ProfileFeatureName,
  type PropertyRecord,
} from '../types';
import { assertTraditionalInputs, computeDtiRatio, computeLtvRatio } from './ratios';
import { getFeatureSignalTable, type FeatureSignalTable } from './signals';

/**
 * What happens when a group has no evidence. Traditional inputs are
 * mandatory; profile groups are left out of the vector.
 */
export const ABSENCE_POLICY: Readonly<Record<FeatureGroup, 'fail' | 'omit'>> = Object.freeze({
  traditional: 'fail',
  professional: 'omit',
  lifestyle: 'omit',
  social: 'omit',
});

const PROFILE_VALUE_DECIMALS = 4;

export function isGroupPresent(values: FeatureValues, group: ProfileFeatureGroup): boolean {
  return FEATURE_NAMES[group].every((name) => values[name] !== undefined);
}

/** Values of one present profile group, in name order. */
export function groupValues(values: FeatureValues, group: ProfileFeatureGroup): number[] {
  const result: number[] = [];
  for (const name of FEATURE_NAMES[group]) {
    const value = values[name];
    if (value !== undefined) result.push(value);
  }
  return result;
}

export class FeatureNormalizer {
  constructor(
    private readonly signals: FeatureSignalTable = getFeatureSignalTable(),
    private readonly normalization: NormalizationPolicy = DEFAULT_SCORING_POLICY.normalization
  ) {}

  extract(
    applicant: ApplicantRecord,
    property: PropertyRecord,
    loan: LoanRecord,
    analyses: readonly ProfileAnalysis[]
  ): FeatureVector {
    assertTraditionalInputs(applicant, property, loan);
    const n = this.normalization;

    const values: FeatureValues = {
      'traditional.dti_ratio': clampUnit(computeDtiRatio(applicant) / n.dtiCeiling),
      'traditional.ltv_ratio': clampUnit(computeLtvRatio(loan, property) / n.ltvCeiling),
      'traditional.credit_score_normalized': clampUnit(
        (applicant.credit_score - n.minCreditScore) / (n.maxCreditScore - n.minCreditScore)
      ),
      'traditional.employment_stability': clampUnit(applicant.years_employed / n.stabilityHorizonYears),
      'traditional.annual_income_normalized': clampUnit(applicant.annual_income / n.incomeCeiling),
      'traditional.is_primary_residence': property.occupancy === 'primary' ? 1 : 0,
      'traditional.is_cash_out': loan.purpose === 'cash_out' ? 1 : 0,
    };

    const groups: Record<FeatureGroup, boolean> = {
      traditional: true,
      professional: false,
      lifestyle: false,
      social: false,
    };
    const contributions: FeatureContribution[] = [];

    for (const group of PROFILE_FEATURE_GROUPS) {
      const groupAnalyses = analyses.filter(
        (analysis) => this.signals.groupForPlatform(analysis.platform) === group
      );
      if (groupAnalyses.length === 0 && ABSENCE_POLICY[group] === 'omit') {
        continue;
      }

      const groupContributions = this.collectContributions(group, groupAnalyses);
      for (const name of FEATURE_NAMES[group]) {
        const delta = groupContributions
          .filter((c) => c.feature === name)
          .reduce((sum, c) => sum + c.delta, 0);
        values[name] = roundTo(clampUnit(this.signals.baseline + delta), PROFILE_VALUE_DECIMALS);
      }
      contributions.push(...groupContributions);
      groups[group] = true;
    }

    logger.debug('Features extracted', {
      groups,
      contributions: contributions.length,
    });

    return { values, groups, contributions };
  }

  private collectContributions(
    group: ProfileFeatureGroup,
    analyses: readonly ProfileAnalysis[]
  ): FeatureContribution[] {
    const { deltas } = this.signals;
    const rules = this.signals.rulesFor(group);
    const contributions: FeatureContribution[] = [];

    for (const analysis of analyses) {
      for (const indicator of analysis.positive_indicators) {
        contributions.push({
          feature: this.matchFeature(group, indicator),
          platform: analysis.platform,
          source: 'positive_indicator',
          text: indicator,
          delta: deltas.positiveIndicator,
        });
      }
      for (const flag of analysis.red_flags) {
        contributions.push({
          feature: this.matchFeature(group, flag),
          platform: analysis.platform,
          source: 'red_flag',
          text: flag,
          delta: deltas.redFlag,
        });
      }

      const narrative = analysis.narrative.toLowerCase();
      for (const rule of rules) {
        for (const phrase of rule.narrativePositive) {
          if (narrative.includes(phrase)) {
            contributions.push({
              feature: rule.name,
              platform: analysis.platform,
              source: 'narrative',
              text: phrase,
              delta: deltas.narrativePositive,
            });
          }
        }
        for (const phrase of rule.narrativeNegative) {
          if (narrative.includes(phrase)) {
            contributions.push({
              feature: rule.name,
              platform: analysis.platform,
              source: 'narrative',
              text: phrase,
              delta: deltas.narrativeNegative,
            });
          }
        }
      }
    }

    return contributions;
  }

  /** First rule of the group with a keyword in the text, else the group fallback. */
  private matchFeature(group: ProfileFeatureGroup, text: string): ProfileFeatureName {
    const lowered = text.toLowerCase();
    const rule = this.signals
      .rulesFor(group)
      .find((candidate) => candidate.keywords.some((keyword) => lowered.includes(keyword)));
    return rule ? rule.name : this.signals.fallbackFeature(group);
  }
}
