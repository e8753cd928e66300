/**
 * Pipeline Orchestrator
 *
 * One assessment per call: range checks, concurrent profile evidence
 * collection, normalization, scoring and an independent compliance pass.
 * Missing profile evidence never fails a run; an input defect always does.
 */

import { ulid } from 'ulid';
import { config as defaultConfig, validateConfig, type Config } from '../config';
import { getContext, runWithContextAsync } from '../context';
import { logger } from '../logger';
import {
  assessmentsCounter,
  complianceVerdictCounter,
  pipelineDurationHistogram,
} from '../metrics';
import { ProfileEvidenceCollector } from '../evidence/collector';
import { createProfileSearch } from '../evidence/profile-search';
import { FeatureNormalizer } from '../features/normalizer';
import { assertTraditionalInputs, computeDtiRatio, computeLtvRatio } from '../features/ratios';
import { getFeatureSignalTable } from '../features/signals';
import { RiskScorer } from '../scoring/risk-scorer';
import { DEFAULT_SCORING_POLICY, validateScoringPolicy, type ScoringPolicy } from '../scoring/policy';
import { estimateLoanTerms } from '../scoring/loan-estimate';
import { ComplianceEvaluator } from '../compliance/evaluator';
import {
  COMPLIANCE_RULES,
  DEFAULT_COMPLIANCE_THRESHOLDS,
  validateComplianceTable,
} from '../compliance/rules';
import type {
  ApplicantRecord,
  EvidenceCollection,
  EvidenceSummary,
  FeatureVector,
  LoanRecord,
  PipelineResult,
  PropertyRecord,
  SocialPlatform,
} from '../types';

export const NO_PROFILE_EVIDENCE_NOTE =
  'No profile evidence was available; the assessment used traditional data only.';

export interface PipelineComponents {
  collector: ProfileEvidenceCollector;
  normalizer: FeatureNormalizer;
  scorer: RiskScorer;
  evaluator: ComplianceEvaluator;
}

function unique<T>(items: readonly T[]): T[] {
  return [...new Set(items)];
}

export function buildEvidenceSummary(
  requested: number,
  evidence: EvidenceCollection,
  vector: FeatureVector
): EvidenceSummary {
  const { analyses, warnings } = evidence;
  const summary: EvidenceSummary = {
    profiles_requested: requested,
    profiles_analyzed: analyses.length,
    platforms: unique<SocialPlatform>(analyses.map((a) => a.platform)),
    positive_indicators: unique(analyses.flatMap((a) => a.positive_indicators)),
    negative_indicators: unique(analyses.flatMap((a) => a.red_flags)),
    feature_groups: { ...vector.groups },
    warnings,
  };
  if (analyses.length === 0) {
    summary.note = NO_PROFILE_EVIDENCE_NOTE;
  }
  return summary;
}

export class AssessmentPipeline {
  constructor(private readonly components: PipelineComponents) {}

  /**
   * Each run gets its own assessment ID; the correlation ID is the caller's
   * when one is in context.
   */
  async run(applicant: ApplicantRecord, property: PropertyRecord, loan: LoanRecord): Promise<PipelineResult> {
    const correlationId = getContext()?.correlationId || ulid();
    const assessmentId = ulid();
    return runWithContextAsync({ correlationId, assessmentId }, () =>
      this.execute({ correlationId, assessmentId }, applicant, property, loan)
    );
  }

  private async execute(
    ids: { correlationId: string; assessmentId: string },
    applicant: ApplicantRecord,
    property: PropertyRecord,
    loan: LoanRecord
  ): Promise<PipelineResult> {
    const { collector, normalizer, scorer, evaluator } = this.components;
    const startTime = Date.now();

    try {
      assertTraditionalInputs(applicant, property, loan);

      const profiles = applicant.social_profiles ?? [];
      logger.info('Assessment started', {
        loan_type: loan.loan_type,
        profiles: profiles.length,
        profile_search: collector.enabled,
      });

      const compliance = evaluator.evaluate(applicant, property, loan);
      const evidence = await collector.collect(profiles);

      const vector = normalizer.extract(applicant, property, loan, evidence.analyses);
      const riskAssessment = scorer.score(
        vector,
        computeDtiRatio(applicant),
        computeLtvRatio(loan, property)
      );

      const hasFourthFactor = riskAssessment.sub_scores.fourth_factor !== undefined;
      assessmentsCounter.inc({ tier: riskAssessment.tier, fourth_factor: String(hasFourthFactor) });
      complianceVerdictCounter.inc({ verdict: compliance.verdict });
      pipelineDurationHistogram.observe({ status: 'success' }, (Date.now() - startTime) / 1000);

      logger.info('Assessment complete', {
        composite_score: riskAssessment.composite_score,
        tier: riskAssessment.tier,
        verdict: compliance.verdict,
        profiles_analyzed: evidence.analyses.length,
        duration_ms: Date.now() - startTime,
      });

      return {
        correlation_id: ids.correlationId,
        assessment_id: ids.assessmentId,
        risk_assessment: riskAssessment,
        compliance,
        evidence_summary: buildEvidenceSummary(profiles.length, evidence, vector),
        features: vector.values,
        loan_estimate: estimateLoanTerms(loan, riskAssessment),
      };
    } catch (error) {
      pipelineDurationHistogram.observe({ status: 'failed' }, (Date.now() - startTime) / 1000);
      logger.error('Assessment failed', error, { duration_ms: Date.now() - startTime });
      throw error;
    }
  }
}

export interface PipelineOverrides {
  scoringPolicy?: ScoringPolicy;
  components?: Partial<PipelineComponents>;
}

/**
 * Wire the default components from configuration. Settings, policy and rule
 * tables are checked here, so a bad value fails at startup rather than per
 * request.
 */
export function createPipeline(
  config: Config = defaultConfig,
  overrides: PipelineOverrides = {}
): AssessmentPipeline {
  validateConfig(config);
  const scoringPolicy = overrides.scoringPolicy ?? DEFAULT_SCORING_POLICY;
  validateScoringPolicy(scoringPolicy);
  validateComplianceTable(COMPLIANCE_RULES, DEFAULT_COMPLIANCE_THRESHOLDS);

  const components: PipelineComponents = {
    collector:
      overrides.components?.collector ??
      new ProfileEvidenceCollector(createProfileSearch(config), {
        lookupTimeoutMs: config.profileLookupTimeoutMs,
        maxLookups: config.maxProfileLookups,
      }),
    normalizer:
      overrides.components?.normalizer ??
      new FeatureNormalizer(getFeatureSignalTable(), scoringPolicy.normalization),
    scorer: overrides.components?.scorer ?? new RiskScorer(scoringPolicy),
    evaluator: overrides.components?.evaluator ?? new ComplianceEvaluator(),
  };

  return new AssessmentPipeline(components);
}
