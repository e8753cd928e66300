/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, loadConfig, validateConfig, type Config } from './config';

// Errors
export { InputDefectError, ConfigurationDefectError, EvidenceUnavailableError } from './errors';

// Types
export * from './types';

// Metrics
export {
  register,
  assessmentsCounter,
  complianceVerdictCounter,
  pipelineDurationHistogram,
  profileLookupsCounter,
  profileSearchDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validateAssessmentRequest,
  validateFeatureSignalDocument,
  type ValidationResult,
} from './schemas';

// Profile evidence
export {
  ProfileEvidenceCollector,
  dedupeProfiles,
  DEFAULT_COLLECTOR_OPTIONS,
  type CollectorOptions,
} from './evidence/collector';
export {
  OpenAiProfileSearch,
  createProfileSearch,
  type ProfileSearch,
  type ProfileSearchOptions,
  type OpenAiProfileSearchOptions,
} from './evidence/profile-search';
export {
  parseProfileNarrative,
  assessConfidence,
  SUMMARY_MAX_LENGTH,
} from './evidence/narrative-parser';
export {
  PROFILE_SEARCH_TEMPLATE,
  PLATFORM_FOCUS,
  buildProfileSearchPrompt,
  type ProfileSearchTemplate,
} from './templates/profile-search.template';

// Features
export {
  FeatureNormalizer,
  ABSENCE_POLICY,
  isGroupPresent,
  groupValues,
} from './features/normalizer';
export {
  assertTraditionalInputs,
  computeDtiRatio,
  computeLtvRatio,
  totalMonthlyDebt,
} from './features/ratios';
export {
  getFeatureSignalTable,
  loadFeatureSignalTable,
  parseFeatureSignalTable,
  isProfileFeatureName,
  isProfileFeatureGroup,
  groupOfFeature,
  type FeatureSignalTable,
  type FeatureSignalRule,
  type FeatureSignalDocument,
  type SignalDeltas,
} from './features/signals';

// Scoring
export { RiskScorer } from './scoring/risk-scorer';
export {
  DEFAULT_SCORING_POLICY,
  validateScoringPolicy,
  type ScoringPolicy,
  type NormalizationPolicy,
  type TierBand,
  type FactorThresholds,
} from './scoring/policy';
export {
  estimateLoanTerms,
  monthlyPayment,
  DEFAULT_PRICING_POLICY,
  type PricingPolicy,
} from './scoring/loan-estimate';

// Compliance
export { ComplianceEvaluator, determineVerdict } from './compliance/evaluator';
export {
  COMPLIANCE_RULES,
  DEFAULT_COMPLIANCE_THRESHOLDS,
  validateComplianceTable,
  type ComplianceRule,
  type ComplianceThresholds,
  type RuleInput,
  type RuleOutcome,
} from './compliance/rules';

// Pipeline
export {
  AssessmentPipeline,
  createPipeline,
  buildEvidenceSummary,
  NO_PROFILE_EVIDENCE_NOTE,
  type PipelineComponents,
  type PipelineOverrides,
} from './pipeline/orchestrator';
