/**
 * Shared TypeScript Types
 *
 * Data model for the underwriting pipeline. Wire-facing records use snake_case,
 * matching docs/contracts/assessment_request.schema.json.
 */

// ============================================================================
// Enumerations
// ============================================================================

export const SOCIAL_PLATFORMS = [
  'linkedin',
  'instagram',
  'twitter',
  'facebook',
  'tiktok',
  'website',
] as const;

export type SocialPlatform = (typeof SOCIAL_PLATFORMS)[number];

export const PROPERTY_TYPES = [
  'single_family',
  'townhouse',
  'condo',
  'pud',
  'multi_unit',
  'manufactured',
] as const;

export type PropertyType = (typeof PROPERTY_TYPES)[number];

export const OCCUPANCY_TYPES = ['primary', 'secondary', 'investment'] as const;

export type OccupancyType = (typeof OCCUPANCY_TYPES)[number];

export const LOAN_TYPES = [
  'conventional_30',
  'conventional_15',
  'fha_30',
  'va_30',
  'arm_7_1',
  'arm_5_1',
] as const;

export type LoanType = (typeof LOAN_TYPES)[number];

export const LOAN_PURPOSES = ['purchase', 'refinance', 'cash_out'] as const;

export type LoanPurpose = (typeof LOAN_PURPOSES)[number];

export type ConfidenceLevel = 'HIGH' | 'MEDIUM' | 'LOW';

// ============================================================================
// Input Records
// ============================================================================

export interface SocialProfileIdentifier {
  platform: SocialPlatform;
  /** Profile URL or handle, as supplied by the applicant */
  identifier: string;
}

export interface DeclaredDebt {
  type: string;
  monthly_payment: number;
}

export interface ApplicantRecord {
  full_name: string;
  email: string;
  phone: string;
  employer_name?: string;
  /** FICO-range score, 300-850 */
  credit_score: number;
  annual_income: number;
  years_employed: number;
  declared_debts: DeclaredDebt[];
  social_profiles?: SocialProfileIdentifier[];
}

export interface PropertyRecord {
  address: string;
  estimated_value: number;
  property_type: PropertyType;
  occupancy: OccupancyType;
}

export interface LoanRecord {
  loan_amount: number;
  loan_type: LoanType;
  purpose: LoanPurpose;
}

export interface AssessmentRequest {
  applicant: ApplicantRecord;
  property: PropertyRecord;
  loan: LoanRecord;
}

// ============================================================================
// Profile Evidence
// ============================================================================

export interface ProfileAnalysis {
  readonly platform: SocialPlatform;
  readonly identifier: string;
  readonly narrative: string;
  readonly summary: string;
  readonly positive_indicators: readonly string[];
  readonly red_flags: readonly string[];
  readonly confidence: ConfidenceLevel;
}

export type EvidenceFailureReason =
  | 'capability_disabled'
  | 'missing_credential'
  | 'not_found'
  | 'malformed_response'
  | 'timeout'
  | 'search_failed'
  | 'limit_exceeded'
  | 'duplicate';

export interface EvidenceWarning {
  platform: SocialPlatform;
  identifier: string;
  reason: EvidenceFailureReason;
  message: string;
}

export interface EvidenceCollection {
  analyses: ProfileAnalysis[];
  warnings: EvidenceWarning[];
}

// ============================================================================
// Features
// ============================================================================

/** Closed set of feature names; the prefix is the feature group. */
export const FEATURE_NAMES = {
  traditional: [
    'traditional.dti_ratio',
    'traditional.ltv_ratio',
    'traditional.credit_score_normalized',
    'traditional.employment_stability',
    'traditional.annual_income_normalized',
    'traditional.is_primary_residence',
    'traditional.is_cash_out',
  ],
  professional: [
    'professional.job_stability',
    'professional.career_growth',
    'professional.credibility',
  ],
  lifestyle: ['lifestyle.financial_responsibility', 'lifestyle.spending_alignment'],
  social: [
    'social.support_network',
    'social.relationship_stability',
    'social.community_rootedness',
  ],
} as const;

export type FeatureGroup = keyof typeof FEATURE_NAMES;

export type ProfileFeatureGroup = Exclude<FeatureGroup, 'traditional'>;

export const PROFILE_FEATURE_GROUPS: readonly ProfileFeatureGroup[] = [
  'professional',
  'lifestyle',
  'social',
];

export type FeatureName<G extends FeatureGroup = FeatureGroup> = (typeof FEATURE_NAMES)[G][number];

export type TraditionalFeatureName = FeatureName<'traditional'>;

export type ProfileFeatureName = FeatureName<ProfileFeatureGroup>;

/** Traditional features are always present; profile features only with their group. */
export type FeatureValues = Record<TraditionalFeatureName, number> &
  Partial<Record<ProfileFeatureName, number>>;

export type ContributionSource = 'positive_indicator' | 'red_flag' | 'narrative';

export interface FeatureContribution {
  feature: ProfileFeatureName;
  platform: SocialPlatform;
  source: ContributionSource;
  /** The indicator string, or the narrative phrase that matched */
  text: string;
  delta: number;
}

export interface FeatureVector {
  values: FeatureValues;
  groups: Record<FeatureGroup, boolean>;
  contributions: FeatureContribution[];
}

// ============================================================================
// Risk Assessment
// ============================================================================

export type SubScoreName = 'credit' | 'capacity' | 'collateral' | 'fourth_factor';

export interface SubScores {
  credit: number;
  capacity: number;
  collateral: number;
  /** Absent when no profile-derived group is present */
  fourth_factor?: number;
}

export type RiskTier = 'Low' | 'Moderate' | 'Elevated' | 'High';

export type FactorDirection = 'positive' | 'negative';

export interface RiskFactor {
  sub_score: SubScoreName;
  direction: FactorDirection;
  code: string;
  reason: string;
  feature?: FeatureName;
  platform?: SocialPlatform;
}

export interface RiskAssessment {
  sub_scores: SubScores;
  composite_score: number;
  tier: RiskTier;
  weights: Partial<Record<SubScoreName, number>>;
  factors: RiskFactor[];
  dti_ratio: number;
  ltv_ratio: number;
}

export interface LoanEstimate {
  estimated_interest_rate: number;
  estimated_monthly_payment: number;
  term_months: number;
}

// ============================================================================
// Compliance
// ============================================================================

export type RuleSeverity = 'hard' | 'soft';

export type ComplianceVerdict = 'Compliant' | 'Needs Review' | 'Non-Compliant';

export interface ComplianceFinding {
  rule_id: string;
  description: string;
  severity: RuleSeverity;
  threshold: string;
  observed: string;
  passed: boolean;
  citation: string;
}

export interface ComplianceResult {
  findings: ComplianceFinding[];
  verdict: ComplianceVerdict;
}

// ============================================================================
// Pipeline Output
// ============================================================================

export interface EvidenceSummary {
  profiles_requested: number;
  profiles_analyzed: number;
  platforms: SocialPlatform[];
  positive_indicators: string[];
  negative_indicators: string[];
  feature_groups: Record<FeatureGroup, boolean>;
  warnings: EvidenceWarning[];
  note?: string;
}

export interface PipelineResult {
  correlation_id: string;
  assessment_id: string;
  risk_assessment: RiskAssessment;
  compliance: ComplianceResult;
  evidence_summary: EvidenceSummary;
  features: FeatureValues;
  loan_estimate: LoanEstimate;
}

// ============================================================================
// API Types
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
