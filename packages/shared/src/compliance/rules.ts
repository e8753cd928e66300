/**
 * Compliance rule table. Each rule is a pure check over the raw records and
 * the unclamped ratios; thresholds are data, not code.
 */

import { ConfigurationDefectError } from '../errors';
import { formatCurrency, formatPercent } from '../utils/math';
import {
  LOAN_TYPES,
  OCCUPANCY_TYPES,
  PROPERTY_TYPES,
  type ApplicantRecord,
  type LoanRecord,
  type LoanType,
  type OccupancyType,
  type PropertyRecord,
  type PropertyType,
  type RuleSeverity,
} from '../types';

export interface ComplianceThresholds {
  readonly minCreditScore: Readonly<Record<LoanType, number>>;
  readonly maxDti: Readonly<Record<LoanType, number>>;
  readonly preferredDti: number;
  readonly maxLtvByOccupancy: Readonly<Record<OccupancyType, number>>;
  readonly maxCashOutLtv: number;
  readonly eligiblePropertyTypes: Readonly<Record<LoanType, readonly PropertyType[]>>;
  readonly minAnnualIncome: number;
  readonly minEmploymentYears: number;
}

export interface RuleInput {
  readonly applicant: ApplicantRecord;
  readonly property: PropertyRecord;
  readonly loan: LoanRecord;
  readonly dtiRatio: number;
  readonly ltvRatio: number;
}

export interface RuleOutcome {
  passed: boolean;
  threshold: string;
  observed: string;
}

export interface ComplianceRule {
  readonly id: string;
  readonly description: string;
  readonly severity: RuleSeverity;
  readonly citation: string;
  check(input: RuleInput, thresholds: ComplianceThresholds): RuleOutcome;
}

const STANDARD_PROPERTY_TYPES: readonly PropertyType[] = Object.freeze([
  'single_family',
  'townhouse',
  'condo',
  'pud',
  'multi_unit',
]);

export const DEFAULT_COMPLIANCE_THRESHOLDS: ComplianceThresholds = Object.freeze({
  minCreditScore: Object.freeze({
    conventional_30: 620,
    conventional_15: 620,
    fha_30: 580,
    va_30: 580,
    arm_7_1: 640,
    arm_5_1: 640,
  }),
  maxDti: Object.freeze({
    conventional_30: 0.5,
    conventional_15: 0.5,
    fha_30: 0.57,
    va_30: 0.6,
    arm_7_1: 0.45,
    arm_5_1: 0.45,
  }),
  preferredDti: 0.43,
  maxLtvByOccupancy: Object.freeze({
    primary: 0.97,
    secondary: 0.9,
    investment: 0.85,
  }),
  maxCashOutLtv: 0.8,
  eligiblePropertyTypes: Object.freeze({
    conventional_30: STANDARD_PROPERTY_TYPES,
    conventional_15: STANDARD_PROPERTY_TYPES,
    fha_30: PROPERTY_TYPES,
    va_30: PROPERTY_TYPES,
    arm_7_1: STANDARD_PROPERTY_TYPES,
    arm_5_1: STANDARD_PROPERTY_TYPES,
  }),
  minAnnualIncome: 12_000,
  minEmploymentYears: 2,
});

export const COMPLIANCE_RULES: readonly ComplianceRule[] = Object.freeze([
  {
    id: 'MIN_CREDIT_SCORE',
    description: 'Minimum credit score for the loan program',
    severity: 'hard',
    citation: 'Fannie Mae Selling Guide B3-5.1-01; HUD Handbook 4000.1 II.A.1.b',
    check: ({ applicant, loan }, t) => {
      const min = t.minCreditScore[loan.loan_type];
      return {
        passed: applicant.credit_score >= min,
        threshold: `>= ${min}`,
        observed: String(applicant.credit_score),
      };
    },
  },
  {
    id: 'MAX_DTI',
    description: 'Maximum debt-to-income ratio for the loan program',
    severity: 'hard',
    citation: 'Fannie Mae Selling Guide B3-6-02',
    check: ({ loan, dtiRatio }, t) => {
      const max = t.maxDti[loan.loan_type];
      return {
        passed: dtiRatio <= max,
        threshold: `<= ${formatPercent(max)}`,
        observed: formatPercent(dtiRatio),
      };
    },
  },
  {
    id: 'PREFERRED_DTI',
    description: 'Debt-to-income ratio within the qualified mortgage guideline',
    severity: 'soft',
    citation: '12 CFR 1026.43(e)',
    check: ({ dtiRatio }, t) => ({
      passed: dtiRatio <= t.preferredDti,
      threshold: `<= ${formatPercent(t.preferredDti)}`,
      observed: formatPercent(dtiRatio),
    }),
  },
  {
    id: 'MAX_LTV_OCCUPANCY',
    description: 'Maximum loan-to-value ratio for the occupancy type',
    severity: 'hard',
    citation: 'Fannie Mae Eligibility Matrix',
    check: ({ property, ltvRatio }, t) => {
      const max = t.maxLtvByOccupancy[property.occupancy];
      return {
        passed: ltvRatio <= max,
        threshold: `<= ${formatPercent(max)} (${property.occupancy})`,
        observed: formatPercent(ltvRatio),
      };
    },
  },
  {
    id: 'MAX_LTV_CASH_OUT',
    description: 'Maximum loan-to-value ratio for cash-out refinance',
    severity: 'hard',
    citation: 'Fannie Mae Selling Guide B2-1.3-03',
    check: ({ loan, ltvRatio }, t) => ({
      passed: loan.purpose !== 'cash_out' || ltvRatio <= t.maxCashOutLtv,
      threshold: `<= ${formatPercent(t.maxCashOutLtv)} when cash-out`,
      observed: `${formatPercent(ltvRatio)} (${loan.purpose})`,
    }),
  },
  {
    id: 'PROPERTY_ELIGIBILITY',
    description: 'Property type eligible for the loan program',
    severity: 'hard',
    citation: 'Fannie Mae Selling Guide B2-3-01',
    check: ({ property, loan }, t) => {
      const eligible = t.eligiblePropertyTypes[loan.loan_type];
      return {
        passed: eligible.includes(property.property_type),
        threshold: eligible.join(', '),
        observed: property.property_type,
      };
    },
  },
  {
    id: 'MIN_DOCUMENTED_INCOME',
    description: 'Minimum documented annual income',
    severity: 'hard',
    citation: 'Fannie Mae Selling Guide B3-3.1-01',
    check: ({ applicant }, t) => ({
      passed: applicant.annual_income >= t.minAnnualIncome,
      threshold: `>= ${formatCurrency(t.minAnnualIncome)}`,
      observed: formatCurrency(applicant.annual_income),
    }),
  },
  {
    id: 'EMPLOYMENT_HISTORY',
    description: 'Two-year employment history',
    severity: 'soft',
    citation: 'Fannie Mae Selling Guide B3-3.1-01',
    check: ({ applicant }, t) => ({
      passed: applicant.years_employed >= t.minEmploymentYears,
      threshold: `>= ${t.minEmploymentYears} years`,
      observed: `${applicant.years_employed} years`,
    }),
  },
  {
    id: 'INVESTMENT_OCCUPANCY',
    description: 'Investment property requires additional reserves review',
    severity: 'soft',
    citation: 'Fannie Mae Selling Guide B2-1.1-01',
    check: ({ property }) => ({
      passed: property.occupancy !== 'investment',
      threshold: 'primary or secondary occupancy',
      observed: property.occupancy,
    }),
  },
] satisfies ComplianceRule[]);

/**
 * Throws ConfigurationDefectError when a rule id repeats or a threshold is
 * missing or out of range for any loan type or occupancy.
 */
export function validateComplianceTable(
  rules: readonly ComplianceRule[],
  thresholds: ComplianceThresholds
): void {
  const problems: string[] = [];

  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.id)) problems.push(`rule ${rule.id} is defined twice`);
    seen.add(rule.id);
    if (rule.severity !== 'hard' && rule.severity !== 'soft') {
      problems.push(`rule ${rule.id} has unknown severity ${String(rule.severity)}`);
    }
  }

  for (const loanType of LOAN_TYPES) {
    const minCredit = thresholds.minCreditScore[loanType];
    if (!(minCredit >= 300 && minCredit <= 850)) {
      problems.push(`minCreditScore.${loanType} must be between 300 and 850`);
    }
    const maxDti = thresholds.maxDti[loanType];
    if (!(maxDti > 0 && maxDti <= 1)) problems.push(`maxDti.${loanType} must be in (0, 1]`);
    const eligible = thresholds.eligiblePropertyTypes[loanType];
    if (!eligible || eligible.length === 0) {
      problems.push(`eligiblePropertyTypes.${loanType} must not be empty`);
    }
  }

  for (const occupancy of OCCUPANCY_TYPES) {
    const maxLtv = thresholds.maxLtvByOccupancy[occupancy];
    if (!(maxLtv > 0 && maxLtv <= 1.05)) {
      problems.push(`maxLtvByOccupancy.${occupancy} must be in (0, 1.05]`);
    }
  }

  if (!(thresholds.preferredDti > 0 && thresholds.preferredDti <= 1)) {
    problems.push('preferredDti must be in (0, 1]');
  }
  if (!(thresholds.maxCashOutLtv > 0 && thresholds.maxCashOutLtv <= 1)) {
    problems.push('maxCashOutLtv must be in (0, 1]');
  }
  if (!(thresholds.minAnnualIncome >= 0)) problems.push('minAnnualIncome must not be negative');
  if (!(thresholds.minEmploymentYears >= 0)) problems.push('minEmploymentYears must not be negative');

  if (problems.length > 0) {
    throw new ConfigurationDefectError('Compliance table is invalid', problems);
  }
}
