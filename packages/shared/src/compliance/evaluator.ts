/**
 * Compliance Evaluator
 *
 * Runs every rule in table order against the raw records. Independent of the
 * risk score and of any profile evidence.
 */

import { assertTraditionalInputs, computeDtiRatio, computeLtvRatio } from '../features/ratios';
import type {
  ApplicantRecord,
  ComplianceFinding,
  ComplianceResult,
  ComplianceVerdict,
  LoanRecord,
  PropertyRecord,
} from '../types';
import {
  COMPLIANCE_RULES,
  DEFAULT_COMPLIANCE_THRESHOLDS,
  type ComplianceRule,
  type ComplianceThresholds,
} from './rules';

export function determineVerdict(findings: readonly ComplianceFinding[]): ComplianceVerdict {
  const failed = findings.filter((finding) => !finding.passed);
  if (failed.some((finding) => finding.severity === 'hard')) return 'Non-Compliant';
  if (failed.length > 0) return 'Needs Review';
  return 'Compliant';
}

export class ComplianceEvaluator {
  constructor(
    private readonly rules: readonly ComplianceRule[] = COMPLIANCE_RULES,
    private readonly thresholds: ComplianceThresholds = DEFAULT_COMPLIANCE_THRESHOLDS
  ) {}

  evaluate(applicant: ApplicantRecord, property: PropertyRecord, loan: LoanRecord): ComplianceResult {
    assertTraditionalInputs(applicant, property, loan);

    const input = {
      applicant,
      property,
      loan,
      dtiRatio: computeDtiRatio(applicant),
      ltvRatio: computeLtvRatio(loan, property),
    };

    const findings: ComplianceFinding[] = this.rules.map((rule) => {
      const outcome = rule.check(input, this.thresholds);
      return {
        rule_id: rule.id,
        description: rule.description,
        severity: rule.severity,
        threshold: outcome.threshold,
        observed: outcome.observed,
        passed: outcome.passed,
        citation: rule.citation,
      };
    });

    return { findings, verdict: determineVerdict(findings) };
  }
}
