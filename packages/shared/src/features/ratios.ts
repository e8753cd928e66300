/**
 * Raw underwriting ratios and the range checks the pipeline relies on.
 *
 * Records reach the pipeline already validated by the transport layer; a
 * failure here means a defect upstream and is raised as InputDefectError.
 */

import { InputDefectError } from '../errors';
import {
  LOAN_PURPOSES,
  LOAN_TYPES,
  OCCUPANCY_TYPES,
  PROPERTY_TYPES,
  type ApplicantRecord,
  type LoanRecord,
  type PropertyRecord,
} from '../types';

const MIN_CREDIT_SCORE = 300;
const MAX_CREDIT_SCORE = 850;

function requireNumber(
  field: string,
  value: unknown,
  accept: (v: number) => boolean,
  expectation: string
): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || !accept(value)) {
    throw new InputDefectError(field, `expected ${expectation}, got ${String(value)}`);
  }
  return value;
}

function requireMember<T extends string>(field: string, value: unknown, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new InputDefectError(field, `expected one of ${allowed.join(', ')}, got ${String(value)}`);
  }
  return match;
}

/**
 * Check every raw field the traditional feature group and the compliance
 * rules read.
 */
export function assertTraditionalInputs(
  applicant: ApplicantRecord,
  property: PropertyRecord,
  loan: LoanRecord
): void {
  requireNumber(
    'applicant.credit_score',
    applicant.credit_score,
    (v) => v >= MIN_CREDIT_SCORE && v <= MAX_CREDIT_SCORE,
    `a credit score between ${MIN_CREDIT_SCORE} and ${MAX_CREDIT_SCORE}`
  );
  requireNumber('applicant.annual_income', applicant.annual_income, (v) => v > 0, 'a positive income');
  requireNumber('applicant.years_employed', applicant.years_employed, (v) => v >= 0, 'a non-negative number');

  if (!Array.isArray(applicant.declared_debts)) {
    throw new InputDefectError('applicant.declared_debts', 'expected a list of declared debts');
  }
  applicant.declared_debts.forEach((debt, index) => {
    requireNumber(
      `applicant.declared_debts[${index}].monthly_payment`,
      debt.monthly_payment,
      (v) => v >= 0,
      'a non-negative monthly payment'
    );
  });

  requireNumber('property.estimated_value', property.estimated_value, (v) => v > 0, 'a positive value');
  requireMember('property.property_type', property.property_type, PROPERTY_TYPES);
  requireMember('property.occupancy', property.occupancy, OCCUPANCY_TYPES);

  requireNumber('loan.loan_amount', loan.loan_amount, (v) => v > 0, 'a positive amount');
  requireMember('loan.loan_type', loan.loan_type, LOAN_TYPES);
  requireMember('loan.purpose', loan.purpose, LOAN_PURPOSES);
}

export function totalMonthlyDebt(applicant: ApplicantRecord): number {
  return applicant.declared_debts.reduce((sum, debt) => sum + debt.monthly_payment, 0);
}

/**
 * Monthly debt obligations over monthly gross income, unclamped.
 */
export function computeDtiRatio(applicant: ApplicantRecord): number {
  const monthlyIncome =
    requireNumber('applicant.annual_income', applicant.annual_income, (v) => v > 0, 'a positive income') / 12;
  return totalMonthlyDebt(applicant) / monthlyIncome;
}

/**
 * Loan amount over estimated property value, unclamped.
 */
export function computeLtvRatio(loan: LoanRecord, property: PropertyRecord): number {
  const value = requireNumber(
    'property.estimated_value',
    property.estimated_value,
    (v) => v > 0,
    'a positive value'
  );
  return loan.loan_amount / value;
}
