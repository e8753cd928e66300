/**
 * Contract Validation Tests
 *
 * Request payload schema and the feature signal table.
 */

import fs from 'fs';
import path from 'path';
import {
  ConfigurationDefectError,
  getFeatureSignalTable,
  parseFeatureSignalTable,
  validateAssessmentRequest,
} from '@riskline/shared';
import { makeApplicant, makeLoan, makeProperty } from './fixtures';

const SIGNAL_FILE = path.join(__dirname, '../../packages/shared/data/feature-signals.json');

function readSignalDocument(): Record<string, unknown> {
  return JSON.parse(fs.readFileSync(SIGNAL_FILE, 'utf-8'));
}

describe('Assessment request schema', () => {
  it('should accept a complete request', () => {
    const result = validateAssessmentRequest({
      applicant: makeApplicant({ social_profiles: [{ platform: 'linkedin', identifier: 'linkedin.com/in/jordan' }] }),
      property: makeProperty(),
      loan: makeLoan(),
    });
    expect(result.valid).toBe(true);
  });

  it('should reject a malformed email and an out-of-range score', () => {
    const result = validateAssessmentRequest({
      applicant: makeApplicant({ email: 'not-an-email', credit_score: 900 }),
      property: makeProperty(),
      loan: makeLoan(),
    });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors).toContain('/applicant/email: must match format "email"');
      expect(result.errors).toContain('/applicant/credit_score: must be <= 850');
    }
  });

  it('should reject an unknown platform', () => {
    const result = validateAssessmentRequest({
      applicant: { ...makeApplicant(), social_profiles: [{ platform: 'myspace', identifier: 'x' }] },
      property: makeProperty(),
      loan: makeLoan(),
    });
    expect(result.valid).toBe(false);
  });

  it('should reject a missing section', () => {
    const result = validateAssessmentRequest({ applicant: makeApplicant(), property: makeProperty() });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors).toContain("/: must have required property 'loan'");
    }
  });
});

describe('Feature signal table', () => {
  it('should load the bundled table', () => {
    const table = getFeatureSignalTable();

    expect(table.baseline).toBe(0.5);
    expect(table.groupForPlatform('linkedin')).toBe('professional');
    expect(table.groupForPlatform('tiktok')).toBe('lifestyle');
    expect(table.groupForPlatform('twitter')).toBe('social');
    expect(table.fallbackFeature('lifestyle')).toBe('lifestyle.financial_responsibility');
    expect(table.rulesFor('professional').map((rule) => rule.name)).toEqual([
      'professional.job_stability',
      'professional.career_growth',
      'professional.credibility',
    ]);
  });

  it('should reject a table missing a feature', () => {
    const doc = readSignalDocument();
    const features = Array.isArray(doc.features) ? doc.features.slice(0, -1) : [];

    try {
      parseFeatureSignalTable({ ...doc, features });
      throw new Error('expected a configuration defect');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationDefectError);
      if (error instanceof ConfigurationDefectError) {
        expect(error.problems).toEqual(['feature social.community_rootedness has no signal rule']);
      }
    }
  });

  it('should reject a fallback from another group', () => {
    const doc = readSignalDocument();
    const fallbacks = {
      professional: 'social.support_network',
      lifestyle: 'lifestyle.financial_responsibility',
      social: 'social.support_network',
    };

    expect(() => parseFeatureSignalTable({ ...doc, fallback_features: fallbacks })).toThrow(
      'fallback social.support_network is not a feature of group professional'
    );
  });

  it('should reject a document that fails the schema', () => {
    const doc = readSignalDocument();
    expect(() => parseFeatureSignalTable({ ...doc, baseline: 2 })).toThrow(ConfigurationDefectError);
  });
});
