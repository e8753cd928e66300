/**
 * JSON Schema Validation
 *
 * Ajv validation for assessment requests (transport boundary) and for the
 * feature signal table (startup).
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import { ConfigurationDefectError } from './errors';
import type { AssessmentRequest } from './types';
import type { FeatureSignalDocument } from './features/signals';

const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const schema: object = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
      return schema;
    }
  }

  throw new ConfigurationDefectError(`Schema file not found: ${schemaName}`);
}

let assessmentRequestValidator: ValidateFunction<AssessmentRequest> | null = null;
let featureSignalValidator: ValidateFunction<FeatureSignalDocument> | null = null;

function getAssessmentRequestValidator(): ValidateFunction<AssessmentRequest> {
  if (!assessmentRequestValidator) {
    assessmentRequestValidator = ajv.compile<AssessmentRequest>(
      loadSchema('assessment_request.schema.json')
    );
  }
  return assessmentRequestValidator;
}

function getFeatureSignalValidator(): ValidateFunction<FeatureSignalDocument> {
  if (!featureSignalValidator) {
    featureSignalValidator = ajv.compile<FeatureSignalDocument>(
      loadSchema('feature_signals.schema.json')
    );
  }
  return featureSignalValidator;
}

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string[] };

function formatErrors<T>(validate: ValidateFunction<T>): string[] {
  return (validate.errors || []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

/**
 * Validate an incoming assessment request body
 */
export function validateAssessmentRequest(data: unknown): ValidationResult<AssessmentRequest> {
  const validate = getAssessmentRequestValidator();

  if (!validate(data)) {
    const errors = formatErrors(validate);
    logger.warn('AssessmentRequest validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true, value: data };
}

/**
 * Structural check of the feature signal table. Cross-references between
 * feature names and groups are checked by the loader.
 */
export function validateFeatureSignalDocument(
  data: unknown
): ValidationResult<FeatureSignalDocument> {
  const validate = getFeatureSignalValidator();
  return validate(data) ? { valid: true, value: data } : { valid: false, errors: formatErrors(validate) };
}
