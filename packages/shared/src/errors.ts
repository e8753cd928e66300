/**
 * Pipeline error taxonomy.
 *
 * InputDefect is fatal to one invocation, ConfigurationDefect is fatal at
 * startup. EvidenceUnavailable never leaves the evidence collector.
 */

import type { EvidenceFailureReason } from './types';

export class InputDefectError extends Error {
  readonly code = 'input_defect';

  constructor(
    readonly field: string,
    message: string
  ) {
    super(`${field}: ${message}`);
    this.name = 'InputDefectError';
  }
}

export class ConfigurationDefectError extends Error {
  readonly code = 'configuration_defect';

  constructor(
    message: string,
    readonly problems: string[] = []
  ) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message);
    this.name = 'ConfigurationDefectError';
  }
}

export class EvidenceUnavailableError extends Error {
  readonly code = 'evidence_unavailable';

  constructor(
    readonly reason: EvidenceFailureReason,
    message: string
  ) {
    super(message);
    this.name = 'EvidenceUnavailableError';
  }
}
