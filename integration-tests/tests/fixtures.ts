/**
 * Test fixtures and an in-process profile search stub.
 */

import {
  loadConfig,
  type ApplicantRecord,
  type Config,
  type LoanRecord,
  type ProfileSearch,
  type ProfileSearchOptions,
  type PropertyRecord,
  type SocialPlatform,
} from '@riskline/shared';

export function makeApplicant(overrides: Partial<ApplicantRecord> = {}): ApplicantRecord {
  return {
    full_name: 'Jordan Example',
    email: 'jordan@example.com',
    phone: '555-0100',
    employer_name: 'Example Corp',
    credit_score: 720,
    annual_income: 95_000,
    years_employed: 5,
    declared_debts: [{ type: 'auto', monthly_payment: 500 }],
    ...overrides,
  };
}

export function makeProperty(overrides: Partial<PropertyRecord> = {}): PropertyRecord {
  return {
    address: '12 Test Lane, Springfield',
    estimated_value: 450_000,
    property_type: 'single_family',
    occupancy: 'primary',
    ...overrides,
  };
}

export function makeLoan(overrides: Partial<LoanRecord> = {}): LoanRecord {
  return {
    loan_amount: 350_000,
    loan_type: 'conventional_30',
    purpose: 'purchase',
    ...overrides,
  };
}

export function testConfig(overrides: Partial<Config> = {}): Config {
  return {
    ...loadConfig({}),
    profileSearchEnabled: false,
    profileSearchApiKey: '',
    ...overrides,
  };
}

export const LINKEDIN_NARRATIVE = `Summary: Jordan Example has worked as a senior analyst at the same employer for six years.

Positive indicators:
- Promoted twice at the same employer
- Holds a CPA license

Red flags:
- None`;

export const INSTAGRAM_NARRATIVE = `Summary: Public posts show frequent luxury travel.

Positive indicators:
- None

Red flags:
- Frequent luxury vacations abroad
- Posts about casino weekends`;

export type StubBehaviour =
  | { narrative: string; delayMs?: number }
  | { error: Error }
  /** Never settles on its own; rejects once the caller aborts */
  | { hang: true };

export interface StubCall {
  platform: SocialPlatform;
  identifier: string;
  signal?: AbortSignal;
}

/** Responds per identifier; unknown identifiers get a not-found narrative. */
export class StubProfileSearch implements ProfileSearch {
  readonly name = 'stub';
  readonly calls: StubCall[] = [];

  constructor(private readonly behaviours: Record<string, StubBehaviour>) {}

  async search(
    platform: SocialPlatform,
    identifier: string,
    options: ProfileSearchOptions = {}
  ): Promise<string> {
    this.calls.push({ platform, identifier, signal: options.signal });
    const behaviour = this.behaviours[identifier];

    if (behaviour === undefined) {
      return 'Profile not found.';
    }
    if ('error' in behaviour) {
      throw behaviour.error;
    }
    if ('hang' in behaviour) {
      return new Promise<string>((_, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    }
    const { narrative, delayMs } = behaviour;
    if (delayMs) {
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
    return narrative;
  }
}
