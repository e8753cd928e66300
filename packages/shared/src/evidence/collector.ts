/**
 * Profile Evidence Collector
 *
 * Looks up each supplied profile identifier concurrently, each lookup bounded
 * by its own timeout. A failed or slow lookup becomes a warning; it never
 * fails the collection or cancels its siblings.
 */

import { EvidenceUnavailableError } from '../errors';
import { logger } from '../logger';
import { profileLookupsCounter } from '../metrics';
import type {
  EvidenceCollection,
  EvidenceFailureReason,
  EvidenceWarning,
  ProfileAnalysis,
  SocialProfileIdentifier,
} from '../types';
import { parseProfileNarrative } from './narrative-parser';
import type { ProfileSearch } from './profile-search';

export interface CollectorOptions {
  lookupTimeoutMs: number;
  maxLookups: number;
}

export const DEFAULT_COLLECTOR_OPTIONS: CollectorOptions = {
  lookupTimeoutMs: 30_000,
  maxLookups: 5,
};

type LookupOutcome = { analysis: ProfileAnalysis } | { warning: EvidenceWarning };

function warningFor(
  profile: SocialProfileIdentifier,
  reason: EvidenceFailureReason,
  message: string
): EvidenceWarning {
  return { platform: profile.platform, identifier: profile.identifier, reason, message };
}

/**
 * Splits repeated (platform, identifier) pairs from first occurrences; both
 * lists keep input order. Identifiers compare trimmed and case-insensitively.
 */
export function dedupeProfiles(profiles: readonly SocialProfileIdentifier[]): {
  unique: SocialProfileIdentifier[];
  duplicates: SocialProfileIdentifier[];
} {
  const seen = new Set<string>();
  const unique: SocialProfileIdentifier[] = [];
  const duplicates: SocialProfileIdentifier[] = [];
  for (const profile of profiles) {
    const key = `${profile.platform}\u0000${profile.identifier.trim().toLowerCase()}`;
    if (seen.has(key)) {
      duplicates.push(profile);
      continue;
    }
    seen.add(key);
    unique.push(profile);
  }
  return { unique, duplicates };
}

export class ProfileEvidenceCollector {
  private readonly options: CollectorOptions;

  constructor(
    private readonly search: ProfileSearch | null,
    options: Partial<CollectorOptions> = {}
  ) {
    this.options = { ...DEFAULT_COLLECTOR_OPTIONS, ...options };
  }

  get enabled(): boolean {
    return this.search !== null;
  }

  /**
   * Analyses come back in the order the identifiers were given. Every
   * identifier that yields no analysis yields exactly one warning: lookup
   * failures first, then profiles over the limit, then repeats.
   */
  async collect(profiles: readonly SocialProfileIdentifier[]): Promise<EvidenceCollection> {
    const { unique, duplicates } = dedupeProfiles(profiles);
    const accepted = unique.slice(0, this.options.maxLookups);
    const overflow = unique.slice(this.options.maxLookups);

    const skippedWarnings = [
      ...overflow.map((profile) =>
        warningFor(
          profile,
          'limit_exceeded',
          `Only the first ${this.options.maxLookups} profiles are looked up`
        )
      ),
      ...duplicates.map((profile) =>
        warningFor(profile, 'duplicate', 'Profile was already requested; looked up once')
      ),
    ];

    const search = this.search;
    if (search === null) {
      if (accepted.length > 0) {
        logger.info('Profile search unavailable; skipping profile evidence', {
          profiles: accepted.length,
        });
      }
      return {
        analyses: [],
        warnings: [
          ...accepted.map((profile) =>
            warningFor(profile, 'capability_disabled', 'Profile search is not configured')
          ),
          ...skippedWarnings,
        ],
      };
    }

    const outcomes = await Promise.all(accepted.map((profile) => this.lookup(search, profile)));

    const analyses: ProfileAnalysis[] = [];
    const warnings: EvidenceWarning[] = [];
    for (const outcome of outcomes) {
      if ('analysis' in outcome) analyses.push(outcome.analysis);
      else warnings.push(outcome.warning);
    }
    warnings.push(...skippedWarnings);

    logger.info('Profile evidence collected', {
      requested: profiles.length,
      looked_up: accepted.length,
      analyzed: analyses.length,
      warnings: warnings.length,
    });

    return { analyses, warnings };
  }

  private async lookup(
    search: ProfileSearch,
    profile: SocialProfileIdentifier
  ): Promise<LookupOutcome> {
    try {
      const narrative = await this.searchWithTimeout(search, profile);
      const analysis = parseProfileNarrative(profile.platform, profile.identifier, narrative);
      profileLookupsCounter.inc({ platform: profile.platform, status: 'success' });
      return { analysis };
    } catch (error) {
      const reason: EvidenceFailureReason =
        error instanceof EvidenceUnavailableError ? error.reason : 'search_failed';
      const message = error instanceof Error ? error.message : String(error);

      profileLookupsCounter.inc({ platform: profile.platform, status: reason });
      logger.warn('Profile lookup failed', { platform: profile.platform, reason, error: message });

      return { warning: warningFor(profile, reason, message) };
    }
  }

  private async searchWithTimeout(
    search: ProfileSearch,
    profile: SocialProfileIdentifier
  ): Promise<string> {
    const timeoutMs = this.options.lookupTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new EvidenceUnavailableError('timeout', `Profile lookup exceeded ${timeoutMs}ms`)
        );
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        search.search(profile.platform, profile.identifier, { signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
