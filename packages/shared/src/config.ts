/**
 * Centralized Configuration
 *
 * Runtime settings read once from the environment. Scoring weights and
 * compliance thresholds are not environment-tunable; they live in
 * scoring/policy.ts and compliance/rules.ts.
 */

import { ConfigurationDefectError } from './errors';

export interface Config {
  // HTTP
  port: number;

  // Profile search capability
  profileSearchEnabled: boolean;
  profileSearchApiKey: string;
  profileSearchBaseUrl: string;
  profileSearchModel: string;
  profileLookupTimeoutMs: number;
  maxProfileLookups: number;
}

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    port: parseInteger(env.PORT, 8080),

    profileSearchEnabled: env.PROFILE_SEARCH_ENABLED !== 'false',
    profileSearchApiKey: env.PROFILE_SEARCH_API_KEY || env.OPENAI_API_KEY || '',
    profileSearchBaseUrl: env.PROFILE_SEARCH_BASE_URL || 'https://api.perplexity.ai',
    profileSearchModel: env.PROFILE_SEARCH_MODEL || 'sonar',
    profileLookupTimeoutMs: parseInteger(env.PROFILE_LOOKUP_TIMEOUT_MS, 30000),
    maxProfileLookups: parseInteger(env.MAX_PROFILE_LOOKUPS, 5),
  };
}

/**
 * Throws ConfigurationDefectError listing every out-of-range setting.
 */
export function validateConfig(config: Config): void {
  const problems: string[] = [];

  if (!(Number.isInteger(config.port) && config.port >= 0 && config.port <= 65535)) {
    problems.push(`PORT must be between 0 and 65535, got ${config.port}`);
  }
  if (!(config.profileLookupTimeoutMs > 0)) {
    problems.push(`PROFILE_LOOKUP_TIMEOUT_MS must be positive, got ${config.profileLookupTimeoutMs}`);
  }
  if (!(Number.isInteger(config.maxProfileLookups) && config.maxProfileLookups >= 0)) {
    problems.push(`MAX_PROFILE_LOOKUPS must be zero or more, got ${config.maxProfileLookups}`);
  }

  if (problems.length > 0) {
    throw new ConfigurationDefectError('Configuration is invalid', problems);
  }
}

export const config: Config = loadConfig();
