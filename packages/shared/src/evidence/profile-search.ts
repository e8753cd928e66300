/**
 * Profile search capability.
 *
 * The collector only sees the ProfileSearch interface. The production
 * implementation talks to any OpenAI-compatible chat completions endpoint;
 * the default base URL points at a web-grounded search model.
 */

import OpenAI from 'openai';
import type { Config } from '../config';
import { EvidenceUnavailableError } from '../errors';
import { logger } from '../logger';
import { profileSearchDurationHistogram } from '../metrics';
import { PROFILE_SEARCH_TEMPLATE, buildProfileSearchPrompt } from '../templates/profile-search.template';
import type { SocialPlatform } from '../types';

export interface ProfileSearchOptions {
  /** Aborted when the caller stops waiting for this lookup */
  signal?: AbortSignal;
}

export interface ProfileSearch {
  readonly name: string;
  /** Resolves to the raw narrative for one profile. */
  search(platform: SocialPlatform, identifier: string, options?: ProfileSearchOptions): Promise<string>;
}

export interface OpenAiProfileSearchOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

export class OpenAiProfileSearch implements ProfileSearch {
  readonly name = 'openai-compatible';
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAiProfileSearchOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async search(
    platform: SocialPlatform,
    identifier: string,
    options: ProfileSearchOptions = {}
  ): Promise<string> {
    const model = this.options.model;
    const startTime = Date.now();

    logger.debug('Searching profile', { platform, model });

    try {
      const response = await this.client.chat.completions.create(
        {
          model,
          messages: [
            { role: 'system', content: PROFILE_SEARCH_TEMPLATE.systemPrompt },
            { role: 'user', content: buildProfileSearchPrompt(platform, identifier) },
          ],
          temperature: 0.2,
          max_tokens: 3000,
        },
        { signal: options.signal }
      );

      const content = response.choices[0]?.message?.content;
      if (!content || !content.trim()) {
        throw new EvidenceUnavailableError('malformed_response', 'Profile search returned no content');
      }

      logger.info('Profile search complete', {
        platform,
        model,
        request_id: response.id,
        duration_ms: Date.now() - startTime,
        tokens_used: response.usage?.total_tokens,
      });

      return content;
    } catch (error) {
      if (error instanceof OpenAI.APIError && (error.status === 401 || error.status === 403)) {
        throw new EvidenceUnavailableError(
          'missing_credential',
          `Profile search rejected the credential (HTTP ${error.status})`
        );
      }
      if (error instanceof OpenAI.APIError && error.status === 404) {
        throw new EvidenceUnavailableError('not_found', `Profile search model or endpoint not found`);
      }
      throw error;
    } finally {
      profileSearchDurationHistogram.observe({ model }, (Date.now() - startTime) / 1000);
    }
  }
}

/**
 * Returns null when the capability is switched off or has no credential;
 * the collector then reports every identifier as unavailable.
 */
export function createProfileSearch(config: Config): ProfileSearch | null {
  if (!config.profileSearchEnabled) {
    logger.info('Profile search disabled by configuration');
    return null;
  }
  if (!config.profileSearchApiKey) {
    logger.warn('Profile search enabled but no API key configured; profile evidence unavailable');
    return null;
  }

  return new OpenAiProfileSearch({
    apiKey: config.profileSearchApiKey,
    baseUrl: config.profileSearchBaseUrl,
    model: config.profileSearchModel,
    timeoutMs: config.profileLookupTimeoutMs,
  });
}
