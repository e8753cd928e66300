/**
 * Profile Search Prompt Template
 *
 * Asks a web-grounded model for a narrative on one public profile. The model
 * is told to answer in three labelled sections so that
 * evidence/narrative-parser.ts can pick out the summary and the bullet lists.
 */

import type { SocialPlatform } from '../types';

export interface ProfileSearchTemplate {
  systemPrompt: string;
  /**
   * Placeholders:
   * - {{platform_label}}: Human-readable platform name
   * - {{identifier}}: Profile URL or handle
   * - {{focus}}: Platform-specific signals to look for
   */
  userPromptTemplate: string;
}

interface PlatformFocus {
  label: string;
  signals: string[];
}

export const PLATFORM_FOCUS: Record<SocialPlatform, PlatformFocus> = {
  linkedin: {
    label: 'LinkedIn',
    signals: [
      'current role, employer and tenure',
      'employment gaps or frequent job changes',
      'promotions and career progression',
      'education, licenses and certifications',
      'recommendations and endorsements',
    ],
  },
  website: {
    label: 'personal or business website',
    signals: [
      'business or professional activity described',
      'consistency with stated employment',
      'licenses, credentials and client testimonials',
    ],
  },
  instagram: {
    label: 'Instagram',
    signals: [
      'lifestyle and spending patterns relative to stated income',
      'luxury purchases or frequent expensive travel',
      'gambling or other financially risky activity',
      'signs of saving, budgeting or home ownership',
    ],
  },
  tiktok: {
    label: 'TikTok',
    signals: [
      'lifestyle and spending patterns relative to stated income',
      'side income or content-creator earnings',
      'financially risky behaviour shown publicly',
    ],
  },
  facebook: {
    label: 'Facebook',
    signals: [
      'family and relationship stability',
      'community involvement and volunteering',
      'length of residence in the area and frequency of moves',
    ],
  },
  twitter: {
    label: 'X (Twitter)',
    signals: [
      'professional engagement and industry presence',
      'public conflicts or reputational issues',
      'community and civic involvement',
    ],
  },
};

export const PROFILE_SEARCH_TEMPLATE: ProfileSearchTemplate = {
  systemPrompt: `You are a research assistant supporting a mortgage underwriter.
Use only publicly available information. Do not speculate about protected characteristics
(race, religion, national origin, sex, marital status, age, disability) and do not report them.
If the profile cannot be found or is private, say so plainly and stop.
If a statement could not be confirmed from the profile itself, say it could not be verified.`,

  userPromptTemplate: `Review the public {{platform_label}} profile at: {{identifier}}

Focus on:
{{focus}}

Answer in exactly this layout:

Summary: two to four sentences describing the profile.

Positive indicators:
- one observation per line, or "- None"

Red flags:
- one observation per line, or "- None"`,
};

export function buildProfileSearchPrompt(platform: SocialPlatform, identifier: string): string {
  const focus = PLATFORM_FOCUS[platform];
  return PROFILE_SEARCH_TEMPLATE.userPromptTemplate
    .replace('{{platform_label}}', () => focus.label)
    .replace('{{identifier}}', () => identifier)
    .replace('{{focus}}', () => focus.signals.map((signal) => `- ${signal}`).join('\n'));
}
