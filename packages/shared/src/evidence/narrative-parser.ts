/**
 * Turns a free-text profile narrative into a ProfileAnalysis.
 *
 * Expected layout (see templates/profile-search.template.ts):
 *
 *   Summary: ...
 *   Positive indicators:
 *   - ...
 *   Red flags:
 *   - ...
 *
 * Markdown emphasis around headings and citation markers such as [1] are
 * tolerated. Anything that is not a bullet under a known heading is ignored.
 */

import { EvidenceUnavailableError } from '../errors';
import type { ConfidenceLevel, ProfileAnalysis, SocialPlatform } from '../types';

export const SUMMARY_MAX_LENGTH = 400;
const MIN_ITEM_LENGTH = 4;
const LOW_CONFIDENCE_LENGTH = 200;
const HIGH_CONFIDENCE_LENGTH = 600;

const UNAVAILABLE_MARKERS = [
  'profile not found',
  'profile could not be found',
  'could not find any',
  'no public information',
  'profile is private',
  'account is private',
  'unable to access',
  'does not exist',
];

const UNVERIFIED_MARKERS = ['could not be verified', 'unable to verify'];

const EMPTY_ITEMS = new Set(['none', 'none identified', 'none found', 'none noted', 'n/a']);

const BULLET = /^(?:[-•*]|\d+[.)])\s+(.*)$/;
const KNOWN_HEADING =
  /^(summary|positive indicators?|strengths|red flags?|concerns)\s*(?::\s*(.*))?$/i;

type Section = 'none' | 'summary' | 'positive' | 'red' | 'other';

interface Heading {
  section: Section;
  rest: string;
}

function stripMarkup(text: string): string {
  return text
    .replace(/\*\*|__/g, '')
    .replace(/\[\d+\]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function parseHeading(line: string): Heading | null {
  const cleaned = line.replace(/[*_#]/g, '').trim();
  const known = KNOWN_HEADING.exec(cleaned);
  if (known) {
    const label = known[1].toLowerCase();
    const section: Section = label === 'summary'
      ? 'summary'
      : label.startsWith('positive') || label === 'strengths'
        ? 'positive'
        : 'red';
    return { section, rest: stripMarkup(known[2] ?? '') };
  }
  if (cleaned.endsWith(':') && cleaned.length <= 60) {
    return { section: 'other', rest: '' };
  }
  return null;
}

function keepItem(text: string): boolean {
  const normalized = text.toLowerCase().replace(/\.$/, '');
  return normalized.length >= MIN_ITEM_LENGTH && !EMPTY_ITEMS.has(normalized);
}

function truncateSummary(text: string): string {
  if (text.length <= SUMMARY_MAX_LENGTH) return text;
  return `${text.slice(0, SUMMARY_MAX_LENGTH - 3).trimEnd()}...`;
}

/** First paragraph made of plain prose lines. */
function firstParagraph(narrative: string): string {
  for (const paragraph of narrative.split(/\n\s*\n/)) {
    const lines = paragraph
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line && !BULLET.test(line) && !parseHeading(line));
    if (lines.length > 0) {
      return stripMarkup(lines.join(' '));
    }
  }
  return '';
}

export function assessConfidence(
  narrative: string,
  indicatorCount: number
): ConfidenceLevel {
  const lowered = narrative.toLowerCase();
  if (
    narrative.length < LOW_CONFIDENCE_LENGTH ||
    UNVERIFIED_MARKERS.some((marker) => lowered.includes(marker))
  ) {
    return 'LOW';
  }
  if (narrative.length >= HIGH_CONFIDENCE_LENGTH && indicatorCount >= 2) {
    return 'HIGH';
  }
  return 'MEDIUM';
}

/**
 * @throws EvidenceUnavailableError when the narrative is blank or says the
 * profile could not be reached
 */
export function parseProfileNarrative(
  platform: SocialPlatform,
  identifier: string,
  narrative: string
): ProfileAnalysis {
  const text = narrative.trim();
  if (!text) {
    throw new EvidenceUnavailableError('malformed_response', 'Profile narrative is empty');
  }

  const summaryLines: string[] = [];
  const positives: string[] = [];
  const redFlags: string[] = [];
  let section: Section = 'none';

  const addItem = (target: Section, item: string): void => {
    const cleaned = stripMarkup(item);
    if (!keepItem(cleaned)) return;
    if (target === 'positive') positives.push(cleaned);
    if (target === 'red') redFlags.push(cleaned);
  };

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!line) {
      if (section === 'summary' && summaryLines.length > 0) section = 'other';
      continue;
    }

    const bullet = BULLET.exec(line);
    if (bullet) {
      if (section === 'positive' || section === 'red') addItem(section, bullet[1]);
      continue;
    }

    const heading = parseHeading(line);
    if (heading) {
      section = heading.section;
      if (heading.rest) {
        if (section === 'summary') summaryLines.push(heading.rest);
        else addItem(section, heading.rest);
      }
      continue;
    }

    if (section === 'summary') {
      summaryLines.push(stripMarkup(line));
    } else if (section === 'positive' || section === 'red') {
      section = 'other';
    }
  }

  const lowered = text.toLowerCase();
  if (
    positives.length === 0 &&
    redFlags.length === 0 &&
    UNAVAILABLE_MARKERS.some((marker) => lowered.includes(marker))
  ) {
    throw new EvidenceUnavailableError('not_found', `No public ${platform} profile could be analysed`);
  }

  const summary = summaryLines.length > 0 ? summaryLines.join(' ') : firstParagraph(text);

  return Object.freeze({
    platform,
    identifier,
    narrative: text,
    summary: truncateSummary(summary),
    positive_indicators: Object.freeze(positives),
    red_flags: Object.freeze(redFlags),
    confidence: assessConfidence(text, positives.length + redFlags.length),
  });
}
