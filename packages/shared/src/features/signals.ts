/**
 * Feature signal table: which profile feature an indicator or narrative
 * phrase moves, and by how much. Loaded from data/feature-signals.json once
 * per process and checked against the closed feature name set.
 */

import fs from 'fs';
import path from 'path';
import { ConfigurationDefectError } from '../errors';
import { logger } from '../logger';
import { validateFeatureSignalDocument } from '../schemas';
import {
  FEATURE_NAMES,
  PROFILE_FEATURE_GROUPS,
  SOCIAL_PLATFORMS,
  type ProfileFeatureGroup,
  type ProfileFeatureName,
  type SocialPlatform,
} from '../types';

/** Shape of feature-signals.json as checked by the JSON schema. */
export interface FeatureSignalDocument {
  version: string;
  baseline: number;
  deltas: {
    positive_indicator: number;
    red_flag: number;
    narrative_positive: number;
    narrative_negative: number;
  };
  platform_groups: Record<string, string>;
  fallback_features: Record<string, string>;
  features: Array<{
    name: string;
    keywords: string[];
    narrative_positive: string[];
    narrative_negative: string[];
  }>;
}

export interface FeatureSignalRule {
  readonly name: ProfileFeatureName;
  readonly group: ProfileFeatureGroup;
  readonly keywords: readonly string[];
  readonly narrativePositive: readonly string[];
  readonly narrativeNegative: readonly string[];
}

export interface SignalDeltas {
  readonly positiveIndicator: number;
  readonly redFlag: number;
  readonly narrativePositive: number;
  readonly narrativeNegative: number;
}

export interface FeatureSignalTable {
  readonly version: string;
  readonly baseline: number;
  readonly deltas: SignalDeltas;
  groupForPlatform(platform: SocialPlatform): ProfileFeatureGroup;
  fallbackFeature(group: ProfileFeatureGroup): ProfileFeatureName;
  /** Rules of one group, in table order */
  rulesFor(group: ProfileFeatureGroup): readonly FeatureSignalRule[];
}

const PROFILE_FEATURE_NAMES: readonly ProfileFeatureName[] = PROFILE_FEATURE_GROUPS.flatMap(
  (group): readonly ProfileFeatureName[] => FEATURE_NAMES[group]
);

export function isProfileFeatureName(value: string): value is ProfileFeatureName {
  return PROFILE_FEATURE_NAMES.some((name) => name === value);
}

export function isProfileFeatureGroup(value: string): value is ProfileFeatureGroup {
  return PROFILE_FEATURE_GROUPS.some((group) => group === value);
}

export function groupOfFeature(name: ProfileFeatureName): ProfileFeatureGroup {
  const group = PROFILE_FEATURE_GROUPS.find((candidate) =>
    FEATURE_NAMES[candidate].some((member) => member === name)
  );
  if (!group) {
    throw new ConfigurationDefectError(`Feature ${name} belongs to no profile group`);
  }
  return group;
}

const lower = (phrases: readonly string[]): readonly string[] =>
  Object.freeze(phrases.map((p) => p.toLowerCase()));

/**
 * Build a table from a parsed document. Every problem found is reported in
 * one ConfigurationDefectError.
 */
export function parseFeatureSignalTable(data: unknown): FeatureSignalTable {
  const result = validateFeatureSignalDocument(data);
  if (!result.valid) {
    throw new ConfigurationDefectError('Feature signal table failed schema validation', result.errors);
  }
  const doc = result.value;
  const problems: string[] = [];

  const platformGroups = new Map<SocialPlatform, ProfileFeatureGroup>();
  for (const platform of SOCIAL_PLATFORMS) {
    const group = doc.platform_groups[platform];
    if (group === undefined) {
      problems.push(`platform ${platform} has no feature group`);
    } else if (!isProfileFeatureGroup(group)) {
      problems.push(`platform ${platform} maps to unknown group ${group}`);
    } else {
      platformGroups.set(platform, group);
    }
  }
  for (const platform of Object.keys(doc.platform_groups)) {
    if (!SOCIAL_PLATFORMS.some((known) => known === platform)) {
      problems.push(`unknown platform ${platform}`);
    }
  }

  const rules: FeatureSignalRule[] = [];
  for (const entry of doc.features) {
    if (!isProfileFeatureName(entry.name)) {
      problems.push(`unknown feature ${entry.name}`);
      continue;
    }
    if (rules.some((rule) => rule.name === entry.name)) {
      problems.push(`feature ${entry.name} is listed twice`);
      continue;
    }
    rules.push(
      Object.freeze({
        name: entry.name,
        group: groupOfFeature(entry.name),
        keywords: lower(entry.keywords),
        narrativePositive: lower(entry.narrative_positive),
        narrativeNegative: lower(entry.narrative_negative),
      })
    );
  }
  for (const name of PROFILE_FEATURE_NAMES) {
    if (!rules.some((rule) => rule.name === name)) {
      problems.push(`feature ${name} has no signal rule`);
    }
  }

  const fallbacks = new Map<ProfileFeatureGroup, ProfileFeatureName>();
  for (const group of PROFILE_FEATURE_GROUPS) {
    const fallback = doc.fallback_features[group];
    if (fallback === undefined) {
      problems.push(`group ${group} has no fallback feature`);
    } else if (!isProfileFeatureName(fallback) || groupOfFeature(fallback) !== group) {
      problems.push(`fallback ${fallback} is not a feature of group ${group}`);
    } else {
      fallbacks.set(group, fallback);
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationDefectError('Feature signal table is inconsistent', problems);
  }

  const rulesByGroup = new Map<ProfileFeatureGroup, readonly FeatureSignalRule[]>(
    PROFILE_FEATURE_GROUPS.map((group) => [
      group,
      Object.freeze(rules.filter((rule) => rule.group === group)),
    ])
  );

  return Object.freeze({
    version: doc.version,
    baseline: doc.baseline,
    deltas: Object.freeze({
      positiveIndicator: doc.deltas.positive_indicator,
      redFlag: doc.deltas.red_flag,
      narrativePositive: doc.deltas.narrative_positive,
      narrativeNegative: doc.deltas.narrative_negative,
    }),
    groupForPlatform(platform: SocialPlatform): ProfileFeatureGroup {
      const group = platformGroups.get(platform);
      if (!group) {
        throw new ConfigurationDefectError(`Platform ${platform} has no feature group`);
      }
      return group;
    },
    fallbackFeature(group: ProfileFeatureGroup): ProfileFeatureName {
      const feature = fallbacks.get(group);
      if (!feature) {
        throw new ConfigurationDefectError(`Group ${group} has no fallback feature`);
      }
      return feature;
    },
    rulesFor(group: ProfileFeatureGroup): readonly FeatureSignalRule[] {
      return rulesByGroup.get(group) ?? [];
    },
  });
}

function resolveSignalFile(): string {
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../data/feature-signals.json'),
    // Relative to shared package dist
    path.join(__dirname, '../../../../../packages/shared/data/feature-signals.json'),
    // Relative to project root
    path.join(process.cwd(), 'packages/shared/data/feature-signals.json'),
  ];

  const found = possiblePaths.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new ConfigurationDefectError('Feature signal table not found', possiblePaths);
  }
  return found;
}

export function loadFeatureSignalTable(filePath: string = resolveSignalFile()): FeatureSignalTable {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationDefectError(
      `Feature signal table at ${filePath} could not be read: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const table = parseFeatureSignalTable(data);
  logger.debug('Feature signal table loaded', { path: filePath, version: table.version });
  return table;
}

let defaultTable: FeatureSignalTable | null = null;

export function getFeatureSignalTable(): FeatureSignalTable {
  if (!defaultTable) {
    defaultTable = loadFeatureSignalTable();
  }
  return defaultTable;
}
