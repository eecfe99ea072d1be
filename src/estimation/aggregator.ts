/**
 * Tracked-time aggregation per feature.
 *
 * A feature with no tracked entries falls back to its seed time; that is a
 * normal branch, never an error.
 */

import { normalizeName } from './normalize.js';
import { trySummarize } from './statistics.js';
import { detectOutliers, robustStatistics } from './outliers.js';
import type {
  EstimationConfig,
  Feature,
  FeatureStatistics,
  OutlierFlag,
  TrackedTimeEntry,
} from './types.js';

export type AggregationConfig = Pick<EstimationConfig, 'targetPercentile' | 'outlierThresholdMultiplier'>;

/**
 * Map of normalized feature label to the entries logged under it, in
 * input order.
 */
export function groupByFeature(entries: readonly TrackedTimeEntry[]): Map<string, TrackedTimeEntry[]> {
  const groups = new Map<string, TrackedTimeEntry[]>();
  for (const entry of entries) {
    const key = normalizeName(entry.feature);
    const group = groups.get(key);
    if (group) {
      group.push(entry);
    } else {
      groups.set(key, [entry]);
    }
  }
  return groups;
}

/**
 * Entries whose label matches the feature name or one of its synonyms.
 */
export function entriesForFeature(
  feature: Pick<Feature, 'name' | 'synonyms'>,
  entries: readonly TrackedTimeEntry[]
): TrackedTimeEntry[] {
  const labels = new Set([feature.name, ...feature.synonyms].map(normalizeName));
  return entries.filter(entry => labels.has(normalizeName(entry.feature)));
}

export function seedStatistics(
  feature: Pick<Feature, 'name' | 'seedTimeHours'>,
  targetPercentile: number
): FeatureStatistics {
  const hours = feature.seedTimeHours;
  return {
    featureName: feature.name,
    count: 0,
    mean: hours,
    median: hours,
    percentile: hours,
    targetPercentile,
    stdDev: 0,
    dataCoverage: 'seed',
  };
}

export function statisticsFor(
  feature: Pick<Feature, 'name' | 'synonyms' | 'seedTimeHours'>,
  entries: readonly TrackedTimeEntry[],
  config: AggregationConfig
): FeatureStatistics {
  const matched = entriesForFeature(feature, entries);
  const values = matched.map(entry => entry.hours);

  const summary = trySummarize(values, config.targetPercentile);
  if (!summary.ok) {
    return seedStatistics(feature, config.targetPercentile);
  }

  const stats: FeatureStatistics = {
    featureName: feature.name,
    ...summary.value,
    targetPercentile: config.targetPercentile,
    dataCoverage: 'tracked',
  };

  const flagged = detectOutliers(values, config.outlierThresholdMultiplier);
  if (flagged.length > 0) {
    const threshold = config.outlierThresholdMultiplier * summary.value.median;
    stats.outliers = flagged.map((index): OutlierFlag => ({
      entryId: matched[index].id,
      value: values[index],
      threshold,
    }));
    stats.robust = robustStatistics(values, flagged, config.targetPercentile);
  }

  return stats;
}
