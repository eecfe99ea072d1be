import { median, summarize } from './statistics.js';
import type { StatisticSet } from './types.js';

export const DEFAULT_OUTLIER_THRESHOLD_MULTIPLIER = 3;

/**
 * Indices of values strictly greater than `thresholdMultiplier x median`.
 * A zero median flags nothing. Returns [] for an empty sequence.
 */
export function detectOutliers(
  values: readonly number[],
  thresholdMultiplier: number = DEFAULT_OUTLIER_THRESHOLD_MULTIPLIER
): number[] {
  if (values.length === 0) return [];

  const baseline = median(values);
  if (baseline === 0) return [];

  const threshold = thresholdMultiplier * baseline;
  const indices: number[] = [];
  values.forEach((value, index) => {
    if (value > threshold) {
      indices.push(index);
    }
  });
  return indices;
}

/**
 * Statistics over `values` without the flagged indices. When every value is
 * flagged the full set is used instead, so this never sees empty input.
 */
export function robustStatistics(
  values: readonly number[],
  outlierIndices: readonly number[],
  targetPercentile: number
): StatisticSet {
  const excluded = new Set(outlierIndices);
  const kept = values.filter((_, index) => !excluded.has(index));
  return summarize(kept.length > 0 ? kept : values, targetPercentile);
}
