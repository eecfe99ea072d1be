import type { ConfidenceLevel, DataCoverage } from './types.js';

export interface ConfidenceThresholds {
  /** Fewest tracked points that can earn HIGH */
  minPointsForHigh: number;
  /** stdDev must stay strictly below `maxCv x mean` for HIGH */
  maxCv: number;
}

export const DEFAULT_CONFIDENCE_THRESHOLDS: ConfidenceThresholds = {
  minPointsForHigh: 5,
  maxCv: 0.2,
};

/**
 * Seed coverage and single observations are LOW; enough tightly clustered
 * tracked points are HIGH; every other tracked case is MEDIUM.
 */
export function classifyConfidence(
  count: number,
  stdDev: number,
  mean: number,
  coverage: DataCoverage,
  thresholds: ConfidenceThresholds = DEFAULT_CONFIDENCE_THRESHOLDS
): ConfidenceLevel {
  if (coverage === 'seed' || count <= 1) {
    return 'LOW';
  }
  if (count >= thresholds.minPointsForHigh && stdDev < thresholds.maxCv * mean) {
    return 'HIGH';
  }
  return 'MEDIUM';
}

const CONFIDENCE_ORDER: readonly ConfidenceLevel[] = ['LOW', 'MEDIUM', 'HIGH'];

/**
 * A project is only as certain as its least certain line item. An empty
 * list has nothing uncertain in it and is HIGH.
 */
export function overallConfidence(levels: readonly ConfidenceLevel[]): ConfidenceLevel {
  let lowest: ConfidenceLevel = 'HIGH';
  for (const level of levels) {
    if (CONFIDENCE_ORDER.indexOf(level) < CONFIDENCE_ORDER.indexOf(lowest)) {
      lowest = level;
    }
  }
  return lowest;
}
