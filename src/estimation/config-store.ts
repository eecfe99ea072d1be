/**
 * ConfigStore - versioned estimation configuration
 *
 * Each change produces a new frozen snapshot with version + 1 and publishes
 * `config:changed`. Computations read one snapshot from start to end.
 */

import { ValidationError } from '../models/errors.js';
import { logger } from '../logging/index.js';
import { createEvent } from '../events/index.js';
import type { EventBus } from '../events/index.js';
import { DEFAULT_OVERLAP_KEYWORDS } from './overlap.js';
import { isEstimationStyle } from './types.js';
import type {
  EstimationConfig,
  EstimationConfigSnapshot,
  EstimationConfigView,
  EstimationStyle,
  ExperienceMultipliers,
} from './types.js';

const log = logger.child('ConfigStore');

export const DEFAULT_ESTIMATION_CONFIG: EstimationConfigView = Object.freeze({
  style: 'median',
  targetPercentile: 80,
  workingHoursPerDay: 8,
  experienceMultipliers: Object.freeze({ junior: 1.5, mid: 1.0, senior: 0.8 }),
  bufferPercentage: 0,
  outlierThresholdMultiplier: 3,
  minPointsForHighConfidence: 5,
  highConfidenceMaxCv: 0.2,
  useRobustStatistics: true,
  overlapKeywords: [...DEFAULT_OVERLAP_KEYWORDS],
});

function requirePositive(field: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ValidationError(field, value, 'must be a positive number');
  }
  return value;
}

function requireNonNegative(field: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ValidationError(field, value, 'must be a non-negative number');
  }
  return value;
}

/**
 * Checks a complete configuration and returns a normalized copy.
 *
 * @throws ValidationError naming the first invalid field
 */
export function validateEstimationConfig(config: EstimationConfig): EstimationConfig {
  if (!isEstimationStyle(config.style)) {
    throw new ValidationError('style', config.style, 'must be one of mean, median, p80');
  }

  const targetPercentile = requireNonNegative('targetPercentile', config.targetPercentile);
  if (targetPercentile > 100) {
    throw new ValidationError('targetPercentile', targetPercentile, 'must be between 0 and 100');
  }

  const multipliers = config.experienceMultipliers;
  const experienceMultipliers: ExperienceMultipliers = {
    junior: requirePositive('experienceMultipliers.junior', multipliers.junior),
    mid: requirePositive('experienceMultipliers.mid', multipliers.mid),
    senior: requirePositive('experienceMultipliers.senior', multipliers.senior),
  };

  const minPoints = config.minPointsForHighConfidence;
  if (!Number.isInteger(minPoints) || minPoints < 2) {
    throw new ValidationError('minPointsForHighConfidence', minPoints, 'must be an integer of at least 2');
  }

  if (typeof config.useRobustStatistics !== 'boolean') {
    throw new ValidationError('useRobustStatistics', config.useRobustStatistics, 'must be true or false');
  }

  if (!Array.isArray(config.overlapKeywords) ||
      config.overlapKeywords.some(keyword => typeof keyword !== 'string' || keyword.trim().length === 0)) {
    throw new ValidationError('overlapKeywords', config.overlapKeywords, 'must be a list of non-empty strings');
  }

  return {
    style: config.style,
    targetPercentile,
    workingHoursPerDay: requirePositive('workingHoursPerDay', config.workingHoursPerDay),
    experienceMultipliers,
    bufferPercentage: requireNonNegative('bufferPercentage', config.bufferPercentage),
    outlierThresholdMultiplier: requirePositive('outlierThresholdMultiplier', config.outlierThresholdMultiplier),
    minPointsForHighConfidence: minPoints,
    highConfidenceMaxCv: requirePositive('highConfidenceMaxCv', config.highConfidenceMaxCv),
    useRobustStatistics: config.useRobustStatistics,
    overlapKeywords: config.overlapKeywords.map(keyword => keyword.trim()),
  };
}

function freezeSnapshot(config: EstimationConfig, version: number): EstimationConfigSnapshot {
  return Object.freeze({
    ...config,
    experienceMultipliers: Object.freeze({ ...config.experienceMultipliers }),
    overlapKeywords: Object.freeze([...config.overlapKeywords]),
    version,
  });
}

function changedKeys(before: EstimationConfigView, after: EstimationConfig): string[] {
  const keys: (keyof EstimationConfig)[] = [
    'style',
    'targetPercentile',
    'workingHoursPerDay',
    'experienceMultipliers',
    'bufferPercentage',
    'outlierThresholdMultiplier',
    'minPointsForHighConfidence',
    'highConfidenceMaxCv',
    'useRobustStatistics',
    'overlapKeywords',
  ];
  return keys.filter(key => JSON.stringify(before[key]) !== JSON.stringify(after[key]));
}

export interface ConfigStoreOptions {
  initial?: Partial<EstimationConfig>;
  eventBus?: EventBus;
}

export class ConfigStore {
  private current: EstimationConfigSnapshot;
  private readonly eventBus?: EventBus;

  constructor(options: ConfigStoreOptions = {}) {
    this.eventBus = options.eventBus;
    const initial = validateEstimationConfig(this.merge(DEFAULT_ESTIMATION_CONFIG, options.initial ?? {}));
    this.current = freezeSnapshot(initial, 1);
  }

  get version(): number {
    return this.current.version;
  }

  snapshot(): EstimationConfigSnapshot {
    return this.current;
  }

  setEstimationStyle(style: EstimationStyle): EstimationConfigSnapshot {
    return this.update({ style });
  }

  setBufferPercentage(bufferPercentage: number): EstimationConfigSnapshot {
    return this.update({ bufferPercentage });
  }

  setExperienceMultipliers(multipliers: Partial<ExperienceMultipliers>): EstimationConfigSnapshot {
    return this.update({
      experienceMultipliers: { ...this.current.experienceMultipliers, ...multipliers },
    });
  }

  setWorkingHoursPerDay(workingHoursPerDay: number): EstimationConfigSnapshot {
    return this.update({ workingHoursPerDay });
  }

  setOutlierThresholdMultiplier(outlierThresholdMultiplier: number): EstimationConfigSnapshot {
    return this.update({ outlierThresholdMultiplier });
  }

  setTargetPercentile(targetPercentile: number): EstimationConfigSnapshot {
    return this.update({ targetPercentile });
  }

  setOverlapKeywords(overlapKeywords: string[]): EstimationConfigSnapshot {
    return this.update({ overlapKeywords });
  }

  /**
   * Applies several fields at once. Nothing changes when any field is
   * invalid.
   */
  update(patch: Partial<EstimationConfig>): EstimationConfigSnapshot {
    const next = validateEstimationConfig(this.merge(this.current, patch));
    return this.replace(next);
  }

  reset(): EstimationConfigSnapshot {
    return this.replace(validateEstimationConfig(this.merge(DEFAULT_ESTIMATION_CONFIG, {})));
  }

  private merge(base: EstimationConfigView, patch: Partial<EstimationConfig>): EstimationConfig {
    return {
      style: patch.style ?? base.style,
      targetPercentile: patch.targetPercentile ?? base.targetPercentile,
      workingHoursPerDay: patch.workingHoursPerDay ?? base.workingHoursPerDay,
      experienceMultipliers: { ...base.experienceMultipliers, ...patch.experienceMultipliers },
      bufferPercentage: patch.bufferPercentage ?? base.bufferPercentage,
      outlierThresholdMultiplier: patch.outlierThresholdMultiplier ?? base.outlierThresholdMultiplier,
      minPointsForHighConfidence: patch.minPointsForHighConfidence ?? base.minPointsForHighConfidence,
      highConfidenceMaxCv: patch.highConfidenceMaxCv ?? base.highConfidenceMaxCv,
      useRobustStatistics: patch.useRobustStatistics ?? base.useRobustStatistics,
      overlapKeywords: [...(patch.overlapKeywords ?? base.overlapKeywords)],
    };
  }

  private replace(next: EstimationConfig): EstimationConfigSnapshot {
    const keys = changedKeys(this.current, next);
    const version = this.current.version + 1;
    this.current = freezeSnapshot(next, version);

    log.info('Estimation config changed', { version, changedKeys: keys });
    this.eventBus?.emit(createEvent('config:changed', { version, changedKeys: keys }));
    return this.current;
  }
}
