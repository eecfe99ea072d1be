/**
 * EstimationService - turns a list of feature names into a ProjectEstimate
 *
 * Pipeline, each stage logged at debug level:
 *   CollectFeatures -> ResolveEachFeature -> ComputeStatistics -> SelectBasis
 *   -> ApplyMultipliers -> DetectOverlaps -> Aggregate -> Done
 *
 * Every request works on the catalog, tracked-time and config snapshots
 * taken when it starts.
 */

import { randomUUID } from 'node:crypto';
import { ComputationError, NotFoundError, ValidationError } from '../models/errors.js';
import { ok, fail } from '../models/outcome.js';
import type { Outcome } from '../models/outcome.js';
import { logger, generateCorrelationId, getCorrelationId, withCorrelation } from '../logging/index.js';
import { createEvent } from '../events/index.js';
import type { EventBus } from '../events/index.js';
import { statisticsFor } from './aggregator.js';
import { classifyConfidence, overallConfidence } from './confidence.js';
import { detectOverlaps } from './overlap.js';
import { normalizeName } from './normalize.js';
import { isEstimationStyle, isExperienceLevel, isTeam } from './types.js';
import type { FeatureCatalog, CatalogSnapshot } from './feature-catalog.js';
import type { TrackedTimeStore, TrackedTimeSnapshot } from './tracked-time-store.js';
import type { ConfigStore } from './config-store.js';
import type {
  EstimateBasis,
  EstimateLineItem,
  EstimationConfigSnapshot,
  EstimationStyle,
  ExperienceLevel,
  Feature,
  FeatureStatistics,
  ProjectEstimate,
  StatisticSet,
  Team,
} from './types.js';

const log = logger.child('EstimationService');

type Stage =
  | 'CollectFeatures'
  | 'ResolveEachFeature'
  | 'ComputeStatistics'
  | 'SelectBasis'
  | 'ApplyMultipliers'
  | 'DetectOverlaps'
  | 'Aggregate'
  | 'Done';

export interface EstimateRequest {
  featureNames: string[];
  experienceLevel?: ExperienceLevel;
  /** Hours for names with no catalog match, keyed by name */
  newFeatureHours?: Record<string, number>;
  defaultNewFeatureHours?: number;
  newFeatureTeam?: Team;
  /** Overrides the configured style for this request only */
  style?: EstimationStyle;
  /** Overrides the configured buffer for this request only */
  bufferPercentage?: number;
}

export type LineItemOptions = Omit<EstimateRequest, 'featureNames' | 'bufferPercentage'>;

export interface EstimationServiceDeps {
  catalog: FeatureCatalog;
  trackedTime: TrackedTimeStore;
  config: ConfigStore;
  eventBus?: EventBus;
}

interface RequestContext {
  catalog: CatalogSnapshot;
  tracked: TrackedTimeSnapshot;
  config: EstimationConfigSnapshot;
  style: EstimationStyle;
  multiplier: number;
  options: LineItemOptions;
}

const BASIS_BY_STYLE: Record<EstimationStyle, EstimateBasis> = {
  mean: 'tracked_mean',
  median: 'tracked_median',
  p80: 'tracked_p80',
};

const TOTALS_TOLERANCE = 1e-9;

function valueForStyle(stats: StatisticSet, style: EstimationStyle): number {
  switch (style) {
    case 'mean':
      return stats.mean;
    case 'median':
      return stats.median;
    case 'p80':
      return stats.percentile;
  }
}

function validateRequest(request: EstimateRequest): void {
  if (!Array.isArray(request.featureNames)) {
    throw new ValidationError('featureNames', request.featureNames, 'must be a list of feature names');
  }
  request.featureNames.forEach((name, index) => {
    if (typeof name !== 'string' || name.trim().length === 0) {
      throw new ValidationError(`featureNames[${index}]`, name, 'must be a non-empty string');
    }
  });
  validateLineItemOptions(request);
  if (request.bufferPercentage !== undefined && !Number.isFinite(request.bufferPercentage)) {
    throw new ValidationError('bufferPercentage', request.bufferPercentage, 'must be a number');
  }
}

function validateLineItemOptions(options: LineItemOptions): void {
  if (options.experienceLevel !== undefined && !isExperienceLevel(options.experienceLevel)) {
    throw new ValidationError('experienceLevel', options.experienceLevel, 'must be one of junior, mid, senior');
  }
  if (options.style !== undefined && !isEstimationStyle(options.style)) {
    throw new ValidationError('style', options.style, 'must be one of mean, median, p80');
  }
  if (options.newFeatureTeam !== undefined && !isTeam(options.newFeatureTeam)) {
    throw new ValidationError('newFeatureTeam', options.newFeatureTeam, 'must be one of frontend, backend, both');
  }
  const hours = options.defaultNewFeatureHours;
  if (hours !== undefined && (!Number.isFinite(hours) || hours < 0)) {
    throw new ValidationError('defaultNewFeatureHours', hours, 'must be a non-negative number');
  }
  for (const [name, value] of Object.entries(options.newFeatureHours ?? {})) {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new ValidationError(`newFeatureHours.${name}`, value, 'must be a non-negative number');
    }
  }
}

export class EstimationService {
  private readonly catalog: FeatureCatalog;
  private readonly trackedTime: TrackedTimeStore;
  private readonly config: ConfigStore;
  private readonly eventBus?: EventBus;
  private readonly cache = new Map<string, FeatureStatistics>();
  private cacheVersions = '';
  private readonly unsubscribe?: () => void;

  constructor(deps: EstimationServiceDeps) {
    this.catalog = deps.catalog;
    this.trackedTime = deps.trackedTime;
    this.config = deps.config;
    this.eventBus = deps.eventBus;
    this.unsubscribe = this.eventBus?.on('config:changed', (event) => {
      log.debug('Statistics cache cleared', { configVersion: event.payload.version, entries: this.cache.size });
      this.cache.clear();
    });
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  /**
   * Detach from the event bus.
   */
  dispose(): void {
    this.unsubscribe?.();
    this.cache.clear();
  }

  estimateProject(request: EstimateRequest): ProjectEstimate {
    const correlationId = getCorrelationId() ?? generateCorrelationId();
    return withCorrelation(correlationId, () => this.runPipeline(request, correlationId));
  }

  /**
   * A single line item, resolved and priced exactly as in a project estimate.
   */
  estimateFeature(name: string, options: LineItemOptions = {}): EstimateLineItem {
    if (typeof name !== 'string' || name.trim().length === 0) {
      throw new ValidationError('featureName', name, 'must be a non-empty string');
    }
    validateLineItemOptions(options);
    return this.lineItem(name, this.createContext(options));
  }

  /**
   * Statistics for a catalog feature.
   *
   * @throws NotFoundError when the name matches no feature or synonym
   */
  featureStatistics(name: string): FeatureStatistics {
    const context = this.createContext({});
    const resolved = this.resolve(name, context.catalog);
    if (!resolved.ok) {
      throw resolved.error;
    }
    return this.statistics(resolved.value, context);
  }

  private runPipeline(request: EstimateRequest, correlationId: string): ProjectEstimate {
    validateRequest(request);
    const context = this.createContext(request);
    const bufferPercentage = request.bufferPercentage ?? context.config.bufferPercentage;
    if (bufferPercentage < 0) {
      throw new ComputationError('Buffer percentage cannot be negative', { bufferPercentage });
    }

    this.stage('CollectFeatures', {
      featureCount: request.featureNames.length,
      catalogVersion: context.catalog.version,
      trackedTimeVersion: context.tracked.version,
      configVersion: context.config.version,
    });

    const lineItems = request.featureNames.map(name => this.lineItem(name, context));

    this.stage('DetectOverlaps', { keywordCount: context.config.overlapKeywords.length });
    const overlapWarnings = detectOverlaps(
      lineItems.map(item => item.featureName),
      context.config.overlapKeywords
    );

    this.stage('Aggregate', { lineItemCount: lineItems.length });
    let frontendTotalHours = 0;
    let backendTotalHours = 0;
    let grandTotalHours = 0;
    for (const item of lineItems) {
      grandTotalHours += item.estimatedHours;
      if (item.team === 'frontend') {
        frontendTotalHours += item.estimatedHours;
      } else if (item.team === 'backend') {
        backendTotalHours += item.estimatedHours;
      } else {
        frontendTotalHours += item.estimatedHours / 2;
        backendTotalHours += item.estimatedHours / 2;
      }
    }

    const drift = Math.abs(frontendTotalHours + backendTotalHours - grandTotalHours);
    if (drift > TOTALS_TOLERANCE * Math.max(1, grandTotalHours)) {
      throw new ComputationError('Team totals do not add up to the grand total', {
        frontendTotalHours,
        backendTotalHours,
        grandTotalHours,
      });
    }

    const estimate: ProjectEstimate = {
      id: randomUUID(),
      lineItems,
      frontendTotalHours,
      backendTotalHours,
      grandTotalHours,
      totalDays: grandTotalHours / context.config.workingHoursPerDay,
      confidence: overallConfidence(lineItems.map(item => item.confidence)),
      overlapWarnings,
      style: context.style,
      configVersion: context.config.version,
      createdAt: new Date(),
    };
    if (bufferPercentage > 0) {
      estimate.bufferHours = grandTotalHours * bufferPercentage / 100;
    }
    if (request.experienceLevel) {
      estimate.experienceLevel = request.experienceLevel;
    }

    this.stage('Done', {
      estimateId: estimate.id,
      grandTotalHours,
      overlapWarnings: overlapWarnings.length,
    });
    log.info('Project estimate computed', {
      estimateId: estimate.id,
      lineItemCount: lineItems.length,
      grandTotalHours,
      newFeatures: lineItems.filter(item => item.isNewFeature).length,
    });

    this.eventBus?.emit(createEvent('estimate:computed', {
      estimateId: estimate.id,
      lineItemCount: lineItems.length,
      grandTotalHours,
      style: estimate.style,
      experienceLevel: estimate.experienceLevel,
      configVersion: estimate.configVersion,
    }, correlationId));

    return estimate;
  }

  private createContext(options: LineItemOptions): RequestContext {
    const config = this.config.snapshot();
    return {
      catalog: this.catalog.snapshot(),
      tracked: this.trackedTime.snapshot(),
      config,
      style: options.style ?? config.style,
      multiplier: options.experienceLevel ? config.experienceMultipliers[options.experienceLevel] : 1,
      options,
    };
  }

  private lineItem(name: string, context: RequestContext): EstimateLineItem {
    this.stage('ResolveEachFeature', { featureName: name });
    const resolved = this.resolve(name, context.catalog);

    if (!resolved.ok) {
      return this.newFeatureLineItem(name.trim(), context);
    }

    const feature = resolved.value;
    this.stage('ComputeStatistics', { featureId: feature.id });
    const statistics = this.statistics(feature, context);

    this.stage('SelectBasis', { featureId: feature.id, dataCoverage: statistics.dataCoverage });
    let baseHours: number;
    let basis: EstimateBasis;
    let confidence: EstimateLineItem['confidence'];

    if (statistics.dataCoverage === 'seed') {
      baseHours = feature.seedTimeHours;
      basis = 'seed';
      confidence = 'LOW';
    } else {
      const source = context.config.useRobustStatistics && statistics.robust ? statistics.robust : statistics;
      baseHours = valueForStyle(source, context.style);
      basis = BASIS_BY_STYLE[context.style];
      confidence = classifyConfidence(source.count, source.stdDev, source.mean, 'tracked', {
        minPointsForHigh: context.config.minPointsForHighConfidence,
        maxCv: context.config.highConfidenceMaxCv,
      });
    }

    this.stage('ApplyMultipliers', { featureId: feature.id, multiplier: context.multiplier });
    const item: EstimateLineItem = {
      featureName: feature.name,
      featureId: feature.id,
      team: feature.team,
      estimatedHours: baseHours * context.multiplier,
      basis,
      confidence,
      isNewFeature: false,
      statistics,
    };
    if (feature.process) {
      item.category = feature.process;
    }
    return item;
  }

  private newFeatureLineItem(name: string, context: RequestContext): EstimateLineItem {
    const { newFeatureHours = {}, defaultNewFeatureHours, newFeatureTeam } = context.options;
    const key = normalizeName(name);
    const supplied = Object.entries(newFeatureHours).find(([label]) => normalizeName(label) === key);
    const baseHours = supplied ? supplied[1] : defaultNewFeatureHours ?? 0;

    log.debug('Feature not in catalog, treating as new', { featureName: name, baseHours });
    this.stage('ApplyMultipliers', { featureName: name, multiplier: context.multiplier });

    return {
      featureName: name,
      team: newFeatureTeam ?? 'both',
      estimatedHours: baseHours * context.multiplier,
      basis: 'seed',
      confidence: 'LOW',
      isNewFeature: true,
    };
  }

  private resolve(name: string, catalog: CatalogSnapshot): Outcome<Feature, NotFoundError> {
    const feature = catalog.findByNameOrSynonym(name);
    return feature ? ok(feature) : fail(new NotFoundError('Feature', name));
  }

  /**
   * Cached per feature id and the three snapshot versions. Entries for older
   * versions are dropped as soon as any version moves on.
   */
  private statistics(feature: Feature, context: RequestContext): FeatureStatistics {
    const versions = [context.catalog.version, context.tracked.version, context.config.version].join(':');
    if (versions !== this.cacheVersions) {
      this.cache.clear();
      this.cacheVersions = versions;
    }

    const key = `${feature.id}:${versions}`;
    let stats = this.cache.get(key);
    if (!stats) {
      stats = statisticsFor(feature, context.tracked.entries, context.config);
      this.cache.set(key, stats);
    }
    return structuredClone(stats);
  }

  private stage(stage: Stage, meta: Record<string, unknown>): void {
    log.debug(`Stage ${stage}`, { stage, ...meta });
  }
}
