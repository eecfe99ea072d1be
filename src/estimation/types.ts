/**
 * Estimation domain types
 */

export type Team = 'frontend' | 'backend' | 'both';

export const TEAMS: readonly Team[] = ['frontend', 'backend', 'both'];

export type EstimationStyle = 'mean' | 'median' | 'p80';

export const ESTIMATION_STYLES: readonly EstimationStyle[] = ['mean', 'median', 'p80'];

export type ExperienceLevel = 'junior' | 'mid' | 'senior';

export const EXPERIENCE_LEVELS: readonly ExperienceLevel[] = ['junior', 'mid', 'senior'];

export type ConfidenceLevel = 'HIGH' | 'MEDIUM' | 'LOW';

export type DataCoverage = 'tracked' | 'seed';

export type EstimateBasis = 'tracked_mean' | 'tracked_median' | 'tracked_p80' | 'seed';

export interface SeedTimeChange {
  previousValue: number;
  newValue: number;
  changedAt: Date;
}

/**
 * Canonical catalog entry
 */
export interface Feature {
  id: string;
  name: string;
  team: Team;
  /** Free grouping label, e.g. "Data Operations" */
  process: string;
  /** Used only when no tracked data exists */
  seedTimeHours: number;
  synonyms: string[];
  notes: string;
  /** Append-only, oldest first */
  seedTimeHistory: SeedTimeChange[];
}

export interface CreateFeatureInput {
  id?: string;
  name: string;
  team: Team;
  seedTimeHours: number;
  process?: string;
  synonyms?: string[];
  notes?: string;
  /** Restored history when reloading a persisted feature */
  seedTimeHistory?: SeedTimeChange[];
}

export interface UpdateFeatureInput {
  name?: string;
  team?: Team;
  process?: string;
  synonyms?: string[];
  notes?: string;
}

/**
 * One observation of actual effort. `feature` is the free-text label as it
 * was logged, not a catalog id.
 */
export interface TrackedTimeEntry {
  id: string;
  team: Team;
  memberName: string;
  feature: string;
  hours: number;
  process?: string;
  date?: Date;
}

export interface CreateTrackedTimeInput {
  id?: string;
  team: string;
  memberName: string;
  feature: string;
  hours: number;
  process?: string;
  date?: Date | string;
}

export interface StatisticSet {
  count: number;
  mean: number;
  median: number;
  /** Value at the configured target percentile */
  percentile: number;
  stdDev: number;
}

export interface OutlierFlag {
  entryId: string;
  value: number;
  /** `thresholdMultiplier x median` that the value exceeded */
  threshold: number;
}

export type RobustStatistics = StatisticSet;

export interface FeatureStatistics extends StatisticSet {
  featureName: string;
  targetPercentile: number;
  dataCoverage: DataCoverage;
  outliers?: OutlierFlag[];
  robust?: RobustStatistics;
}

export interface ExperienceMultipliers {
  junior: number;
  mid: number;
  senior: number;
}

export interface EstimationConfig {
  style: EstimationStyle;
  targetPercentile: number;
  workingHoursPerDay: number;
  experienceMultipliers: ExperienceMultipliers;
  bufferPercentage: number;
  outlierThresholdMultiplier: number;
  minPointsForHighConfidence: number;
  /** Largest stdDev / mean ratio that still earns HIGH confidence */
  highConfidenceMaxCv: number;
  /** Estimate and classify from outlier-excluded statistics when outliers were flagged */
  useRobustStatistics: boolean;
  overlapKeywords: string[];
}

export type EstimationConfigView = Readonly<Omit<EstimationConfig, 'experienceMultipliers' | 'overlapKeywords'>> & {
  readonly experienceMultipliers: Readonly<ExperienceMultipliers>;
  readonly overlapKeywords: readonly string[];
};

/**
 * Immutable view of the configuration handed to one computation.
 */
export type EstimationConfigSnapshot = EstimationConfigView & { readonly version: number };

export interface EstimateLineItem {
  featureName: string;
  featureId?: string;
  team: Team;
  estimatedHours: number;
  basis: EstimateBasis;
  confidence: ConfidenceLevel;
  category?: string;
  isNewFeature: boolean;
  statistics?: FeatureStatistics;
}

export interface OverlapWarning {
  features: string[];
  keywords: string[];
  suggestion: string;
}

export interface ProjectEstimate {
  id: string;
  lineItems: EstimateLineItem[];
  frontendTotalHours: number;
  backendTotalHours: number;
  grandTotalHours: number;
  /** Kept out of grandTotalHours */
  bufferHours?: number;
  totalDays: number;
  /** Lowest line-item confidence */
  confidence: ConfidenceLevel;
  overlapWarnings: OverlapWarning[];
  style: EstimationStyle;
  experienceLevel?: ExperienceLevel;
  configVersion: number;
  createdAt: Date;
}

export function isTeam(value: unknown): value is Team {
  return TEAMS.some(team => team === value);
}

export function isEstimationStyle(value: unknown): value is EstimationStyle {
  return ESTIMATION_STYLES.some(style => style === value);
}

export function isExperienceLevel(value: unknown): value is ExperienceLevel {
  return EXPERIENCE_LEVELS.some(level => level === value);
}
