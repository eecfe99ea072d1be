export { FeatureRepository, featureFromRow, featureToRow } from './features.js';
export type { FeatureRow } from './features.js';

export { TrackedTimeRepository, trackedTimeFromRow, trackedTimeToRow } from './tracked-time.js';
export type { TrackedTimeRow } from './tracked-time.js';

export { EstimateRepository, estimateFromRow, estimateToRow } from './estimates.js';
export type { ProjectEstimateRow } from './estimates.js';
