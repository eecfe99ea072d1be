/**
 * Estimation engine: statistics, catalog, tracked time, configuration and
 * the service that combines them into project estimates.
 *
 * @module estimation
 */

export * from './statistics.js';
export * from './outliers.js';
export * from './confidence.js';
export * from './normalize.js';
export * from './aggregator.js';
export * from './overlap.js';
export * from './feature-catalog.js';
export * from './tracked-time-store.js';
export * from './config-store.js';
export * from './estimation-service.js';
export * from './types.js';
