/**
 * Public API of the estimator package
 */

export * from './estimation/index.js';
export * from './models/errors.js';
export * from './models/outcome.js';
export * from './events/index.js';
export { logger, LogLevel, withCorrelation, getCorrelationId, generateCorrelationId } from './logging/index.js';
export type { Logger, LogEntry } from './logging/index.js';
export * from './library/feature-library.js';
export * from './import/csv-importer.js';
export * from './data/index.js';
export * from './db/index.js';
export * from './api/index.js';
export { ConfigLoader, ConfigValidationError } from './cli/config-loader.js';
export type { AppConfig } from './cli/config-loader.js';
export { validateEnv, assertEnv, isDataSourceKind } from './config/env-validator.js';
export type { DataSourceKind, ValidationResult } from './config/env-validator.js';
