/**
 * Logging for the estimator.
 *
 * ```typescript
 * import { logger } from '../logging/index.js';
 *
 * const log = logger.child('FeatureCatalog');
 * log.info('Feature added', { featureId: 'feat_1a2b3c4d' });
 * log.error('Import failed', error, { path });
 * ```
 *
 * Environment variables:
 * - EST_LOG_LEVEL: DEBUG, INFO, WARN, ERROR (default: INFO)
 * - EST_LOG_FORMAT: json, pretty (default: pretty)
 * - EST_LOG_REDACT: comma-separated extra fields to redact
 */

export { logger, LogLevel, parseLogLevel } from './logger.js';
export type { Logger, LogEntry, LogFormat, LogMeta } from './types.js';

export {
  generateCorrelationId,
  getCorrelationId,
  setCorrelationId,
  clearCorrelationId,
  withCorrelation,
  withCorrelationAsync,
  ensureCorrelationId,
} from './correlation.js';

export {
  redact,
  redactValue,
  getDefaultRedactFields,
} from './redaction.js';
