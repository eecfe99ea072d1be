/**
 * Data sources and start-up loading
 */

import { logger } from '../logging/index.js';
import { assertEnv } from '../config/env-validator.js';
import { createSupabaseClient } from '../db/client.js';
import { ValidationError } from '../models/errors.js';
import type { AppConfig } from '../cli/config-loader.js';
import type { FeatureCatalog } from '../estimation/feature-catalog.js';
import type { TrackedTimeStore } from '../estimation/tracked-time-store.js';
import type { RowError } from '../models/errors.js';
import type { EstimationDataSource } from './data-source.js';
import { FileDataSource } from './file-data-source.js';
import { SupabaseDataSource } from './supabase-data-source.js';

export type { EstimationDataSource, DataSourceHealth, TrackedTimeLoad } from './data-source.js';
export { FileDataSource } from './file-data-source.js';
export type { FileDataSourceOptions } from './file-data-source.js';
export { SupabaseDataSource } from './supabase-data-source.js';

const log = logger.child('DataSource');

export function createDataSource(config: AppConfig): EstimationDataSource {
  if (config.dataSource === 'supabase') {
    assertEnv('supabase', {
      SUPABASE_URL: config.supabaseUrl,
      SUPABASE_SERVICE_KEY: config.supabaseKey,
    });
    return new SupabaseDataSource(createSupabaseClient({
      url: config.supabaseUrl,
      serviceKey: config.supabaseKey,
    }));
  }
  return new FileDataSource({
    featureLibraryPath: config.featureLibraryPath,
    trackedTimePath: config.trackedTimePath,
    estimatesDir: config.estimatesDir,
  });
}

export interface HydrateResult {
  features: number;
  trackedTime: number;
  /** Stored features the catalog refused, e.g. a name taken twice */
  rejectedFeatures: { id: string; error: ValidationError }[];
  rejectedTrackedTime: RowError[];
}

/**
 * Fills an empty catalog and tracked-time store from the data source.
 */
export async function hydrate(
  source: EstimationDataSource,
  catalog: FeatureCatalog,
  trackedTime: TrackedTimeStore
): Promise<HydrateResult> {
  const [features, stored] = await Promise.all([source.loadFeatures(), source.loadTrackedTime()]);

  const rejectedFeatures: HydrateResult['rejectedFeatures'] = [];
  for (const feature of features) {
    try {
      catalog.addFeature(feature);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      rejectedFeatures.push({ id: feature.id, error });
    }
  }

  const batch = trackedTime.addMany(stored.entries);

  const result: HydrateResult = {
    features: catalog.size,
    trackedTime: batch.accepted.length,
    rejectedFeatures,
    rejectedTrackedTime: [...stored.rejected, ...batch.rejected],
  };
  log.info('Data loaded', {
    source: source.kind,
    features: result.features,
    trackedTime: result.trackedTime,
    rejected: rejectedFeatures.length + result.rejectedTrackedTime.length,
  });
  return result;
}
