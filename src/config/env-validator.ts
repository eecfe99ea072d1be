import { logger } from '../logging/index.js';

const log = logger.child('EnvValidator');

export type DataSourceKind = 'file' | 'supabase';

/**
 * Variables each data source cannot run without.
 */
const REQUIRED_VARS: Record<DataSourceKind, readonly string[]> = {
  file: [],
  supabase: ['SUPABASE_URL', 'SUPABASE_SERVICE_KEY'],
};

/**
 * Optional environment variables that have defaults when absent.
 */
const OPTIONAL_VARS = [
  { name: 'EST_LOG_LEVEL', default: 'INFO' },
  { name: 'EST_LOG_FORMAT', default: 'pretty' },
  { name: 'EST_FEATURE_LIBRARY_PATH', default: './data/feature-library.yaml' },
] as const;

export interface ValidationResult {
  valid: boolean;
  dataSource: DataSourceKind;
  missing: string[];
}

export function isDataSourceKind(value: unknown): value is DataSourceKind {
  return value === 'file' || value === 'supabase';
}

/**
 * Checks the variables required by the chosen data source (EST_DATA_SOURCE
 * when not given, `file` when that is unset too).
 */
export function validateEnv(
  dataSource?: DataSourceKind,
  env: NodeJS.ProcessEnv = process.env
): ValidationResult {
  const envSource = env.EST_DATA_SOURCE?.trim().toLowerCase();
  const source: DataSourceKind = dataSource ?? (isDataSourceKind(envSource) ? envSource : 'file');

  const missing = REQUIRED_VARS[source].filter(name => !env[name]);

  for (const { name, default: defaultValue } of OPTIONAL_VARS) {
    if (!env[name]) {
      log.debug('Optional env var not set, using default', { name, default: defaultValue });
    }
  }

  return { valid: missing.length === 0, dataSource: source, missing };
}

/**
 * @throws Error listing all missing required environment variables
 */
export function assertEnv(dataSource?: DataSourceKind, env: NodeJS.ProcessEnv = process.env): void {
  const result = validateEnv(dataSource, env);
  if (!result.valid) {
    const message = [
      `Missing required environment variables for the ${result.dataSource} data source:`,
      ...result.missing.map(name => `  - ${name}`),
      '',
      'Set these variables in your .env file or environment before starting.',
    ].join('\n');
    log.error('Startup aborted: missing required environment variables', { missing: result.missing });
    throw new Error(message);
  }
  log.debug('Environment validation passed', { dataSource: result.dataSource });
}
