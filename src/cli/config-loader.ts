/**
 * Configuration loader for the estimator
 * Merges defaults, a JSON config file and environment variables
 */

import * as fs from 'fs';
import { ConfigValidationError, ValidationError } from '../models/errors.js';
import { DEFAULT_ESTIMATION_CONFIG, validateEstimationConfig } from '../estimation/config-store.js';
import { isEstimationStyle } from '../estimation/types.js';
import type { EstimationConfig, ExperienceMultipliers } from '../estimation/types.js';
import { isDataSourceKind } from '../config/env-validator.js';
import type { DataSourceKind } from '../config/env-validator.js';

/**
 * Complete application configuration
 */
export interface AppConfig {
  dataSource: DataSourceKind;

  // Paths used by the file data source
  featureLibraryPath: string;
  trackedTimePath?: string;
  estimatesDir: string;

  // Database
  supabaseUrl?: string;
  supabaseKey?: string;

  apiPort: number;
  logLevel: string;

  /** Overrides applied on top of the estimation defaults */
  estimation: Partial<EstimationConfig>;
}

/**
 * JSON config file format
 */
interface ConfigFileFormat {
  dataSource?: string;
  paths?: {
    featureLibrary?: string;
    trackedTime?: string;
    estimatesDir?: string;
  };
  supabase?: {
    url?: string;
    key?: string;
  };
  api?: {
    port?: number;
  };
  logging?: {
    level?: string;
  };
  estimation?: Partial<EstimationConfig>;
}

export { ConfigValidationError };

const DEFAULTS: AppConfig = {
  dataSource: 'file',
  featureLibraryPath: './data/feature-library.yaml',
  estimatesDir: './data/estimates',
  apiPort: 3100,
  logLevel: 'info',
  estimation: {},
};

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'];

/**
 * Parse a number from string, returning undefined if invalid
 */
function parseNumberOrUndefined(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Mask sensitive values for display
 */
function maskSecret(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (value.length <= 4) return '***';
  return value.substring(0, 4) + '***';
}

function mergeEstimation(
  base: Partial<EstimationConfig>,
  override: Partial<EstimationConfig>
): Partial<EstimationConfig> {
  const merged: Partial<EstimationConfig> = { ...base, ...override };
  if (base.experienceMultipliers || override.experienceMultipliers) {
    const multipliers: ExperienceMultipliers = {
      ...DEFAULT_ESTIMATION_CONFIG.experienceMultipliers,
      ...base.experienceMultipliers,
      ...override.experienceMultipliers,
    };
    merged.experienceMultipliers = multipliers;
  }
  return merged;
}

export const ConfigLoader = {
  /**
   * Load configuration from environment variables
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): Partial<AppConfig> {
    const config: Partial<AppConfig> = {};

    if (env.EST_DATA_SOURCE) {
      const source = env.EST_DATA_SOURCE.trim().toLowerCase();
      if (!isDataSourceKind(source)) {
        throw new ConfigValidationError([`EST_DATA_SOURCE must be file or supabase (got "${env.EST_DATA_SOURCE}")`]);
      }
      config.dataSource = source;
    }

    // Paths
    if (env.EST_FEATURE_LIBRARY_PATH) {
      config.featureLibraryPath = env.EST_FEATURE_LIBRARY_PATH;
    }
    if (env.EST_TRACKED_TIME_PATH) {
      config.trackedTimePath = env.EST_TRACKED_TIME_PATH;
    }
    if (env.EST_ESTIMATES_DIR) {
      config.estimatesDir = env.EST_ESTIMATES_DIR;
    }

    // Database
    if (env.SUPABASE_URL) {
      config.supabaseUrl = env.SUPABASE_URL;
    }
    if (env.SUPABASE_SERVICE_KEY) {
      config.supabaseKey = env.SUPABASE_SERVICE_KEY;
    }

    const port = parseNumberOrUndefined(env.EST_API_PORT);
    if (port !== undefined) {
      config.apiPort = port;
    }

    if (env.EST_LOG_LEVEL) {
      config.logLevel = env.EST_LOG_LEVEL.toLowerCase();
    }

    // Estimation
    const estimation: Partial<EstimationConfig> = {};
    if (env.EST_ESTIMATION_STYLE) {
      const style = env.EST_ESTIMATION_STYLE.trim().toLowerCase();
      if (!isEstimationStyle(style)) {
        throw new ConfigValidationError([`EST_ESTIMATION_STYLE must be mean, median or p80 (got "${env.EST_ESTIMATION_STYLE}")`]);
      }
      estimation.style = style;
    }
    const buffer = parseNumberOrUndefined(env.EST_BUFFER_PERCENTAGE);
    if (buffer !== undefined) {
      estimation.bufferPercentage = buffer;
    }
    const hoursPerDay = parseNumberOrUndefined(env.EST_WORKING_HOURS_PER_DAY);
    if (hoursPerDay !== undefined) {
      estimation.workingHoursPerDay = hoursPerDay;
    }
    if (Object.keys(estimation).length > 0) {
      config.estimation = estimation;
    }

    return config;
  },

  /**
   * Load configuration from a JSON file
   */
  fromFile(configPath: string): Partial<AppConfig> {
    if (!fs.existsSync(configPath)) {
      throw new ConfigValidationError([`Config file not found: ${configPath}`]);
    }

    let fileContent: string;
    try {
      fileContent = fs.readFileSync(configPath, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigValidationError([`Failed to read config file ${configPath}: ${reason}`]);
    }

    let parsed: ConfigFileFormat;
    try {
      parsed = JSON.parse(fileContent);
    } catch {
      throw new ConfigValidationError([`Invalid JSON in config file: ${configPath}`]);
    }

    const config: Partial<AppConfig> = {};

    if (parsed.dataSource !== undefined) {
      if (!isDataSourceKind(parsed.dataSource)) {
        throw new ConfigValidationError([`dataSource must be file or supabase (got "${parsed.dataSource}")`]);
      }
      config.dataSource = parsed.dataSource;
    }

    // Paths
    if (parsed.paths?.featureLibrary) {
      config.featureLibraryPath = parsed.paths.featureLibrary;
    }
    if (parsed.paths?.trackedTime) {
      config.trackedTimePath = parsed.paths.trackedTime;
    }
    if (parsed.paths?.estimatesDir) {
      config.estimatesDir = parsed.paths.estimatesDir;
    }

    // Database
    if (parsed.supabase?.url) {
      config.supabaseUrl = parsed.supabase.url;
    }
    if (parsed.supabase?.key) {
      config.supabaseKey = parsed.supabase.key;
    }

    if (parsed.api?.port !== undefined) {
      config.apiPort = parsed.api.port;
    }

    if (parsed.logging?.level) {
      config.logLevel = parsed.logging.level.toLowerCase();
    }

    if (parsed.estimation) {
      config.estimation = { ...parsed.estimation };
    }

    return config;
  },

  /**
   * Load configuration merging file and environment variables.
   * Environment variables take precedence over file config.
   */
  load(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
    const fileConfig = configPath ? ConfigLoader.fromFile(configPath) : {};
    const envConfig = ConfigLoader.fromEnv(env);

    // Merge: defaults < file < env
    const merged: Partial<AppConfig> = {
      ...DEFAULTS,
      ...fileConfig,
      ...envConfig,
      estimation: mergeEstimation(fileConfig.estimation ?? {}, envConfig.estimation ?? {}),
    };

    return ConfigLoader.validate(merged);
  },

  /**
   * Validate configuration and apply defaults.
   * Collects every problem before throwing ConfigValidationError.
   */
  validate(config: Partial<AppConfig>): AppConfig {
    const errors: string[] = [];

    const withDefaults: AppConfig = {
      ...DEFAULTS,
      ...config,
      estimation: config.estimation ?? {},
    };

    if (!isDataSourceKind(withDefaults.dataSource)) {
      errors.push('dataSource must be file or supabase');
    }

    if (withDefaults.dataSource === 'supabase') {
      if (!withDefaults.supabaseUrl) {
        errors.push('supabaseUrl is required for the supabase data source');
      } else if (!isValidUrl(withDefaults.supabaseUrl)) {
        errors.push('supabaseUrl must be a valid URL');
      }
      if (!withDefaults.supabaseKey) {
        errors.push('supabaseKey is required for the supabase data source');
      }
    }

    if (typeof withDefaults.featureLibraryPath !== 'string' || withDefaults.featureLibraryPath.trim() === '') {
      errors.push('featureLibraryPath must be a non-empty path');
    }

    if (!Number.isInteger(withDefaults.apiPort) || withDefaults.apiPort < 1 || withDefaults.apiPort > 65535) {
      errors.push('apiPort must be an integer between 1 and 65535');
    }

    if (!LOG_LEVELS.includes(withDefaults.logLevel)) {
      errors.push(`logLevel must be one of ${LOG_LEVELS.join(', ')}`);
    }

    try {
      validateEstimationConfig({
        ...DEFAULT_ESTIMATION_CONFIG,
        ...withDefaults.estimation,
        experienceMultipliers: {
          ...DEFAULT_ESTIMATION_CONFIG.experienceMultipliers,
          ...withDefaults.estimation.experienceMultipliers,
        },
        overlapKeywords: [...(withDefaults.estimation.overlapKeywords ?? DEFAULT_ESTIMATION_CONFIG.overlapKeywords)],
      });
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      errors.push(`estimation.${error.message.replace(/^Invalid /, '')}`);
    }

    if (errors.length > 0) {
      throw new ConfigValidationError(errors);
    }

    return withDefaults;
  },

  /**
   * Get default configuration values
   */
  getDefaults(): AppConfig {
    return { ...DEFAULTS, estimation: {} };
  },

  /**
   * Format configuration for display (masking sensitive values)
   */
  toDisplayString(config: AppConfig): string {
    const displayConfig = {
      dataSource: config.dataSource,
      paths: {
        featureLibrary: config.featureLibraryPath,
        trackedTime: config.trackedTimePath,
        estimatesDir: config.estimatesDir,
      },
      supabase: {
        url: config.supabaseUrl,
        key: maskSecret(config.supabaseKey),
      },
      api: {
        port: config.apiPort,
      },
      logging: {
        level: config.logLevel,
      },
      estimation: config.estimation,
    };

    return JSON.stringify(displayConfig, null, 2);
  },
};
