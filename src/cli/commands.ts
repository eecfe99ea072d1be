/**
 * CLI commands for the estimator
 */

import { logger } from '../logging/index.js';
import { isEstimatorError } from '../models/errors.js';
import { importTrackedTimeFile } from '../import/csv-importer.js';
import { EstimatorApiServer } from '../api/server.js';
import type { AppConfig } from './config-loader.js';
import type { FeatureCatalog } from '../estimation/feature-catalog.js';
import type { TrackedTimeStore } from '../estimation/tracked-time-store.js';
import type { ConfigStore } from '../estimation/config-store.js';
import type { EstimationService } from '../estimation/estimation-service.js';
import type { EstimationDataSource } from '../data/index.js';
import type {
  EstimationStyle,
  ExperienceLevel,
  Feature,
  ProjectEstimate,
  Team,
} from '../estimation/types.js';

const log = logger.child('Commands');

/**
 * Result returned from command execution
 */
export interface CommandResult {
  success: boolean;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Command definition for help display
 */
export interface CommandDefinition {
  name: string;
  description: string;
  usage?: string;
}

export interface FeatureAddOptions {
  name: string;
  team: Team;
  seedTimeHours: number;
  process?: string;
  synonyms?: string[];
  notes?: string;
}

export interface EstimateOptions {
  featureNames: string[];
  experienceLevel?: ExperienceLevel;
  bufferPercentage?: number;
  style?: EstimationStyle;
  /** Hours given to names with no catalog match */
  newFeatureHours?: number;
}

export interface ServeOptions {
  port?: number;
}

/**
 * Config loader interface (simplified for commands)
 */
interface ConfigLoaderInterface {
  load(configPath?: string): AppConfig;
  toDisplayString(config: AppConfig): string;
}

/**
 * Context provided to commands
 */
export interface CommandContext {
  catalog: FeatureCatalog;
  trackedTime: TrackedTimeStore;
  configStore: ConfigStore;
  service: EstimationService;
  dataSource: EstimationDataSource;
  configLoader: ConfigLoaderInterface;
  config: AppConfig;
}

function failure(action: string, error: unknown): CommandResult {
  const errorMessage = error instanceof Error ? error.message : 'Unknown error';
  if (!isEstimatorError(error)) {
    log.error(`Failed to ${action}`, error instanceof Error ? error : undefined);
  }
  return {
    success: false,
    message: `Failed to ${action}: ${errorMessage}`,
  };
}

function featureSummary(feature: Feature): Record<string, unknown> {
  return {
    id: feature.id,
    name: feature.name,
    team: feature.team,
    seedTimeHours: feature.seedTimeHours,
    ...(feature.process ? { process: feature.process } : {}),
    ...(feature.synonyms.length > 0 ? { synonyms: feature.synonyms.join(', ') } : {}),
  };
}

/**
 * Accepts an id or any name or synonym.
 */
function findFeature(catalog: FeatureCatalog, nameOrId: string): Feature | undefined {
  return catalog.getById(nameOrId) ?? catalog.findByNameOrSynonym(nameOrId);
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

function estimateSummary(estimate: ProjectEstimate): Record<string, unknown> {
  return {
    id: estimate.id,
    lineItems: estimate.lineItems.map(item => ({
      feature: item.featureName,
      team: item.team,
      hours: round(item.estimatedHours),
      basis: item.basis,
      confidence: item.confidence,
      ...(item.isNewFeature ? { newFeature: true } : {}),
    })),
    frontendTotalHours: round(estimate.frontendTotalHours),
    backendTotalHours: round(estimate.backendTotalHours),
    grandTotalHours: round(estimate.grandTotalHours),
    ...(estimate.bufferHours !== undefined ? { bufferHours: round(estimate.bufferHours) } : {}),
    totalDays: round(estimate.totalDays),
    confidence: estimate.confidence,
    style: estimate.style,
    ...(estimate.overlapWarnings.length > 0
      ? { overlapWarnings: estimate.overlapWarnings.map(warning => warning.suggestion) }
      : {}),
  };
}

/**
 * Command implementations
 */
export const Commands = {
  /**
   * List catalog features, optionally for one team
   */
  async featureList(context: CommandContext, team?: Team): Promise<CommandResult> {
    const features = context.catalog.list(team);
    return {
      success: true,
      message: features.length === 0
        ? 'No features in the catalog'
        : `Found ${features.length} feature(s)${team ? ` for team ${team}` : ''}:`,
      data: { features: features.map(featureSummary) },
    };
  },

  async featureSearch(context: CommandContext, query: string): Promise<CommandResult> {
    if (!query.trim()) {
      return { success: false, message: 'Search query is required' };
    }
    const features = context.catalog.search(query);
    return {
      success: true,
      message: features.length === 0
        ? `No features match "${query}"`
        : `Found ${features.length} feature(s) matching "${query}":`,
      data: { features: features.map(featureSummary) },
    };
  },

  /**
   * Show a feature with its current statistics
   */
  async featureShow(context: CommandContext, nameOrId: string): Promise<CommandResult> {
    const feature = findFeature(context.catalog, nameOrId);
    if (!feature) {
      return { success: false, message: `Feature not found: ${nameOrId}` };
    }

    try {
      const statistics = context.service.featureStatistics(feature.name);
      return {
        success: true,
        message: `Feature ${feature.name}`,
        data: {
          feature: {
            ...featureSummary(feature),
            ...(feature.notes ? { notes: feature.notes } : {}),
            seedTimeChanges: feature.seedTimeHistory.length,
          },
          statistics: {
            dataCoverage: statistics.dataCoverage,
            count: statistics.count,
            mean: round(statistics.mean),
            median: round(statistics.median),
            [`p${statistics.targetPercentile}`]: round(statistics.percentile),
            stdDev: round(statistics.stdDev),
            ...(statistics.outliers ? { outliers: statistics.outliers.length } : {}),
          },
        },
      };
    } catch (error) {
      return failure('compute statistics', error);
    }
  },

  async featureAdd(context: CommandContext, options: FeatureAddOptions): Promise<CommandResult> {
    try {
      const feature = context.catalog.addFeature(options);
      await context.dataSource.saveFeature(feature);
      log.info('Feature added from CLI', { featureId: feature.id });
      return {
        success: true,
        message: `Feature added: ${feature.name}`,
        data: featureSummary(feature),
      };
    } catch (error) {
      return failure('add feature', error);
    }
  },

  /**
   * Change a feature's seed time; the previous value goes to its history
   */
  async featureSeed(context: CommandContext, nameOrId: string, hours: number): Promise<CommandResult> {
    const feature = findFeature(context.catalog, nameOrId);
    if (!feature) {
      return { success: false, message: `Feature not found: ${nameOrId}` };
    }

    try {
      const updated = context.catalog.updateSeedTime(feature.id, hours);
      await context.dataSource.saveFeature(updated);
      return {
        success: true,
        message: `Seed time for ${updated.name} changed from ${feature.seedTimeHours}h to ${updated.seedTimeHours}h`,
        data: featureSummary(updated),
      };
    } catch (error) {
      return failure('update seed time', error);
    }
  },

  /**
   * Import tracked time from a CSV file and store the valid rows
   */
  async timeImport(context: CommandContext, csvPath: string): Promise<CommandResult> {
    if (!csvPath) {
      return { success: false, message: 'CSV path is required' };
    }

    try {
      const result = await importTrackedTimeFile(csvPath, context.trackedTime);
      const stored = await context.dataSource.appendTrackedTime(result.accepted);

      return {
        success: result.rejected.length === 0,
        message: `Imported ${stored} of ${result.totalRows} row(s) from ${csvPath}`,
        data: {
          accepted: result.accepted.length,
          rejected: result.rejected.map(row => ({
            row: row.rowNumber,
            errors: row.errors.map(e => e.message).join('; '),
          })),
        },
      };
    } catch (error) {
      return failure('import tracked time', error);
    }
  },

  async estimate(context: CommandContext, options: EstimateOptions): Promise<CommandResult> {
    if (options.featureNames.length === 0) {
      return { success: false, message: 'At least one feature name is required' };
    }

    try {
      const estimate = context.service.estimateProject({
        featureNames: options.featureNames,
        experienceLevel: options.experienceLevel,
        bufferPercentage: options.bufferPercentage,
        style: options.style,
        defaultNewFeatureHours: options.newFeatureHours,
      });
      await context.dataSource.saveEstimate(estimate);

      const buffer = estimate.bufferHours !== undefined ? ` (+${round(estimate.bufferHours)}h buffer)` : '';
      return {
        success: true,
        message: `Estimate: ${round(estimate.grandTotalHours)}h${buffer}, ${round(estimate.totalDays)} day(s), ${estimate.confidence} confidence`,
        data: estimateSummary(estimate),
      };
    } catch (error) {
      return failure('compute estimate', error);
    }
  },

  /**
   * Show the current configuration
   */
  async configShow(context: CommandContext): Promise<CommandResult> {
    try {
      const { version, ...estimation } = context.configStore.snapshot();
      return {
        success: true,
        message: 'Current configuration:',
        data: {
          config: context.configLoader.toDisplayString(context.config),
          estimation: { ...estimation, overlapKeywords: estimation.overlapKeywords.join(', ') },
          configVersion: version,
        },
      };
    } catch (error) {
      return failure('display config', error);
    }
  },

  /**
   * Validate a configuration file
   */
  async configValidate(context: CommandContext, configPath: string): Promise<CommandResult> {
    if (!configPath) {
      return { success: false, message: 'Config path is required' };
    }

    try {
      const config = context.configLoader.load(configPath);
      return {
        success: true,
        message: 'Configuration is valid',
        data: {
          configPath,
          config: context.configLoader.toDisplayString(config),
        },
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      return {
        success: false,
        message: `Configuration validation failed: ${errorMessage}`,
      };
    }
  },

  /**
   * Start the HTTP API. The returned server keeps the process alive.
   */
  async serve(
    context: CommandContext,
    options: ServeOptions = {}
  ): Promise<CommandResult & { server?: EstimatorApiServer }> {
    try {
      const server = new EstimatorApiServer({
        port: options.port ?? context.config.apiPort,
        catalog: context.catalog,
        trackedTime: context.trackedTime,
        configStore: context.configStore,
        service: context.service,
        dataSource: context.dataSource,
      });
      await server.start();
      const port = server.getAddress()?.port;
      return {
        success: true,
        message: `API listening on http://localhost:${port}`,
        data: { port },
        server,
      };
    } catch (error) {
      return failure('start API server', error);
    }
  },

  /**
   * Get list of available commands
   */
  getCommandList(): CommandDefinition[] {
    return [
      { name: 'feature list', description: 'List catalog features', usage: 'feature list [--team <team>]' },
      { name: 'feature search', description: 'Search names and synonyms', usage: 'feature search <query>' },
      { name: 'feature show', description: 'Show a feature and its statistics', usage: 'feature show <name|id>' },
      {
        name: 'feature add',
        description: 'Add a feature to the catalog',
        usage: 'feature add <name> --team <team> --hours <n> [--process <p>] [--synonyms a,b]',
      },
      { name: 'feature seed', description: 'Change a seed time', usage: 'feature seed <name|id> <hours>' },
      { name: 'time import', description: 'Import tracked time from CSV', usage: 'time import <csv>' },
      {
        name: 'estimate',
        description: 'Estimate a project',
        usage: 'estimate <features...> [--experience <level>] [--buffer <pct>] [--style <style>] [--new-hours <n>]',
      },
      { name: 'config show', description: 'Show current configuration' },
      { name: 'config validate', description: 'Validate a configuration file', usage: 'config validate <path>' },
      { name: 'serve', description: 'Start the HTTP API', usage: 'serve [--port <port>]' },
    ];
  },
};
