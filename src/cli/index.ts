/**
 * CLI entry point for the estimator
 */

import { Commands } from './commands.js';
import type { CommandContext, CommandResult } from './commands.js';
import { ConfigLoader } from './config-loader.js';
import type { AppConfig } from './config-loader.js';
import { logger } from '../logging/index.js';
import { EventBus } from '../events/index.js';
import { FeatureCatalog } from '../estimation/feature-catalog.js';
import { TrackedTimeStore } from '../estimation/tracked-time-store.js';
import { ConfigStore } from '../estimation/config-store.js';
import { EstimationService } from '../estimation/estimation-service.js';
import { isEstimationStyle, isExperienceLevel, isTeam } from '../estimation/types.js';
import { createDataSource, hydrate } from '../data/index.js';
import pkg from '../../package.json' with { type: 'json' };

/**
 * Parsed command-line arguments
 */
export interface ParsedArgs {
  command?: string;
  subcommand?: string;
  args: string[];
  options: Record<string, string | boolean>;
}

export type OutputFormat = 'text' | 'json';

/**
 * Package version (from package.json)
 */
const VERSION = pkg.version;

const COMMANDS_WITH_SUBCOMMANDS = new Set(['feature', 'time', 'config']);

/**
 * Parse command-line arguments into structured format
 */
export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    args: [],
    options: {},
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg.startsWith('--')) {
      const optionName = arg.slice(2);
      const nextArg = args[i + 1];

      if (nextArg !== undefined && !nextArg.startsWith('-')) {
        result.options[optionName] = nextArg;
        i += 2;
      } else {
        result.options[optionName] = true;
        i++;
      }
    } else if (arg.startsWith('-') && arg.length > 1) {
      result.options[arg.slice(1)] = true;
      i++;
    } else if (!result.command) {
      result.command = arg;
      i++;
    } else if (!result.subcommand && COMMANDS_WITH_SUBCOMMANDS.has(result.command)) {
      result.subcommand = arg;
      i++;
    } else {
      result.args.push(arg);
      i++;
    }
  }

  return result;
}

/**
 * Format command result for output
 */
export function formatOutput(result: CommandResult, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2);
  }

  if (result.success) {
    let output = result.message;
    if (result.data) {
      output += '\n' + formatData(result.data);
    }
    return output;
  }
  return `Error: ${result.message}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format data object for text output
 */
function formatData(data: Record<string, unknown>, indent = ''): string {
  const lines: string[] = [];

  for (const [key, value] of Object.entries(data)) {
    if (Array.isArray(value)) {
      lines.push(`${indent}${key}:`);
      for (const item of value) {
        if (isRecord(item)) {
          const [first, ...rest] = formatData(item, indent + '    ').split('\n');
          lines.push(`${indent}  - ${first.trimStart()}`, ...rest);
        } else {
          lines.push(`${indent}  - ${String(item)}`);
        }
      }
    } else if (isRecord(value)) {
      lines.push(`${indent}${key}:`);
      lines.push(formatData(value, indent + '  '));
    } else {
      lines.push(`${indent}${key}: ${String(value)}`);
    }
  }

  return lines.join('\n');
}

function stringOption(options: ParsedArgs['options'], name: string): string | undefined {
  const value = options[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Numeric option; a present but malformed value is an error rather than
 * silently ignored.
 */
function numberOption(options: ParsedArgs['options'], name: string): number | undefined {
  const raw = options[name];
  if (raw === undefined) return undefined;
  const value = typeof raw === 'string' ? Number(raw) : Number.NaN;
  if (!Number.isFinite(value)) {
    throw new Error(`--${name} must be a number`);
  }
  return value;
}

/**
 * Builds the stores, loads them from the configured data source and wires
 * the estimation service.
 */
export async function createContext(config: AppConfig): Promise<CommandContext> {
  const eventBus = new EventBus();
  const catalog = new FeatureCatalog({ eventBus });
  const trackedTime = new TrackedTimeStore({ eventBus });
  const configStore = new ConfigStore({ initial: config.estimation, eventBus });
  const dataSource = createDataSource(config);

  await hydrate(dataSource, catalog, trackedTime);

  return {
    catalog,
    trackedTime,
    configStore,
    service: new EstimationService({ catalog, trackedTime, config: configStore, eventBus }),
    dataSource,
    configLoader: ConfigLoader,
    config,
  };
}

/**
 * CLI class with static methods
 */
export const CLI = {
  /**
   * Run the CLI with given arguments
   */
  async run(args: string[]): Promise<number> {
    const parsed = parseArgs(args);
    const format: OutputFormat = parsed.options.format === 'json' ? 'json' : 'text';

    if (parsed.options.help || parsed.options.h) {
      CLI.showHelp();
      return 0;
    }

    if (parsed.options.version || parsed.options.v) {
      CLI.showVersion();
      return 0;
    }

    if (!parsed.command) {
      CLI.showHelp();
      return 0;
    }

    try {
      const config = ConfigLoader.load(stringOption(parsed.options, 'config'));
      logger.setLevelFromString(config.logLevel);

      const context = await createContext(config);
      const result = await CLI.executeCommand(parsed, context);

      console.log(formatOutput(result, format));

      return result.success ? 0 : 1;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      console.error(`Error: ${message}`);
      return 1;
    }
  },

  /**
   * Execute a command based on parsed arguments
   */
  async executeCommand(parsed: ParsedArgs, context: CommandContext): Promise<CommandResult> {
    const { command, subcommand, args, options } = parsed;

    switch (command) {
      case 'feature':
        return CLI.executeFeatureCommand(subcommand, args, options, context);

      case 'time':
        if (subcommand !== 'import') {
          throw new Error(`Unknown time command: ${subcommand}`);
        }
        return Commands.timeImport(context, args[0] ?? '');

      case 'estimate': {
        const experience = stringOption(options, 'experience');
        if (experience !== undefined && !isExperienceLevel(experience)) {
          throw new Error('--experience must be one of junior, mid, senior');
        }
        const style = stringOption(options, 'style');
        if (style !== undefined && !isEstimationStyle(style)) {
          throw new Error('--style must be one of mean, median, p80');
        }
        return Commands.estimate(context, {
          featureNames: args,
          experienceLevel: experience,
          bufferPercentage: numberOption(options, 'buffer'),
          style,
          newFeatureHours: numberOption(options, 'new-hours'),
        });
      }

      case 'config':
        return CLI.executeConfigCommand(subcommand, args, context);

      case 'serve': {
        const { server, ...result } = await Commands.serve(context, { port: numberOption(options, 'port') });
        if (server) {
          const shutdown = () => {
            server.stop().catch((error: unknown) => {
              logger.error('Failed to stop API server', error instanceof Error ? error : undefined);
            });
          };
          process.once('SIGINT', shutdown);
          process.once('SIGTERM', shutdown);
        }
        return result;
      }

      default:
        throw new Error(`Unknown command: ${command}`);
    }
  },

  /**
   * Execute feature subcommands
   */
  async executeFeatureCommand(
    subcommand: string | undefined,
    args: string[],
    options: Record<string, string | boolean>,
    context: CommandContext
  ): Promise<CommandResult> {
    switch (subcommand) {
      case 'list': {
        const team = stringOption(options, 'team');
        if (team !== undefined && !isTeam(team)) {
          throw new Error('--team must be one of frontend, backend, both');
        }
        return Commands.featureList(context, team);
      }

      case 'search':
        return Commands.featureSearch(context, args.join(' '));

      case 'show':
        return Commands.featureShow(context, args.join(' '));

      case 'add': {
        const team = stringOption(options, 'team');
        const hours = numberOption(options, 'hours');
        if (!isTeam(team) || hours === undefined) {
          throw new Error('Usage: feature add <name> --team <frontend|backend|both> --hours <n>');
        }
        return Commands.featureAdd(context, {
          name: args.join(' '),
          team,
          seedTimeHours: hours,
          process: stringOption(options, 'process'),
          synonyms: stringOption(options, 'synonyms')?.split(',').map(s => s.trim()).filter(Boolean),
          notes: stringOption(options, 'notes'),
        });
      }

      case 'seed': {
        const hours = Number(args[args.length - 1]);
        if (args.length < 2 || !Number.isFinite(hours)) {
          throw new Error('Usage: feature seed <name|id> <hours>');
        }
        return Commands.featureSeed(context, args.slice(0, -1).join(' '), hours);
      }

      default:
        throw new Error(`Unknown feature command: ${subcommand}`);
    }
  },

  /**
   * Execute config subcommands
   */
  async executeConfigCommand(
    subcommand: string | undefined,
    args: string[],
    context: CommandContext
  ): Promise<CommandResult> {
    switch (subcommand) {
      case 'show':
        return Commands.configShow(context);

      case 'validate':
        return Commands.configValidate(context, args[0] ?? '');

      default:
        throw new Error(`Unknown config command: ${subcommand}`);
    }
  },

  /**
   * Show help message
   */
  showHelp(): void {
    const helpText = `
estimator - Project effort estimation from a feature library and tracked time

Usage: estimator <command> [options]

Commands:
  feature list [--team <team>]   List catalog features
  feature search <query>         Search feature names and synonyms
  feature show <name|id>         Show a feature and its statistics
  feature add <name> --team <team> --hours <n> [--process <p>] [--synonyms a,b]
                                 Add a feature to the catalog
  feature seed <name|id> <hours> Change a feature's seed time

  time import <csv>              Import tracked time from a CSV file

  estimate <features...> [--experience junior|mid|senior] [--buffer <pct>]
           [--style mean|median|p80] [--new-hours <n>]
                                 Estimate a project

  config show                    Show current configuration
  config validate <path>         Validate a configuration file

  serve [--port <port>]          Start the HTTP API

Options:
  --help, -h                     Show this help message
  --version, -v                  Show version number
  --config <path>                Path to configuration file
  --format <format>              Output format (json|text)

Environment Variables:
  EST_DATA_SOURCE                file (default) or supabase
  EST_FEATURE_LIBRARY_PATH       Feature library YAML (default: ./data/feature-library.yaml)
  EST_TRACKED_TIME_PATH          Tracked time CSV for the file data source
  EST_ESTIMATES_DIR              Saved estimates directory (default: ./data/estimates)
  EST_ESTIMATION_STYLE           mean|median|p80 (default: median)
  EST_BUFFER_PERCENTAGE          Buffer on top of the total (default: 0)
  EST_WORKING_HOURS_PER_DAY      Hours in a working day (default: 8)
  EST_API_PORT                   API port (default: 3100)
  EST_LOG_LEVEL                  Log level (debug|info|warn|error)
  SUPABASE_URL                   Supabase project URL
  SUPABASE_SERVICE_KEY           Supabase service key

Examples:
  estimator feature search login
  estimator time import ./data/tracked-time.csv
  estimator estimate CRUD "User Profile" Websocket --experience junior --buffer 15
  estimator serve --port 3100
`;

    console.log(helpText);
  },

  /**
   * Show version number
   */
  showVersion(): void {
    console.log(`estimator v${VERSION}`);
  },
};

export type { CommandResult } from './commands.js';
export type { AppConfig } from './config-loader.js';
