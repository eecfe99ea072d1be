import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CLI, parseArgs, formatOutput } from './index.js';
import { Commands } from './commands.js';
import type { CommandResult } from './commands.js';
import { ConfigLoader } from './config-loader.js';
import { logger, LogLevel } from '../logging/index.js';
import { hydrate } from '../data/index.js';

vi.mock('./commands.js', async () => {
  const actual = await vi.importActual('./commands.js');
  return {
    ...actual,
    Commands: {
      featureList: vi.fn().mockResolvedValue({ success: true, message: 'Features', data: { features: [] } }),
      featureSearch: vi.fn().mockResolvedValue({ success: true, message: 'Matches' }),
      featureShow: vi.fn().mockResolvedValue({ success: true, message: 'Feature' }),
      featureAdd: vi.fn().mockResolvedValue({ success: true, message: 'Feature added' }),
      featureSeed: vi.fn().mockResolvedValue({ success: true, message: 'Seed updated' }),
      timeImport: vi.fn().mockResolvedValue({ success: true, message: 'Imported' }),
      estimate: vi.fn().mockResolvedValue({ success: true, message: 'Estimate', data: { grandTotalHours: 10 } }),
      configShow: vi.fn().mockResolvedValue({ success: true, message: 'Config', data: { config: '{}' } }),
      configValidate: vi.fn().mockResolvedValue({ success: true, message: 'Valid' }),
      serve: vi.fn().mockResolvedValue({ success: true, message: 'Listening', data: { port: 3100 } }),
    },
  };
});

vi.mock('./config-loader.js', () => ({
  ConfigLoader: {
    load: vi.fn().mockReturnValue({
      dataSource: 'file',
      featureLibraryPath: './data/feature-library.yaml',
      estimatesDir: './data/estimates',
      apiPort: 3100,
      logLevel: 'warn',
      estimation: {},
    }),
    toDisplayString: vi.fn().mockReturnValue('{}'),
  },
}));

vi.mock('../data/index.js', () => ({
  createDataSource: vi.fn().mockReturnValue({ kind: 'file' }),
  hydrate: vi.fn().mockResolvedValue({ features: 0, trackedTime: 0, rejectedFeatures: [], rejectedTrackedTime: [] }),
}));

describe('parseArgs', () => {
  it('should parse a command with a subcommand', () => {
    const parsed = parseArgs(['feature', 'list', '--team', 'backend']);

    expect(parsed.command).toBe('feature');
    expect(parsed.subcommand).toBe('list');
    expect(parsed.options.team).toBe('backend');
  });

  it('should keep every estimate argument as a feature name', () => {
    const parsed = parseArgs(['estimate', 'CRUD', 'User Profile', '--experience', 'junior', '--buffer', '10']);

    expect(parsed.command).toBe('estimate');
    expect(parsed.subcommand).toBeUndefined();
    expect(parsed.args).toEqual(['CRUD', 'User Profile']);
    expect(parsed.options).toEqual({ experience: 'junior', buffer: '10' });
  });

  it('should treat a trailing flag as boolean', () => {
    expect(parseArgs(['config', 'show', '--verbose']).options.verbose).toBe(true);
  });

  it('should parse short flags', () => {
    expect(parseArgs(['-h']).options.h).toBe(true);
  });

  it('should handle empty args', () => {
    expect(parseArgs([]).command).toBeUndefined();
  });
});

describe('formatOutput', () => {
  it('should format a successful result with nested data', () => {
    const result: CommandResult = {
      success: true,
      message: 'Found 1 feature(s):',
      data: {
        features: [{ id: 'feat_crud', name: 'CRUD' }],
        totals: { hours: 4 },
      },
    };

    expect(formatOutput(result, 'text')).toBe([
      'Found 1 feature(s):',
      'features:',
      '  - id: feat_crud',
      '    name: CRUD',
      'totals:',
      '  hours: 4',
    ].join('\n'));
  });

  it('should list scalar arrays', () => {
    const result: CommandResult = { success: true, message: 'Warnings', data: { warnings: ['a', 'b'] } };
    expect(formatOutput(result, 'text')).toBe('Warnings\nwarnings:\n  - a\n  - b');
  });

  it('should format an error result', () => {
    expect(formatOutput({ success: false, message: 'Operation failed' }, 'text')).toBe('Error: Operation failed');
  });

  it('should format result as JSON', () => {
    const output = formatOutput({ success: true, message: 'Done', data: { count: 5 } }, 'json');
    expect(JSON.parse(output)).toEqual({ success: true, message: 'Done', data: { count: 5 } });
  });
});

describe('CLI', () => {
  let consoleSpy: {
    log: ReturnType<typeof vi.spyOn>;
    error: ReturnType<typeof vi.spyOn>;
  };

  beforeEach(() => {
    vi.clearAllMocks();
    consoleSpy = {
      log: vi.spyOn(console, 'log').mockImplementation(() => {}),
      error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    consoleSpy.log.mockRestore();
    consoleSpy.error.mockRestore();
    logger.setLevel(LogLevel.ERROR);
  });

  describe('run', () => {
    it('should show help when --help flag is provided', async () => {
      expect(await CLI.run(['--help'])).toBe(0);
      expect(consoleSpy.log).toHaveBeenCalled();
      expect(ConfigLoader.load).not.toHaveBeenCalled();
    });

    it('should show help when no command is provided', async () => {
      expect(await CLI.run([])).toBe(0);
      expect(consoleSpy.log).toHaveBeenCalled();
    });

    it('should load data before running a command', async () => {
      expect(await CLI.run(['feature', 'list'])).toBe(0);
      expect(hydrate).toHaveBeenCalledTimes(1);
      expect(Commands.featureList).toHaveBeenCalledWith(expect.anything(), undefined);
    });

    it('should pass a team filter', async () => {
      await CLI.run(['feature', 'list', '--team', 'frontend']);
      expect(Commands.featureList).toHaveBeenCalledWith(expect.anything(), 'frontend');
    });

    it('should reject an unknown team filter', async () => {
      expect(await CLI.run(['feature', 'list', '--team', 'qa'])).toBe(1);
      expect(consoleSpy.error).toHaveBeenCalledWith('Error: --team must be one of frontend, backend, both');
    });

    it('should join search words', async () => {
      await CLI.run(['feature', 'search', 'user', 'profile']);
      expect(Commands.featureSearch).toHaveBeenCalledWith(expect.anything(), 'user profile');
    });

    it('should add a feature with its options', async () => {
      await CLI.run(['feature', 'add', 'Search', '--team', 'backend', '--hours', '8', '--synonyms', 'find, lookup']);

      expect(Commands.featureAdd).toHaveBeenCalledWith(expect.anything(), {
        name: 'Search',
        team: 'backend',
        seedTimeHours: 8,
        process: undefined,
        synonyms: ['find', 'lookup'],
        notes: undefined,
      });
    });

    it('should require team and hours to add a feature', async () => {
      expect(await CLI.run(['feature', 'add', 'Search'])).toBe(1);
      expect(Commands.featureAdd).not.toHaveBeenCalled();
    });

    it('should split the seed hours from a multi-word name', async () => {
      await CLI.run(['feature', 'seed', 'User', 'Profile', '6']);
      expect(Commands.featureSeed).toHaveBeenCalledWith(expect.anything(), 'User Profile', 6);
    });

    it('should run time import', async () => {
      await CLI.run(['time', 'import', './time.csv']);
      expect(Commands.timeImport).toHaveBeenCalledWith(expect.anything(), './time.csv');
    });

    it('should pass estimate options', async () => {
      await CLI.run(['estimate', 'CRUD', 'Login', '--experience', 'senior', '--buffer', '15', '--style', 'p80', '--new-hours', '3']);

      expect(Commands.estimate).toHaveBeenCalledWith(expect.anything(), {
        featureNames: ['CRUD', 'Login'],
        experienceLevel: 'senior',
        bufferPercentage: 15,
        style: 'p80',
        newFeatureHours: 3,
      });
    });

    it('should reject a malformed numeric option', async () => {
      expect(await CLI.run(['estimate', 'CRUD', '--buffer', 'lots'])).toBe(1);
      expect(consoleSpy.error).toHaveBeenCalledWith('Error: --buffer must be a number');
    });

    it('should reject an unknown experience level', async () => {
      expect(await CLI.run(['estimate', 'CRUD', '--experience', 'expert'])).toBe(1);
    });

    it('should print JSON when asked', async () => {
      await CLI.run(['estimate', 'CRUD', '--format', 'json']);
      const calls = consoleSpy.log.mock.calls;
      const output = String(calls[calls.length - 1][0]);
      expect(JSON.parse(output)).toEqual({ success: true, message: 'Estimate', data: { grandTotalHours: 10 } });
    });

    it('should execute config commands', async () => {
      await CLI.run(['config', 'show']);
      await CLI.run(['config', 'validate', './estimator.json']);

      expect(Commands.configShow).toHaveBeenCalled();
      expect(Commands.configValidate).toHaveBeenCalledWith(expect.anything(), './estimator.json');
    });

    it('should pass the port to serve', async () => {
      expect(await CLI.run(['serve', '--port', '4000'])).toBe(0);
      expect(Commands.serve).toHaveBeenCalledWith(expect.anything(), { port: 4000 });
    });

    it('should return error code for unknown command', async () => {
      expect(await CLI.run(['unknown'])).toBe(1);
      expect(consoleSpy.error).toHaveBeenCalledWith('Error: Unknown command: unknown');
    });

    it('should return error code when command fails', async () => {
      vi.mocked(Commands.featureList).mockResolvedValueOnce({ success: false, message: 'Failed' });
      expect(await CLI.run(['feature', 'list'])).toBe(1);
    });

    it('should report unexpected errors', async () => {
      vi.mocked(Commands.featureList).mockRejectedValueOnce(new Error('Unexpected'));

      expect(await CLI.run(['feature', 'list'])).toBe(1);
      expect(consoleSpy.error).toHaveBeenCalledWith('Error: Unexpected');
    });

    it('should pass the config path to the loader', async () => {
      await CLI.run(['config', 'show', '--config', './custom.json']);
      expect(ConfigLoader.load).toHaveBeenCalledWith('./custom.json');
    });

    it('should set the log level from config', async () => {
      const setLevel = vi.spyOn(logger, 'setLevelFromString');
      await CLI.run(['config', 'show']);
      expect(setLevel).toHaveBeenCalledWith('warn');
      setLevel.mockRestore();
    });
  });

  describe('showHelp', () => {
    it('should display help message with commands', () => {
      CLI.showHelp();

      const output = consoleSpy.log.mock.calls.flat().join('\n');
      expect(output).toContain('Usage: estimator <command> [options]');
      expect(output).toContain('time import <csv>');
    });
  });

  describe('showVersion', () => {
    it('should display version number', () => {
      CLI.showVersion();

      const output = consoleSpy.log.mock.calls.flat().join('\n');
      expect(output).toMatch(/^estimator v\d+\.\d+\.\d+$/);
    });
  });
});
