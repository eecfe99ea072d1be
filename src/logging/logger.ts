/**
 * Structured logger for the estimator
 *
 * Entries carry a component name, an optional correlation id and redacted
 * metadata, and are written to the console either as JSON lines or in a
 * colored single-line format.
 */

import { LogLevel } from './types.js';
import type { LogEntry, LogFormat, LogMeta, Logger, LoggerState } from './types.js';
import { redact } from './redaction.js';
import { getCorrelationId } from './correlation.js';

const state: LoggerState = {
  level: LogLevel.INFO,
  format: 'pretty',
  redactFields: [],
  timers: new Map(),
};

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m',
  [LogLevel.INFO]: '\x1b[32m',
  [LogLevel.WARN]: '\x1b[33m',
  [LogLevel.ERROR]: '\x1b[31m',
};

const RESET_COLOR = '\x1b[0m';
const DIM_COLOR = '\x1b[2m';

/**
 * Parse a log level name; unknown names fall back to INFO.
 */
export function parseLogLevel(levelStr: string): LogLevel {
  switch (levelStr.trim().toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN':
    case 'WARNING': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    default: return LogLevel.INFO;
  }
}

function formatPretty(level: LogLevel, entry: LogEntry): string {
  const levelColor = LEVEL_COLORS[level];
  let output = `${DIM_COLOR}${entry.timestamp}${RESET_COLOR} ${levelColor}${entry.level.padEnd(5)}${RESET_COLOR}`;
  output += ` ${DIM_COLOR}[${entry.component}]${RESET_COLOR}`;

  if (entry.correlationId) {
    output += ` ${DIM_COLOR}(${entry.correlationId})${RESET_COLOR}`;
  }

  output += ` ${entry.message}`;

  if (entry.duration !== undefined) {
    output += ` ${DIM_COLOR}(${entry.duration}ms)${RESET_COLOR}`;
  }

  if (entry.meta) {
    output += ` ${DIM_COLOR}${JSON.stringify(entry.meta)}${RESET_COLOR}`;
  }

  if (entry.error) {
    const code = entry.error.code ? ` [${entry.error.code}]` : '';
    output += `\n  ${levelColor}${entry.error.name}${code}: ${entry.error.message}${RESET_COLOR}`;
    if (entry.error.stack && state.level === LogLevel.DEBUG) {
      output += `\n${DIM_COLOR}${entry.error.stack}${RESET_COLOR}`;
    }
  }

  return output;
}

function writeLog(level: LogLevel, entry: LogEntry): void {
  const formatted = state.format === 'json' ? JSON.stringify(entry) : formatPretty(level, entry);

  switch (level) {
    case LogLevel.DEBUG:
    case LogLevel.INFO:
      console.log(formatted);
      break;
    case LogLevel.WARN:
      console.warn(formatted);
      break;
    case LogLevel.ERROR:
      console.error(formatted);
      break;
  }
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

interface EntryParts {
  component: string;
  correlationId?: string;
  error?: Error;
  meta?: LogMeta;
  duration?: number;
}

function createEntry(level: LogLevel, message: string, parts: EntryParts): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: LEVEL_NAMES[level],
    component: parts.component,
    message,
  };

  const correlationId = parts.correlationId ?? getCorrelationId();
  if (correlationId) {
    entry.correlationId = correlationId;
  }

  if (parts.error) {
    entry.error = {
      message: parts.error.message,
      name: parts.error.name,
      code: errorCode(parts.error),
      stack: parts.error.stack,
    };
  }

  if (parts.meta && Object.keys(parts.meta).length > 0) {
    entry.meta = redact(parts.meta, state.redactFields);
  }

  if (parts.duration !== undefined) {
    entry.duration = parts.duration;
  }

  return entry;
}

class ComponentLogger implements Logger {
  constructor(
    private readonly component: string,
    private readonly correlationId?: string
  ) {}

  debug(message: string, meta?: LogMeta): void {
    this.log(LogLevel.DEBUG, message, undefined, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log(LogLevel.INFO, message, undefined, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log(LogLevel.WARN, message, undefined, meta);
  }

  error(message: string, errorOrMeta?: Error | LogMeta, meta?: LogMeta): void {
    if (errorOrMeta instanceof Error) {
      this.log(LogLevel.ERROR, message, errorOrMeta, meta);
    } else {
      this.log(LogLevel.ERROR, message, undefined, errorOrMeta);
    }
  }

  child(component: string): Logger {
    return new ComponentLogger(`${this.component}.${component}`, this.correlationId);
  }

  withCorrelationId(id: string): Logger {
    return new ComponentLogger(this.component, id);
  }

  time(label: string): void {
    state.timers.set(this.timerKey(label), Date.now());
  }

  timeEnd(label: string, meta?: LogMeta): number | undefined {
    const key = this.timerKey(label);
    const start = state.timers.get(key);

    if (start === undefined) {
      this.warn(`Timer "${label}" does not exist`);
      return undefined;
    }

    state.timers.delete(key);
    const duration = Date.now() - start;

    if (LogLevel.DEBUG >= state.level) {
      writeLog(LogLevel.DEBUG, createEntry(LogLevel.DEBUG, `${label} completed`, {
        component: this.component,
        correlationId: this.correlationId,
        meta,
        duration,
      }));
    }

    return duration;
  }

  private timerKey(label: string): string {
    return `${this.component}:${this.correlationId ?? getCorrelationId() ?? ''}:${label}`;
  }

  private log(level: LogLevel, message: string, error?: Error, meta?: LogMeta): void {
    if (level < state.level) return;
    writeLog(level, createEntry(level, message, {
      component: this.component,
      correlationId: this.correlationId,
      error,
      meta,
    }));
  }
}

const rootLogger = new ComponentLogger('estimator');

export const logger = {
  /**
   * Apply EST_LOG_LEVEL, EST_LOG_FORMAT and EST_LOG_REDACT from the environment.
   */
  init(env: NodeJS.ProcessEnv = process.env): void {
    const level = env.EST_LOG_LEVEL;
    if (level) {
      state.level = parseLogLevel(level);
    }

    const format = env.EST_LOG_FORMAT;
    if (format === 'json' || format === 'pretty') {
      state.format = format;
    }

    const redactFields = env.EST_LOG_REDACT;
    if (redactFields) {
      state.redactFields = redactFields.split(',').map(f => f.trim()).filter(f => f.length > 0);
    }
  },

  setLevel(level: LogLevel): void {
    state.level = level;
  },

  setLevelFromString(levelStr: string): void {
    state.level = parseLogLevel(levelStr);
  },

  setFormat(format: LogFormat): void {
    state.format = format;
  },

  addRedactFields(fields: string[]): void {
    state.redactFields.push(...fields);
  },

  getLevel(): LogLevel {
    return state.level;
  },

  getFormat(): LogFormat {
    return state.format;
  },

  /** Restore defaults (tests) */
  reset(): void {
    state.level = LogLevel.INFO;
    state.format = 'pretty';
    state.redactFields = [];
    state.timers.clear();
  },

  debug: rootLogger.debug.bind(rootLogger),
  info: rootLogger.info.bind(rootLogger),
  warn: rootLogger.warn.bind(rootLogger),
  error: rootLogger.error.bind(rootLogger),
  time: rootLogger.time.bind(rootLogger),
  timeEnd: rootLogger.timeEnd.bind(rootLogger),

  child(component: string): Logger {
    return new ComponentLogger(component);
  },

  withCorrelationId(id: string): Logger {
    return new ComponentLogger('estimator', id);
  },
};

export { LogLevel } from './types.js';
export type { Logger, LogEntry } from './types.js';
