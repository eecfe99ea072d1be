/**
 * Type definitions for the estimator logging system
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogFormat = 'json' | 'pretty';

export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  correlationId?: string;
  meta?: LogMeta;
  error?: {
    message: string;
    name: string;
    code?: string;
    stack?: string;
  };
  duration?: number;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, errorOrMeta?: Error | LogMeta, meta?: LogMeta): void;

  /** Create a child logger; component names nest as `Parent.Child` */
  child(component: string): Logger;

  /** Pin a correlation id on every entry written by the returned logger */
  withCorrelationId(id: string): Logger;

  time(label: string): void;

  /** Ends a timer started with `time`, logs the duration at DEBUG and returns it in ms */
  timeEnd(label: string, meta?: LogMeta): number | undefined;
}

export interface LoggerState {
  level: LogLevel;
  format: LogFormat;
  redactFields: string[];
  timers: Map<string, number>;
}
