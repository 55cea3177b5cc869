/**
 * Leveled logger for engine components.
 * Errors and warnings are always printed, more verbose levels are enabled per
 * namespace through the `TABULAR_PAGER_DEBUG` environment variable
 * (`*`, `true` or a comma-separated list supporting trailing wildcards).
 */

import { ENV_KEYS } from '../config/constants';
import { Env } from '../models/app-config';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  TRACE = 4,
}

export type LogContext = Record<string, unknown>;

export interface LoggerConfig {
  enabled: boolean;
  level: LogLevel;
  prefix?: string;
  includeTimestamp?: boolean;
  /**
   * Replaces console output, e.g. to collect lines in tests.
   */
  customOutput?: (message: string, level: LogLevel, context?: LogContext) => void;
}

type ConsoleWriter = (...args: unknown[]) => void;

const consoleWriterFor = (level: LogLevel): ConsoleWriter => {
  switch (level) {
    case LogLevel.ERROR:
      return console.error;
    case LogLevel.WARN:
      return console.warn;
    case LogLevel.INFO:
      return console.info;
    default:
      return console.debug;
  }
};

export class DebugLogger {
  private settings: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.settings = { enabled: true, level: LogLevel.WARN, includeTimestamp: true, ...config };
  }

  configure(config: Partial<LoggerConfig>): void {
    this.settings = { ...this.settings, ...config };
  }

  isEnabled(level: LogLevel = LogLevel.ERROR): boolean {
    return this.settings.enabled && level <= this.settings.level;
  }

  setEnabled(enabled: boolean): void {
    this.configure({ enabled });
  }

  setLevel(level: LogLevel): void {
    this.configure({ level });
  }

  /**
   * A logger for a sub-component sharing this logger's configuration.
   */
  child(prefix: string): DebugLogger {
    const { prefix: parent } = this.settings;
    return new DebugLogger({ ...this.settings, prefix: parent ? `${parent}:${prefix}` : prefix });
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.write(LogLevel.ERROR, message, error === undefined ? context : { error, ...context });
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.WARN, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.INFO, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.write(LogLevel.TRACE, message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const line = this.render(level, message);
    const { customOutput } = this.settings;

    if (customOutput) {
      customOutput(line, level, context);
      return;
    }

    const hasContext = context !== undefined && Object.keys(context).length > 0;
    const writer = consoleWriterFor(level);
    if (hasContext) {
      writer(line, context);
    } else {
      writer(line);
    }
  }

  private render(level: LogLevel, message: string): string {
    const { includeTimestamp, prefix } = this.settings;

    return [
      includeTimestamp ? `[${new Date().toISOString()}]` : null,
      `[${LogLevel[level]}]`,
      prefix ? `[${prefix}]` : null,
      message,
    ]
      .filter((part): part is string => part !== null)
      .join(' ');
  }
}

const matchesNamespace = (namespace: string, pattern: string): boolean =>
  pattern.endsWith('*') ? namespace.startsWith(pattern.slice(0, -1)) : namespace === pattern;

/**
 * Whether verbose output is switched on for a namespace.
 */
export function isDebugEnabled(namespace: string, env: Env = process.env): boolean {
  const setting = env[ENV_KEYS.DEBUG]?.trim();

  if (!setting) return false;
  if (setting === '*' || setting === 'true') return true;

  return setting
    .split(',')
    .map((pattern) => pattern.trim())
    .some((pattern) => matchesNamespace(namespace, pattern));
}

const isLogLevelName = (name: string): name is keyof typeof LogLevel =>
  Object.keys(LogLevel).includes(name) && Number.isNaN(Number(name));

/**
 * Level from `TABULAR_PAGER_LOG_LEVEL`, else DEBUG for namespaces under
 * `TABULAR_PAGER_DEBUG`, else WARN.
 */
export function getLogLevel(namespace: string, env: Env = process.env): LogLevel {
  const name = env[ENV_KEYS.LOG_LEVEL]?.trim().toUpperCase();

  if (name && isLogLevelName(name)) {
    return LogLevel[name];
  }

  return isDebugEnabled(namespace, env) ? LogLevel.DEBUG : LogLevel.WARN;
}

export function createDebugLogger(namespace: string, env: Env = process.env): DebugLogger {
  return new DebugLogger({ prefix: namespace, level: getLogLevel(namespace, env) });
}

// One shared logger per namespace
const registry = new Map<string, DebugLogger>();

export function getLogger(namespace: string): DebugLogger {
  let logger = registry.get(namespace);
  if (!logger) {
    logger = createDebugLogger(namespace);
    registry.set(namespace, logger);
  }
  return logger;
}
