import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';

import pino from 'pino';

import { type LogLevel, validateLoggerEnv } from './env.schema.js';

// Validate environment variables (reads NODE_ENV directly from process.env)
const env = validateLoggerEnv(process.env);

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

export type Logger = pino.Logger;

export interface LoggerSettings {
  console: boolean;
  file: boolean;
  level: LogLevel;
}

// Cache for loggers
const loggerCache = new Map<string, Logger>();

// Root logger instance
let rootLogger: Logger | undefined;

// Mutable settings so the CLI can change verbosity and outputs at runtime
let settings: LoggerSettings = {
  console: env.LOGGER_CONSOLE_ENABLED,
  file: env.LOGGER_FILE_LOG_ENABLED,
  level: env.LOGGER_LOG_LEVEL,
};

function isTestEnv(): boolean {
  // Check both the validated env and process.env (in case vitest sets it after module load)
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

/**
 * Creates and configures the root logger instance.
 *
 * Console output always goes to stderr: stdout carries the account report.
 */
function createRootLogger(): Logger {
  interface TransportTarget {
    level: string;
    options: Record<string, unknown>;
    target: string;
  }

  const transportTargets: TransportTarget[] = [];

  if (settings.console && !isTestEnv()) {
    if (env.NODE_ENV === 'development') {
      transportTargets.push({
        level: 'trace',
        options: {
          destination: 2,
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
        },
        target: 'pino-pretty',
      });
    } else {
      transportTargets.push({
        level: 'trace',
        options: {
          destination: 2, // stderr file descriptor
        },
        target: 'pino/file',
      });
    }
  }

  if (settings.file && !isTestEnv()) {
    transportTargets.push({
      level: 'trace',
      options: {
        destination: path.join(env.LOGGER_FILE_LOG_DIRNAME, env.LOGGER_FILE_LOG_FILENAME),
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: settings.level,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // In test mode, or with every output disabled, use a noop stream to suppress all output
  if (isTestEnv() || transportTargets.length === 0) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino(pinoConfig, noopStream);
  }

  pinoConfig.transport = { targets: transportTargets };
  return pino.pino(pinoConfig);
}

/**
 * Internal: get or create the underlying pino logger for a category.
 * Callers should prefer the proxy returned by getLogger below so
 * reconfiguration (configureLogger) is respected even for previously
 * created loggers.
 */
function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child(
    {
      category,
      categoryLabel: formatLabel(category, 25),
    },
    { level: settings.level }
  );

  loggerCache.set(category, categoryLogger);

  return categoryLogger;
}

/**
 * Returns a category logger that stays in sync with reconfiguration.
 *
 * We return a Proxy that looks up the latest underlying pino logger on every
 * property access. Modules create their loggers at top level, before the CLI
 * has parsed `--verbose`.
 */
export const getLogger = (category: string): Logger => {
  return new Proxy({} as Logger, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop, logger);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
};

/**
 * Update logger settings at runtime.
 * Resets cached loggers so the new configuration applies immediately.
 */
export function configureLogger(next: Partial<LoggerSettings>): void {
  settings = { ...settings, ...next };
  rootLogger = undefined;
  loggerCache.clear();
}
