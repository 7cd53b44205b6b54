import { afterEach, describe, expect, it } from 'vitest';

import { loggerEnvSchema } from '../env.schema.js';
import { configureLogger, getLogger } from '../pino-logger.js';

describe('getLogger', () => {
  afterEach(() => {
    configureLogger({ level: 'info' });
  });

  it('should expose the pino logging methods', () => {
    const logger = getLogger('test-category');

    expect(typeof logger.info).toBe('function');
    expect(() => logger.info({ tx: 1 }, 'message is swallowed under test')).not.toThrow();
  });

  it('should apply reconfigured levels to loggers created earlier', () => {
    const logger = getLogger('engine');
    expect(logger.isLevelEnabled('debug')).toBe(false);

    configureLogger({ level: 'debug' });

    expect(logger.level).toBe('debug');
    expect(logger.isLevelEnabled('debug')).toBe(true);
  });

  it('should create later loggers at the configured level', () => {
    configureLogger({ level: 'warn' });

    const logger = getLogger('created-after-configure');

    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('info')).toBe(false);
  });
});

describe('loggerEnvSchema', () => {
  it('should apply defaults', () => {
    const env = loggerEnvSchema.parse({});

    expect(env.LOGGER_LOG_LEVEL).toBe('info');
    expect(env.LOGGER_CONSOLE_ENABLED).toBe(true);
    expect(env.LOGGER_FILE_LOG_ENABLED).toBe(false);
    expect(env.LOGGER_FILE_LOG_FILENAME).toBe('ledgerline.log');
  });

  it('should normalize the level and parse boolean flags', () => {
    const env = loggerEnvSchema.parse({ LOGGER_LOG_LEVEL: ' DEBUG ', LOGGER_FILE_LOG_ENABLED: 'true' });

    expect(env.LOGGER_LOG_LEVEL).toBe('debug');
    expect(env.LOGGER_FILE_LOG_ENABLED).toBe(true);
  });

  it('should reject unknown levels', () => {
    expect(loggerEnvSchema.safeParse({ LOGGER_LOG_LEVEL: 'verbose' }).success).toBe(false);
  });
});
