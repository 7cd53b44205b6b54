export { configureLogger, getLogger, type Logger, type LoggerSettings } from './pino-logger.js';
export { LOG_LEVELS, LogLevelSchema, loggerEnvSchema, validateLoggerEnv, type LogLevel } from './env.schema.js';
