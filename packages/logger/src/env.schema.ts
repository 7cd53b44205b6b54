import { z } from 'zod';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

export const LogLevelSchema = z.enum(LOG_LEVELS);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const booleanString = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val: string) => val === 'true');

// Define environment schema
export const loggerEnvSchema = z.object({
  LOGGER_CONSOLE_ENABLED: booleanString('true'),
  LOGGER_FILE_LOG_DIRNAME: z.string().trim().min(1, { message: 'Invalid log directory name' }).default('logs'),
  LOGGER_FILE_LOG_ENABLED: booleanString('false'),
  LOGGER_FILE_LOG_FILENAME: z.string().trim().min(1, { message: 'Invalid file log name' }).default('ledgerline.log'),
  LOGGER_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(LogLevelSchema)
    .default('info'),
  LOGGER_SERVICE_NAME: z.string().default('ledgerline'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('production'),
});

// Infer TypeScript type from schema
export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

// Function to validate environment variables
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
