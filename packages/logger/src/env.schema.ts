import { z } from 'zod';

export const logLevels = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof logLevels)[number];

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val: string) => val === 'true');

export const loggerEnvSchema = z.object({
  LOGGER_CONSOLE_ENABLED: booleanFlag('false'),
  LOGGER_FILE_LOG_DIRNAME: z.string().trim().min(1, { message: 'Invalid log directory name' }).default('logs'),
  LOGGER_FILE_LOG_ENABLED: booleanFlag('false'),
  LOGGER_FILE_LOG_FILENAME: z.string().trim().min(1, { message: 'Invalid file log name' }).default('moneta.log'),
  LOGGER_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(logLevels, { errorMap: () => ({ message: 'Invalid log level' }) }))
    .default('info'),
  LOGGER_SERVICE_NAME: z.string().default('moneta'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
