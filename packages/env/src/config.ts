import { z } from 'zod';

function isSupportedLocale(tag: string): boolean {
  try {
    return Intl.getCanonicalLocales(tag).length === 1;
  } catch {
    return false;
  }
}

const envSchema = z.object({
  MONETA_DEFAULT_LOCALE: z
    .string()
    .trim()
    .min(1)
    .refine(isSupportedLocale, { message: 'Must be a valid BCP 47 locale tag' })
    .default('en-US'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates a set of environment variables without touching the cached configuration.
 * @throws Error if validation fails
 */
export function parseEnv(source: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates environment variables on first access.
 * Caches the result for subsequent calls.
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Drops the cached configuration so the next access re-reads `process.env`.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Locale used by formatters built without an explicit one.
 *
 * Priority:
 * 1. MONETA_DEFAULT_LOCALE environment variable (if set)
 * 2. 'en-US'
 *
 * The tag is returned in canonical form, so 'EN-us' becomes 'en-US'.
 */
export function getDefaultLocale(): string {
  const env = validateEnv();
  return Intl.getCanonicalLocales(env.MONETA_DEFAULT_LOCALE)[0] ?? 'en-US';
}

/**
 * Get the current NODE_ENV value.
 */
export function getNodeEnv(): ValidatedEnv['NODE_ENV'] {
  const env = validateEnv();
  return env.NODE_ENV;
}

/**
 * Check if running in test environment.
 */
export function isTest(): boolean {
  return getNodeEnv() === 'test';
}

/**
 * Check if running in production environment.
 */
export function isProduction(): boolean {
  return getNodeEnv() === 'production';
}

/**
 * Check if running in development environment.
 */
export function isDevelopment(): boolean {
  return getNodeEnv() === 'development';
}
