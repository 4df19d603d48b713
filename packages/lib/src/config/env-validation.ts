import { z } from 'zod';

type EnvSource = Record<string, string | undefined>;

/**
 * Environment variables read by the library.
 * Everything is optional; defaults apply when unset.
 */
export const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  LOG_FORMAT: z.enum(['json', 'pretty']).optional(),
  LOG_SANITIZE: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
});

export type GridEnv = z.infer<typeof envSchema>;

/**
 * Validates environment variables against the schema.
 * @throws Error with descriptive message if validation fails
 */
export const validateEnv = (env: EnvSource = process.env): GridEnv => {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
};

/**
 * Returns array of validation error messages without throwing.
 */
export const getEnvErrors = (env: EnvSource = process.env): string[] => {
  const result = envSchema.safeParse(env);

  if (result.success) {
    return [];
  }

  return result.error.issues.map(
    (issue) => `${issue.path.join('.')}: ${issue.message}`
  );
};

export const isEnvValid = (env: EnvSource = process.env): boolean => {
  return envSchema.safeParse(env).success;
};

// Validated once on first access
let cachedEnv: GridEnv | null = null;

export const getValidatedEnv = (): GridEnv => {
  if (!cachedEnv) {
    cachedEnv = validateEnv();
  }
  return cachedEnv;
};

export const resetEnvCache = (): void => {
  cachedEnv = null;
};
