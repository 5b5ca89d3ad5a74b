import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { PipelineConfig } from './types.js';

export const DEFAULT_CRON = '*/15 * * * *';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  WEATHER_API_KEY: optionalString,
  WEATHER_API_URL: z.string().url().default('http://weather-api:5000'),
  WEATHER_CITY: z.string().min(1).default('London'),
  WEATHER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  DATABASE_URL: optionalString,
  DB_HOST: z.string().min(1).default('db'),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  DB_USER: z.string().min(1).default('weather_user'),
  DB_PASSWORD: z.string().optional(),
  DB_NAME: z.string().min(1).default('weather_db'),
  DB_SCHEMA: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier')
    .default('dev'),
  PIPELINE_CRON: z.string().min(1).default(DEFAULT_CRON),
  VERBOSE: z
    .string()
    .optional()
    .transform((value) => value === 'true' || value === '1'),
});

/**
 * Build the pipeline configuration from environment variables.
 *
 * @param env - Variables to read, `process.env` by default.
 * @throws {ConfigError} listing every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): PipelineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }
  const vars = parsed.data;

  return {
    databaseConfig: vars.DATABASE_URL
      ? { connectionString: vars.DATABASE_URL }
      : {
          host: vars.DB_HOST,
          port: vars.DB_PORT,
          user: vars.DB_USER,
          password: vars.DB_PASSWORD,
          database: vars.DB_NAME,
        },
    source: {
      baseUrl: vars.WEATHER_API_URL,
      apiKey: vars.WEATHER_API_KEY,
      city: vars.WEATHER_CITY,
      timeoutMs: vars.WEATHER_TIMEOUT_MS,
    },
    schema: vars.DB_SCHEMA,
    cron: vars.PIPELINE_CRON,
    verbose: vars.VERBOSE,
  };
}

/**
 * Load a .env file into `process.env` without overriding variables that are
 * already set. A missing file is not an error.
 */
export function loadEnvFile(path?: string): void {
  const result = dotenv.config(path ? { path } : {});
  if (result.error && path) {
    throw new ConfigError(
      `Could not read env file ${path}: ${result.error.message}`,
    );
  }
}
