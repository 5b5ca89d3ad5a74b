// Testable startup logic for the mock weather API
import type { Server } from 'http';
import { z } from 'zod';
import { ApiKeyManager, DEFAULT_API_KEYS_PATH } from './api-keys.js';
import { DEFAULT_CAPITALS_PATH, loadCities } from './cities.js';
import type { Logger, MockApiConfig } from './core/types.js';
import { serve } from './express.js';

export const DEFAULT_PORT = 5000;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  API_KEYS_CONFIG: z.string().min(1).default(DEFAULT_API_KEYS_PATH),
  CAPITALS_JSON_PATH: z.string().min(1).default(DEFAULT_CAPITALS_PATH),
});

/** Console logger with a timestamp, level and source on every line. */
export function createConsoleLogger(name = 'mock-weather-api'): Logger {
  const line = (level: string, message: string) =>
    `${new Date().toISOString()} - ${name} - ${level} - ${message}`;
  return {
    info: (message) => console.log(line('INFO', message)),
    warn: (message) => console.warn(line('WARNING', message)),
    error: (message, error) =>
      error === undefined
        ? console.error(line('ERROR', message))
        : console.error(line('ERROR', message), error),
  };
}

export interface ServerDeps {
  env?: Record<string, string | undefined>;
  logger?: Logger;
  serveImpl?: (config: MockApiConfig, port: number) => Promise<Server>;
}

/**
 * Read PORT, API_KEYS_CONFIG and CAPITALS_JSON_PATH, load the key whitelist
 * and the city catalog, and start listening.
 */
export async function startServer({
  env = process.env,
  logger = createConsoleLogger(),
  serveImpl = serve,
}: ServerDeps = {}): Promise<Server> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(
      `Invalid configuration: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
    );
  }
  const { PORT, API_KEYS_CONFIG, CAPITALS_JSON_PATH } = parsed.data;

  const keyManager = ApiKeyManager.fromFile(API_KEYS_CONFIG, logger);
  const cities = loadCities(CAPITALS_JSON_PATH);
  const server = await serveImpl({ keyManager, cities, logger }, PORT);
  logger.info(
    `Weather API listening on port ${PORT} (${keyManager.size} keys, ${Object.keys(cities).length} cities)`,
  );
  return server;
}
