import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { CityCatalog } from './core/types.js';

/** Catalog shipped with the package. */
export const DEFAULT_CAPITALS_PATH = fileURLToPath(
  new URL('../data/capitals.json', import.meta.url),
);

const CitySchema = z.object({
  country: z.string(),
  region: z.string(),
  lat: z.string(),
  lon: z.string(),
  timezone_id: z.string(),
});

const CatalogSchema = z.record(CitySchema);

/**
 * Load the city catalog.
 *
 * @throws when the file is missing or not a valid catalog.
 */
export function loadCities(
  path: string = process.env.CAPITALS_JSON_PATH ?? DEFAULT_CAPITALS_PATH,
): CityCatalog {
  if (!fs.existsSync(path)) {
    throw new Error(`Cities file not found at ${path}`);
  }
  const result = CatalogSchema.safeParse(
    JSON.parse(fs.readFileSync(path, 'utf8')),
  );
  if (!result.success) {
    throw new Error(
      `Invalid cities file ${path}: ${result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
    );
  }
  return result.data;
}
