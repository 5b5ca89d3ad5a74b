import type { PoolClient } from 'pg';
import { ConnectionError, InsertError, errorMessage } from './errors.js';
import { log, logError } from './log-context.js';
import { toObservation } from './observation.js';
import { ConnectionPoolManager } from './pool.js';
import { withRetry } from './retry.js';
import { DEFAULT_SCHEMA, rawWeatherTable, rollbackQuietly } from './schema.js';
import type {
  InsertResult,
  RawWeatherRow,
  RetryOptions,
  WeatherObservation,
} from './types.js';

export interface InsertOptions {
  schema?: string;
  /** Clock used to date the observation. */
  now?: Date;
  retry?: RetryOptions;
}

const ROW_COLUMNS = `id, city, temp, weather_description AS "weatherDescription", wind_speed AS "windSpeed", time, inserted_at AS "insertedAt", utc_offset AS "utcOffset"`;

/**
 * Insert one observation in its own transaction. Any error rolls the
 * transaction back before it is re-thrown, so no partial row is visible.
 */
export async function insertObservation(
  client: PoolClient,
  observation: WeatherObservation,
  schema: string = DEFAULT_SCHEMA,
): Promise<{ id: number; insertedAt: Date }> {
  const table = rawWeatherTable(schema);
  try {
    await client.query('BEGIN');
    const result = await client.query<{ id: number; insertedAt: Date }>(
      `INSERT INTO ${table}
        (city, temp, weather_description, wind_speed, time, inserted_at, utc_offset)
        VALUES ($1, $2, $3, $4, $5, NOW(), $6)
        RETURNING id, inserted_at AS "insertedAt"`,
      [
        observation.city,
        observation.temperature,
        observation.description,
        observation.windSpeed,
        observation.observedAt,
        observation.utcOffset,
      ],
    );
    await client.query('COMMIT');
    return result.rows[0];
  } catch (error) {
    await rollbackQuietly(client);
    throw error;
  }
}

/**
 * Map a fetched payload and write it.
 *
 * A malformed payload fails once with {@link InsertError}: there is nothing
 * to retry. Storage failures retry the whole transaction on a fresh
 * connection, so delivery is at-least-once and a retry after a commit whose
 * acknowledgement was lost writes a duplicate row. A {@link ConnectionError}
 * from the pool is passed through as is.
 */
export async function insertRecord(
  pool: ConnectionPoolManager,
  payload: unknown,
  options: InsertOptions = {},
): Promise<InsertResult> {
  const { schema = DEFAULT_SCHEMA, now = new Date(), retry = {} } = options;
  const observation = toObservation(payload, now);
  const maxAttempts = retry.maxAttempts ?? 3;

  try {
    const row = await withRetry(
      async () => {
        const client = await pool.acquire();
        try {
          return await insertObservation(client, observation, schema);
        } finally {
          client.release();
        }
      },
      {
        ...retry,
        maxAttempts,
        // acquire() has already spent its own attempts.
        shouldRetry: (error) =>
          !(error instanceof ConnectionError) &&
          (retry.shouldRetry?.(error) ?? true),
        onRetry: (info) => {
          logError(
            `Insert attempt ${info.attempt}/${info.maxAttempts} failed after ${info.elapsedMs}ms, retrying in ${info.delayMs}ms: ${errorMessage(info.error)}`,
          );
          retry.onRetry?.(info);
        },
      },
    );
    log(
      `Inserted weather record ${row.id} for ${observation.city} (temperature ${observation.temperature})`,
    );
    return { id: row.id, insertedAt: row.insertedAt, observation };
  } catch (error) {
    logError(`Failed to insert weather record for ${observation.city}`, error);
    if (error instanceof ConnectionError) throw error;
    throw new InsertError(
      `Failed to insert weather record: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}

export async function getRecord(
  client: PoolClient,
  id: number,
  schema: string = DEFAULT_SCHEMA,
): Promise<RawWeatherRow | null> {
  const result = await client.query<RawWeatherRow>(
    `SELECT ${ROW_COLUMNS} FROM ${rawWeatherTable(schema)} WHERE id = $1`,
    [id],
  );
  return result.rows[0] ?? null;
}

/** Most recent rows first, optionally for a single city. */
export async function listRecords(
  client: PoolClient,
  filters: { city?: string; limit?: number } = {},
  schema: string = DEFAULT_SCHEMA,
): Promise<RawWeatherRow[]> {
  const { city, limit = 100 } = filters;
  const params: unknown[] = [];
  let query = `SELECT ${ROW_COLUMNS} FROM ${rawWeatherTable(schema)}`;
  if (city !== undefined) {
    params.push(city);
    query += ` WHERE city = $${params.length}`;
  }
  params.push(limit);
  query += ` ORDER BY id DESC LIMIT $${params.length}`;
  const result = await client.query<RawWeatherRow>(query, params);
  return result.rows;
}
