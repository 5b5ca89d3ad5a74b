import type { PoolClient } from 'pg';
import { SchemaError, errorMessage } from './errors.js';
import { log, logError } from './log-context.js';

export const DEFAULT_SCHEMA = 'dev';
export const RAW_WEATHER_TABLE = 'raw_weather_data';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Quote a schema name for use in DDL/DML. Only plain identifiers are
 * accepted since the name ends up inside SQL text.
 */
export function quoteSchema(schema: string): string {
  if (!IDENTIFIER.test(schema)) {
    throw new SchemaError(`Invalid schema name: "${schema}"`);
  }
  return `"${schema}"`;
}

/** Fully qualified, quoted name of the raw weather table. */
export function rawWeatherTable(schema: string = DEFAULT_SCHEMA): string {
  return `${quoteSchema(schema)}."${RAW_WEATHER_TABLE}"`;
}

/**
 * Create the schema and the raw weather table if they do not exist yet.
 * Both statements run in one transaction, so either both apply or neither.
 */
export const ensureSchema = async (
  client: PoolClient,
  schema: string = DEFAULT_SCHEMA,
): Promise<void> => {
  const table = rawWeatherTable(schema);
  try {
    await client.query('BEGIN');
    await client.query(`CREATE SCHEMA IF NOT EXISTS ${quoteSchema(schema)}`);
    await client.query(`
      CREATE TABLE IF NOT EXISTS ${table} (
        id SERIAL PRIMARY KEY,
        city TEXT,
        temp FLOAT,
        weather_description TEXT,
        wind_speed FLOAT,
        time TIMESTAMP,
        inserted_at TIMESTAMP DEFAULT NOW(),
        utc_offset TEXT
      )
    `);
    await client.query('COMMIT');
    log(`Ensured table ${schema}.${RAW_WEATHER_TABLE}`);
  } catch (error) {
    await rollbackQuietly(client);
    logError(
      `Failed to create table ${schema}.${RAW_WEATHER_TABLE}: ${errorMessage(error)}`,
    );
    throw new SchemaError(
      `Failed to ensure schema "${schema}": ${errorMessage(error)}`,
      { cause: error },
    );
  }
};

/**
 * Roll back the current transaction. A failing ROLLBACK is logged, and the
 * error that caused it is the one reported.
 */
export async function rollbackQuietly(client: PoolClient): Promise<void> {
  try {
    await client.query('ROLLBACK');
  } catch (rollbackError) {
    logError(`Rollback failed: ${errorMessage(rollbackError)}`);
  }
}
