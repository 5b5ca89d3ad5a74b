import { Pool } from 'pg';
import { parse } from 'pg-connection-string';
import type { ConnectionOptions } from 'tls';
import fs from 'fs';
import type { DatabaseConfig, PoolSizing } from './types.js';
import { logError } from './log-context.js';

export const DEFAULT_POOL_SIZE = 5;
export const DEFAULT_MAX_OVERFLOW = 10;
export const DEFAULT_RECYCLE_SECONDS = 3600;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

/**
 * Helper to load a PEM string or file. Only values starting with 'file://' are loaded from file.
 */
function loadPemOrFile(value?: string): string | undefined {
  if (!value) return undefined;
  if (value.startsWith('file://')) {
    const filePath = value.slice(7);
    return fs.readFileSync(filePath, 'utf8');
  }
  return value;
}

/**
 * Build a connection string from its parts. The password is passed through
 * unchecked; a missing one surfaces as an authentication failure on connect.
 */
export function buildConnectionString(config: DatabaseConfig): string {
  if (config.connectionString) return config.connectionString;
  const user = encodeURIComponent(config.user ?? '');
  const password = config.password
    ? `:${encodeURIComponent(config.password)}`
    : '';
  const host = config.host ?? 'localhost';
  const port = config.port ?? 5432;
  const database = config.database ?? '';
  return `postgresql://${user}${password}@${host}:${port}/${database}`;
}

/**
 * Create a database connection pool.
 *
 * Sessions run with `timezone=UTC`. Connections are closed once they reach
 * `recycleSeconds`, and checkout gives up after `connectTimeoutMs`.
 *
 * SSL config example (for local file paths):
 *   ssl: {
 *     ca: process.env.PGSSLROOTCERT, // PEM string or 'file://...'
 *     cert: process.env.PGSSLCERT,   // optional, PEM string or 'file://...'
 *     key: process.env.PGSSLKEY,     // optional, PEM string or 'file://...'
 *     rejectUnauthorized: true
 *   }
 */
export const createPool = (
  config: DatabaseConfig,
  sizing: PoolSizing = {},
): Pool => {
  const {
    poolSize = DEFAULT_POOL_SIZE,
    maxOverflow = DEFAULT_MAX_OVERFLOW,
    recycleSeconds = DEFAULT_RECYCLE_SECONDS,
    connectTimeoutMs = DEFAULT_CONNECT_TIMEOUT_MS,
  } = sizing;

  const connectionString = buildConnectionString(config);
  let searchPath: string | undefined;
  let ssl: ConnectionOptions | undefined = undefined;

  const parsed = parse(connectionString);
  if (parsed.options) {
    const match = parsed.options.match(/search_path=([^\s]+)/);
    if (match) {
      searchPath = match[1];
    }
  }
  try {
    const url = new URL(connectionString);
    searchPath = url.searchParams.get('search_path') || searchPath;
    if (url.searchParams.get('sslmode') === 'no-verify') {
      ssl = { rejectUnauthorized: false };
    }
  } catch {
    // Not a URL (e.g. a socket path); fall back to what pg-connection-string read.
    if ('sslmode' in parsed && parsed.sslmode === 'no-verify') {
      ssl = { rejectUnauthorized: false };
    }
  }

  // Flexible SSL loading: only support file:// for file loading
  if (config.ssl) {
    ssl = {
      ...ssl,
      ca: loadPemOrFile(config.ssl.ca ?? process.env.PGSSLROOTCERT),
      cert: loadPemOrFile(config.ssl.cert ?? process.env.PGSSLCERT),
      key: loadPemOrFile(config.ssl.key ?? process.env.PGSSLKEY),
      rejectUnauthorized:
        config.ssl.rejectUnauthorized !== undefined
          ? config.ssl.rejectUnauthorized
          : true,
    };
  }

  const pool = new Pool({
    connectionString,
    max: poolSize + maxOverflow,
    maxLifetimeSeconds: recycleSeconds,
    connectionTimeoutMillis: connectTimeoutMs,
    options: '-c timezone=UTC',
    ...(ssl ? { ssl } : {}),
  });

  // Idle clients can error out when the server goes away; without a listener
  // the pool would crash the process.
  pool.on('error', (error) => {
    logError('Idle database client error:', error);
  });

  if (searchPath) {
    pool.on('connect', (client) => {
      client
        .query(`SET search_path TO ${searchPath}`)
        .catch((error: unknown) =>
          logError(`Failed to set search_path to ${searchPath}:`, error),
        );
    });
  }

  return pool;
};
