import type { Pool } from 'pg';
import { vi } from 'vitest';

export interface FakeWeatherRow {
  id: number;
  city: string | null;
  temp: number | null;
  weather_description: string | null;
  wind_speed: number | null;
  time: string | null;
  inserted_at: Date;
  utc_offset: string | null;
}

export interface FakeDatabase {
  schemas: Set<string>;
  tables: Map<string, FakeWeatherRow[]>;
  /** Every statement received, whitespace-collapsed, in order. */
  statements: string[];
  connectAttempts: number;
  ended: boolean;
}

export interface FakePoolOptions {
  /** Reject the first N `connect()` calls. */
  failConnects?: number;
  /** Reject the first N `SELECT 1` validation queries. */
  failPings?: number;
  /** Return an error to make a statement fail. */
  failQuery?: (sql: string, params: unknown[]) => Error | undefined;
  /**
   * Apply the next N COMMITs that carry inserted rows, then fail them as if
   * the acknowledgement was lost.
   */
  loseCommitAcks?: number;
  now?: () => Date;
}

interface PendingTransaction {
  schemas: string[];
  tables: string[];
  rows: { table: string; row: FakeWeatherRow }[];
}

const collapse = (sql: string) => sql.replace(/\s+/g, ' ').trim();

const toRawRow = (row: FakeWeatherRow) => ({
  id: row.id,
  city: row.city,
  temp: row.temp,
  weatherDescription: row.weather_description,
  windSpeed: row.wind_speed,
  // pg parses TIMESTAMP (without time zone) as local time.
  time: row.time === null ? null : new Date(row.time),
  insertedAt: row.inserted_at,
  utcOffset: row.utc_offset,
});

/**
 * In-process stand-in for a pg {@link Pool}. It understands the handful of
 * statements the pipeline sends (ping, transactions, the DDL and the
 * raw_weather_data INSERT/SELECTs) and keeps committed state in memory.
 */
export function createFakePool(options: FakePoolOptions = {}) {
  const { failQuery, now = () => new Date() } = options;
  let connectFailures = options.failConnects ?? 0;
  let pingFailures = options.failPings ?? 0;
  let commitAcksToLose = options.loseCommitAcks ?? 0;
  let nextId = 1;

  const db: FakeDatabase = {
    schemas: new Set(['public']),
    tables: new Map(),
    statements: [],
    connectAttempts: 0,
    ended: false,
  };

  const createClient = () => {
    let tx: PendingTransaction | null = null;

    const schemaExists = (schema: string) =>
      db.schemas.has(schema) || (tx?.schemas.includes(schema) ?? false);
    const tableRows = (table: string): FakeWeatherRow[] | undefined => {
      const committed = db.tables.get(table);
      if (committed) return committed;
      return tx?.tables.includes(table) ? [] : undefined;
    };

    const query = vi.fn(async (text: string, params: unknown[] = []) => {
      const sql = collapse(text);
      db.statements.push(sql);

      const injected = failQuery?.(sql, params);
      if (injected) throw injected;

      if (sql === 'SELECT 1') {
        if (pingFailures > 0) {
          pingFailures--;
          throw new Error('server closed the connection unexpectedly');
        }
        return { rows: [{ '?column?': 1 }], rowCount: 1 };
      }
      if (sql === 'BEGIN') {
        tx = { schemas: [], tables: [], rows: [] };
        return { rows: [], rowCount: null };
      }
      if (sql === 'COMMIT') {
        const committed = tx;
        tx = null;
        if (committed) {
          for (const schema of committed.schemas) db.schemas.add(schema);
          for (const table of committed.tables) {
            if (!db.tables.has(table)) db.tables.set(table, []);
          }
          for (const { table, row } of committed.rows) {
            db.tables.get(table)?.push(row);
          }
          if (committed.rows.length > 0 && commitAcksToLose > 0) {
            commitAcksToLose--;
            throw new Error('Connection terminated unexpectedly');
          }
        }
        return { rows: [], rowCount: null };
      }
      if (sql === 'ROLLBACK') {
        tx = null;
        return { rows: [], rowCount: null };
      }

      const createSchema = sql.match(/^CREATE SCHEMA IF NOT EXISTS "(\w+)"$/);
      if (createSchema) {
        const [, schema] = createSchema;
        if (tx) tx.schemas.push(schema);
        else db.schemas.add(schema);
        return { rows: [], rowCount: null };
      }

      const createTable = sql.match(/^CREATE TABLE IF NOT EXISTS "(\w+)"\."(\w+)"/);
      if (createTable) {
        const [, schema, name] = createTable;
        if (!schemaExists(schema)) {
          throw new Error(`schema "${schema}" does not exist`);
        }
        const table = `${schema}.${name}`;
        if (tx) tx.tables.push(table);
        else if (!db.tables.has(table)) db.tables.set(table, []);
        return { rows: [], rowCount: null };
      }

      const insert = sql.match(/^INSERT INTO "(\w+)"\."(\w+)"/);
      if (insert) {
        const table = `${insert[1]}.${insert[2]}`;
        if (!tableRows(table)) {
          throw new Error(`relation "${table}" does not exist`);
        }
        const [city, temp, description, windSpeed, time, utcOffset] = params;
        const row: FakeWeatherRow = {
          id: nextId++,
          city: typeof city === 'string' ? city : null,
          temp: typeof temp === 'number' ? temp : null,
          weather_description:
            typeof description === 'string' ? description : null,
          wind_speed: typeof windSpeed === 'number' ? windSpeed : null,
          time: typeof time === 'string' ? time : null,
          inserted_at: now(),
          utc_offset: typeof utcOffset === 'string' ? utcOffset : null,
        };
        if (tx) tx.rows.push({ table, row });
        else db.tables.get(table)?.push(row);
        return {
          rows: [{ id: row.id, insertedAt: row.inserted_at }],
          rowCount: 1,
        };
      }

      const select = sql.match(/^SELECT .* FROM "(\w+)"\."(\w+)"(.*)$/);
      if (select) {
        const table = `${select[1]}.${select[2]}`;
        const rows = tableRows(table);
        if (!rows) throw new Error(`relation "${table}" does not exist`);
        const clause = select[3];
        let result = [...rows];
        if (clause.includes('WHERE id = $1')) {
          result = result.filter((row) => row.id === params[0]);
        } else {
          if (clause.includes('WHERE city = $1')) {
            result = result.filter((row) => row.city === params[0]);
          }
          const limit = params[params.length - 1];
          result.sort((a, b) => b.id - a.id);
          if (typeof limit === 'number') result = result.slice(0, limit);
        }
        const mapped = result.map(toRawRow);
        return { rows: mapped, rowCount: mapped.length };
      }

      throw new Error(`Fake pool does not understand: ${sql}`);
    });

    return { query, release: vi.fn() };
  };

  const clients: ReturnType<typeof createClient>[] = [];

  const fake = {
    connect: vi.fn(async () => {
      db.connectAttempts++;
      if (db.ended) {
        throw new Error('Cannot use a pool after calling end on the pool');
      }
      if (connectFailures > 0) {
        connectFailures--;
        throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
      }
      const client = createClient();
      clients.push(client);
      return client;
    }),
    end: vi.fn(async () => {
      if (db.ended) {
        throw new Error('Called end on pool more than once');
      }
      db.ended = true;
    }),
  };

  return { pool: fake as unknown as Pool, fake, db, clients };
}

/** Payload shaped like the weather endpoint's response. */
export function buildWeatherPayload(
  overrides: {
    location?: Record<string, unknown>;
    current?: Record<string, unknown>;
  } = {},
) {
  return {
    location: {
      name: 'London',
      country: 'United Kingdom',
      utc_offset: '0.0',
      ...overrides.location,
    },
    current: {
      observation_time: '07:24 AM',
      temperature: 2,
      weather_descriptions: ['Partly cloudy'],
      wind_speed: 23,
      ...overrides.current,
    },
  };
}

/** A `fetch` stand-in answering every call with the given responses in turn. */
export function createFakeFetch(...responses: (Response | Error)[]) {
  let index = 0;
  return vi.fn(async (_input: string, _init?: RequestInit) => {
    const next = responses[Math.min(index, responses.length - 1)];
    index++;
    if (next instanceof Error) throw next;
    return next.clone();
  });
}

export const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

/** Sleep stand-in that records requested delays and returns at once. */
export function createFakeSleep() {
  return vi.fn(async (_ms: number) => {});
}
