import type { PoolClient } from 'pg';

export interface DatabaseSSLConfig {
  /**
   * CA certificate as PEM string or file path. If the value starts with 'file://', it will be loaded from file, otherwise treated as PEM string.
   */
  ca?: string;
  /**
   * Client certificate as PEM string or file path. If the value starts with 'file://', it will be loaded from file, otherwise treated as PEM string.
   */
  cert?: string;
  /**
   * Client private key as PEM string or file path. If the value starts with 'file://', it will be loaded from file, otherwise treated as PEM string.
   */
  key?: string;
  rejectUnauthorized?: boolean;
}

export interface DatabaseConfig {
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  ssl?: DatabaseSSLConfig;
}

/**
 * Sizing of the connection pool. A pg pool has a single upper bound, so the
 * steady-state size and the overflow allowance are added together.
 */
export interface PoolSizing {
  /** Connections kept around in steady state. Default 5. */
  poolSize?: number;
  /** Extra connections allowed under load. Default 10. */
  maxOverflow?: number;
  /** Connections older than this are closed and replaced. Default 3600. */
  recycleSeconds?: number;
  /** Default 10000. */
  connectTimeoutMs?: number;
}

export interface WeatherSourceConfig {
  baseUrl: string;
  apiKey?: string;
  city: string;
  /** Default 10000. */
  timeoutMs?: number;
}

export interface PipelineConfig {
  databaseConfig: DatabaseConfig;
  source: WeatherSourceConfig;
  /** Target schema for `raw_weather_data`. */
  schema: string;
  /** Cron expression for periodic runs. */
  cron: string;
  verbose?: boolean;
}

/**
 * Body returned by the weather endpoint. Only the fields the pipeline reads
 * are typed; everything else is passed through untouched.
 */
export interface WeatherApiResponse {
  location: {
    name: string;
    utc_offset: string;
    [key: string]: unknown;
  };
  current: {
    observation_time: string;
    temperature: number;
    weather_descriptions: string[];
    wind_speed: number;
    [key: string]: unknown;
  };
  [key: string]: unknown;
}

export interface WeatherObservation {
  city: string;
  temperature: number;
  /** The first description reported by the source. */
  description: string;
  windSpeed: number;
  /** Local wall-clock time, `YYYY-MM-DDTHH:MM:SS`. */
  observedAt: string;
  utcOffset: string;
}

export interface RawWeatherRow {
  id: number;
  city: string | null;
  temp: number | null;
  weatherDescription: string | null;
  windSpeed: number | null;
  time: Date | null;
  insertedAt: Date;
  utcOffset: string | null;
}

export interface InsertResult {
  id: number;
  insertedAt: Date;
  observation: WeatherObservation;
}

export interface RetryAttemptInfo {
  /** 1-based number of the attempt that just failed. */
  attempt: number;
  maxAttempts: number;
  error: unknown;
  /** Delay before the next attempt. */
  delayMs: number;
  /** Time since the first attempt started. */
  elapsedMs: number;
}

export interface RetryOptions {
  /** Default 3. */
  maxAttempts?: number;
  /** Delay after the first failure. Default 2000. */
  baseDelayMs?: number;
  /** Upper bound for a single delay. Default 10000. */
  maxDelayMs?: number;
  /** Return false to fail immediately without further attempts. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (info: RetryAttemptInfo) => void;
  sleep?: (ms: number) => Promise<void>;
}

export type PipelineState =
  | 'FETCH'
  | 'ENSURE_SCHEMA'
  | 'INSERT'
  | 'DISPOSE'
  | 'SUCCESS'
  | 'FAILED';

export interface PipelineRunResult {
  status: 'success';
  recordId: number;
  observation: WeatherObservation;
  startedAt: Date;
  finishedAt: Date;
}

export interface SchedulerRunResult {
  status: 'success' | 'failed' | 'skipped';
  result?: PipelineRunResult;
  error?: Error;
}

export interface SchedulerOptions {
  /** Cron expression, default every 15 minutes. */
  cron?: string;
  /** IANA timezone for the cron expression. Default 'UTC'. */
  timezone?: string;
  onError?: (error: Error) => void;
  verbose?: boolean;
}

export interface Scheduler {
  /** Run the pipeline once and return its outcome. */
  start: () => Promise<SchedulerRunResult>;
  /** Run the pipeline on every cron tick until stopped. */
  startInBackground: () => void;
  stop: () => void;
  /** Stop and wait for an in-flight run, up to `timeoutMs`. */
  stopAndDrain: (timeoutMs?: number) => Promise<void>;
  isRunning: () => boolean;
  nextRunAt: () => Date | null;
}

/** A checked-out connection, validated before being handed out. */
export type Connection = PoolClient;
