/**
 * Errors raised by the ingestion pipeline. Each carries the underlying
 * failure as `cause` so callers can inspect the storage or network error.
 */

export class WeatherIngestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WeatherIngestError';
  }
}

/** The pool could not hand out a working connection. */
export class ConnectionError extends WeatherIngestError {
  attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
    this.attempts = attempts;
  }
}

export class SchemaError extends WeatherIngestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SchemaError';
  }
}

/** Malformed observation, or the storage engine rejected the write. */
export class InsertError extends WeatherIngestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InsertError';
  }
}

export class FetchError extends WeatherIngestError {
  status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchError';
    this.status = status;
  }
}

export class ConfigError extends WeatherIngestError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
