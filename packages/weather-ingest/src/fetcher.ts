import { ConfigError, FetchError, errorMessage } from './errors.js';
import { log, logError } from './log-context.js';
import { withRetry } from './retry.js';
import type { RetryOptions, WeatherSourceConfig } from './types.js';

export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

export type FetchImpl = (
  input: string,
  init?: RequestInit,
) => Promise<Response>;

export interface FetchWeatherOptions extends WeatherSourceConfig {
  fetchImpl?: FetchImpl;
  retry?: RetryOptions;
}

export function buildWeatherUrl(baseUrl: string, city: string): string {
  const url = new URL('weather', baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`);
  url.searchParams.set('city', city);
  return url.toString();
}

/**
 * Network failures, timeouts, 5xx and 429 are worth another attempt; any
 * other client error will not change on a retry.
 */
export function isRetryableFetchError(error: unknown): boolean {
  if (!(error instanceof FetchError)) return false;
  if (error.status === undefined) return true;
  return error.status >= 500 || error.status === 429;
}

async function fetchOnce(
  url: string,
  apiKey: string,
  timeoutMs: number,
  fetchImpl: FetchImpl,
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'GET',
      headers: { 'X-API-Key': apiKey, Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const timedOut =
      error instanceof Error &&
      (error.name === 'TimeoutError' || error.name === 'AbortError');
    throw new FetchError(
      timedOut
        ? `Weather API request timed out after ${timeoutMs}ms`
        : `Weather API request failed: ${errorMessage(error)}`,
      undefined,
      { cause: error },
    );
  }

  if (!response.ok) {
    throw new FetchError(
      `Weather API responded with ${response.status} ${response.statusText}`.trim(),
      response.status,
    );
  }

  try {
    return await response.json();
  } catch (error) {
    throw new FetchError(
      `Weather API returned an invalid JSON body: ${errorMessage(error)}`,
      response.status,
      { cause: error },
    );
  }
}

/**
 * GET the current observation for the configured city.
 *
 * The body is returned unvalidated; mapping it onto a row is the inserter's
 * job.
 *
 * @throws {ConfigError} when no API key is configured.
 * @throws {FetchError} on a non-2xx status, network failure or timeout, once
 *   retries are exhausted.
 */
export async function fetchWeather(
  options: FetchWeatherOptions,
): Promise<unknown> {
  const {
    baseUrl,
    apiKey,
    city,
    timeoutMs = DEFAULT_FETCH_TIMEOUT_MS,
    fetchImpl = fetch,
    retry = {},
  } = options;
  if (!apiKey) {
    throw new ConfigError('WEATHER_API_KEY not set in environment');
  }

  const url = buildWeatherUrl(baseUrl, city);
  log(`Fetching weather for ${city} (timeout ${timeoutMs}ms)`);

  try {
    return await withRetry(() => fetchOnce(url, apiKey, timeoutMs, fetchImpl), {
      ...retry,
      shouldRetry: (error) =>
        isRetryableFetchError(error) && (retry.shouldRetry?.(error) ?? true),
      onRetry: (info) => {
        logError(
          `Weather fetch attempt ${info.attempt}/${info.maxAttempts} failed, retrying in ${info.delayMs}ms: ${errorMessage(info.error)}`,
        );
        retry.onRetry?.(info);
      },
    });
  } catch (error) {
    logError(`API request failed: ${errorMessage(error)}`);
    throw error;
  }
}
