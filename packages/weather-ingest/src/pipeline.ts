import { errorMessage } from './errors.js';
import { fetchWeather, type FetchImpl } from './fetcher.js';
import { insertRecord } from './inserter.js';
import { log, logError, setLogContext } from './log-context.js';
import { ConnectionPoolManager } from './pool.js';
import { ensureSchema } from './schema.js';
import type {
  PipelineConfig,
  PipelineRunResult,
  PipelineState,
  RetryOptions,
} from './types.js';

export interface RunPipelineOptions {
  config: PipelineConfig;
  /**
   * Pool for this run. The run disposes it when it finishes, whatever the
   * outcome. Defaults to a pool built from `config.databaseConfig`.
   */
  pool?: ConnectionPoolManager;
  fetchImpl?: FetchImpl;
  retry?: RetryOptions;
  now?: () => Date;
  onStateChange?: (state: PipelineState) => void;
}

/**
 * Fetch one observation, make sure the table exists and insert the row.
 *
 * Steps run in order, FETCH -> ENSURE_SCHEMA -> INSERT, and each retries
 * its own transient failures; the driver never retries a step. DISPOSE runs
 * on both paths. A failing step's error is re-thrown unchanged after the pool
 * is disposed.
 */
export async function runPipeline(
  options: RunPipelineOptions,
): Promise<PipelineRunResult> {
  const { config, fetchImpl, retry, now = () => new Date(), onStateChange } =
    options;
  setLogContext(config.verbose ?? false);

  const pool =
    options.pool ??
    ConnectionPoolManager.fromConfig(config.databaseConfig, {}, retry);
  const startedAt = now();

  const enter = (state: PipelineState) => {
    log(`Pipeline state: ${state}`);
    onStateChange?.(state);
  };

  let failed = false;
  try {
    enter('FETCH');
    const payload = await fetchWeather({
      ...config.source,
      fetchImpl,
      retry,
    });

    enter('ENSURE_SCHEMA');
    const client = await pool.acquire();
    try {
      await ensureSchema(client, config.schema);
    } finally {
      client.release();
    }

    enter('INSERT');
    const inserted = await insertRecord(pool, payload, {
      schema: config.schema,
      now: now(),
      retry,
    });

    log('Data pipeline completed successfully');
    return {
      status: 'success',
      recordId: inserted.id,
      observation: inserted.observation,
      startedAt,
      finishedAt: now(),
    };
  } catch (error) {
    failed = true;
    logError(`Pipeline run failed: ${errorMessage(error)}`);
    throw error;
  } finally {
    enter('DISPOSE');
    await pool.dispose();
    enter(failed ? 'FAILED' : 'SUCCESS');
    log('Pipeline execution finished');
  }
}
