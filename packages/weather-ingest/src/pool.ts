import type { Pool } from 'pg';
import { createPool } from './db-util.js';
import { ConnectionError, errorMessage } from './errors.js';
import { log, logError } from './log-context.js';
import { withRetry } from './retry.js';
import type {
  Connection,
  DatabaseConfig,
  PoolSizing,
  RetryOptions,
} from './types.js';

/**
 * Owns a pg pool for the lifetime of one pipeline run and hands out
 * connections that have just answered a `SELECT 1`.
 */
export class ConnectionPoolManager {
  private disposed = false;
  private disposing: Promise<void> | null = null;

  constructor(
    private pool: Pool,
    private retryOptions: RetryOptions = {},
  ) {}

  static fromConfig(
    config: DatabaseConfig,
    sizing: PoolSizing = {},
    retryOptions: RetryOptions = {},
  ): ConnectionPoolManager {
    return new ConnectionPoolManager(createPool(config, sizing), retryOptions);
  }

  /** Expose the raw pool for advanced usage. */
  getPool(): Pool {
    return this.pool;
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Check out a validated connection. The caller must `release()` it.
   *
   * @throws {ConnectionError} once every attempt has failed, or right away
   *   when the pool has been disposed.
   */
  async acquire(): Promise<Connection> {
    if (this.disposed) {
      throw new ConnectionError('Connection pool has been disposed', 0);
    }
    const maxAttempts = this.retryOptions.maxAttempts ?? 3;
    const startedAt = Date.now();
    let attempts = 0;

    try {
      return await withRetry(
        async (attempt) => {
          attempts = attempt;
          try {
            const client = await this.checkout();
            log(`Connected to database (attempt ${attempt}/${maxAttempts})`);
            return client;
          } catch (error) {
            logError(
              `Database connection attempt ${attempt}/${maxAttempts} failed after ${Date.now() - startedAt}ms: ${errorMessage(error)}`,
            );
            throw error;
          }
        },
        {
          ...this.retryOptions,
          maxAttempts,
          shouldRetry: (error) =>
            !this.disposed && (this.retryOptions.shouldRetry?.(error) ?? true),
        },
      );
    } catch (error) {
      throw new ConnectionError(
        `Could not connect to database after ${attempts} attempt${attempts === 1 ? '' : 's'} (${Date.now() - startedAt}ms): ${errorMessage(error)}`,
        attempts,
        { cause: error },
      );
    }
  }

  /**
   * End the pool and every connection it holds. Safe to call repeatedly and
   * before any connection was acquired.
   */
  async dispose(): Promise<void> {
    if (this.disposing) return this.disposing;
    this.disposed = true;
    this.disposing = this.pool.end().then(
      () => log('Connection pool disposed'),
      (error: unknown) =>
        logError(`Error while disposing connection pool: ${errorMessage(error)}`),
    );
    return this.disposing;
  }

  private async checkout(): Promise<Connection> {
    const client = await this.pool.connect();
    try {
      await client.query('SELECT 1');
      return client;
    } catch (error) {
      // Hand the broken connection back so the pool destroys it.
      client.release(error instanceof Error ? error : true);
      throw error;
    }
  }
}
