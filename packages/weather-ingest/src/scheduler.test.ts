import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Cron } from 'croner';
import { createScheduler } from './scheduler.js';
import { ConnectionPoolManager } from './pool.js';
import {
  buildWeatherPayload,
  createFakeFetch,
  createFakePool,
  createFakeSleep,
  jsonResponse,
} from './test-util.js';
import type { PipelineConfig, PipelineRunResult } from './types.js';

const config: PipelineConfig = {
  databaseConfig: { host: 'db' },
  source: { baseUrl: 'http://weather-api:5000', apiKey: 'test-key', city: 'London' },
  schema: 'dev',
  cron: '*/15 * * * *',
};

const runResult = (recordId: number): PipelineRunResult => ({
  status: 'success',
  recordId,
  observation: {
    city: 'London',
    temperature: 2,
    description: 'Partly cloudy',
    windSpeed: 23,
    observedAt: '2026-10-19T07:24:00',
    utcOffset: '0.0',
  },
  startedAt: new Date(0),
  finishedAt: new Date(0),
});

/**
 * Stand-in for croner's Cron that records its arguments and lets the test
 * fire ticks by hand.
 */
function createFakeCron() {
  const instances: {
    pattern: string;
    options: unknown;
    fire: () => void;
    stop: ReturnType<typeof vi.fn>;
  }[] = [];

  class FakeCron {
    stop = vi.fn();
    nextRun = vi.fn(() => new Date('2026-10-19T09:45:00Z'));

    constructor(pattern: string, options: unknown, callback: () => void) {
      instances.push({ pattern, options, fire: callback, stop: this.stop });
    }
  }

  return { CronImpl: FakeCron as unknown as typeof Cron, instances };
}

/** A run that stays pending until `finish` is called. */
function createDeferredRun() {
  let finish: (result: PipelineRunResult) => void = () => {};
  const run = vi.fn(
    () =>
      new Promise<PipelineRunResult>((resolve) => {
        finish = resolve;
      }),
  );
  return { run, finish: (result: PipelineRunResult) => finish(result) };
}

describe('createScheduler', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  describe('start (one-shot)', () => {
    it('runs the pipeline once and reports success', async () => {
      // Setup
      const run = vi.fn().mockResolvedValue(runResult(7));
      const scheduler = createScheduler(config, {}, { run });

      // Act
      const outcome = await scheduler.start();

      // Assert
      expect(outcome).toEqual({ status: 'success', result: runResult(7) });
      expect(run).toHaveBeenCalledOnce();
    });

    it('reports a failed run through onError without throwing', async () => {
      // Setup
      const failure = new Error('db down');
      const onError = vi.fn();
      const run = vi.fn().mockRejectedValue(failure);
      const scheduler = createScheduler(config, { onError }, { run });

      // Act
      const outcome = await scheduler.start();

      // Assert
      expect(outcome).toEqual({ status: 'failed', error: failure });
      expect(onError).toHaveBeenCalledWith(failure);
    });

    it('wraps a non-Error rejection', async () => {
      // Setup
      const onError = vi.fn();
      const run = vi.fn().mockRejectedValue('boom');
      const scheduler = createScheduler(config, { onError }, { run });

      // Act
      const outcome = await scheduler.start();

      // Assert
      expect(outcome.status).toBe('failed');
      expect(outcome.error?.message).toBe('boom');
    });

    it('logs pipeline progress when the scheduler is verbose', async () => {
      // Setup
      const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const sleep = createFakeSleep();
      const { pool } = createFakePool();
      const scheduler = createScheduler(
        { ...config, verbose: false },
        { verbose: true },
        {
          pipeline: {
            pool: new ConnectionPoolManager(pool, { sleep }),
            fetchImpl: createFakeFetch(jsonResponse(buildWeatherPayload())),
            retry: { sleep },
          },
        },
      );

      // Act
      const outcome = await scheduler.start();

      // Assert
      expect(outcome.status).toBe('success');
      const lines = logSpy.mock.calls.map(([message]) => String(message));
      expect(lines).toContain('Pipeline state: FETCH');
      expect(lines).toContain('Scheduler: run stored record 1');
    });

    it('stays quiet when neither config nor options ask for verbose logs', async () => {
      // Setup
      const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const sleep = createFakeSleep();
      const { pool } = createFakePool();
      const scheduler = createScheduler(
        config,
        {},
        {
          pipeline: {
            pool: new ConnectionPoolManager(pool, { sleep }),
            fetchImpl: createFakeFetch(jsonResponse(buildWeatherPayload())),
            retry: { sleep },
          },
        },
      );

      // Act
      await scheduler.start();

      // Assert
      expect(logSpy).not.toHaveBeenCalled();
    });
  });

  describe('startInBackground', () => {
    it('schedules with the configured cron and UTC by default', () => {
      // Setup
      const { CronImpl, instances } = createFakeCron();
      const scheduler = createScheduler(config, {}, { run: vi.fn(), CronImpl });

      // Act
      scheduler.startInBackground();

      // Assert
      expect(instances).toHaveLength(1);
      expect(instances[0].pattern).toBe('*/15 * * * *');
      expect(instances[0].options).toEqual({ timezone: 'UTC' });
      expect(scheduler.isRunning()).toBe(true);
      expect(scheduler.nextRunAt()).toEqual(new Date('2026-10-19T09:45:00Z'));
    });

    it('prefers the cron given in options', () => {
      // Setup
      const { CronImpl, instances } = createFakeCron();
      const scheduler = createScheduler(
        config,
        { cron: '0 * * * *', timezone: 'Europe/London' },
        { run: vi.fn(), CronImpl },
      );

      // Act
      scheduler.startInBackground();
      scheduler.startInBackground();

      // Assert
      expect(instances).toHaveLength(1);
      expect(instances[0].pattern).toBe('0 * * * *');
      expect(instances[0].options).toEqual({ timezone: 'Europe/London' });
    });

    it('skips a tick while the previous run is still in progress', async () => {
      // Setup
      const { CronImpl, instances } = createFakeCron();
      const { run, finish } = createDeferredRun();
      const scheduler = createScheduler(config, {}, { run, CronImpl });
      scheduler.startInBackground();

      // Act
      instances[0].fire();
      const overlapping = await scheduler.start();
      finish(runResult(1));
      await new Promise((resolve) => setTimeout(resolve, 0));
      instances[0].fire();

      // Assert
      expect(overlapping).toEqual({ status: 'skipped' });
      expect(run).toHaveBeenCalledTimes(2);
    });

    it('keeps scheduling after a failed run', async () => {
      // Setup
      const { CronImpl, instances } = createFakeCron();
      const onError = vi.fn();
      const run = vi
        .fn()
        .mockRejectedValueOnce(new Error('fetch failed'))
        .mockResolvedValueOnce(runResult(2));
      const scheduler = createScheduler(config, { onError }, { run, CronImpl });
      scheduler.startInBackground();

      // Act
      instances[0].fire();
      await vi.waitFor(() => expect(onError).toHaveBeenCalledOnce());
      await new Promise((resolve) => setTimeout(resolve, 0));
      const outcome = await scheduler.start();

      // Assert
      expect(outcome).toEqual({ status: 'success', result: runResult(2) });
      expect(scheduler.isRunning()).toBe(true);
    });
  });

  describe('stop', () => {
    it('stops the cron job', () => {
      // Setup
      const { CronImpl, instances } = createFakeCron();
      const scheduler = createScheduler(config, {}, { run: vi.fn(), CronImpl });
      scheduler.startInBackground();

      // Act
      scheduler.stop();

      // Assert
      expect(instances[0].stop).toHaveBeenCalledOnce();
      expect(scheduler.isRunning()).toBe(false);
      expect(scheduler.nextRunAt()).toBeNull();
    });

    it('stopAndDrain waits for the in-flight run', async () => {
      // Setup
      const { CronImpl, instances } = createFakeCron();
      const { run, finish } = createDeferredRun();
      const scheduler = createScheduler(config, {}, { run, CronImpl });
      scheduler.startInBackground();
      instances[0].fire();
      let drained = false;

      // Act
      const draining = scheduler.stopAndDrain().then(() => {
        drained = true;
      });
      await new Promise((resolve) => setTimeout(resolve, 0));
      const drainedBeforeFinish = drained;
      finish(runResult(3));
      await draining;

      // Assert
      expect(drainedBeforeFinish).toBe(false);
      expect(drained).toBe(true);
      expect(scheduler.isRunning()).toBe(false);
    });

    it('stopAndDrain gives up after the timeout', async () => {
      // Setup
      vi.useFakeTimers();
      const { CronImpl, instances } = createFakeCron();
      const { run } = createDeferredRun();
      const scheduler = createScheduler(config, {}, { run, CronImpl });
      scheduler.startInBackground();
      instances[0].fire();

      // Act
      const draining = scheduler.stopAndDrain(1000);
      await vi.advanceTimersByTimeAsync(1000);

      // Assert
      await expect(draining).resolves.toBeUndefined();
    });
  });
});
