import { Cron } from 'croner';
import { DEFAULT_CRON } from './config.js';
import { log, setLogContext } from './log-context.js';
import { runPipeline, type RunPipelineOptions } from './pipeline.js';
import type {
  PipelineConfig,
  PipelineRunResult,
  Scheduler,
  SchedulerOptions,
  SchedulerRunResult,
} from './types.js';

export interface SchedulerDeps {
  /** One pipeline run. Defaults to {@link runPipeline} with a fresh pool. */
  run?: () => Promise<PipelineRunResult>;
  /** Extra options for the default run (pool, fetch, retry). */
  pipeline?: Omit<RunPipelineOptions, 'config'>;
  /** Cron class for dependency injection (default: croner's Cron). */
  CronImpl?: typeof Cron;
}

/**
 * Creates a scheduler that runs the ingestion pipeline on a cron schedule,
 * every 15 minutes unless told otherwise.
 *
 * Runs never overlap: a tick that fires while a run is still going is
 * skipped. A failed run is reported through `onError` and the schedule keeps
 * going.
 *
 * @param config - Pipeline configuration; `config.cron` is used when
 *   `options.cron` is not given.
 * @param options - Cron expression, timezone, error callback and verbosity.
 * @param deps - Overrides for the run function and the cron implementation.
 */
export const createScheduler = (
  config: PipelineConfig,
  options: SchedulerOptions = {},
  deps: SchedulerDeps = {},
): Scheduler => {
  const {
    cron: cronExpression = config.cron || DEFAULT_CRON,
    timezone = 'UTC',
    onError = (error: Error) => console.error('Pipeline run failed:', error),
    verbose = config.verbose ?? false,
  } = options;
  const {
    pipeline,
    run = () =>
      runPipeline({ ...pipeline, config: { ...config, verbose } }),
    CronImpl = Cron,
  } = deps;

  let job: Cron | null = null;
  let currentRunPromise: Promise<SchedulerRunResult> | null = null;

  setLogContext(verbose);

  const runOnce = async (): Promise<SchedulerRunResult> => {
    setLogContext(verbose);
    try {
      const result = await run();
      // The run may have entered its own log context.
      setLogContext(verbose);
      log(`Scheduler: run stored record ${result.recordId}`);
      return { status: 'success', result };
    } catch (e) {
      setLogContext(verbose);
      const error = e instanceof Error ? e : new Error(String(e));
      onError(error);
      return { status: 'failed', error };
    }
  };

  const tick = async (): Promise<SchedulerRunResult> => {
    if (currentRunPromise) {
      log('Scheduler: previous run still in progress, skipping tick');
      return { status: 'skipped' };
    }
    currentRunPromise = runOnce();
    try {
      return await currentRunPromise;
    } finally {
      currentRunPromise = null;
    }
  };

  return {
    start: () => tick(),

    startInBackground: () => {
      if (job) return;
      log(`Scheduler: running pipeline on "${cronExpression}" (${timezone})`);
      job = new CronImpl(cronExpression, { timezone }, () => {
        void tick();
      });
    },

    stop: () => {
      if (job) {
        job.stop();
        job = null;
      }
      log('Scheduler: stopped');
    },

    stopAndDrain: async (timeoutMs = 30_000) => {
      if (job) {
        job.stop();
        job = null;
      }

      if (currentRunPromise) {
        log('Scheduler: draining current run…');
        let timer: NodeJS.Timeout | undefined;
        await Promise.race([
          currentRunPromise,
          new Promise<void>((resolve) => {
            timer = setTimeout(resolve, timeoutMs);
          }),
        ]);
        clearTimeout(timer);
      }

      log('Scheduler: drained and stopped');
    },

    isRunning: () => job !== null,

    nextRunAt: () => job?.nextRun() ?? null,
  };
};
