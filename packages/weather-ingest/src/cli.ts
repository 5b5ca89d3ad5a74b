// Testable CLI logic for weather-ingest
import { loadConfig, loadEnvFile } from './config.js';
import { errorMessage } from './errors.js';
import { runPipeline } from './pipeline.js';
import { createScheduler } from './scheduler.js';
import type { PipelineConfig, PipelineRunResult, Scheduler } from './types.js';

export interface CliDeps {
  log?: (...args: unknown[]) => void;
  error?: (...args: unknown[]) => void;
  exit?: (code: number) => void;
  env?: Record<string, string | undefined>;
  loadEnvFileImpl?: (path?: string) => void;
  runPipelineImpl?: (config: PipelineConfig) => Promise<PipelineRunResult>;
  createSchedulerImpl?: (config: PipelineConfig, cron?: string) => Scheduler;
  /** Resolves when the scheduler should shut down. Defaults to SIGINT/SIGTERM. */
  waitForShutdown?: () => Promise<void>;
}

const waitForSignal = () =>
  new Promise<void>((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });

/** Removes `flag <value>` from `args` and returns the value. */
function takeOption(args: string[], ...flags: string[]): string | undefined {
  for (const flag of flags) {
    const index = args.indexOf(flag);
    if (index !== -1 && args[index + 1]) {
      const value = args[index + 1];
      args.splice(index, 2);
      return value;
    }
  }
  return undefined;
}

export async function runCli(
  argv: string[],
  {
    log = console.log,
    error = console.error,
    exit = (code: number) => process.exit(code),
    env = process.env,
    loadEnvFileImpl = loadEnvFile,
    runPipelineImpl = (config) => runPipeline({ config }),
    createSchedulerImpl = (config, cron) => createScheduler(config, { cron }),
    waitForShutdown = waitForSignal,
  }: CliDeps = {},
): Promise<void> {
  const [, , command, ...restArgs] = argv;

  function printUsage() {
    log('Usage: weather-ingest <run|schedule> [--envPath <path>] [--cron <expr>]');
    log('');
    log('Commands:');
    log('  run        Fetch one observation and store it, then exit');
    log('  schedule   Run the pipeline on a cron schedule until interrupted');
    log('');
    log('Options:');
    log('  --envPath <path>   Path to a .env file to load environment variables from');
    log('  --cron <expr>      Cron expression for "schedule" (default: PIPELINE_CRON or */15 * * * *)');
    log('');
    log('Notes:');
    log('  - WEATHER_API_KEY and the DB_* variables (or DATABASE_URL) must be set.');
    exit(1);
  }

  if (command !== 'run' && command !== 'schedule') {
    printUsage();
    return;
  }

  const args = [...restArgs];
  const envPath = takeOption(args, '--envPath');
  const cron = takeOption(args, '--cron', '-c');

  let config: PipelineConfig;
  try {
    loadEnvFileImpl(envPath);
    config = loadConfig(env);
  } catch (e) {
    error(errorMessage(e));
    exit(1);
    return;
  }

  if (command === 'run') {
    try {
      const result = await runPipelineImpl(config);
      log(
        `Stored record ${result.recordId} for ${result.observation.city} at ${result.observation.observedAt}`,
      );
      exit(0);
    } catch (e) {
      error(`Pipeline run failed: ${errorMessage(e)}`);
      exit(1);
    }
    return;
  }

  const scheduler = createSchedulerImpl(config, cron);
  scheduler.startInBackground();
  const next = scheduler.nextRunAt();
  log(
    `Scheduler started${next ? `, next run at ${next.toISOString()}` : ''}`,
  );
  await waitForShutdown();
  await scheduler.stopAndDrain();
  exit(0);
}
