export { runPipeline } from './pipeline.js';
export type { RunPipelineOptions } from './pipeline.js';
export { createScheduler } from './scheduler.js';
export type { SchedulerDeps } from './scheduler.js';
export { ConnectionPoolManager } from './pool.js';
export { createPool, buildConnectionString } from './db-util.js';
export {
  ensureSchema,
  rawWeatherTable,
  DEFAULT_SCHEMA,
  RAW_WEATHER_TABLE,
} from './schema.js';
export {
  insertRecord,
  insertObservation,
  getRecord,
  listRecords,
} from './inserter.js';
export type { InsertOptions } from './inserter.js';
export {
  toObservation,
  parseObservationTime,
  WeatherApiResponseSchema,
} from './observation.js';
export { fetchWeather, buildWeatherUrl } from './fetcher.js';
export type { FetchImpl, FetchWeatherOptions } from './fetcher.js';
export { withRetry, computeBackoffDelay } from './retry.js';
export { loadConfig, loadEnvFile, DEFAULT_CRON } from './config.js';
export * from './errors.js';
export * from './types.js';
