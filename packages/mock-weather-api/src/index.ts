export { handleRequest } from './core/api-handlers.js';
export {
  generateWeatherData,
  findCity,
  readLocalClock,
  WEATHER_CONDITIONS,
  WIND_DIRECTIONS,
} from './core/weather.js';
export { ApiKeyManager, DEFAULT_API_KEYS_PATH } from './api-keys.js';
export { loadCities, DEFAULT_CAPITALS_PATH } from './cities.js';
export { createApp, serve, toWebRequest, sendWebResponse } from './express.js';
export { startServer, createConsoleLogger, DEFAULT_PORT } from './cli.js';
export type { ServerDeps } from './cli.js';
export type {
  ApiKeyInfo,
  CityCatalog,
  CityInfo,
  ErrorResponse,
  Logger,
  MockApiConfig,
  WeatherGeneratorDeps,
  WeatherPayload,
} from './core/types.js';
