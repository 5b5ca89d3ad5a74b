import type { ApiKeyManager } from '../api-keys.js';

export interface CityInfo {
  country: string;
  region: string;
  /** Latitude with three decimals, as a string. */
  lat: string;
  lon: string;
  /** IANA timezone, e.g. 'Europe/London'. */
  timezone_id: string;
}

export type CityCatalog = Record<string, CityInfo>;

export interface ApiKeyInfo {
  name?: string;
  active?: boolean;
  /** ISO-8601 date or date-time. The key is rejected after it. */
  expires_at?: string;
}

export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, error?: unknown) => void;
}

/**
 * Randomness and clock used to build a payload. Tests pass fixed ones.
 */
export interface WeatherGeneratorDeps {
  /** Returns a number in [0, 1). Default `Math.random`. */
  random?: () => number;
  now?: () => Date;
}

/**
 * Configuration for the mock weather API.
 */
export interface MockApiConfig extends WeatherGeneratorDeps {
  keyManager: ApiKeyManager;
  cities: CityCatalog;
  logger?: Logger;
}

export interface WeatherPayload {
  request: {
    type: 'City';
    query: string;
    language: 'en';
    unit: string;
  };
  location: {
    name: string;
    country: string;
    region: string;
    lat: string;
    lon: string;
    timezone_id: string;
    /** `YYYY-MM-DD HH:MM` in the city's timezone. */
    localtime: string;
    localtime_epoch: number;
    /** Whole-hour offset from UTC, e.g. `"1.0"` or `"-5.0"`. */
    utc_offset: string;
  };
  current: {
    /** `hh:mm AM|PM` in the city's timezone. */
    observation_time: string;
    temperature: number;
    weather_code: number;
    weather_descriptions: string[];
    air_quality: Record<string, string>;
    wind_speed: number;
    wind_degree: number;
    wind_dir: string;
    pressure: number;
    precip: number;
    humidity: number;
    cloudcover: number;
    feelslike: number;
    uv_index: number;
    visibility: number;
  };
}

export interface ErrorResponse {
  success: false;
  error: {
    code: number;
    type: string;
    info: string;
  };
}
