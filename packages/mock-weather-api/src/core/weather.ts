import type {
  CityCatalog,
  CityInfo,
  WeatherGeneratorDeps,
  WeatherPayload,
} from './types.js';

export const WEATHER_CONDITIONS = [
  { code: 113, description: 'Sunny' },
  { code: 116, description: 'Partly cloudy' },
  { code: 119, description: 'Cloudy' },
  { code: 122, description: 'Overcast' },
  { code: 176, description: 'Patchy rain possible' },
  { code: 296, description: 'Light rain' },
] as const;

export const WIND_DIRECTIONS = [
  'N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW',
] as const;

interface LocalClock {
  /** `YYYY-MM-DD HH:MM` */
  localtime: string;
  /** `hh:mm AM|PM` */
  observationTime: string;
  /** Whole hours east of UTC, truncated toward zero. */
  offsetHours: number;
}

/**
 * Wall-clock reading of `now` in `timeZone`.
 */
export function readLocalClock(now: Date, timeZone: string): LocalClock {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
    timeZoneName: 'shortOffset',
  }).formatToParts(now);
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? '';

  const hour = Number(part('hour'));
  const minute = part('minute');
  const hour12 = hour % 12 === 0 ? 12 : hour % 12;
  // "GMT", "GMT+1", "GMT-3:30"
  const offset = part('timeZoneName').match(/^GMT([+-]\d{1,2})/);

  return {
    localtime: `${part('year')}-${part('month')}-${part('day')} ${String(hour).padStart(2, '0')}:${minute}`,
    observationTime: `${String(hour12).padStart(2, '0')}:${minute} ${hour < 12 ? 'AM' : 'PM'}`,
    offsetHours: offset ? Number(offset[1]) : 0,
  };
}

/** Case-insensitive lookup; returns the catalog's spelling of the name. */
export function findCity(
  cities: CityCatalog,
  name: string,
): [string, CityInfo] | undefined {
  const wanted = name.toLowerCase();
  return Object.entries(cities).find(([key]) => key.toLowerCase() === wanted);
}

/**
 * Build a weather payload for `cityName`. Known cities report their own
 * location and timezone; any other name gets random coordinates in UTC.
 * Readings are random within plausible ranges.
 */
export function generateWeatherData(
  cities: CityCatalog,
  cityName: string,
  options: { country?: string; unit?: string } = {},
  deps: WeatherGeneratorDeps = {},
): WeatherPayload {
  const { country, unit = 'm' } = options;
  const { random = Math.random, now = () => new Date() } = deps;

  const randint = (min: number, max: number) =>
    min + Math.floor(random() * (max - min + 1));
  const uniform = (min: number, max: number, digits: number) =>
    (min + random() * (max - min)).toFixed(digits);
  const choice = <T>(items: readonly T[]): T =>
    items[Math.floor(random() * items.length)];

  const known = findCity(cities, cityName);
  let city: CityInfo;
  let query: string;
  if (known) {
    const [key, info] = known;
    city = info;
    query = `${key}, ${info.country}`;
  } else {
    city = {
      country: country ?? 'Unknown',
      region: cityName,
      lat: uniform(-90, 90, 3),
      lon: uniform(-180, 180, 3),
      timezone_id: 'UTC',
    };
    query = country ? `${cityName}, ${country}` : cityName;
  }

  const timestamp = now();
  const clock = readLocalClock(timestamp, city.timezone_id);
  const weather = choice(WEATHER_CONDITIONS);

  return {
    request: { type: 'City', query, language: 'en', unit },
    location: {
      name: cityName,
      country: city.country,
      region: city.region,
      lat: city.lat,
      lon: city.lon,
      timezone_id: city.timezone_id,
      localtime: clock.localtime,
      localtime_epoch: Math.floor(timestamp.getTime() / 1000),
      utc_offset: `${clock.offsetHours}.0`,
    },
    current: {
      observation_time: clock.observationTime,
      temperature: randint(-10, 35),
      weather_code: weather.code,
      weather_descriptions: [weather.description],
      air_quality: {
        co: uniform(200, 600, 2),
        no2: uniform(10, 50, 3),
        o3: String(randint(30, 80)),
        so2: uniform(1, 15, 1),
        pm2_5: uniform(1, 25, 2),
        pm10: uniform(1, 25, 2),
        'us-epa-index': String(randint(1, 6)),
        'gb-defra-index': String(randint(1, 10)),
      },
      wind_speed: randint(0, 50),
      wind_degree: randint(0, 359),
      wind_dir: choice(WIND_DIRECTIONS),
      pressure: randint(980, 1040),
      precip: randint(0, 20),
      humidity: randint(30, 100),
      cloudcover: randint(0, 100),
      feelslike: randint(-10, 35),
      uv_index: randint(1, 11),
      visibility: randint(1, 20),
    },
  };
}
