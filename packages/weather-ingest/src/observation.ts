import { z } from 'zod';
import { InsertError } from './errors.js';
import type { WeatherApiResponse, WeatherObservation } from './types.js';

export const WeatherApiResponseSchema = z
  .object({
    location: z
      .object({
        name: z.string(),
        utc_offset: z.string(),
      })
      .passthrough(),
    current: z
      .object({
        observation_time: z.string(),
        temperature: z.number(),
        weather_descriptions: z.array(z.string()).min(1),
        wind_speed: z.number(),
      })
      .passthrough(),
  })
  .passthrough();

const TIME_OF_DAY = /^\s*(\d{1,2}):(\d{2})\s*([AaPp][Mm])\s*$/;

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * Parse a 12-hour `hh:mm AM|PM` time and put it on the local calendar date
 * of `now`. Returns a zone-less `YYYY-MM-DDTHH:MM:SS` timestamp.
 */
export function parseObservationTime(
  value: string,
  now: Date = new Date(),
): string {
  const match = value.match(TIME_OF_DAY);
  if (!match) {
    throw new InsertError(`Invalid observation_time: "${value}"`);
  }
  const hour12 = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  if (hour12 < 1 || hour12 > 12 || minute > 59) {
    throw new InsertError(`Invalid observation_time: "${value}"`);
  }
  const pm = match[3].toUpperCase() === 'PM';
  const hour = (hour12 % 12) + (pm ? 12 : 0);

  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  return `${date}T${pad(hour)}:${pad(minute)}:00`;
}

/**
 * Validate a fetched payload and map it onto an observation.
 *
 * @throws {InsertError} when a required field is missing or has the wrong type.
 */
export function toObservation(
  payload: unknown,
  now: Date = new Date(),
): WeatherObservation {
  const parsed = WeatherApiResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const fields = parsed.error.issues
      .map((issue) => issue.path.join('.') || '(root)')
      .join(', ');
    throw new InsertError(`Malformed weather observation: ${fields}`, {
      cause: parsed.error,
    });
  }
  const data: WeatherApiResponse = parsed.data;
  return {
    city: data.location.name,
    temperature: data.current.temperature,
    description: data.current.weather_descriptions[0],
    windSpeed: data.current.wind_speed,
    observedAt: parseObservationTime(data.current.observation_time, now),
    utcOffset: data.location.utc_offset,
  };
}
