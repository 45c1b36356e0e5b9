// Current Weather Tool
// Fetches current conditions and flattens them into a unit-tagged mapping

import { z } from 'zod';
import type { ToolDefaults } from '../../env.js';
import type { OpenWeatherClient } from '../weather/client.js';
import type { CurrentWeatherPayload } from '../weather/types.js';
import { CURRENT_WEATHER_GUIDANCE } from './prompts.js';
import type { ToolDefinition } from './types.js';
import { UNIT_VALUES, describeError, toProviderUnits, unitSuffixes } from './units.js';

// Numbers or numeric strings; null, booleans and blank strings stay invalid
function coordinate(min: number, max: number) {
  return z.preprocess(
    value => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
    z.number().min(min).max(max),
  );
}

export const CoordinatesSchema = {
  lat: coordinate(-90, 90),
  lon: coordinate(-180, 180),
};

export const CurrentWeatherArgsSchema = z.object({
  ...CoordinatesSchema,
  units: z.string().trim().toLowerCase().optional(),
});

export type CurrentWeatherArgs = z.infer<typeof CurrentWeatherArgsSchema>;

export type CurrentWeatherResult = {
  error?: string;
  temp: number | null;
  temp_unit: string | null;
  feels_like: number | null;
  condition: string | null;
  description: string | null;
  wind_speed: number | null;
  wind_unit: string | null;
  wind_deg: number | null;
  humidity: number | null;
  clouds: number | null;
  pressure: number | null;
  visibility: number | null;
};

export function normalizeCurrentWeather(raw: CurrentWeatherPayload, units: string): CurrentWeatherResult {
  const { main, wind } = raw;
  const weather = raw.weather?.[0];
  const suffix = unitSuffixes(units);

  return {
    temp: main?.temp ?? null,
    temp_unit: suffix.temp,
    feels_like: main?.feels_like ?? null,
    condition: weather?.main ?? 'Unknown',
    description: weather?.description ?? '',
    wind_speed: wind?.speed ?? null,
    wind_unit: suffix.wind,
    wind_deg: wind?.deg ?? null,
    humidity: main?.humidity ?? null,
    clouds: raw.clouds?.all ?? null,
    pressure: main?.pressure ?? null,
    visibility: raw.visibility ?? null,
  };
}

function failed(error: string): CurrentWeatherResult {
  return {
    error,
    temp: null,
    temp_unit: null,
    feels_like: null,
    condition: null,
    description: null,
    wind_speed: null,
    wind_unit: null,
    wind_deg: null,
    humidity: null,
    clouds: null,
    pressure: null,
    visibility: null,
  };
}

export function createCurrentWeatherTool(
  client: OpenWeatherClient,
  defaults: ToolDefaults,
): ToolDefinition<CurrentWeatherArgs, CurrentWeatherResult> {
  return {
    name: 'get_current_weather',
    description:
      'Get current weather conditions for specific coordinates, including temperature, feels-like, condition, wind, humidity, and clouds.',
    parameters: [
      { name: 'lat', type: 'number', description: 'Latitude of the location', required: true },
      { name: 'lon', type: 'number', description: 'Longitude of the location', required: true },
      {
        name: 'units',
        type: 'string',
        description: 'Unit system - "metric" (Celsius), "imperial" (Fahrenheit), or "standard" (Kelvin)',
        required: false,
        enum: UNIT_VALUES,
        default: defaults.units,
      },
    ],
    schema: CurrentWeatherArgsSchema,
    guidance: CURRENT_WEATHER_GUIDANCE,

    async execute({ lat, lon, units = defaults.units }, { signal }) {
      try {
        const raw = await client.currentWeather(
          { lat, lon, units: toProviderUnits(units), lang: defaults.lang },
          { signal },
        );
        return normalizeCurrentWeather(raw, units);
      } catch (error) {
        if (signal?.aborted) throw error;
        return failed(`Failed to fetch weather data: ${describeError(error)}`);
      }
    },

    fallback: failed,
  };
}
