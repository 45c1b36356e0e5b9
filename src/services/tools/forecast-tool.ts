// Forecast Tool
// Filters the 5-day / 3-hour forecast down to a named timeframe

import { z } from 'zod';
import type { ToolDefaults } from '../../env.js';
import type { OpenWeatherClient } from '../weather/client.js';
import type { ForecastEntry } from '../weather/types.js';
import { TIMEFRAMES, isTimeframe, isWithinWindow, resolveTimeframeWindow, toNaiveIsoString } from './forecast-window.js';
import { FORECAST_GUIDANCE } from './prompts.js';
import { CoordinatesSchema } from './current-weather-tool.js';
import type { ToolDefinition } from './types.js';
import { UNIT_VALUES, describeError, toProviderUnits, unitSuffixes } from './units.js';

export const ForecastArgsSchema = z.object({
  ...CoordinatesSchema,
  timeframe: z.string().trim().toLowerCase().optional(),
  units: z.string().trim().toLowerCase().optional(),
});

export type ForecastArgs = z.infer<typeof ForecastArgsSchema>;

export type ForecastEntryResult = {
  datetime: string;
  timestamp: number;
  temp: number | null;
  temp_unit: string;
  feels_like: number | null;
  temp_min: number | null;
  temp_max: number | null;
  condition: string;
  description: string;
  precipitation_prob: number;
  wind_speed: number | null;
  humidity: number | null;
  clouds: number | null;
};

export type ForecastResult = {
  error?: string;
  timeframe: string | null;
  entries: ForecastEntryResult[];
  count: number;
};

export interface ForecastToolOptions {
  clock?: () => Date;
}

export function normalizeForecastEntry(entry: ForecastEntry, tempUnit: string): ForecastEntryResult {
  const { main, wind } = entry;
  const weather = entry.weather?.[0];

  return {
    datetime: toNaiveIsoString(entry.dt),
    timestamp: entry.dt,
    temp: main?.temp ?? null,
    temp_unit: tempUnit,
    feels_like: main?.feels_like ?? null,
    temp_min: main?.temp_min ?? null,
    temp_max: main?.temp_max ?? null,
    condition: weather?.main ?? 'Unknown',
    description: weather?.description ?? '',
    // pop is a 0-1 fraction; keep one decimal of the percentage
    precipitation_prob: Math.round((entry.pop ?? 0) * 1000) / 10,
    wind_speed: wind?.speed ?? null,
    humidity: main?.humidity ?? null,
    clouds: entry.clouds?.all ?? null,
  };
}

export function filterForecast(
  entries: ForecastEntry[],
  timeframe: string,
  units: string,
  now: Date,
): ForecastEntryResult[] {
  // Unrecognized timeframes read as the widest window
  const window = resolveTimeframeWindow(isTimeframe(timeframe) ? timeframe : 'next_3_days', now);
  const tempUnit = unitSuffixes(units).temp;

  return entries
    .filter(entry => isWithinWindow(entry.dt, window))
    .map(entry => normalizeForecastEntry(entry, tempUnit));
}

export function createForecastTool(
  client: OpenWeatherClient,
  defaults: ToolDefaults,
  { clock = () => new Date() }: ForecastToolOptions = {},
): ToolDefinition<ForecastArgs, ForecastResult> {
  return {
    name: 'get_forecast',
    description:
      'Get the weather forecast for coordinates over a timeframe: "tonight", "tomorrow", "weekend", or "next_3_days". ' +
      'Returns 3-hour forecast entries within that window.',
    parameters: [
      { name: 'lat', type: 'number', description: 'Latitude of the location', required: true },
      { name: 'lon', type: 'number', description: 'Longitude of the location', required: true },
      {
        name: 'timeframe',
        type: 'string',
        description: 'Time period to forecast',
        required: false,
        enum: [...TIMEFRAMES],
        default: 'tomorrow',
      },
      {
        name: 'units',
        type: 'string',
        description: 'Unit system - "metric" (Celsius), "imperial" (Fahrenheit), or "standard" (Kelvin)',
        required: false,
        enum: UNIT_VALUES,
        default: defaults.units,
      },
    ],
    schema: ForecastArgsSchema,
    guidance: FORECAST_GUIDANCE,

    async execute({ lat, lon, timeframe = 'tomorrow', units = defaults.units }, { signal }) {
      try {
        const raw = await client.forecast5Day(
          { lat, lon, units: toProviderUnits(units), lang: defaults.lang },
          { signal },
        );

        const list = raw.list ?? [];
        if (list.length === 0) {
          return { error: 'No forecast data available', timeframe, entries: [], count: 0 };
        }

        const entries = filterForecast(list, timeframe, units, clock());
        return { timeframe, entries, count: entries.length };
      } catch (error) {
        if (signal?.aborted) throw error;
        return {
          error: `Failed to fetch forecast data: ${describeError(error)}`,
          timeframe,
          entries: [],
          count: 0,
        };
      }
    },

    fallback: error => ({ error, timeframe: null, entries: [], count: 0 }),
  };
}
