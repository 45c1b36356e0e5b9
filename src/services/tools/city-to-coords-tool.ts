// City To Coordinates Tool
// Resolves a free-text place name to coordinates through OpenWeather geocoding

import { z } from 'zod';
import type { ToolDefaults } from '../../env.js';
import type { OpenWeatherClient } from '../weather/client.js';
import type { GeocodePlace } from '../weather/types.js';
import { CITY_TO_COORDS_GUIDANCE } from './prompts.js';
import type { ToolDefinition } from './types.js';
import { describeError } from './units.js';

export const CityToCoordsArgsSchema = z.object({
  city: z.string().trim().min(1, 'City is required'),
});

export type CityToCoordsArgs = z.infer<typeof CityToCoordsArgsSchema>;

export type CityToCoordsResult =
  | { lat: number; lon: number; normalized_name: string }
  | { error: string; lat: null; lon: null; normalized_name: null };

export function formatPlaceName(place: Pick<GeocodePlace, 'name' | 'state' | 'country'>): string {
  return [place.name, place.state, place.country].filter(part => !!part).join(', ');
}

function notFound(error: string): CityToCoordsResult {
  return { error, lat: null, lon: null, normalized_name: null };
}

export function createCityToCoordsTool(
  client: OpenWeatherClient,
  defaults: ToolDefaults,
): ToolDefinition<CityToCoordsArgs, CityToCoordsResult> {
  return {
    name: 'city_to_coords',
    description:
      'Convert a city name to geographic coordinates. Call this before any weather lookup when the user names a place.',
    parameters: [
      {
        name: 'city',
        type: 'string',
        description: 'The name of the city to geocode (e.g., "Paris", "New York, US", "Tokyo, Japan")',
        required: true,
      },
    ],
    schema: CityToCoordsArgsSchema,
    guidance: CITY_TO_COORDS_GUIDANCE,

    async execute({ city }, { signal }) {
      let results: GeocodePlace[];
      try {
        results = await client.geocodeDirect(city, { limit: 1, lang: defaults.lang }, { signal });
      } catch (error) {
        if (signal?.aborted) throw error;
        return notFound(`Failed to look up coordinates for '${city}': ${describeError(error)}`);
      }

      const place = results[0];
      if (!place) {
        return notFound(`Could not find coordinates for '${city}'`);
      }

      return {
        lat: place.lat,
        lon: place.lon,
        normalized_name: formatPlaceName(place),
      };
    },

    fallback: notFound,
  };
}
