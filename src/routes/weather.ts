import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { CoordinatesSchema } from '../services/tools/current-weather-tool.js';
import type { OpenWeatherClient } from '../services/weather/client.js';

const GeocodeQuerySchema = z.object({
  q: z.string().trim().min(1, 'Query is required'),
  limit: z.coerce.number().int().min(1).max(5).default(1),
  lang: z.string().trim().min(1).optional(),
});

const CoordinatesQuerySchema = z.object({
  ...CoordinatesSchema,
  units: z.enum(['metric', 'imperial', 'standard']).default('metric'),
  lang: z.string().trim().min(1).optional(),
});

export interface WeatherRouteOptions {
  client: Pick<OpenWeatherClient, 'geocodeDirect' | 'currentWeather' | 'forecast5Day'>;
}

// Raw OpenWeather passthrough endpoints; upstream failures map through the error handler
export const weatherRoutes: FastifyPluginAsync<WeatherRouteOptions> = async (server, { client }) => {
  server.get('/geocode', async (request) => {
    const { q, limit, lang } = GeocodeQuerySchema.parse(request.query);
    return client.geocodeDirect(q, { limit, lang });
  });

  server.get('/weather/current', async (request) => {
    const query = CoordinatesQuerySchema.parse(request.query);
    return client.currentWeather(query);
  });

  server.get('/weather/forecast', async (request) => {
    const query = CoordinatesQuerySchema.parse(request.query);
    return client.forecast5Day(query);
  });
};
