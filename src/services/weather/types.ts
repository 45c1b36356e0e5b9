// OpenWeather payload schemas
// Only the fields the tools read are declared; everything else passes through untouched

import { z } from 'zod';

const num = z.number().nullish();
const str = z.string().nullish();

export const GeocodePlaceSchema = z
  .object({
    name: str,
    lat: z.number(),
    lon: z.number(),
    state: str,
    country: str,
  })
  .passthrough();

export const GeocodeResponseSchema = z.array(GeocodePlaceSchema);

const MainSchema = z
  .object({
    temp: num,
    feels_like: num,
    temp_min: num,
    temp_max: num,
    pressure: num,
    humidity: num,
  })
  .passthrough();

const ConditionSchema = z
  .object({
    main: str,
    description: str,
  })
  .passthrough();

const WindSchema = z
  .object({
    speed: num,
    deg: num,
  })
  .passthrough();

const CloudsSchema = z.object({ all: num }).passthrough();

export const CurrentWeatherSchema = z
  .object({
    main: MainSchema.nullish(),
    weather: z.array(ConditionSchema).nullish(),
    wind: WindSchema.nullish(),
    clouds: CloudsSchema.nullish(),
    visibility: num,
  })
  .passthrough();

export const ForecastEntrySchema = z
  .object({
    dt: z.number(),
    main: MainSchema.nullish(),
    weather: z.array(ConditionSchema).nullish(),
    wind: WindSchema.nullish(),
    clouds: CloudsSchema.nullish(),
    pop: num,
  })
  .passthrough();

export const ForecastResponseSchema = z
  .object({
    list: z.array(ForecastEntrySchema).nullish(),
  })
  .passthrough();

export type GeocodePlace = z.infer<typeof GeocodePlaceSchema>;
export type CurrentWeatherPayload = z.infer<typeof CurrentWeatherSchema>;
export type ForecastEntry = z.infer<typeof ForecastEntrySchema>;
export type ForecastPayload = z.infer<typeof ForecastResponseSchema>;

export type QueryValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryValue>;
