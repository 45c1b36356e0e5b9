import { describe, it, expect } from 'vitest';
import { createForecastTool, filterForecast, ForecastArgsSchema } from '../forecast-tool.js';
import { createFakeOpenWeather, json } from '../../weather/__tests__/fake-openweather.js';

const defaults = { lang: 'en', units: 'metric' as const };
const clock = () => new Date('2024-05-01T10:00:00Z');
const ts = (iso: string) => Date.parse(iso) / 1000;

function entry(iso: string, pop = 0) {
  return {
    dt: ts(iso),
    main: { temp: 14.2, feels_like: 13.5, temp_min: 13.9, temp_max: 14.8, humidity: 70 },
    weather: [{ main: 'Rain', description: 'light rain' }],
    wind: { speed: 4.1 },
    clouds: { all: 90 },
    pop,
  };
}

const forecastList = [
  entry('2024-05-01T21:00:00Z', 0.2),
  entry('2024-05-02T00:00:00Z'),
  entry('2024-05-02T12:00:00Z', 0.456),
  entry('2024-05-03T00:00:00Z'),
];

describe('get_forecast tool', () => {
  it('keeps only entries for tomorrow by default', async () => {
    const { client } = createFakeOpenWeather({
      '/data/2.5/forecast': () => json({ cod: '200', list: forecastList }),
    });
    const tool = createForecastTool(client, defaults, { clock });

    const result = await tool.execute({ lat: 48.85, lon: 2.35 }, {});

    expect(result.timeframe).toBe('tomorrow');
    expect(result.count).toBe(2);
    expect(result.entries.map(e => e.datetime)).toEqual(['2024-05-02T00:00:00', '2024-05-02T12:00:00']);
    expect(result.entries[1]).toEqual({
      datetime: '2024-05-02T12:00:00',
      timestamp: ts('2024-05-02T12:00:00Z'),
      temp: 14.2,
      temp_unit: '°C',
      feels_like: 13.5,
      temp_min: 13.9,
      temp_max: 14.8,
      condition: 'Rain',
      description: 'light rain',
      precipitation_prob: 45.6,
      wind_speed: 4.1,
      humidity: 70,
      clouds: 90,
    });
  });

  it('filters by the requested timeframe and unit system', async () => {
    const { client, requestedParams } = createFakeOpenWeather({
      '/data/2.5/forecast': () => json({ list: forecastList }),
    });
    const tool = createForecastTool(client, defaults, { clock });

    const result = await tool.execute({ lat: 40.71, lon: -74.01, timeframe: 'tonight', units: 'imperial' }, {});

    expect(result.timeframe).toBe('tonight');
    expect(result.entries.map(e => e.datetime)).toEqual(['2024-05-01T21:00:00', '2024-05-02T00:00:00']);
    expect(result.entries[0]).toMatchObject({ temp_unit: '°F', precipitation_prob: 20 });
    expect(requestedParams().get('units')).toBe('imperial');
  });

  it('reports an empty forecast list', async () => {
    const { client } = createFakeOpenWeather({
      '/data/2.5/forecast': () => json({ list: [] }),
    });
    const tool = createForecastTool(client, defaults, { clock });

    const result = await tool.execute({ lat: 48.85, lon: 2.35 }, {});

    expect(result).toEqual({ error: 'No forecast data available', timeframe: 'tomorrow', entries: [], count: 0 });
  });

  it('treats a missing list like an empty one', async () => {
    const { client } = createFakeOpenWeather({
      '/data/2.5/forecast': () => json({ cod: '200' }),
    });
    const tool = createForecastTool(client, defaults, { clock });

    const result = await tool.execute({ lat: 48.85, lon: 2.35, timeframe: 'weekend' }, {});

    expect(result).toEqual({ error: 'No forecast data available', timeframe: 'weekend', entries: [], count: 0 });
  });

  it('returns zero entries when nothing falls in the window', async () => {
    const { client } = createFakeOpenWeather({
      '/data/2.5/forecast': () => json({ list: forecastList }),
    });
    const tool = createForecastTool(client, defaults, { clock });

    const result = await tool.execute({ lat: 48.85, lon: 2.35, timeframe: 'weekend' }, {});

    expect(result).toEqual({ timeframe: 'weekend', entries: [], count: 0 });
  });

  it('returns an error-tagged shape when the provider is unreachable', async () => {
    const { client } = createFakeOpenWeather({
      '/data/2.5/forecast': () => {
        throw new TypeError('fetch failed');
      },
    });
    const tool = createForecastTool(client, defaults, { clock });

    const result = await tool.execute({ lat: 48.85, lon: 2.35, timeframe: 'next_3_days' }, {});

    expect(result).toEqual({
      error: 'Failed to fetch forecast data: OpenWeather request to /data/2.5/forecast failed: fetch failed',
      timeframe: 'next_3_days',
      entries: [],
      count: 0,
    });
  });

  it('builds an empty error shape from fallback()', () => {
    const tool = createForecastTool(createFakeOpenWeather({}).client, defaults, { clock });
    expect(tool.fallback('boom')).toEqual({ error: 'boom', timeframe: null, entries: [], count: 0 });
  });

  it('rejects null coordinates', () => {
    expect(ForecastArgsSchema.safeParse({ lat: null, lon: null, timeframe: 'tomorrow' }).success).toBe(false);
  });

  it('normalizes timeframe and units arguments', () => {
    expect(ForecastArgsSchema.parse({ lat: '48.85', lon: 2.35, timeframe: ' Tonight ' })).toEqual({
      lat: 48.85,
      lon: 2.35,
      timeframe: 'tonight',
    });
  });
});

describe('filterForecast', () => {
  it('reads an unrecognized timeframe as the next three days', () => {
    const entries = [
      { dt: ts('2024-04-30T12:00:00Z') },
      { dt: ts('2024-05-04T09:00:00Z') },
      { dt: ts('2024-05-04T12:00:00Z') },
    ];

    const someday = filterForecast(entries, 'someday', 'metric', clock());

    expect(someday.map(e => e.datetime)).toEqual(['2024-04-30T12:00:00', '2024-05-04T09:00:00']);
    expect(someday).toEqual(filterForecast(entries, 'next_3_days', 'metric', clock()));
  });

  it('treats a missing precipitation probability as zero', () => {
    const [first] = filterForecast([{ dt: ts('2024-05-02T03:00:00Z') }], 'tomorrow', 'standard', clock());

    expect(first).toEqual({
      datetime: '2024-05-02T03:00:00',
      timestamp: ts('2024-05-02T03:00:00Z'),
      temp: null,
      temp_unit: 'K',
      feels_like: null,
      temp_min: null,
      temp_max: null,
      condition: 'Unknown',
      description: '',
      precipitation_prob: 0,
      wind_speed: null,
      humidity: null,
      clouds: null,
    });
  });
});
