import { describe, it, expect, vi } from 'vitest';
import {
  ConfigurationError,
  DEFAULT_LLM_BASE_URL,
  DEFAULT_LLM_MODEL,
  DEFAULT_OPENWEATHER_BASE_URL,
  loadConfig,
  logConfiguration,
} from '../env.js';
import { createSilentLogger } from '../utils/logger.js';

const required = { OPENWEATHER_API_KEY: 'test-weather-key', LLM_API_KEY: 'test-secret' };

describe('loadConfig', () => {
  it('applies defaults when only the keys are set', () => {
    const config = loadConfig(required);

    expect(config).toEqual({
      port: 8000,
      host: '127.0.0.1',
      nodeEnv: 'development',
      logLevel: 'info',
      weather: {
        apiKey: 'test-weather-key',
        baseUrl: DEFAULT_OPENWEATHER_BASE_URL,
        timeoutMs: 10_000,
        maxRetries: 3,
        backoffMs: 500,
        userAgent: 'weather-agent-api/0.1',
      },
      tools: { lang: 'en', units: 'metric' },
      llm: {
        apiKey: 'test-secret',
        baseUrl: DEFAULT_LLM_BASE_URL,
        model: DEFAULT_LLM_MODEL,
        temperature: 0.1,
        maxTokens: 1024,
      },
      maxTurns: 8,
      warnings: [],
    });
  });

  it('reads overrides and the legacy key names', () => {
    const config = loadConfig({
      WEATHER_API_KEY: ' test-weather-key ',
      GOOGLE_API_KEY: 'test-secret',
      PORT: '9000',
      OPENWEATHER_TIMEOUT_MS: '2500',
      OPENWEATHER_MAX_RETRIES: '5',
      DEFAULT_UNITS: 'Imperial',
      DEFAULT_LANG: 'fr',
      LLM_MODEL: 'test-model',
      LLM_TEMPERATURE: '0.7',
      AGENT_MAX_TURNS: '4',
    });

    expect(config.weather).toMatchObject({ apiKey: 'test-weather-key', timeoutMs: 2500, maxRetries: 5 });
    expect(config.llm).toMatchObject({ apiKey: 'test-secret', model: 'test-model', temperature: 0.7 });
    expect(config.tools).toEqual({ lang: 'fr', units: 'imperial' });
    expect(config.port).toBe(9000);
    expect(config.maxTurns).toBe(4);
    expect(config.warnings).toEqual([]);
  });

  it('falls back to defaults with a warning for invalid values', () => {
    const config = loadConfig({
      ...required,
      PORT: '70000',
      DEFAULT_UNITS: 'kelvin',
      LLM_TEMPERATURE: 'hot',
      OPENWEATHER_MAX_RETRIES: '-1',
    });

    expect(config.port).toBe(8000);
    expect(config.tools.units).toBe('metric');
    expect(config.llm.temperature).toBe(0.1);
    expect(config.weather.maxRetries).toBe(3);
    expect(config.warnings).toEqual([
      'Invalid PORT "70000", using default 8000',
      'Invalid OPENWEATHER_MAX_RETRIES "-1", using default 3',
      'Invalid DEFAULT_UNITS "kelvin", using default metric',
      'Invalid LLM_TEMPERATURE "hot", using default 0.1',
    ]);
  });

  it('keeps at least one agent turn', () => {
    const config = loadConfig({ ...required, AGENT_MAX_TURNS: '0' });

    expect(config.maxTurns).toBe(8);
    expect(config.warnings).toEqual(['Invalid AGENT_MAX_TURNS "0", using default 8']);
  });

  it('refuses a zero timeout or backoff', () => {
    const config = loadConfig({ ...required, OPENWEATHER_TIMEOUT_MS: '0', OPENWEATHER_BACKOFF_MS: '0' });

    expect(config.weather).toMatchObject({ timeoutMs: 10_000, backoffMs: 500 });
    expect(config.warnings).toEqual([
      'Invalid OPENWEATHER_TIMEOUT_MS "0", using default 10000',
      'Invalid OPENWEATHER_BACKOFF_MS "0", using default 500',
    ]);
  });

  it('fails fast without an OpenWeather key', () => {
    expect(() => loadConfig({ LLM_API_KEY: 'test-secret' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ LLM_API_KEY: 'test-secret', OPENWEATHER_API_KEY: '   ' })).toThrow(
      'OpenWeather API key not configured (OPENWEATHER_API_KEY).',
    );
  });

  it('fails fast without a language model key', () => {
    expect(() => loadConfig({ OPENWEATHER_API_KEY: 'test-weather-key' })).toThrow(
      'Language model API key not configured (LLM_API_KEY).',
    );
  });
});

describe('logConfiguration', () => {
  it('logs warnings and never the keys', () => {
    const logger = createSilentLogger();
    const warn = vi.spyOn(logger, 'warn');
    const info = vi.spyOn(logger, 'info');

    logConfiguration(loadConfig({ ...required, PORT: 'abc' }), logger);

    expect(warn).toHaveBeenCalledWith('Invalid PORT "abc", using default 8000');
    const [fields] = info.mock.calls[0];
    expect(JSON.stringify(fields)).not.toContain('test-secret');
    expect(JSON.stringify(fields)).not.toContain('test-weather-key');
  });
});
