// Environment configuration for the weather agent API
// Reads process.env once at startup and hands explicit config objects to constructors

import type { Logger } from 'pino';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type EnvSource = Record<string, string | undefined>;

export type Units = 'metric' | 'imperial' | 'standard';

export interface WeatherClientConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  backoffMs: number;
  userAgent: string;
}

export interface ToolDefaults {
  lang: string;
  units: Units;
}

export interface LlmConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  weather: WeatherClientConfig;
  tools: ToolDefaults;
  llm: LlmConfig;
  maxTurns: number;
  // Problems found while parsing; logged once the logger exists
  warnings: string[];
}

export const DEFAULT_OPENWEATHER_BASE_URL = 'https://api.openweathermap.org';
export const DEFAULT_LLM_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';
export const DEFAULT_LLM_MODEL = 'gemini-2.0-flash';

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number, warnings: string[]): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    warnings.push(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(
  value: string | undefined,
  defaultValue: number,
  name: string,
  warnings: string[],
): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    warnings.push(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseFloatInRange(
  value: string | undefined,
  defaultValue: number,
  name: string,
  [min, max]: [number, number],
  warnings: string[],
): number {
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
    warnings.push(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseUnits(value: string | undefined, warnings: string[]): Units {
  const raw = strEnv(value, 'metric').toLowerCase();
  if (raw === 'metric' || raw === 'imperial' || raw === 'standard') return raw;
  warnings.push(`Invalid DEFAULT_UNITS "${value}", using default metric`);
  return 'metric';
}

/**
 * Builds the application config from an environment map.
 * Throws ConfigurationError when a required key is missing so the process
 * fails before serving any request.
 */
export function loadConfig(source: EnvSource = process.env): AppConfig {
  const warnings: string[] = [];

  const weatherApiKey = strEnv(source.OPENWEATHER_API_KEY || source.WEATHER_API_KEY);
  if (!weatherApiKey) {
    throw new ConfigurationError('OpenWeather API key not configured (OPENWEATHER_API_KEY).');
  }

  const llmApiKey = strEnv(source.LLM_API_KEY || source.GOOGLE_API_KEY);
  if (!llmApiKey) {
    throw new ConfigurationError('Language model API key not configured (LLM_API_KEY).');
  }

  return {
    port: parsePort(source.PORT, 8000, warnings),
    host: strEnv(source.HOST, '127.0.0.1'),
    nodeEnv: strEnv(source.NODE_ENV, 'development'),
    logLevel: strEnv(source.LOG_LEVEL, 'info'),

    weather: {
      apiKey: weatherApiKey,
      baseUrl: strEnv(source.OPENWEATHER_BASE_URL, DEFAULT_OPENWEATHER_BASE_URL),
      timeoutMs: parsePositiveInt(source.OPENWEATHER_TIMEOUT_MS, 10_000, 'OPENWEATHER_TIMEOUT_MS', warnings),
      maxRetries: parsePositiveInt(source.OPENWEATHER_MAX_RETRIES, 3, 'OPENWEATHER_MAX_RETRIES', warnings),
      backoffMs: parsePositiveInt(source.OPENWEATHER_BACKOFF_MS, 500, 'OPENWEATHER_BACKOFF_MS', warnings),
      userAgent: 'weather-agent-api/0.1',
    },

    tools: {
      lang: strEnv(source.DEFAULT_LANG, 'en'),
      units: parseUnits(source.DEFAULT_UNITS, warnings),
    },

    llm: {
      apiKey: llmApiKey,
      baseUrl: strEnv(source.LLM_BASE_URL, DEFAULT_LLM_BASE_URL),
      model: strEnv(source.LLM_MODEL, DEFAULT_LLM_MODEL),
      temperature: parseFloatInRange(source.LLM_TEMPERATURE, 0.1, 'LLM_TEMPERATURE', [0, 2], warnings),
      maxTokens: parsePositiveInt(source.LLM_MAX_TOKENS, 1024, 'LLM_MAX_TOKENS', warnings),
    },

    maxTurns: parsePositiveInt(source.AGENT_MAX_TURNS, 8, 'AGENT_MAX_TURNS', warnings),
    warnings,
  };
}

// Log configuration on startup (secrets redacted)
export function logConfiguration(config: AppConfig, log: Logger): void {
  for (const warning of config.warnings) {
    log.warn(warning);
  }
  log.info(
    {
      environment: config.nodeEnv,
      server: `${config.host}:${config.port}`,
      weatherBaseUrl: config.weather.baseUrl,
      weatherTimeoutMs: config.weather.timeoutMs,
      weatherMaxRetries: config.weather.maxRetries,
      llmBaseUrl: config.llm.baseUrl,
      llmModel: config.llm.model,
      maxTurns: config.maxTurns,
      defaultUnits: config.tools.units,
      defaultLang: config.tools.lang,
    },
    'Weather agent configuration',
  );
}
