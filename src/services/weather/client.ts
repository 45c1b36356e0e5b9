// OpenWeather HTTP client
// One long-lived instance per process: per-call timeout, retries with exponential
// backoff, and an explicit open/close lifecycle

import { setTimeout as delay } from 'timers/promises';
import type { Logger } from 'pino';
import type { Units, WeatherClientConfig } from '../../env.js';
import { ConfigurationError, DEFAULT_OPENWEATHER_BASE_URL } from '../../env.js';
import { UpstreamError, UpstreamHttpError, UpstreamTransportError, isRetryableStatus } from './errors.js';
import {
  CurrentWeatherSchema,
  ForecastResponseSchema,
  GeocodeResponseSchema,
  type CurrentWeatherPayload,
  type ForecastPayload,
  type GeocodePlace,
  type QueryParams,
} from './types.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface OpenWeatherClientOptions extends Partial<Omit<WeatherClientConfig, 'apiKey'>> {
  apiKey: string;
  logger: Logger;
  fetch?: FetchLike;
  sleep?: SleepFn;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface CoordinatesQuery {
  lat: number;
  lon: number;
  units?: Units;
  lang?: string;
}

interface RawResponse {
  status: number;
  headers: Headers;
  body: string;
}

type ClientState = 'idle' | 'open' | 'closed';

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Backoff before retrying `attempt` (1-based): backoffMs * 2^(attempt-1).
 * A 429 carrying a numeric Retry-After (seconds) waits at least that long.
 */
export function computeRetryDelay(
  attempt: number,
  backoffMs: number,
  status?: number,
  retryAfter?: string | null,
): number {
  const base = backoffMs * 2 ** (attempt - 1);

  if (status === 429 && retryAfter) {
    const seconds = Number(retryAfter.trim());
    if (retryAfter.trim() !== '' && Number.isFinite(seconds)) {
      return Math.max(seconds * 1000, base);
    }
  }

  return base;
}

export class OpenWeatherClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly backoffMs: number;

  private readonly apiKey: string;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: SleepFn;
  private readonly log: Logger;

  private state: ClientState = 'idle';
  private lifecycle = new AbortController();

  constructor(options: OpenWeatherClientOptions) {
    const apiKey = options.apiKey.trim();
    if (!apiKey) {
      throw new ConfigurationError('OpenWeather API key not configured');
    }

    this.apiKey = apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_OPENWEATHER_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.backoffMs = options.backoffMs ?? 500;
    this.userAgent = options.userAgent ?? 'weather-agent-api/0.1';
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger.child({ module: 'openweather' });
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  open(): this {
    if (this.state === 'closed') {
      this.lifecycle = new AbortController();
    }
    this.state = 'open';
    return this;
  }

  // Aborts in-flight requests; later calls fail until open() is called again
  async close(): Promise<void> {
    if (this.state === 'closed') return;
    this.state = 'closed';
    this.lifecycle.abort(new UpstreamTransportError('OpenWeather client closed'));
  }

  /**
   * GET `path` with the API key merged into the query string.
   * Retries 429/5xx and transport failures while attempts remain; other
   * non-2xx statuses fail immediately.
   */
  async get(path: string, params: QueryParams = {}, options: RequestOptions = {}): Promise<unknown> {
    const url = this.buildUrl(path, params);
    const { signal } = options;

    for (let attempt = 1; ; attempt++) {
      this.assertOpen();
      signal?.throwIfAborted();

      let response: RawResponse;
      try {
        response = await this.fetchOnce(url, signal);
      } catch (error) {
        if (signal?.aborted) throw signal.reason;
        if (this.state !== 'open') {
          throw new UpstreamTransportError('OpenWeather client closed', { cause: error });
        }

        const transportError = new UpstreamTransportError(
          `OpenWeather request to ${path} failed: ${describeTransportFailure(error, this.timeoutMs)}`,
          { cause: error },
        );
        if (attempt < this.maxRetries) {
          const delayMs = computeRetryDelay(attempt, this.backoffMs);
          this.log.warn({ path, attempt, delayMs, err: transportError.message }, 'Retrying OpenWeather request after transport error');
          await this.backoff(delayMs, signal);
          continue;
        }
        throw transportError;
      }

      if (response.status >= 200 && response.status < 300) {
        return parseJson(response.body, path);
      }

      if (isRetryableStatus(response.status) && attempt < this.maxRetries) {
        const delayMs = computeRetryDelay(
          attempt,
          this.backoffMs,
          response.status,
          response.headers.get('retry-after'),
        );
        this.log.warn({ path, attempt, status: response.status, delayMs }, 'Retrying OpenWeather request');
        await this.backoff(delayMs, signal);
        continue;
      }

      throw new UpstreamHttpError(response.status, path, response.body);
    }
  }

  // Direct geocoding: place candidates for a free-text query
  async geocodeDirect(
    q: string,
    { limit = 1, lang }: { limit?: number; lang?: string } = {},
    options?: RequestOptions,
  ): Promise<GeocodePlace[]> {
    const raw = await this.get('/geo/1.0/direct', { q, limit, lang }, options);
    return GeocodeResponseSchema.parse(raw);
  }

  async currentWeather(query: CoordinatesQuery, options?: RequestOptions): Promise<CurrentWeatherPayload> {
    const raw = await this.get('/data/2.5/weather', toCoordinateParams(query), options);
    return CurrentWeatherSchema.parse(raw);
  }

  // 5-day forecast in 3-hour steps
  async forecast5Day(query: CoordinatesQuery, options?: RequestOptions): Promise<ForecastPayload> {
    const raw = await this.get('/data/2.5/forecast', toCoordinateParams(query), options);
    return ForecastResponseSchema.parse(raw);
  }

  private assertOpen(): void {
    if (this.state !== 'open') {
      throw new UpstreamTransportError(
        this.state === 'idle' ? 'OpenWeather client is not open' : 'OpenWeather client closed',
      );
    }
  }

  // Waits between attempts; close() and the caller's signal both cut the wait short
  private async backoff(delayMs: number, signal?: AbortSignal): Promise<void> {
    const lifecycleSignal = this.lifecycle.signal;
    try {
      await this.sleep(delayMs, signal ? AbortSignal.any([signal, lifecycleSignal]) : lifecycleSignal);
    } catch (error) {
      if (signal?.aborted) throw signal.reason;
      if (lifecycleSignal.aborted) {
        throw new UpstreamTransportError('OpenWeather client closed', { cause: error });
      }
      throw error;
    }
  }

  private buildUrl(path: string, params: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`);
    for (const [key, value] of Object.entries(params)) {
      if (value === undefined) continue;
      url.searchParams.set(key, String(value));
    }
    url.searchParams.set('appid', this.apiKey);
    return url.toString();
  }

  // Single attempt; the timeout covers both headers and body
  private async fetchOnce(url: string, signal?: AbortSignal): Promise<RawResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new UpstreamTransportError(`timed out after ${this.timeoutMs}ms`));
    }, this.timeoutMs);

    const onCallerAbort = () => controller.abort(signal?.reason);
    const onClose = () => controller.abort(this.lifecycle.signal.reason);
    const lifecycleSignal = this.lifecycle.signal;
    signal?.addEventListener('abort', onCallerAbort, { once: true });
    lifecycleSignal.addEventListener('abort', onClose, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          'User-Agent': this.userAgent,
        },
        signal: controller.signal,
      });
      const body = await response.text();
      return { status: response.status, headers: response.headers, body };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
      lifecycleSignal.removeEventListener('abort', onClose);
    }
  }
}

function toCoordinateParams({ lat, lon, units = 'metric', lang }: CoordinatesQuery): QueryParams {
  return { lat, lon, units, lang };
}

function parseJson(body: string, path: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new UpstreamError(`OpenWeather returned invalid JSON for ${path}`, { cause: error });
  }
}

function describeTransportFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof UpstreamTransportError) return error.message;
  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return `timed out after ${timeoutMs}ms`;
    }
    return error.message;
  }
  return String(error);
}
