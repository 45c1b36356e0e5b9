// Errors raised by the OpenWeather client

export class UpstreamError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpstreamError';
  }
}

/**
 * Non-2xx response from the provider. `transient` marks 429/5xx responses that
 * were retried until the attempt budget ran out.
 */
export class UpstreamHttpError extends UpstreamError {
  readonly transient: boolean;

  constructor(
    public readonly status: number,
    public readonly path: string,
    public readonly body: string,
  ) {
    super(`OpenWeather request to ${path} failed with status ${status}${body ? `: ${truncate(body)}` : ''}`);
    this.name = 'UpstreamHttpError';
    this.transient = isRetryableStatus(status);
  }
}

// Connection failures, timeouts, and requests on a closed client
export class UpstreamTransportError extends UpstreamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpstreamTransportError';
  }
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}

function truncate(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
