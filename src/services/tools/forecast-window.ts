// Timeframe windows for forecast filtering
// Provider timestamps are UTC epoch seconds and are compared as naive UTC wall
// time; no conversion to the location's timezone happens here.

export const TIMEFRAMES = ['tonight', 'tomorrow', 'weekend', 'next_3_days'] as const;

export type Timeframe = (typeof TIMEFRAMES)[number];

export interface TimeWindow {
  start: number; // epoch ms, inclusive
  end: number; // epoch ms
  endInclusive: boolean;
}

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

function startOfUtcDay(ms: number): number {
  return Math.floor(ms / DAY_MS) * DAY_MS;
}

export function isTimeframe(value: string): value is Timeframe {
  return (TIMEFRAMES as readonly string[]).includes(value);
}

/**
 * - tonight: 18:00 today (or now, once past 18:00) through 06:00 tomorrow
 * - tomorrow: [next midnight, +24h)
 * - weekend: [next Saturday 00:00, +48h); Saturday afternoon skips to the following week
 * - next_3_days: up to now + 72h, including anything already past
 */
export function resolveTimeframeWindow(timeframe: Timeframe, now: Date): TimeWindow {
  const nowMs = now.getTime();
  const today = startOfUtcDay(nowMs);

  switch (timeframe) {
    case 'tonight': {
      const start = now.getUTCHours() >= 18 ? nowMs : today + 18 * HOUR_MS;
      return { start, end: today + DAY_MS + 6 * HOUR_MS, endInclusive: true };
    }

    case 'tomorrow': {
      const start = today + DAY_MS;
      return { start, end: start + DAY_MS, endInclusive: false };
    }

    case 'weekend': {
      // Monday = 0 ... Sunday = 6
      const weekday = (now.getUTCDay() + 6) % 7;
      let daysUntilSaturday = (5 - weekday + 7) % 7;
      if (daysUntilSaturday === 0 && now.getUTCHours() >= 12) {
        daysUntilSaturday = 7;
      }
      const start = today + daysUntilSaturday * DAY_MS;
      return { start, end: start + 2 * DAY_MS, endInclusive: false };
    }

    case 'next_3_days':
      return { start: Number.NEGATIVE_INFINITY, end: nowMs + 72 * HOUR_MS, endInclusive: true };
  }
}

export function isWithinWindow(timestampSeconds: number, window: TimeWindow): boolean {
  const ms = timestampSeconds * 1000;
  if (ms < window.start) return false;
  return window.endInclusive ? ms <= window.end : ms < window.end;
}

// ISO-8601 without a zone designator, e.g. 2024-05-02T12:00:00
export function toNaiveIsoString(timestampSeconds: number): string {
  return new Date(timestampSeconds * 1000).toISOString().slice(0, 19);
}
