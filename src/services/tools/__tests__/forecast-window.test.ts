import { describe, it, expect } from 'vitest';
import { isTimeframe, isWithinWindow, resolveTimeframeWindow, toNaiveIsoString } from '../forecast-window.js';

const at = (iso: string) => new Date(iso);
const ts = (iso: string) => Date.parse(iso) / 1000;

describe('resolveTimeframeWindow', () => {
  // 2024-05-01 is a Wednesday
  const wednesdayMorning = at('2024-05-01T10:00:00Z');

  it('tonight starts at 18:00 and runs through 06:00 inclusive', () => {
    const window = resolveTimeframeWindow('tonight', wednesdayMorning);

    expect(isWithinWindow(ts('2024-05-01T15:00:00Z'), window)).toBe(false);
    expect(isWithinWindow(ts('2024-05-01T18:00:00Z'), window)).toBe(true);
    expect(isWithinWindow(ts('2024-05-02T06:00:00Z'), window)).toBe(true);
    expect(isWithinWindow(ts('2024-05-02T09:00:00Z'), window)).toBe(false);
  });

  it('tonight starts now once it is past 18:00', () => {
    const window = resolveTimeframeWindow('tonight', at('2024-05-01T20:30:00Z'));

    expect(window.start).toBe(Date.parse('2024-05-01T20:30:00Z'));
    expect(isWithinWindow(ts('2024-05-01T18:00:00Z'), window)).toBe(false);
    expect(isWithinWindow(ts('2024-05-01T21:00:00Z'), window)).toBe(true);
  });

  it('tomorrow covers the next calendar day with an exclusive end', () => {
    const window = resolveTimeframeWindow('tomorrow', wednesdayMorning);

    expect(isWithinWindow(ts('2024-05-01T21:00:00Z'), window)).toBe(false);
    expect(isWithinWindow(ts('2024-05-02T00:00:00Z'), window)).toBe(true);
    expect(isWithinWindow(ts('2024-05-02T21:00:00Z'), window)).toBe(true);
    expect(isWithinWindow(ts('2024-05-03T00:00:00Z'), window)).toBe(false);
  });

  it('weekend runs from the coming Saturday for 48 hours', () => {
    const window = resolveTimeframeWindow('weekend', wednesdayMorning);

    expect(window).toEqual({
      start: Date.parse('2024-05-04T00:00:00Z'),
      end: Date.parse('2024-05-06T00:00:00Z'),
      endInclusive: false,
    });
  });

  it('weekend on Saturday morning is the current weekend', () => {
    const window = resolveTimeframeWindow('weekend', at('2024-05-04T09:00:00Z'));
    expect(window.start).toBe(Date.parse('2024-05-04T00:00:00Z'));
  });

  it('weekend on Saturday afternoon moves to the following week', () => {
    const window = resolveTimeframeWindow('weekend', at('2024-05-04T13:00:00Z'));
    expect(window.start).toBe(Date.parse('2024-05-11T00:00:00Z'));
  });

  it('weekend on Sunday points at the next Saturday', () => {
    const window = resolveTimeframeWindow('weekend', at('2024-05-05T10:00:00Z'));
    expect(window.start).toBe(Date.parse('2024-05-11T00:00:00Z'));
  });

  it('next_3_days keeps everything up to now + 72h', () => {
    const window = resolveTimeframeWindow('next_3_days', wednesdayMorning);

    expect(isWithinWindow(ts('2024-04-30T12:00:00Z'), window)).toBe(true);
    expect(isWithinWindow(ts('2024-05-04T10:00:00Z'), window)).toBe(true);
    expect(isWithinWindow(ts('2024-05-04T12:00:00Z'), window)).toBe(false);
  });
});

describe('forecast window helpers', () => {
  it('recognizes the named timeframes', () => {
    expect(isTimeframe('weekend')).toBe(true);
    expect(isTimeframe('next_week')).toBe(false);
  });

  it('formats timestamps as naive ISO strings', () => {
    expect(toNaiveIsoString(ts('2024-05-02T12:00:00Z'))).toBe('2024-05-02T12:00:00');
  });
});
