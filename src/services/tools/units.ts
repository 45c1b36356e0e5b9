import type { Units } from '../../env.js';

export const UNIT_VALUES: Units[] = ['metric', 'imperial', 'standard'];

// Anything other than metric/imperial is sent upstream as standard (Kelvin)
export function toProviderUnits(units: string): Units {
  if (units === 'metric' || units === 'imperial') return units;
  return 'standard';
}

export function unitSuffixes(units: string): { temp: string; wind: string } {
  switch (units) {
    case 'metric':
      return { temp: '°C', wind: 'm/s' };
    case 'imperial':
      return { temp: '°F', wind: 'mph' };
    default:
      return { temp: 'K', wind: 'm/s' };
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
