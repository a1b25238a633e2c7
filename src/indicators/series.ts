import { InvalidParameterError } from '../errors.js';

/** Index-aligned with its source; warm-up entries are `undefined`. */
export type IndicatorSeries = ReadonlyArray<number | undefined>;

export function assertPeriod(period: number, name = 'period'): void {
  if (!Number.isInteger(period) || period < 1) {
    throw new InvalidParameterError(`${name} must be a positive integer, got ${period}`);
  }
}

export function assertSameLength(sequences: Record<string, readonly unknown[]>): number {
  const entries = Object.entries(sequences);
  const [, first] = entries[0] ?? ['', []];
  for (const [name, seq] of entries) {
    if (seq.length !== first.length) {
      const lengths = entries.map(([n, s]) => `${n}=${s.length}`).join(', ');
      throw new InvalidParameterError(`${name} length mismatch (${lengths})`);
    }
  }
  return first.length;
}
