import { assertPeriod, type IndicatorSeries } from './series.js';

/**
 * Exponential smoothing seeded with the simple mean of the first `period`
 * values. The seed lands on index `period - 1`; everything before it is
 * `undefined`.
 */
function exponentialSmoothing(values: readonly number[], period: number, k: number): IndicatorSeries {
  const out: (number | undefined)[] = new Array<number | undefined>(values.length).fill(undefined);
  if (values.length < period) return out;

  let sum = 0;
  for (let i = 0; i < period; i++) {
    sum += values[i];
  }
  let prev = sum / period;
  out[period - 1] = prev;

  for (let i = period; i < values.length; i++) {
    prev = values[i] * k + prev * (1 - k);
    out[i] = prev;
  }
  return out;
}

/** EMA with `k = 2 / (period + 1)`. */
export function ema(values: readonly number[], period: number): IndicatorSeries {
  assertPeriod(period);
  return exponentialSmoothing(values, period, 2 / (period + 1));
}

/** Wilder's moving average (RMA), `k = 1 / period`. */
export function wilder(values: readonly number[], period: number): IndicatorSeries {
  assertPeriod(period);
  return exponentialSmoothing(values, period, 1 / period);
}
