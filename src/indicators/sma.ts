import { assertPeriod, type IndicatorSeries } from './series.js';

/**
 * Rolling mean over `period` entries. A window that still contains an
 * `undefined` entry yields `undefined`, so smoothing another indicator
 * extends its warm-up.
 */
export function sma(values: IndicatorSeries, period: number): IndicatorSeries {
  assertPeriod(period);
  const out: (number | undefined)[] = new Array<number | undefined>(values.length).fill(undefined);

  for (let i = period - 1; i < values.length; i++) {
    let sum = 0;
    let complete = true;
    for (let j = i - period + 1; j <= i; j++) {
      const v = values[j];
      if (v === undefined) {
        complete = false;
        break;
      }
      sum += v;
    }
    out[i] = complete ? sum / period : undefined;
  }
  return out;
}
