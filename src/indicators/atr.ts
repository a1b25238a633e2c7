import { InvalidParameterError } from '../errors.js';
import { ema, wilder } from './ema.js';
import { assertPeriod, assertSameLength, type IndicatorSeries } from './series.js';
import { sma } from './sma.js';

export const ATR_SMOOTHINGS = ['ema', 'sma', 'wilder'] as const;

export type AtrSmoothing = (typeof ATR_SMOOTHINGS)[number];

/**
 * True range per candle. The first candle has no previous close, so its range
 * is just high - low.
 */
export function trueRange(highs: readonly number[], lows: readonly number[], closes: readonly number[]): number[] {
  const length = assertSameLength({ highs, lows, closes });
  const tr: number[] = [];
  for (let i = 0; i < length; i++) {
    const range = highs[i] - lows[i];
    if (i === 0) {
      tr.push(range);
      continue;
    }
    const prevClose = closes[i - 1];
    tr.push(Math.max(range, Math.abs(highs[i] - prevClose), Math.abs(lows[i] - prevClose)));
  }
  return tr;
}

/**
 * Average True Range. Defaults to EMA smoothing so it warms up exactly like
 * {@link ema}; `sma` and `wilder` are available for parity with other charting
 * tools.
 */
export function atr(
  highs: readonly number[],
  lows: readonly number[],
  closes: readonly number[],
  period: number,
  smoothing: AtrSmoothing = 'ema',
): IndicatorSeries {
  assertPeriod(period);
  const tr = trueRange(highs, lows, closes);
  switch (smoothing) {
    case 'ema':
      return ema(tr, period);
    case 'sma':
      return sma(tr, period);
    case 'wilder':
      return wilder(tr, period);
    default:
      throw new InvalidParameterError(`Unknown ATR smoothing "${String(smoothing)}"`);
  }
}
