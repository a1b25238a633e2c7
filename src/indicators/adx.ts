import { trueRange } from './atr.js';
import { assertPeriod, type IndicatorSeries } from './series.js';
import { sma } from './sma.js';

// Rolling-mean variant: DM, TR and DX are all smoothed with sma().
export function adx(
  highs: readonly number[],
  lows: readonly number[],
  closes: readonly number[],
  period: number,
): IndicatorSeries {
  assertPeriod(period);
  const tr = trueRange(highs, lows, closes);
  const plusDm: number[] = [0];
  const minusDm: number[] = [0];

  for (let i = 1; i < highs.length; i++) {
    const up = highs[i] - highs[i - 1];
    const down = lows[i - 1] - lows[i];
    plusDm.push(up > down && up > 0 ? up : 0);
    minusDm.push(down > up && down > 0 ? down : 0);
  }

  const atrSeries = sma(tr, period);
  const plusAvg = sma(plusDm, period);
  const minusAvg = sma(minusDm, period);

  const dx: (number | undefined)[] = atrSeries.map((range, i) => {
    const plus = plusAvg[i];
    const minus = minusAvg[i];
    if (range === undefined || plus === undefined || minus === undefined || range === 0) {
      return undefined;
    }
    const plusDi = (100 * plus) / range;
    const minusDi = (100 * minus) / range;
    const total = plusDi + minusDi;
    return total === 0 ? undefined : (Math.abs(plusDi - minusDi) / total) * 100;
  });

  return sma(dx, period);
}
