import type { Candle, CandleSeries } from '../src/candles.js';

export const FIVE_MINUTES = 300_000;

export function makeCandle(o: number, h: number, l: number, c: number, openTime = 0, volume = 10): Candle {
  return { openTime, open: o, high: h, low: l, close: c, volume };
}

/**
 * 220 bars of slow uptrend, a 12-bar dip, then a 30-bar recovery. With the
 * default params the 5/50 EMAs cross up on index 242 with close above the
 * 200 EMA and within one ATR of the fast EMA. An earlier bearish cross on
 * index 223 fails the trend filter.
 *
 * `mirror` reflects every price around 150, turning the bullish setup into
 * an identical bearish one.
 */
export function crossoverCandles(mirror = false): Candle[] {
  const closes: number[] = [];
  let x = 100;
  for (let i = 0; i < 220; i++) {
    x = 100 + 0.05 * i;
    closes.push(x);
  }
  for (let i = 0; i < 12; i++) {
    x -= 0.6;
    closes.push(x);
  }
  for (let i = 0; i < 30; i++) {
    x += 0.5;
    closes.push(x);
  }

  return closes.map((c, i) => {
    const o = i > 0 ? closes[i - 1] : c;
    const h = Math.max(o, c) + 0.5;
    const l = Math.min(o, c) - 0.5;
    const openTime = i * FIVE_MINUTES;
    return mirror ? makeCandle(300 - o, 300 - l, 300 - h, 300 - c, openTime) : makeCandle(o, h, l, c, openTime);
  });
}

export const BULLISH_CROSS_INDEX = 242;
export const FILTERED_BEARISH_CROSS_INDEX = 223;

export function seriesOf(candles: readonly Candle[], symbol = 'BTC/USDT', timeframe = '5m'): CandleSeries {
  return { symbol, timeframe, candles };
}
