import type * as ccxt from 'ccxt';

export interface Candle {
  readonly openTime: number; // Unix ms
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

export interface CandleSeries {
  readonly symbol: string;
  readonly timeframe: string;
  readonly candles: readonly Candle[];
}

const TIMEFRAME_UNITS_MS: { [unit: string]: number } = {
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
  M: 2_592_000_000,
};

const TIMEFRAME_PATTERN = /^(\d+)([smhdwM])$/;

export function isTimeframe(timeframe: string): boolean {
  const match = TIMEFRAME_PATTERN.exec(timeframe.trim());
  return match !== null && Number(match[1]) > 0;
}

/** '5m' -> 300000. Throws on anything that is not `<count><unit>`. */
export function timeframeToMs(timeframe: string): number {
  const match = TIMEFRAME_PATTERN.exec(timeframe.trim());
  const unit = match ? TIMEFRAME_UNITS_MS[match[2]] : undefined;
  if (!match || unit === undefined || Number(match[1]) === 0) {
    throw new Error(`Unsupported timeframe "${timeframe}"`);
  }
  return Number(match[1]) * unit;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Maps ccxt OHLCV rows to candles. Rows with missing fields are skipped, as are
 * rows whose timestamp does not move forward.
 */
export function toCandles(ohlcv: readonly ccxt.OHLCV[]): Candle[] {
  const candles: Candle[] = [];
  for (const row of ohlcv) {
    const [openTime, open, high, low, close, volume] = row;
    if (
      !isFiniteNumber(openTime) ||
      !isFiniteNumber(open) ||
      !isFiniteNumber(high) ||
      !isFiniteNumber(low) ||
      !isFiniteNumber(close)
    ) {
      continue;
    }
    const last = candles[candles.length - 1];
    if (last && openTime <= last.openTime) continue;
    candles.push({ openTime, open, high, low, close, volume: isFiniteNumber(volume) ? volume : 0 });
  }
  return candles;
}

/**
 * Exchanges return the in-progress candle as the last row. Drop every candle
 * that has not closed by `now`.
 */
export function closedCandles(candles: readonly Candle[], timeframe: string, now: number): Candle[] {
  const intervalMs = timeframeToMs(timeframe);
  return candles.filter((candle) => candle.openTime + intervalMs <= now);
}
