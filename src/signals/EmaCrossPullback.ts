import type { Candle, CandleSeries } from '../candles.js';
import { adx, atr, ema, sma } from '../indicators/index.js';
import { parseDetectionParams, type DetectionParams, type RawParams } from './params.js';
import type { Direction, SignalDetector, SignalEvent, SymbolSignalState } from './SignalDetector.js';

/** Indicator readings for the last two closed candles. */
export interface CrossoverWindow {
  readonly openTime: number;
  readonly prevOpenTime: number;
  readonly close: number;
  readonly prevFast: number;
  readonly prevSlow: number;
  readonly fast: number;
  readonly slow: number;
  readonly trend: number;
  readonly atr: number;
  /** Present only when the ADX filter is enabled. */
  readonly adx?: number;
  /** Present only when the volume filter is enabled. */
  readonly volume?: number;
  readonly volumeAverage?: number;
}

/**
 * Computes every indicator the rule needs and reads it at the previous and
 * current candle. Returns null while the series is too short or any required
 * value is still warming up.
 */
export function readWindow(candles: readonly Candle[], params: DetectionParams): CrossoverWindow | null {
  const n = candles.length;
  if (n < params.trendPeriod + 2) return null;

  const closes = candles.map((c) => c.close);
  const highs = candles.map((c) => c.high);
  const lows = candles.map((c) => c.low);

  const fastSeries = ema(closes, params.fastPeriod);
  const slowSeries = ema(closes, params.slowPeriod);
  const trendSeries = ema(closes, params.trendPeriod);
  const atrSeries = atr(highs, lows, closes, params.atrPeriod, params.atrSmoothing);

  const prev = n - 2;
  const curr = n - 1;
  const prevFast = fastSeries[prev];
  const prevSlow = slowSeries[prev];
  const fast = fastSeries[curr];
  const slow = slowSeries[curr];
  const trend = trendSeries[curr];
  const atrValue = atrSeries[curr];

  if (
    prevFast === undefined ||
    prevSlow === undefined ||
    fast === undefined ||
    slow === undefined ||
    trend === undefined ||
    atrValue === undefined
  ) {
    return null;
  }

  const last = candles[curr];
  let window: CrossoverWindow = {
    openTime: last.openTime,
    prevOpenTime: candles[prev].openTime,
    close: last.close,
    prevFast,
    prevSlow,
    fast,
    slow,
    trend,
    atr: atrValue,
  };

  if (params.minAdx > 0) {
    const adxValue = adx(highs, lows, closes, params.adxPeriod)[curr];
    if (adxValue === undefined) return null;
    window = { ...window, adx: adxValue };
  }

  if (params.volumeMultiple > 0) {
    const volumeAverage = sma(
      candles.map((c) => c.volume),
      params.volumePeriod,
    )[curr];
    if (volumeAverage === undefined) return null;
    window = { ...window, volume: last.volume, volumeAverage };
  }

  return window;
}

export function crossoverDirection(window: CrossoverWindow): Direction | null {
  if (window.prevFast <= window.prevSlow && window.fast > window.slow) return 'BULLISH';
  if (window.prevFast >= window.prevSlow && window.fast < window.slow) return 'BEARISH';
  return null;
}

/**
 * Crossover, trend filter, pullback confirmation, then the optional ADX and
 * volume filters. Returns the confirmed direction, or null.
 */
export function confirmedDirection(window: CrossoverWindow, params: DetectionParams): Direction | null {
  const direction = crossoverDirection(window);
  if (direction === null) return null;

  const withTrend = direction === 'BULLISH' ? window.close > window.trend : window.close < window.trend;
  if (!withTrend) return null;

  if (Math.abs(window.close - window.fast) > window.atr * params.pullbackAtrMultiple) return null;

  if (params.minAdx > 0 && (window.adx === undefined || window.adx < params.minAdx)) return null;

  if (params.volumeMultiple > 0) {
    if (window.volume === undefined || window.volumeAverage === undefined) return null;
    if (window.volume < params.volumeMultiple * window.volumeAverage) return null;
  }

  return direction;
}

/** Whole bars between the last signal and this window's candle. */
function barsSinceLastSignal(window: CrossoverWindow, state: SymbolSignalState): number | null {
  const barMs = window.openTime - window.prevOpenTime;
  if (state.lastFiredAt === null || barMs <= 0) return null;
  return Math.floor((window.openTime - state.lastFiredAt) / barMs);
}

/**
 * Applies the edge trigger: a confirmed direction only fires when it differs
 * from the last one reported for the symbol and, with `cooldownBars`, when
 * enough bars have passed since that report. `state` is written after the
 * event is built and never on a null verdict.
 */
export function evaluateWindow(
  symbol: string,
  timeframe: string,
  window: CrossoverWindow,
  state: SymbolSignalState,
  params: DetectionParams,
): SignalEvent | null {
  const direction = confirmedDirection(window, params);
  if (direction === null || direction === state.lastDirection) return null;

  if (params.cooldownBars > 0) {
    const bars = barsSinceLastSignal(window, state);
    if (bars !== null && bars < params.cooldownBars) return null;
  }

  const event: SignalEvent = {
    symbol,
    timeframe,
    timestamp: window.openTime,
    direction,
    price: window.close,
    emaFast: window.fast,
    emaSlow: window.slow,
    emaTrend: window.trend,
    atr: window.atr,
  };

  state.lastDirection = direction;
  state.lastFiredAt = window.openTime;
  return event;
}

export function detect(series: CandleSeries, state: SymbolSignalState, params: DetectionParams): SignalEvent | null {
  const window = readWindow(series.candles, params);
  if (window === null) return null;
  return evaluateWindow(series.symbol, series.timeframe, window, state, params);
}

/**
 * Fast/slow EMA crossover gated by a long EMA trend filter and an ATR-scaled
 * pullback to the fast EMA.
 */
export class EmaCrossPullback implements SignalDetector {
  name = 'EmaCrossPullback';
  readonly params: DetectionParams;

  constructor(params: RawParams<DetectionParams> = {}) {
    this.params = parseDetectionParams(params);
  }

  detect(series: CandleSeries, state: SymbolSignalState): SignalEvent | null {
    return detect(series, state, this.params);
  }

  /** Candles needed before the rule can fire. */
  get minimumCandles(): number {
    return this.params.trendPeriod + 2;
  }
}
