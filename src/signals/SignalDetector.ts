import type { CandleSeries } from '../candles.js';

export type Direction = 'BULLISH' | 'BEARISH';

export interface SignalEvent {
  readonly symbol: string;
  readonly timeframe: string;
  /** openTime of the candle that confirmed the signal */
  readonly timestamp: number;
  readonly direction: Direction;
  readonly price: number;
  readonly emaFast: number;
  readonly emaSlow: number;
  readonly emaTrend: number;
  readonly atr: number;
}

export interface SymbolSignalState {
  lastDirection: Direction | 'NONE';
  lastFiredAt: number | null;
}

export interface SignalDetector {
  name: string;
  /** Returns the new signal for the last closed candle, or null. Updates `state` only when it fires. */
  detect(series: CandleSeries, state: SymbolSignalState): SignalEvent | null;
}
