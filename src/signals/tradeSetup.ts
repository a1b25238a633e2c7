import type { TradeSetupParams } from './params.js';
import type { Direction, SignalEvent } from './SignalDetector.js';

export interface TradeSetup {
  readonly side: 'LONG' | 'SHORT';
  readonly leverage: number;
  /** Entry zone bounds, entryLow <= entryHigh */
  readonly entryLow: number;
  readonly entryHigh: number;
  readonly stopLoss: number;
  readonly takeProfits: readonly number[];
}

export function sideFor(direction: Direction): TradeSetup['side'] {
  return direction === 'BULLISH' ? 'LONG' : 'SHORT';
}

/**
 * Derives entry zone, stop and targets from the signal close and ATR. Longs
 * wait for a dip of PULL_U..PULL_L ATRs below the close; shorts mirror it.
 */
export function buildTradeSetup(event: SignalEvent, params: TradeSetupParams): TradeSetup {
  const { price, atr } = event;
  const side = sideFor(event.direction);
  const sign = side === 'LONG' ? 1 : -1;

  const nearer = price - sign * params.pullUpper * atr;
  const farther = price - sign * params.pullLower * atr;

  return {
    side,
    leverage: params.leverage,
    entryLow: Math.min(nearer, farther),
    entryHigh: Math.max(nearer, farther),
    stopLoss: price - sign * params.riskAtr * atr,
    takeProfits: params.takeProfitMultiples.map((m) => price + sign * m * atr),
  };
}
