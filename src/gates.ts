import type { CandleSource, FundingRateSource } from './exchange.js';
import { ema } from './indicators/index.js';
import { createChildLogger } from './logger.js';
import type { ScannerSettings } from './settings.js';
import type { SignalEvent } from './signals/SignalDetector.js';

const log = createChildLogger('gates');

export interface GateVerdict {
  allowed: boolean;
  /** Extra line for the notification. */
  note?: string;
}

/** Async check on a fired signal, run before the signal is recorded and sent. */
export interface SignalGate {
  name: string;
  check(event: SignalEvent): Promise<GateVerdict>;
}

/**
 * Requires the last closed higher-timeframe candle to close on the signal's
 * side of a long EMA. Lets the signal through when the history is too short
 * for the EMA or the fetch fails.
 */
export class HigherTimeframeTrendGate implements SignalGate {
  name = 'htfTrend';

  constructor(
    private readonly candles: CandleSource,
    private readonly timeframe: string,
    private readonly period = 200,
  ) {}

  async check(event: SignalEvent): Promise<GateVerdict> {
    let closes: number[];
    try {
      const candles = await this.candles.fetchCandles(event.symbol, this.timeframe, this.period + 100);
      closes = candles.map((c) => c.close);
    } catch (error) {
      log.warn({ err: error, symbol: event.symbol, timeframe: this.timeframe }, 'Higher timeframe fetch failed, letting signal through');
      return { allowed: true };
    }

    const trend = ema(closes, this.period).at(-1);
    const close = closes.at(-1);
    if (trend === undefined || close === undefined) return { allowed: true };

    return { allowed: event.direction === 'BULLISH' ? close > trend : close < trend };
  }
}

/** Blocks signals while the absolute funding rate is above `maxAbsPercent`. */
export class FundingRateGate implements SignalGate {
  name = 'funding';

  constructor(
    private readonly source: FundingRateSource,
    private readonly maxAbsPercent: number,
  ) {}

  async check(event: SignalEvent): Promise<GateVerdict> {
    let rate: number | null;
    try {
      rate = await this.source.fetchFundingRate(event.symbol);
    } catch (error) {
      log.warn({ err: error, symbol: event.symbol }, 'Funding rate fetch failed, letting signal through');
      return { allowed: true };
    }
    if (rate === null) return { allowed: true };

    return { allowed: Math.abs(rate) <= this.maxAbsPercent, note: `Funding: ${rate.toFixed(4)}%` };
  }
}

export function createGates(
  market: CandleSource & FundingRateSource,
  settings: Pick<ScannerSettings, 'requireHtfTrend' | 'higherTimeframe' | 'htfTrendPeriod' | 'fundingFilter' | 'maxAbsFunding'>,
): SignalGate[] {
  const gates: SignalGate[] = [];
  if (settings.requireHtfTrend) {
    gates.push(new HigherTimeframeTrendGate(market, settings.higherTimeframe, settings.htfTrendPeriod));
  }
  if (settings.fundingFilter) {
    gates.push(new FundingRateGate(market, settings.maxAbsFunding));
  }
  return gates;
}
