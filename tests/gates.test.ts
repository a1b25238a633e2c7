import { describe, it, expect, vi } from 'vitest';
import type { Candle } from '../src/candles.js';
import { createGates, FundingRateGate, HigherTimeframeTrendGate } from '../src/gates.js';
import type { SignalEvent } from '../src/signals/SignalDetector.js';
import { makeCandle } from './fixtures.js';

const ONE_HOUR = 3_600_000;

const bullish: SignalEvent = {
  symbol: 'BTC/USDT',
  timeframe: '5m',
  timestamp: 0,
  direction: 'BULLISH',
  price: 100,
  emaFast: 99.8,
  emaSlow: 99.5,
  emaTrend: 95,
  atr: 1,
};
const bearish: SignalEvent = { ...bullish, direction: 'BEARISH' };

/** `count` flat hourly candles at 100, with the last close replaced by `lastClose`. */
function hourly(count: number, lastClose: number): Candle[] {
  return Array.from({ length: count }, (_, i) => {
    const close = i === count - 1 ? lastClose : 100;
    return makeCandle(100, Math.max(100, close) + 1, Math.min(100, close) - 1, close, i * ONE_HOUR);
  });
}

function candleSource(candles: Candle[] | Error) {
  return {
    fetchCandles: vi.fn(async () => {
      if (candles instanceof Error) throw candles;
      return candles;
    }),
  };
}

describe('HigherTimeframeTrendGate', () => {
  it('fetches enough history for the trend EMA', async () => {
    const source = candleSource(hourly(10, 100));
    await new HigherTimeframeTrendGate(source, '1h', 5).check(bullish);
    expect(source.fetchCandles).toHaveBeenCalledWith('BTC/USDT', '1h', 105);
  });

  it('allows longs above the trend and blocks them below', async () => {
    // with a 5-period EMA over nine closes of 100 and one of 110, the EMA ends at 100 + 10/3
    expect(await new HigherTimeframeTrendGate(candleSource(hourly(10, 110)), '1h', 5).check(bullish)).toEqual({
      allowed: true,
    });
    expect(await new HigherTimeframeTrendGate(candleSource(hourly(10, 90)), '1h', 5).check(bullish)).toEqual({
      allowed: false,
    });
  });

  it('mirrors the check for shorts', async () => {
    expect((await new HigherTimeframeTrendGate(candleSource(hourly(10, 90)), '1h', 5).check(bearish)).allowed).toBe(true);
    expect((await new HigherTimeframeTrendGate(candleSource(hourly(10, 110)), '1h', 5).check(bearish)).allowed).toBe(false);
  });

  it('lets the signal through without enough history', async () => {
    const gate = new HigherTimeframeTrendGate(candleSource(hourly(4, 90)), '1h', 5);
    expect(await gate.check(bullish)).toEqual({ allowed: true });
  });

  it('lets the signal through when the fetch fails', async () => {
    const gate = new HigherTimeframeTrendGate(candleSource(new Error('timeout')), '1h');
    expect(await gate.check(bullish)).toEqual({ allowed: true });
  });
});

describe('FundingRateGate', () => {
  function fundingSource(rate: number | null | Error) {
    return {
      fetchFundingRate: vi.fn(async () => {
        if (rate instanceof Error) throw rate;
        return rate;
      }),
    };
  }

  it('allows a funding rate within the limit and notes it', async () => {
    expect(await new FundingRateGate(fundingSource(0.01), 0.05).check(bullish)).toEqual({
      allowed: true,
      note: 'Funding: 0.0100%',
    });
  });

  it('blocks a funding rate above the limit in either direction', async () => {
    expect(await new FundingRateGate(fundingSource(-0.08), 0.05).check(bullish)).toEqual({
      allowed: false,
      note: 'Funding: -0.0800%',
    });
  });

  it('lets the signal through when no rate is available', async () => {
    expect(await new FundingRateGate(fundingSource(null), 0.05).check(bullish)).toEqual({ allowed: true });
    expect(await new FundingRateGate(fundingSource(new Error('down')), 0.05).check(bullish)).toEqual({ allowed: true });
  });
});

describe('createGates', () => {
  const market = { ...candleSource([]), fetchFundingRate: vi.fn(async () => null) };
  const off = { requireHtfTrend: false, higherTimeframe: '1h', htfTrendPeriod: 200, fundingFilter: false, maxAbsFunding: 0.05 };

  it('builds no gates by default', () => {
    expect(createGates(market, off)).toEqual([]);
  });

  it('builds the enabled gates in order', () => {
    const gates = createGates(market, { ...off, requireHtfTrend: true, fundingFilter: true });
    expect(gates.map((gate) => gate.name)).toEqual(['htfTrend', 'funding']);
  });
});
