import { describe, it, expect } from 'vitest';
import { InvalidParameterError } from '../src/errors.js';
import { parseTradeSetupParams } from '../src/signals/params.js';
import type { SignalEvent } from '../src/signals/SignalDetector.js';
import { buildTradeSetup } from '../src/signals/tradeSetup.js';

function event(direction: SignalEvent['direction']): SignalEvent {
  return {
    symbol: 'SOL/USDT',
    timeframe: '5m',
    timestamp: 0,
    direction,
    price: 100,
    emaFast: 99.8,
    emaSlow: 99.5,
    emaTrend: 95,
    atr: 2,
  };
}

describe('buildTradeSetup', () => {
  const params = parseTradeSetupParams();

  it('places a long entry zone below the close with targets above', () => {
    const setup = buildTradeSetup(event('BULLISH'), params);
    expect(setup.side).toBe('LONG');
    expect(setup.leverage).toBe(20);
    expect(setup.entryLow).toBeCloseTo(99.3, 10);
    expect(setup.entryHigh).toBeCloseTo(99.6, 10);
    expect(setup.stopLoss).toBeCloseTo(95.6, 10);
    const expected = [101.6, 103.2, 104.8, 107, 108.4, 110];
    setup.takeProfits.forEach((tp, i) => expect(tp).toBeCloseTo(expected[i], 10));
    expect(setup.takeProfits).toHaveLength(6);
  });

  it('mirrors the levels for a short', () => {
    const setup = buildTradeSetup(event('BEARISH'), params);
    expect(setup.side).toBe('SHORT');
    expect(setup.entryLow).toBeCloseTo(100.4, 10);
    expect(setup.entryHigh).toBeCloseTo(100.7, 10);
    expect(setup.stopLoss).toBeCloseTo(104.4, 10);
    expect(setup.takeProfits[0]).toBeCloseTo(98.4, 10);
    expect(setup.takeProfits[5]).toBeCloseTo(90, 10);
  });
});

describe('parseTradeSetupParams', () => {
  it('coerces values read from the environment', () => {
    const params = parseTradeSetupParams({ leverage: '10', riskAtr: '1.5', takeProfitMultiples: ['1', '2.5'] });
    expect(params).toEqual({ leverage: 10, riskAtr: 1.5, pullLower: 0.35, pullUpper: 0.2, takeProfitMultiples: [1, 2.5] });
  });

  it('rejects a zero leverage and negative multiples', () => {
    expect(() => parseTradeSetupParams({ leverage: '0' })).toThrow(InvalidParameterError);
    expect(() => parseTradeSetupParams({ takeProfitMultiples: ['-1'] })).toThrow(/takeProfitMultiples/);
  });
});
