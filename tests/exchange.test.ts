import { describe, it, expect, vi } from 'vitest';
import { CcxtMarketData, createExchange, selectTopSymbols } from '../src/exchange.js';
import { FIVE_MINUTES } from './fixtures.js';

describe('selectTopSymbols', () => {
  const tickers = [
    { symbol: 'BTC/USDT', quoteVolume: 900 },
    { symbol: 'ETH/USDT', quoteVolume: 700 },
    { symbol: 'DOGE/USDT:USDT', quoteVolume: 800 },
    { symbol: 'ETH/BTC', quoteVolume: 5000 },
    { symbol: 'PEPE/USDT', quoteVolume: 50 },
    { symbol: 'NEW/USDT', quoteVolume: undefined },
  ];

  it('ranks symbols in the quote currency by volume', () => {
    const picked = selectTopSymbols(tickers, { quoteCurrency: 'usdt', topN: 3, minQuoteVolume: 0 });
    expect(picked).toEqual(['BTC/USDT', 'DOGE/USDT:USDT', 'ETH/USDT']);
  });

  it('drops symbols below the minimum volume and keeps all when topN is 0', () => {
    const picked = selectTopSymbols(tickers, { quoteCurrency: 'USDT', topN: 0, minQuoteVolume: 100 });
    expect(picked).toEqual(['BTC/USDT', 'DOGE/USDT:USDT', 'ETH/USDT']);
  });

  it('skips tickers without a symbol', () => {
    const picked = selectTopSymbols(
      [{ symbol: undefined, quoteVolume: 5 }, undefined, { symbol: 'BTC/USDT', quoteVolume: 10 }],
      { quoteCurrency: 'USDT', topN: 0, minQuoteVolume: 0 },
    );
    expect(picked).toEqual(['BTC/USDT']);
  });
});

describe('createExchange', () => {
  it('rejects exchanges outside the supported list', () => {
    expect(() => createExchange('mtgox')).toThrow(/not supported/);
  });
});

describe('CcxtMarketData', () => {
  const rows = [0, 1, 2, 3, 4].map((i) => [i * FIVE_MINUTES, 1, 2, 0.5, 1.5, 10]);

  function fakeExchange(fundingRate: number | null = 0.0001) {
    return {
      id: 'fake',
      has: { fetchFundingRate: true },
      fetchFundingRate: vi.fn().mockResolvedValue({ symbol: 'BTC/USDT:USDT', fundingRate }),
      fetchOHLCV: vi.fn().mockResolvedValue(rows),
      fetchTickers: vi.fn().mockResolvedValue({
        'BTC/USDT': { symbol: 'BTC/USDT', quoteVolume: 10 },
        'ETH/USDT': { symbol: 'ETH/USDT', quoteVolume: 20 },
      }),
    };
  }

  it('returns the requested number of closed candles', async () => {
    const exchange = fakeExchange();
    // candle 4 opened at 1_200_000 and is still forming at 1_400_000
    const market = new CcxtMarketData(exchange, () => 1_400_000);

    const candles = await market.fetchCandles('BTC/USDT', '5m', 3);

    expect(exchange.fetchOHLCV).toHaveBeenCalledWith('BTC/USDT', '5m', undefined, 4);
    expect(candles.map((c) => c.openTime)).toEqual([FIVE_MINUTES, 2 * FIVE_MINUTES, 3 * FIVE_MINUTES]);
  });

  it('selects top symbols from the tickers', async () => {
    const market = new CcxtMarketData(fakeExchange());
    const symbols = await market.topSymbols({ quoteCurrency: 'USDT', topN: 1, minQuoteVolume: 0 });
    expect(symbols).toEqual(['ETH/USDT']);
    expect(market.id).toBe('fake');
  });

  it('reports funding rates in percent', async () => {
    const exchange = fakeExchange(0.0001);
    const market = new CcxtMarketData(exchange);

    expect(await market.fetchFundingRate('BTC/USDT:USDT')).toBeCloseTo(0.01, 10);
    expect(exchange.fetchFundingRate).toHaveBeenCalledWith('BTC/USDT:USDT');
  });

  it('has no funding rate when the exchange does not support it', async () => {
    const exchange = { ...fakeExchange(), has: { fetchFundingRate: false } };
    const market = new CcxtMarketData(exchange);

    expect(await market.fetchFundingRate('BTC/USDT')).toBeNull();
    expect(exchange.fetchFundingRate).not.toHaveBeenCalled();
  });

  it('has no funding rate when the exchange returns none', async () => {
    const market = new CcxtMarketData(fakeExchange(null));
    expect(await market.fetchFundingRate('BTC/USDT:USDT')).toBeNull();
  });
});
