import * as ccxt from 'ccxt';
import { closedCandles, toCandles, type Candle } from './candles.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('exchange');

export interface CandleSource {
  /** Closed candles only, oldest first. */
  fetchCandles(symbol: string, timeframe: string, limit: number): Promise<Candle[]>;
}

export interface MarketFilter {
  quoteCurrency: string;
  topN: number;
  minQuoteVolume: number;
}

export interface SymbolSource {
  /** Most liquid symbols quoted in `quoteCurrency`, by 24h quote volume. */
  topSymbols(filter: MarketFilter): Promise<string[]>;
}

export interface FundingRateSource {
  /** Current funding rate in percent, or null when the market has none. */
  fetchFundingRate(symbol: string): Promise<number | null>;
}

export type MarketData = CandleSource & SymbolSource & FundingRateSource;

type ExchangeClass = new (userConfig?: { enableRateLimit?: boolean }) => ccxt.Exchange;

const AVAILABLE_EXCHANGES: { [id: string]: ExchangeClass } = {
  binance: ccxt.binance,
  bybit: ccxt.bybit,
  okx: ccxt.okx,
  kraken: ccxt.kraken,
  kucoin: ccxt.kucoin,
  hyperliquid: ccxt.hyperliquid,
  blofin: ccxt.blofin,
};

export function createExchange(id: string): ccxt.Exchange {
  const ExchangeCtor = AVAILABLE_EXCHANGES[id];
  if (!ExchangeCtor) {
    const known = Object.keys(AVAILABLE_EXCHANGES).join(', ');
    throw new Error(`Exchange "${id}" is not supported. Use one of: ${known}`);
  }
  return new ExchangeCtor({ enableRateLimit: true });
}

function quoteOf(symbol: string): string {
  // 'ENA/USDT' -> 'USDT', 'BTC/USDT:USDT' -> 'USDT'
  return symbol.split('/')[1]?.split(':')[0] ?? '';
}

type TickerVolume = Pick<ccxt.Ticker, 'symbol' | 'quoteVolume'>;

function hasSymbol(ticker: TickerVolume | undefined): ticker is TickerVolume & { symbol: string } {
  return typeof ticker?.symbol === 'string';
}

export function selectTopSymbols(tickers: ReadonlyArray<TickerVolume | undefined>, filter: MarketFilter): string[] {
  const quote = filter.quoteCurrency.toUpperCase();
  const ranked = tickers
    .filter(hasSymbol)
    .filter((ticker) => quoteOf(ticker.symbol).toUpperCase() === quote)
    .map((ticker) => ({ symbol: ticker.symbol, volume: ticker.quoteVolume ?? 0 }))
    .filter((entry) => entry.volume >= filter.minQuoteVolume);

  ranked.sort((a, b) => b.volume - a.volume);
  const limited = filter.topN > 0 ? ranked.slice(0, filter.topN) : ranked;
  return limited.map((entry) => entry.symbol);
}

/** The part of a ccxt exchange the scanner talks to. */
export type ExchangeClient = Pick<ccxt.Exchange, 'id' | 'has' | 'fetchOHLCV' | 'fetchTickers' | 'fetchFundingRate'>;

export class CcxtMarketData implements MarketData {
  constructor(
    private readonly exchange: ExchangeClient,
    private readonly now: () => number = Date.now,
  ) {}

  get id(): string {
    return this.exchange.id;
  }

  async fetchCandles(symbol: string, timeframe: string, limit: number): Promise<Candle[]> {
    // one extra row because the still-open candle gets dropped
    const ohlcv = await this.exchange.fetchOHLCV(symbol, timeframe, undefined, limit + 1);
    const candles = closedCandles(toCandles(ohlcv), timeframe, this.now());
    return candles.slice(-limit);
  }

  async topSymbols(filter: MarketFilter): Promise<string[]> {
    const tickers = Object.values(await this.exchange.fetchTickers());
    const symbols = selectTopSymbols(tickers, filter);
    log.debug({ exchange: this.exchange.id, count: symbols.length }, 'Selected top symbols');
    return symbols;
  }

  async fetchFundingRate(symbol: string): Promise<number | null> {
    if (!this.exchange.has['fetchFundingRate']) return null;
    const { fundingRate } = await this.exchange.fetchFundingRate(symbol);
    if (typeof fundingRate !== 'number' || !Number.isFinite(fundingRate)) return null;
    // ccxt reports a fraction; some venues already send percent
    return Math.abs(fundingRate) < 1 ? fundingRate * 100 : fundingRate;
  }
}
