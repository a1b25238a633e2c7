import type { Candle } from './candles.js';
import type { CandleSource, SymbolSource } from './exchange.js';
import type { GateVerdict, SignalGate } from './gates.js';
import { createChildLogger } from './logger.js';
import type { Notifier } from './notifications/Notifier.js';
import type { ScannerSettings } from './settings.js';
import type { TradeSetupParams } from './signals/params.js';
import type { SignalDetector, SignalEvent } from './signals/SignalDetector.js';
import type { SignalStateStore } from './signals/SignalState.js';
import { buildTradeSetup } from './signals/tradeSetup.js';

const log = createChildLogger('scanner');

/** Round-robin over fixed-size symbol batches. Size 0 means one batch with everything. */
export class SymbolRotation {
  private readonly batches: string[][];
  private cursor = 0;

  constructor(symbols: readonly string[], batchSize: number) {
    const unique = [...new Set(symbols)];
    if (batchSize <= 0 || batchSize >= unique.length) {
      this.batches = [unique];
    } else {
      this.batches = [];
      for (let i = 0; i < unique.length; i += batchSize) {
        this.batches.push(unique.slice(i, i + batchSize));
      }
    }
  }

  get symbols(): string[] {
    return this.batches.flat();
  }

  next(): string[] {
    const batch = this.batches[this.cursor % this.batches.length];
    this.cursor = (this.cursor + 1) % this.batches.length;
    return batch;
  }
}

export interface ScannerContext {
  candles: CandleSource;
  detector: SignalDetector;
  states: SignalStateStore;
  notifier: Notifier;
  rotation: SymbolRotation;
  timeframe: string;
  candleLimit: number;
  tradeSetup: TradeSetupParams;
  /** Checked in order after the detector fires; any rejection drops the signal. */
  gates?: SignalGate[];
  /** Suppresses notifyInfo messages. */
  quiet?: boolean;
}

export interface ScanReport {
  scanned: string[];
  signals: SignalEvent[];
  failed: string[];
}

/**
 * Picks the symbols to watch. With AUTO_SYMBOLS the exchange's most liquid
 * pairs win; an empty or failed selection falls back to SYMBOLS.
 */
export async function resolveSymbols(
  source: SymbolSource,
  settings: Pick<ScannerSettings, 'symbols' | 'autoSymbols' | 'quoteCurrency' | 'topN' | 'minQuoteVolume'>,
): Promise<string[]> {
  if (!settings.autoSymbols) return settings.symbols;

  try {
    const picked = await source.topSymbols({
      quoteCurrency: settings.quoteCurrency,
      topN: settings.topN,
      minQuoteVolume: settings.minQuoteVolume,
    });
    if (picked.length > 0) return picked;
    log.warn('Auto symbol selection found no markets, using SYMBOLS');
  } catch (error) {
    log.error({ err: error }, 'Auto symbol selection failed, using SYMBOLS');
  }
  return settings.symbols;
}

async function sendInfo(ctx: ScannerContext, message: string): Promise<void> {
  if (ctx.quiet) return;
  try {
    await ctx.notifier.notifyInfo(message);
  } catch (error) {
    log.warn({ err: error }, 'Could not deliver info message');
  }
}

type SymbolOutcome = { status: 'signal'; event: SignalEvent } | { status: 'none' } | { status: 'failed' };

async function analyzeSymbol(ctx: ScannerContext, symbol: string): Promise<SymbolOutcome> {
  let candles: Candle[];
  try {
    candles = await ctx.candles.fetchCandles(symbol, ctx.timeframe, ctx.candleLimit);
  } catch (error) {
    log.error({ err: error, symbol }, 'Error fetching candles');
    return { status: 'failed' };
  }

  // the detector works on a copy so a gate can still veto the signal
  const state = ctx.states.get(symbol);
  const draft = { ...state };
  let event: SignalEvent | null;
  try {
    event = ctx.detector.detect({ symbol, timeframe: ctx.timeframe, candles }, draft);
  } catch (error) {
    log.error({ err: error, symbol, detector: ctx.detector.name }, 'Detector rejected input');
    return { status: 'failed' };
  }

  if (!event) {
    log.debug({ symbol, candles: candles.length }, 'No signal');
    return { status: 'none' };
  }

  const notes: string[] = [];
  for (const gate of ctx.gates ?? []) {
    let verdict: GateVerdict;
    try {
      verdict = await gate.check(event);
    } catch (error) {
      log.error({ err: error, symbol, gate: gate.name }, 'Signal gate failed');
      return { status: 'failed' };
    }
    if (verdict.note) notes.push(verdict.note);
    if (!verdict.allowed) {
      log.info({ symbol, direction: event.direction, gate: gate.name, note: verdict.note }, 'Signal blocked');
      return { status: 'none' };
    }
  }
  Object.assign(state, draft);

  log.info(
    { symbol, direction: event.direction, price: event.price, atr: event.atr, at: new Date(event.timestamp).toISOString() },
    `SIGNAL DETECTED for ${symbol} by ${ctx.detector.name}`,
  );

  const setup = buildTradeSetup(event, ctx.tradeSetup);
  try {
    await ctx.notifier.notifySignal(event, setup, notes);
    log.info({ symbol, notifier: ctx.notifier.name }, 'Signal sent');
  } catch (error) {
    log.error({ err: error, symbol, notifier: ctx.notifier.name }, 'Error sending signal notification');
  }
  return { status: 'signal', event };
}

/** One scan cycle over the next batch of symbols. Never rejects. */
export async function runScanner(ctx: ScannerContext): Promise<ScanReport> {
  const batch = ctx.rotation.next();
  log.info({ symbols: batch.length }, `Scanner triggered at ${new Date().toISOString()}`);

  const report: ScanReport = { scanned: [], signals: [], failed: [] };
  for (const symbol of batch) {
    const outcome = await analyzeSymbol(ctx, symbol);
    report.scanned.push(symbol);
    if (outcome.status === 'signal') report.signals.push(outcome.event);
    if (outcome.status === 'failed') report.failed.push(symbol);
  }

  if (report.failed.length > 0) {
    await sendInfo(ctx, `Error: could not scan ${report.failed.join(', ')}`);
  }

  log.info({ scanned: report.scanned.length, signals: report.signals.length, failed: report.failed.length }, 'Scanner finished');
  return report;
}

export async function announceStartup(ctx: ScannerContext, exchangeLabel: string): Promise<void> {
  await sendInfo(
    ctx,
    `Started scanner on **${exchangeLabel}** | TF **${ctx.timeframe}** | Symbols: ${ctx.rotation.symbols.join(', ')}`,
  );
}
