import { z } from 'zod';
import { isTimeframe } from './candles.js';
import type { Config } from './config.js';
import { InvalidParameterError } from './errors.js';
import { describeIssues } from './signals/params.js';

const count = z.coerce.number().int().nonnegative();
const amount = z.coerce.number().finite().nonnegative();
const timeframe = z.string().refine(isTimeframe, 'Unsupported timeframe');

export const scannerSettingsSchema = z.object({
  exchangeLabel: z.string().min(1),
  symbols: z.array(z.string().min(1)).min(1),
  autoSymbols: z.boolean(),
  quoteCurrency: z.string().min(1),
  topN: count,
  minQuoteVolume: amount,
  // 0 scans every symbol each cycle
  scanBatch: count,
  timeframe,
  candleHistory: z.coerce.number().int().positive(),
  port: z.coerce.number().int().min(1).max(65_535),
  quiet: z.boolean(),

  requireHtfTrend: z.boolean(),
  higherTimeframe: timeframe,
  htfTrendPeriod: z.coerce.number().int().positive(),
  fundingFilter: z.boolean(),
  // percent
  maxAbsFunding: amount,
});

export type ScannerSettings = z.infer<typeof scannerSettingsSchema>;

/** Validates everything the scanner reads from Config besides the detector and trade setup params. */
export function parseScannerSettings(config: Config): ScannerSettings {
  const result = scannerSettingsSchema.safeParse({
    exchangeLabel: config.EXCHANGE_LABEL || config.EXCHANGE,
    symbols: config.SYMBOLS,
    autoSymbols: config.AUTO_SYMBOLS,
    quoteCurrency: config.QUOTE_CURRENCY,
    topN: config.TOP_N_MARKETS,
    minQuoteVolume: config.MIN_VOLUME_24H,
    scanBatch: config.SCAN_BATCH,
    timeframe: config.CANDLE_TIMEFRAME,
    candleHistory: config.CANDLE_HISTORY_COUNT,
    port: config.PORT,
    quiet: config.QUIET,
    requireHtfTrend: config.REQUIRE_TREND_HTF,
    higherTimeframe: config.HTF,
    htfTrendPeriod: config.HTF_TREND_PERIOD,
    fundingFilter: config.ENABLE_FUNDING_FILTER,
    maxAbsFunding: config.MAX_ABS_FUNDING,
  });
  if (!result.success) {
    throw new InvalidParameterError(`Invalid scanner settings: ${describeIssues(result.error)}`);
  }
  return result.data;
}
