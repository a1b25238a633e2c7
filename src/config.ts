import dotenv from 'dotenv';

dotenv.config();

export type NotifierKind = 'discord' | 'telegram' | 'log';

export interface Config {
  // Market data
  EXCHANGE: string;
  EXCHANGE_LABEL: string;
  SYMBOLS: string[];
  AUTO_SYMBOLS: boolean;
  QUOTE_CURRENCY: string;
  TOP_N_MARKETS: string;
  MIN_VOLUME_24H: string;
  SCAN_BATCH: string;
  CANDLE_TIMEFRAME: string;
  CANDLE_HISTORY_COUNT: string;

  CRON_SCHEDULE: string;
  PORT: string;
  LOG_LEVEL: string;
  QUIET: boolean;

  // EmaCrossPullback detector
  FAST_PERIOD: string;
  SLOW_PERIOD: string;
  TREND_PERIOD: string;
  ATR_PERIOD: string;
  ATR_SMOOTHING: string;
  PULLBACK_ATR_MULTIPLE: string;
  MIN_ADX: string;
  ADX_PERIOD: string;
  VOLUME_MULTIPLE: string;
  VOLUME_PERIOD: string;
  COOLDOWN_BARS: string;

  // Gates checked after the detector fires
  REQUIRE_TREND_HTF: boolean;
  HTF: string;
  HTF_TREND_PERIOD: string;
  ENABLE_FUNDING_FILTER: boolean;
  MAX_ABS_FUNDING: string;

  // Trade setup printed with each signal
  LEVERAGE: string;
  RISK_ATR: string;
  PULL_L: string;
  PULL_U: string;
  TP_MULT: string[];

  NOTIFIER: NotifierKind;
  DISCORD_WEBHOOK_URL: string;
  SIGNAL_TITLE: string;
  TELEGRAM_BOT_TOKEN: string;
  TELEGRAM_CHAT_ID: string;
}

export function envBool(value: string | undefined, fallback = false): boolean {
  if (value === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function envList(value: string | undefined, fallback: string): string[] {
  return (value ?? fallback)
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseNotifierKind(value: string | undefined): NotifierKind {
  const kind = (value ?? 'log').trim().toLowerCase();
  if (kind === 'discord' || kind === 'telegram' || kind === 'log') {
    return kind;
  }
  throw new Error(`Unknown NOTIFIER "${value}". Expected discord, telegram or log.`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    EXCHANGE: (env.EXCHANGE || 'binance').trim().toLowerCase(),
    EXCHANGE_LABEL: (env.EXCHANGE_LABEL || '').trim(),
    SYMBOLS: envList(env.SYMBOLS, 'BTC/USDT'),
    AUTO_SYMBOLS: envBool(env.AUTO_SYMBOLS),
    QUOTE_CURRENCY: env.QUOTE_CURRENCY || 'USDT',
    TOP_N_MARKETS: env.TOP_N_MARKETS || '12',
    MIN_VOLUME_24H: env.MIN_VOLUME_24H || '0',
    SCAN_BATCH: env.SCAN_BATCH || '8',
    CANDLE_TIMEFRAME: env.CANDLE_TIMEFRAME || '5m',
    CANDLE_HISTORY_COUNT: env.CANDLE_HISTORY_COUNT || '400',

    CRON_SCHEDULE: env.CRON_SCHEDULE || '*/30 * * * * *',
    PORT: env.PORT || '3000',
    LOG_LEVEL: env.LOG_LEVEL || 'info',
    QUIET: envBool(env.QUIET),

    FAST_PERIOD: env.FAST_PERIOD || '5',
    SLOW_PERIOD: env.SLOW_PERIOD || '50',
    TREND_PERIOD: env.TREND_PERIOD || '200',
    ATR_PERIOD: env.ATR_PERIOD || '14',
    ATR_SMOOTHING: env.ATR_SMOOTHING || 'ema',
    PULLBACK_ATR_MULTIPLE: env.PULLBACK_ATR_MULTIPLE || '1.0',
    MIN_ADX: env.MIN_ADX || '0',
    ADX_PERIOD: env.ADX_PERIOD || '14',
    VOLUME_MULTIPLE: env.VOLUME_MULTIPLE || '0',
    VOLUME_PERIOD: env.VOLUME_PERIOD || '20',
    COOLDOWN_BARS: env.COOLDOWN_BARS || '0',

    REQUIRE_TREND_HTF: envBool(env.REQUIRE_TREND_HTF),
    HTF: env.HTF || '1h',
    HTF_TREND_PERIOD: env.HTF_TREND_PERIOD || '200',
    ENABLE_FUNDING_FILTER: envBool(env.ENABLE_FUNDING_FILTER),
    MAX_ABS_FUNDING: env.MAX_ABS_FUNDING || '0.05',

    LEVERAGE: env.LEVERAGE || '20',
    RISK_ATR: env.RISK_ATR || '2.2',
    PULL_L: env.PULL_L || '0.35',
    PULL_U: env.PULL_U || '0.20',
    TP_MULT: envList(env.TP_MULT, '0.8,1.6,2.4,3.5,4.2,5.0'),

    NOTIFIER: parseNotifierKind(env.NOTIFIER),
    DISCORD_WEBHOOK_URL: env.DISCORD_WEBHOOK_URL || '',
    SIGNAL_TITLE: env.SIGNAL_TITLE || 'EMA Pullback Signal',
    TELEGRAM_BOT_TOKEN: env.TELEGRAM_BOT_TOKEN || '',
    TELEGRAM_CHAT_ID: env.TELEGRAM_CHAT_ID || '',
  };
}

export const config: Config = loadConfig();
