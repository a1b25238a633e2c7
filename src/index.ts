import fastify from 'fastify';
import cron from 'node-cron';
import { config } from './config.js';
import { CcxtMarketData, createExchange } from './exchange.js';
import { createGates } from './gates.js';
import { createChildLogger, logger } from './logger.js';
import { createNotifier } from './notifications/index.js';
import { EmaCrossPullback } from './signals/EmaCrossPullback.js';
import { parseTradeSetupParams } from './signals/params.js';
import { SignalStateStore } from './signals/SignalState.js';
import { announceStartup, resolveSymbols, runScanner, SymbolRotation, type ScannerContext } from './scanner.js';
import { parseScannerSettings } from './settings.js';
import { createShutdown } from './shutdown.js';
import { registerStatusRoutes } from './status.js';

const start = async () => {
  if (!cron.validate(config.CRON_SCHEDULE)) {
    throw new Error(`Invalid CRON_SCHEDULE "${config.CRON_SCHEDULE}"`);
  }

  const settings = parseScannerSettings(config);
  const detector = new EmaCrossPullback({
    fastPeriod: config.FAST_PERIOD,
    slowPeriod: config.SLOW_PERIOD,
    trendPeriod: config.TREND_PERIOD,
    atrPeriod: config.ATR_PERIOD,
    atrSmoothing: config.ATR_SMOOTHING,
    pullbackAtrMultiple: config.PULLBACK_ATR_MULTIPLE,
    minAdx: config.MIN_ADX,
    adxPeriod: config.ADX_PERIOD,
    volumeMultiple: config.VOLUME_MULTIPLE,
    volumePeriod: config.VOLUME_PERIOD,
    cooldownBars: config.COOLDOWN_BARS,
  });
  const tradeSetup = parseTradeSetupParams({
    leverage: config.LEVERAGE,
    riskAtr: config.RISK_ATR,
    pullLower: config.PULL_L,
    pullUpper: config.PULL_U,
    takeProfitMultiples: config.TP_MULT,
  });

  const market = new CcxtMarketData(createExchange(config.EXCHANGE));
  const notifier = createNotifier(config);
  const states = new SignalStateStore();

  const requestedHistory = settings.candleHistory;
  const candleLimit = Math.max(requestedHistory, detector.minimumCandles);
  if (candleLimit > requestedHistory) {
    logger.warn({ requestedHistory, candleLimit }, 'CANDLE_HISTORY_COUNT is below the detector warm-up, raising it');
  }

  const symbols = await resolveSymbols(market, settings);
  const ctx: ScannerContext = {
    candles: market,
    detector,
    states,
    notifier,
    rotation: new SymbolRotation(symbols, settings.scanBatch),
    timeframe: settings.timeframe,
    candleLimit,
    tradeSetup,
    gates: createGates(market, settings),
    quiet: settings.quiet,
  };

  const server = fastify({ logger: { level: config.LOG_LEVEL } });
  registerStatusRoutes(server, states, {
    exchange: market.id,
    timeframe: settings.timeframe,
    symbols: ctx.rotation.symbols,
    startedAt: Date.now(),
  });

  await server.listen({ port: settings.port, host: '0.0.0.0' });
  logger.info(
    { params: detector.params, notifier: notifier.name, gates: ctx.gates?.map((gate) => gate.name) },
    `Server listening on ${settings.port}`,
  );

  await announceStartup(ctx, settings.exchangeLabel);

  let running = false;
  const cycle = async () => {
    if (running) {
      logger.warn('Previous scan still running, skipping this tick');
      return;
    }
    running = true;
    try {
      await runScanner(ctx);
    } catch (error) {
      logger.error({ err: error }, 'Error running scanner');
    } finally {
      running = false;
    }
  };

  logger.info(`Scheduling scanner with cron: ${config.CRON_SCHEDULE}`);
  await cycle();
  const task = cron.schedule(config.CRON_SCHEDULE, cycle);

  const shutdown = createShutdown(task, server, createChildLogger('shutdown'));
  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.fatal({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.once('SIGINT', () => onSignal('SIGINT'));
  process.once('SIGTERM', () => onSignal('SIGTERM'));
};

start().catch((err) => {
  logger.fatal({ err }, 'Failed to start scanner');
  process.exit(1);
});
