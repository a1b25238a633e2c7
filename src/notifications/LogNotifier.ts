import { createChildLogger, type Logger } from '../logger.js';
import type { SignalEvent } from '../signals/SignalDetector.js';
import type { TradeSetup } from '../signals/tradeSetup.js';
import type { Notifier } from './Notifier.js';

/** Writes signals to the log instead of a chat channel. Handy for dry runs. */
export class LogNotifier implements Notifier {
  name = 'log';

  constructor(private readonly log: Logger = createChildLogger('signals')) {}

  async notifySignal(event: SignalEvent, setup: TradeSetup, notes: readonly string[] = []): Promise<void> {
    this.log.info({ event, setup, notes }, `${setup.side} ${event.symbol} @ ${event.price}`);
  }

  async notifyInfo(message: string): Promise<void> {
    this.log.info(message);
  }
}
