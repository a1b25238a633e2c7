import type { SignalEvent } from '../signals/SignalDetector.js';
import type { TradeSetup } from '../signals/tradeSetup.js';

export interface Notifier {
  name: string;
  /**
   * Delivers one confirmed signal, with optional extra lines such as the
   * funding rate. Rejects when delivery finally fails.
   */
  notifySignal(event: SignalEvent, setup: TradeSetup, notes?: readonly string[]): Promise<void>;
  /** Operational messages: startup banner, cycle errors. */
  notifyInfo(message: string): Promise<void>;
}
