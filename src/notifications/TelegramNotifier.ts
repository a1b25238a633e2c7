import type { Telegram } from 'telegraf';
import type { SignalEvent } from '../signals/SignalDetector.js';
import type { TradeSetup } from '../signals/tradeSetup.js';
import { formatPrice, quoteCurrency } from './format.js';
import type { Notifier } from './Notifier.js';

/** Escapes the characters legacy Telegram Markdown treats as markup. */
export function escapeMarkdown(text: string): string {
  return text.replace(/[_*`[]/g, '\\$&');
}

export function buildTelegramMessage(event: SignalEvent, setup: TradeSetup, notes: readonly string[] = []): string {
  const currency = quoteCurrency(event.symbol);
  const header = setup.side === 'LONG' ? '🟢 *LONG SIGNAL*' : '🔴 *SHORT SIGNAL*';
  const targets = setup.takeProfits.map((tp, i) => `${i + 1}. ${formatPrice(tp)}`).join('\n');

  return [
    header,
    '',
    `*Market:* ${escapeMarkdown(event.symbol)} (${escapeMarkdown(event.timeframe)})`,
    `*Leverage:* Cross (${setup.leverage}x)`,
    `*Entry (${escapeMarkdown(currency)}):* ${formatPrice(setup.entryLow)} - ${formatPrice(setup.entryHigh)}`,
    `*Targets:*`,
    targets,
    `*Stop loss:* ${formatPrice(setup.stopLoss)}`,
    ...notes.map(escapeMarkdown),
  ].join('\n');
}

export class TelegramNotifier implements Notifier {
  name = 'telegram';

  constructor(
    private readonly telegram: Pick<Telegram, 'sendMessage'>,
    private readonly chatId: string,
  ) {
    if (!chatId) {
      throw new Error('TELEGRAM_CHAT_ID is required for the telegram notifier');
    }
  }

  async notifySignal(event: SignalEvent, setup: TradeSetup, notes: readonly string[] = []): Promise<void> {
    await this.telegram.sendMessage(this.chatId, buildTelegramMessage(event, setup, notes), { parse_mode: 'Markdown' });
  }

  async notifyInfo(message: string): Promise<void> {
    await this.telegram.sendMessage(this.chatId, message);
  }
}
