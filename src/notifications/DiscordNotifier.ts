import { setTimeout as sleep } from 'node:timers/promises';
import { createChildLogger } from '../logger.js';
import type { SignalEvent } from '../signals/SignalDetector.js';
import type { TradeSetup } from '../signals/tradeSetup.js';
import { formatPrice, quoteCurrency, targetLabel } from './format.js';
import type { Notifier } from './Notifier.js';

const log = createChildLogger('discord');

const LONG_COLOR = 0x00c853;
const SHORT_COLOR = 0xd32f2f;

export interface DiscordNotifierOptions {
  webhookUrl: string;
  title: string;
  maxAttempts?: number;
  retryDelayMs?: number;
}

interface DiscordEmbed {
  title: string;
  description: string;
  color?: number;
}

export function buildSignalDescription(event: SignalEvent, setup: TradeSetup, notes: readonly string[] = []): string {
  const currency = quoteCurrency(event.symbol);
  const lines: string[] = [];
  lines.push(setup.side === 'LONG' ? '🟢 **Long**\n' : '🔴 **Short**\n');
  lines.push(`**Name:** ${event.symbol}`);
  lines.push(`**Leverage:** Cross (${setup.leverage}x)\n`);
  lines.push(`🌀 **Entry Price (${currency})**: ${formatPrice(setup.entryLow)} – ${formatPrice(setup.entryHigh)}`);
  lines.push(`\n🎯 **Targets in ${currency}:**`);
  setup.takeProfits.forEach((tp, i) => lines.push(`${targetLabel(i)} ${formatPrice(tp)}`));
  lines.push(`\n🛑 **StopLoss:** ${formatPrice(setup.stopLoss)}`);
  lines.push(`\n- TF: ${event.timeframe}`);
  notes.forEach((note) => lines.push(`\n- Info: ${note}`));
  return lines.join('\n');
}

/** Posts embeds to a Discord webhook, retrying failed posts with backoff. */
export class DiscordNotifier implements Notifier {
  name = 'discord';
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;

  constructor(private readonly options: DiscordNotifierOptions) {
    if (!options.webhookUrl) {
      throw new Error('DISCORD_WEBHOOK_URL is required for the discord notifier');
    }
    this.maxAttempts = options.maxAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async notifySignal(event: SignalEvent, setup: TradeSetup, notes: readonly string[] = []): Promise<void> {
    await this.post({
      title: this.options.title,
      description: buildSignalDescription(event, setup, notes),
      color: setup.side === 'LONG' ? LONG_COLOR : SHORT_COLOR,
    });
  }

  async notifyInfo(message: string): Promise<void> {
    await this.post({ title: 'Signals Bot', description: message });
  }

  private async post(embed: DiscordEmbed): Promise<void> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const res = await fetch(this.options.webhookUrl, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ embeds: [embed] }),
          signal: AbortSignal.timeout(10_000),
        });
        if (res.ok) return;
        const body = await res.text().catch(() => '');
        lastError = new Error(`Discord webhook responded ${res.status}: ${body}`);
      } catch (err) {
        lastError = err;
      }
      log.warn({ attempt, err: lastError }, 'Discord webhook post failed');
      if (attempt < this.maxAttempts) {
        await sleep(this.retryDelayMs * 2 ** (attempt - 1));
      }
    }
    throw lastError instanceof Error ? lastError : new Error('Discord webhook post failed');
  }
}
