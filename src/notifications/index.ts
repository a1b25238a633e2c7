import { Telegraf } from 'telegraf';
import type { Config } from '../config.js';
import { DiscordNotifier } from './DiscordNotifier.js';
import { LogNotifier } from './LogNotifier.js';
import type { Notifier } from './Notifier.js';
import { TelegramNotifier } from './TelegramNotifier.js';

export type { Notifier } from './Notifier.js';

export function createNotifier(config: Config): Notifier {
  switch (config.NOTIFIER) {
    case 'discord':
      return new DiscordNotifier({ webhookUrl: config.DISCORD_WEBHOOK_URL, title: config.SIGNAL_TITLE });
    case 'telegram': {
      if (!config.TELEGRAM_BOT_TOKEN) {
        throw new Error('TELEGRAM_BOT_TOKEN is required for the telegram notifier');
      }
      const bot = new Telegraf(config.TELEGRAM_BOT_TOKEN);
      return new TelegramNotifier(bot.telegram, config.TELEGRAM_CHAT_ID);
    }
    case 'log':
      return new LogNotifier();
  }
}
