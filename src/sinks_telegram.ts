import { Api } from 'grammy';
import { ok, miss, errorMessage, type Result } from './result.js';
import type { ParseMode, TelegramConfig } from './config/monitor.js';

type SendOptions = { parse_mode?: ParseMode; link_preview_options?: { is_disabled?: boolean } };
export type MessageApi = { sendMessage(chatId: number | string, text: string, other?: SendOptions): Promise<unknown> };

export type Notifier = {
  readonly parseMode?: ParseMode;
  send(text: string): Promise<Result<void>>;
};

export const disabledNotifier: Notifier = {
  send: async () => miss('disabled'),
};

export class TelegramNotifier implements Notifier {
  readonly parseMode?: ParseMode;

  constructor(private api: MessageApi, private chatId: string, parseMode?: ParseMode) {
    this.parseMode = parseMode;
  }

  async send(text: string): Promise<Result<void>> {
    try {
      await this.api.sendMessage(this.chatId, text, {
        link_preview_options: { is_disabled: true },
        ...(this.parseMode ? { parse_mode: this.parseMode } : {}),
      });
      return ok(undefined);
    } catch (e) {
      return miss('send_failed', new Error(errorMessage(e)));
    }
  }
}

export function createNotifier(cfg: TelegramConfig | null, timeoutMs = 10_000): Notifier {
  if (!cfg) return disabledNotifier;
  const api = new Api(cfg.botToken, { timeoutSeconds: Math.max(1, Math.ceil(timeoutMs / 1000)) });
  return new TelegramNotifier(api, cfg.chatId, cfg.parseMode);
}
