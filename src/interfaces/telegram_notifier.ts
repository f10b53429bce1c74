import TelegramBot from 'node-telegram-bot-api';
import { logError } from '../utils/logger.js';
import type { NotifyResult } from '../types/metadata.js';
import type { Notifier } from './notifier.js';

/** Minimum ms delay between successive messages, under Telegram's per-chat limit. */
const RATE_LIMIT_MS = 1000;

/**
 * Sends summaries to one Telegram chat via the Bot API.
 *
 * The bot is send-only: polling is disabled, so no updates are consumed.
 */
export class TelegramNotifier implements Notifier {
  readonly channel = 'telegram';
  readonly #bot: TelegramBot;
  readonly #chatId: string;
  readonly #rateLimitMs: number;
  #lastMessageAt: number = 0;

  /**
   * @param token  - Bot token from @BotFather (TELEGRAM_BOT_TOKEN).
   * @param chatId - Target chat (TELEGRAM_CHAT_ID).
   */
  constructor(token: string, chatId: string, rateLimitMs: number = RATE_LIMIT_MS) {
    this.#bot = new TelegramBot(token, { polling: false });
    this.#chatId = chatId;
    this.#rateLimitMs = rateLimitMs;
  }

  async notify(summaryText: string): Promise<NotifyResult> {
    await this.#applyRateLimit();

    try {
      await this.#bot.sendMessage(this.#chatId, summaryText, {
        parse_mode: 'HTML',
        disable_web_page_preview: true,
      });
      return { ok: true };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      await logError(`[TelegramNotifier] Failed to send message: ${message}`);
      return { ok: false, errorMessage: message };
    }
  }

  // ── Private Helpers ──────────────────────────────────────────────────────────

  async #applyRateLimit(): Promise<void> {
    const elapsed = Date.now() - this.#lastMessageAt;
    if (elapsed < this.#rateLimitMs) {
      await new Promise<void>((resolve) =>
        setTimeout(resolve, this.#rateLimitMs - elapsed),
      );
    }
    this.#lastMessageAt = Date.now();
  }
}
