import TelegramBot from 'node-telegram-bot-api';
import type { SinkFeed } from '../types/ports.js';
import type { OutboundPayload } from '../types/relay.js';

/** Subset of the Bot API client the sink calls; lets tests pass a stand-in. */
export type TelegramSendApi = Pick<TelegramBot, 'sendMessage' | 'sendPhoto'>;

/**
 * Delivers rendered payloads through the Telegram Bot API:
 *   - the main text, then every extra chunk, with the payload's parse mode
 *   - each image URL as a separate photo
 *   - everything into the mapping's forum topic when one is configured
 *
 * The bot never polls; inbound traffic belongs to the admin collaborator.
 */
export class TelegramSink implements SinkFeed {
  readonly #bot: TelegramSendApi;

  /**
   * @param bot - Bot API token (TELEGRAM_BOT_TOKEN) or an already built client.
   */
  constructor(bot: string | TelegramSendApi) {
    this.#bot = typeof bot === 'string' ? new TelegramBot(bot, { polling: false }) : bot;
  }

  async send(destinationId: string, payload: OutboundPayload, threadId: number | null): Promise<void> {
    const topic = threadId === null ? {} : { message_thread_id: threadId };
    const textOptions: TelegramBot.SendMessageOptions = {
      ...topic,
      disable_web_page_preview: payload.disablePreview,
      ...(payload.parseMode ? { parse_mode: payload.parseMode } : {}),
    };

    if (payload.text) {
      await this.#bot.sendMessage(destinationId, payload.text, textOptions);
    }
    for (const extra of payload.extraMessages) {
      await this.#bot.sendMessage(destinationId, extra, textOptions);
    }
    for (const url of payload.imageUrls) {
      await this.#bot.sendPhoto(destinationId, url, { ...topic });
    }
  }
}
