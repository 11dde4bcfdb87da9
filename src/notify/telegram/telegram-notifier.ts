/**
 * Telegram Bot API notifier
 *
 * Posts HTML messages with sendMessage, one request per chat, in order.
 * The first failure stops delivery; there is no retry or buffering.
 */

import { NotificationError } from '$types/errors';

import type { Logger } from '@logging';
import type { Notifier, SendMessagePayload, TelegramNotifierConfig } from '../types';

/**
 * Build the sendMessage body for one chat
 * @param chatId - Recipient chat id
 * @param text - HTML message
 * @returns Request payload
 */
export function buildSendMessagePayload(chatId: string, text: string): SendMessagePayload {
  return {
    chat_id: chatId,
    text: text,
    parse_mode: 'HTML',
    disable_web_page_preview: true,
  };
}

/**
 * Create a Telegram notifier
 *
 * @param config - Token, API root and per-request timeout
 * @param logger - Logger for delivery confirmations
 * @returns Notifier instance
 *
 * @example
 * ```typescript
 * const notifier = createTelegramNotifier({
 *   token: 'test-secret',
 *   apiBase: 'https://api.telegram.org',
 *   timeoutMs: 20000
 * }, logger);
 * await notifier.notify('<b>hello</b>', ['1001', '1002']);
 * ```
 */
export function createTelegramNotifier(config: TelegramNotifierConfig, logger: Logger): Notifier {
  const endpoint = config.apiBase.replace(/\/+$/, '') + '/bot' + config.token + '/sendMessage';

  async function send(chatId: string, text: string): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), config.timeoutMs);

    try {
      const response = await fetch(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(buildSendMessagePayload(chatId, text)),
        signal: controller.signal,
      });

      // The reply body is never read; release the connection
      await response.body?.cancel();

      if (!response.ok) {
        throw new NotificationError(chatId, 'HTTP ' + response.status + ': ' + response.statusText, response.status);
      }
    } catch (error) {
      if (error instanceof NotificationError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new NotificationError(chatId, 'Request timeout after ' + config.timeoutMs + 'ms');
      }
      // Network errors may echo the request URL, which carries the token
      const reason = error instanceof Error ? error.message : String(error);
      throw new NotificationError(chatId, reason.split(config.token).join('***'));
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async function notify(message: string, recipients: readonly string[]): Promise<void> {
    for (const chatId of recipients) {
      await send(chatId, message);
      logger.info('Telegram message sent to ' + chatId);
    }
  }

  return {
    notify: notify,
  };
}
