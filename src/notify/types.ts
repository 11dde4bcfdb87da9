/**
 * Notification delivery types
 */

/**
 * Delivers one message to a list of recipients
 */
export interface Notifier {
  /**
   * Send the message to each recipient in order.
   * Rejects on the first failed delivery; later recipients are skipped.
   */
  notify(message: string, recipients: readonly string[]): Promise<void>;
}

/**
 * Telegram Bot API notifier configuration
 */
export interface TelegramNotifierConfig {
  /** Bot token; used only in the request path, never in errors or logs */
  token: string;
  /** API root without trailing slash, e.g. https://api.telegram.org */
  apiBase: string;
  /** Timeout per sendMessage call */
  timeoutMs: number;
}

/**
 * sendMessage request body
 */
export interface SendMessagePayload {
  chat_id: string;
  text: string;
  parse_mode: 'HTML';
  disable_web_page_preview: boolean;
}
