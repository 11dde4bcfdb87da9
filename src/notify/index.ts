/**
 * Notification module barrel export
 */

export { createTelegramNotifier, buildSendMessagePayload } from './telegram/telegram-notifier';

export type { Notifier, TelegramNotifierConfig, SendMessagePayload } from './types';
