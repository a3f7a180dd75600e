import type { BaseLogger } from 'pino';
import type { ChannelOutcome } from '../../domain/index.js';
import type { NotificationConfig } from './config.js';
import { describeError } from './http.js';

export function telegramSendMessageUrl(apiUrl: string, botToken: string): string {
  return `${apiUrl.replace(/\/+$/, '')}/bot${botToken}/sendMessage`;
}

/**
 * Sends the login summary through the Telegram Bot API `sendMessage`.
 *
 * Needs both a bot token and a chat id; either missing is a skip. The
 * token is part of the URL, so the URL is never logged.
 */
export async function sendTelegramNotification(
  config: NotificationConfig['telegram'],
  log: BaseLogger,
  message: string,
): Promise<ChannelOutcome> {
  if (!config.bot_token) {
    log.debug('Telegram notification skipped (no bot token)');
    return { status: 'skipped', reason: 'TELEGRAM_BOT_TOKEN not set' };
  }
  if (!config.chat_id) {
    log.debug('Telegram notification skipped (no chat id)');
    return { status: 'skipped', reason: 'TELEGRAM_CHAT_ID not set' };
  }

  try {
    const response = await fetch(telegramSendMessageUrl(config.api_url, config.bot_token), {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ chat_id: config.chat_id, text: message }).toString(),
      signal: AbortSignal.timeout(config.timeout_ms),
    });
    await response.body?.cancel();

    if (response.ok) {
      log.info({ chat_id: config.chat_id }, 'Telegram notification sent');
      return { status: 'sent' };
    }

    log.warn({ status: response.status }, 'Telegram API returned non-OK status');
    return { status: 'failed', error: `Telegram HTTP ${response.status}` };
  } catch (err: unknown) {
    log.warn({ err }, 'Failed to send Telegram notification');
    return { status: 'failed', error: describeError(err) };
  }
}
