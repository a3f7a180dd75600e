import type { BaseLogger } from 'pino';
import type { ChannelOutcome } from '../../domain/index.js';
import type { NotificationConfig } from './config.js';
import { describeError } from './http.js';

/** Discord rejects content over 2000 characters; keep a margin. */
export const DISCORD_MAX_CONTENT = 1900;

/** Cuts by code point so a surrogate pair is never split. */
export function truncateContent(message: string, max = DISCORD_MAX_CONTENT): string {
  const chars = Array.from(message);
  return chars.length > max ? chars.slice(0, max).join('') : message;
}

/**
 * Posts the login summary to the configured Discord webhook.
 *
 * Skips when no webhook URL is configured. Any non-2xx status, transport
 * error or timeout is reported as `failed`; nothing is retried and
 * nothing is thrown.
 */
export async function sendDiscordNotification(
  config: NotificationConfig['discord'],
  log: BaseLogger,
  message: string,
): Promise<ChannelOutcome> {
  if (!config.webhook_url) {
    log.debug('Discord notification skipped (not configured)');
    return { status: 'skipped', reason: 'DISCORD_WEBHOOK_URL not set' };
  }

  try {
    const response = await fetch(config.webhook_url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ content: truncateContent(message) }),
      signal: AbortSignal.timeout(config.timeout_ms),
    });
    await response.body?.cancel();

    if (response.ok) {
      log.info('Discord notification sent');
      return { status: 'sent' };
    }

    log.warn({ status: response.status }, 'Discord webhook returned non-OK status');
    return { status: 'failed', error: `Discord HTTP ${response.status}` };
  } catch (err: unknown) {
    log.warn({ err }, 'Failed to send Discord notification');
    return { status: 'failed', error: describeError(err) };
  }
}
