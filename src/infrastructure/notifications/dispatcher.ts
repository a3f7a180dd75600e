import type { BaseLogger } from 'pino';
import type { ChannelOutcome, NotificationReport, StoredRecord } from '../../domain/index.js';
import type { LoginNotifier } from '../../application/index.js';
import type { NotificationConfig } from './config.js';
import { buildLoginMessage } from './message.js';
import { sendDiscordNotification } from './discord.js';
import { sendTelegramNotification } from './telegram.js';
import { describeError } from './http.js';

function settled(result: PromiseSettledResult<ChannelOutcome>): ChannelOutcome {
  return result.status === 'fulfilled'
    ? result.value
    : { status: 'failed', error: describeError(result.reason) };
}

/**
 * Creates the login notifier for all configured channels.
 *
 * Each channel is invoked independently and concurrently; a failure in
 * one channel does not prevent the other from executing. The returned
 * promise resolves with both outcomes and never rejects.
 */
export function createLoginNotifier(
  config: NotificationConfig,
  log: BaseLogger,
): LoginNotifier {
  return async (record: StoredRecord): Promise<NotificationReport> => {
    const message = buildLoginMessage(record);

    const [discord, telegram] = await Promise.allSettled([
      sendDiscordNotification(config.discord, log, message),
      sendTelegramNotification(config.telegram, log, message),
    ]);

    return { discord: settled(discord), telegram: settled(telegram) };
  };
}
