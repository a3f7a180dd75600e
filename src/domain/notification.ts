/**
 * Outcome of one outbound notification channel.
 *
 * `skipped` means the channel is not configured; it is not an error.
 */
export type ChannelOutcome =
  | { status: 'sent' }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: string };

/** Per-channel outcomes for one login notification. */
export interface NotificationReport {
  discord: ChannelOutcome;
  telegram: ChannelOutcome;
}
