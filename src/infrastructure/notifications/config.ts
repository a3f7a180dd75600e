/**
 * Outbound notification channel configuration.
 *
 * A channel whose credentials are `null` is treated as not configured:
 * it is skipped, never failed.
 */
export interface NotificationConfig {
  discord: { webhook_url: string | null; timeout_ms: number };
  telegram: {
    bot_token: string | null;
    chat_id: string | null;
    api_url: string;
    timeout_ms: number;
  };
}

export const DEFAULT_TIMEOUT_MS = 5000;

/** Default configuration: both channels unconfigured. */
export const DEFAULT_CONFIG: NotificationConfig = {
  discord: { webhook_url: null, timeout_ms: DEFAULT_TIMEOUT_MS },
  telegram: {
    bot_token: null,
    chat_id: null,
    api_url: 'https://api.telegram.org',
    timeout_ms: DEFAULT_TIMEOUT_MS,
  },
};
