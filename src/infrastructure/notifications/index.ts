export { DEFAULT_CONFIG, DEFAULT_TIMEOUT_MS } from './config.js';
export type { NotificationConfig } from './config.js';
export { buildLoginMessage } from './message.js';
export { sendDiscordNotification, DISCORD_MAX_CONTENT } from './discord.js';
export { sendTelegramNotification, telegramSendMessageUrl } from './telegram.js';
export { createLoginNotifier } from './dispatcher.js';
