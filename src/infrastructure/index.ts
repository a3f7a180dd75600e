export { appendJsonl, createJsonlStore, PersistenceError } from './store/index.js';
export type { AppendOptions } from './store/index.js';
export {
  createLoginNotifier,
  buildLoginMessage,
  sendDiscordNotification,
  sendTelegramNotification,
  DEFAULT_CONFIG,
} from './notifications/index.js';
export type { NotificationConfig } from './notifications/index.js';
