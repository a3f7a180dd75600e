export type {
  JsonScalar,
  JsonValue,
  JsonObject,
  LoginEvent,
  RedactedEvent,
  StoredRecord,
} from './login-event.js';
export { isJsonObject } from './login-event.js';
export { redact, redactObject, REDACTION_MARKER, DEFAULT_SENSITIVE_KEYS } from './redaction.js';
export type { ChannelOutcome, NotificationReport } from './notification.js';
