export { loginEventSchema } from './login-schema.js';
export { validateLoginEvent } from './login-validator.js';
export type { ValidationResult } from './login-validator.js';
export { enrichEvent, toUtcIso } from './enrich-event.js';
export { MinuteThrottle } from './minute-throttle.js';
export type { ThrottleDecision } from './minute-throttle.js';
export { ingestLogin, toHttpResponse } from './ingest-login.js';
export type {
  IngestDeps,
  IngestRequest,
  IngestResult,
  HttpResponse,
  LoginStore,
  LoginNotifier,
} from './ingest-login.js';
