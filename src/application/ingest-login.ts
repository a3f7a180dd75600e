import type { BaseLogger } from 'pino';
import type {
  JsonValue,
  NotificationReport,
  StoredRecord,
} from '../domain/index.js';
import { redactObject, DEFAULT_SENSITIVE_KEYS } from '../domain/index.js';
import { validateLoginEvent } from './login-validator.js';
import { enrichEvent } from './enrich-event.js';

/** Append-only sink for accepted login records. */
export interface LoginStore {
  append(record: StoredRecord): Promise<void>;
}

/** Best-effort fan-out; implementations resolve with per-channel outcomes. */
export type LoginNotifier = (record: StoredRecord) => Promise<NotificationReport>;

export interface IngestDeps {
  store: LoginStore;
  notify: LoginNotifier;
  clock: () => Date;
  log: BaseLogger;
  sensitive_keys?: readonly string[];
}

export interface IngestRequest {
  /** Raw request body text; `undefined` when the request carried none. */
  rawBody: string | undefined;
  /** Client address as observed by the server. */
  ip: string;
}

/**
 * Terminal states of the ingestion pipeline.
 *
 * received → validated → redacted → enriched → persisted → notified
 *
 * Every rejection happens before anything is written. A persisted
 * result carries the notification promise: it settles after the
 * response and never rejects.
 */
export type IngestResult =
  | { state: 'rejected_empty' }
  | { state: 'rejected_malformed'; details: string }
  | { state: 'rejected_invalid'; errors: string[] }
  | { state: 'failed'; cause: unknown }
  | { state: 'persisted'; record: StoredRecord; notified: Promise<NotificationReport> };

export interface HttpResponse {
  status: number;
  body: Record<string, unknown>;
}

function parseBody(raw: string): { ok: true; value: JsonValue } | { ok: false; message: string } {
  try {
    const value: JsonValue = JSON.parse(raw);
    return { ok: true, value };
  } catch (err: unknown) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Use case: ingest one login attempt.
 *
 * Parse → validate → redact → enrich → append → notify. Validation
 * errors are aggregated; persistence errors end the pipeline; channel
 * failures are logged and never change the result.
 */
export async function ingestLogin(
  deps: IngestDeps,
  request: IngestRequest,
): Promise<IngestResult> {
  const { rawBody, ip } = request;

  if (rawBody === undefined || rawBody.trim() === '') {
    return { state: 'rejected_empty' };
  }

  const parsed = parseBody(rawBody);
  if (!parsed.ok) {
    return { state: 'rejected_malformed', details: parsed.message };
  }

  const validation = validateLoginEvent(parsed.value);
  if (!validation.valid) {
    return { state: 'rejected_invalid', errors: validation.errors };
  }

  const redacted = redactObject(
    validation.event,
    deps.sensitive_keys ?? DEFAULT_SENSITIVE_KEYS,
  );
  const record = enrichEvent(redacted, ip, deps.clock());

  try {
    await deps.store.append(record);
  } catch (err: unknown) {
    deps.log.error({ err, ip }, 'Failed to write log');
    return { state: 'failed', cause: err };
  }

  return { state: 'persisted', record, notified: dispatchNotifications(deps, record) };
}

/** Starts notification without awaiting it; the returned promise never rejects. */
function dispatchNotifications(
  deps: IngestDeps,
  record: StoredRecord,
): Promise<NotificationReport> {
  return Promise.resolve()
    .then(() => deps.notify(record))
    .catch((err: unknown): NotificationReport => {
      const error = err instanceof Error ? err.message : String(err);
      deps.log.warn({ err }, 'Notifier failed');
      return {
        discord: { status: 'failed', error },
        telegram: { status: 'failed', error },
      };
    })
    .then((report) => {
      deps.log.info(
        {
          user: record['username'],
          ip: record.ip,
          discord: report.discord.status,
          telegram: report.telegram.status,
        },
        'Login recorded',
      );
      return report;
    });
}

/** Maps a pipeline result onto the HTTP status and JSON body. */
export function toHttpResponse(result: IngestResult): HttpResponse {
  switch (result.state) {
    case 'rejected_empty':
      return { status: 400, body: { error: 'Empty body' } };
    case 'rejected_malformed':
      return { status: 400, body: { error: 'Invalid JSON', details: result.details } };
    case 'rejected_invalid':
      return { status: 422, body: { error: 'Validation failed', details: result.errors } };
    case 'failed':
      return { status: 500, body: { error: 'Failed to persist log' } };
    case 'persisted':
      return { status: 201, body: { ok: true } };
  }
}
