import type { RedactedEvent, StoredRecord } from '../domain/index.js';

/** ISO-8601 in UTC with second precision, e.g. `2026-10-19T08:15:00Z`. */
export function toUtcIso(now: Date): string {
  return now.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Stamps server-observed metadata onto a redacted event.
 *
 * `ip` and `timestamp` are spread last: server values always overwrite
 * client-supplied keys of the same name.
 */
export function enrichEvent(event: RedactedEvent, ip: string, now: Date): StoredRecord {
  return {
    ...event,
    ip,
    timestamp: toUtcIso(now),
  };
}
