import type { JsonObject, JsonValue, StoredRecord } from '../../domain/index.js';
import { isJsonObject } from '../../domain/index.js';

const MISSING = 'n/a';

function text(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return MISSING;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

function child(value: JsonValue | undefined): JsonObject {
  return isJsonObject(value) ? value : {};
}

/**
 * Builds the human-readable summary shared by every channel.
 *
 * Missing fields render as `n/a`; the screen renders as `WIDTHxHEIGHT`
 * only when both dimensions are present.
 */
export function buildLoginMessage(record: StoredRecord): string {
  const device = child(record['device']);
  const screen = child(device['screen']);
  const width = screen['width'];
  const height = screen['height'];
  const size =
    width !== undefined && width !== null && height !== undefined && height !== null
      ? `${text(width)}x${text(height)}`
      : MISSING;

  return [
    '🔔 New login:',
    `- user: ${text(record['username'])}`,
    `- ip: ${text(record.ip)}`,
    `- os: ${text(device['platform'])}`,
    `- lang: ${text(device['language'])}`,
    `- screen: ${size}`,
    `- time: ${text(record.timestamp)}`,
  ].join('\n');
}
