import { vi } from 'vitest';
import type { JsonObject, StoredRecord } from '../src/domain/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as import('pino').Logger;
}

/** Fixed "now" for deterministic timestamps. */
export const FIXED_NOW = new Date('2026-10-19T08:15:00.000Z');
export const FIXED_TIMESTAMP = '2026-10-19T08:15:00Z';

/**
 * Factory for stored records with sensible defaults.
 * `fields` replace the default event fields; `ip` and `timestamp` always win.
 */
export function makeRecord(
  fields: JsonObject = {},
  ip = '203.0.113.7',
  timestamp = FIXED_TIMESTAMP,
): StoredRecord {
  return {
    username: 'ray',
    device: {
      platform: 'MacIntel',
      language: 'en-US',
      screen: { width: 2560, height: 1600 },
    },
    ...fields,
    ip,
    timestamp,
  };
}
