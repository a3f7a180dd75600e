import type { JsonObject, JsonValue } from './login-event.js';
import { isJsonObject } from './login-event.js';

export const REDACTION_MARKER = '[REDACTED]';

export const DEFAULT_SENSITIVE_KEYS: readonly string[] = ['password', 'token'];

/**
 * Structural redaction over an open JSON tree.
 *
 * Any key whose lowercase form is in `sensitiveKeys` has its value
 * replaced by `[REDACTED]`, at any depth and inside arrays. Keys are
 * matched, not paths, so new nested shapes need no code changes.
 *
 * Pure function: the input is never mutated. Idempotent, since the
 * marker is a scalar and a redacted key is redacted again to the same value.
 */
export function redact(
  value: JsonValue,
  sensitiveKeys: readonly string[] = DEFAULT_SENSITIVE_KEYS,
): JsonValue {
  return walk(value, normalizeKeys(sensitiveKeys));
}

/** Object-typed entry point for callers that already hold a `JsonObject`. */
export function redactObject(
  value: JsonObject,
  sensitiveKeys: readonly string[] = DEFAULT_SENSITIVE_KEYS,
): JsonObject {
  return walkObject(value, normalizeKeys(sensitiveKeys));
}

function normalizeKeys(keys: readonly string[]): ReadonlySet<string> {
  return new Set(keys.map((k) => k.toLowerCase()));
}

function walk(value: JsonValue, keys: ReadonlySet<string>): JsonValue {
  if (Array.isArray(value)) {
    return value.map((item) => walk(item, keys));
  }
  if (isJsonObject(value)) {
    return walkObject(value, keys);
  }
  return value;
}

function walkObject(value: JsonObject, keys: ReadonlySet<string>): JsonObject {
  // fromEntries defines own properties, so a parsed "__proto__" key stays data
  return Object.fromEntries(
    Object.entries(value).map(([key, child]): [string, JsonValue] => [
      key,
      keys.has(key.toLowerCase()) ? REDACTION_MARKER : walk(child, keys),
    ]),
  );
}
