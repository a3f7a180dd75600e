/**
 * Core domain types for the login-logger event model.
 *
 * These types define the shape of a login event as it flows through
 * the pipeline. They carry no framework dependencies.
 */

/** Leaf values of a parsed JSON document. */
export type JsonScalar = string | number | boolean | null;

/** Any parsed JSON document: object, sequence or scalar. */
export type JsonValue = JsonScalar | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Client-submitted login attempt, before redaction.
 *
 * Known optional fields live under `device` (`platform`, `language`,
 * `userAgent`, `timezone`, and `screen` with numeric `width`/`height`).
 * The model is open: unknown fields at any level are preserved.
 */
export interface LoginEvent extends JsonObject {
  username: string;
}

/** A login event after sensitive-field redaction. Same structure as `LoginEvent`. */
export type RedactedEvent = JsonObject;

/**
 * What lands in the store: the redacted event plus server-assigned
 * `ip` and `timestamp` (ISO-8601, UTC).
 */
export type StoredRecord = JsonObject & {
  readonly ip: string;
  readonly timestamp: string;
};

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
