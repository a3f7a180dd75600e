import type { JsonObject, JsonValue, LoginEvent } from '../domain/index.js';
import { isJsonObject } from '../domain/index.js';
import { loginEventSchema, PAYLOAD_MESSAGE } from './login-schema.js';

export type ValidationResult =
  | { valid: true; event: LoginEvent; errors: [] }
  | { valid: false; errors: string[] };

function hasUsername(value: JsonObject): value is LoginEvent {
  return typeof value['username'] === 'string';
}

/**
 * Checks the shape of a parsed login event.
 *
 * A non-object input yields a single error. Otherwise every violation
 * is collected, in field order, so the caller sees the full list in
 * one round trip. No side effects.
 */
export function validateLoginEvent(input: JsonValue): ValidationResult {
  const parsed = loginEventSchema.safeParse(input);

  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) => issue.message),
    };
  }

  if (isJsonObject(input) && hasUsername(input)) {
    return { valid: true, event: input, errors: [] };
  }

  return { valid: false, errors: [PAYLOAD_MESSAGE] };
}
