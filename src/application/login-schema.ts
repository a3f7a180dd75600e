import { z } from 'zod';

export const PAYLOAD_MESSAGE = 'Payload must be a JSON object';
export const USERNAME_MESSAGE = 'username is required (non-empty string)';

/**
 * Zod schema for the shape checks applied to an inbound login event.
 *
 * - Every object is passthrough: the event model is open.
 * - `null` is treated like an absent optional field.
 * - Messages are the exact strings returned to the caller, so the
 *   issue list maps one-to-one onto the 422 `details` array.
 */
export const screenSchema = z
  .object(
    {
      width: z
        .number({ invalid_type_error: 'device.screen.width must be numeric when provided' })
        .nullish(),
      height: z
        .number({ invalid_type_error: 'device.screen.height must be numeric when provided' })
        .nullish(),
    },
    { invalid_type_error: 'device.screen must be an object' },
  )
  .passthrough();

export const deviceSchema = z
  .object(
    {
      screen: screenSchema.nullish(),
    },
    { invalid_type_error: 'device must be an object when provided' },
  )
  .passthrough();

export const loginEventSchema = z
  .object(
    {
      username: z
        .string({ required_error: USERNAME_MESSAGE, invalid_type_error: USERNAME_MESSAGE })
        .refine((value) => value.trim().length > 0, { message: USERNAME_MESSAGE }),
      device: deviceSchema.nullish(),
    },
    { required_error: PAYLOAD_MESSAGE, invalid_type_error: PAYLOAD_MESSAGE },
  )
  .passthrough();
