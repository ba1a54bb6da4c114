import { z } from 'zod';
import { GRAPHQL_INT_MAX, GRAPHQL_INT_MIN } from '../common/checked-int.js';
import { DecodeError } from '../store/store.errors.js';

/** ISO-8601 timestamp in a stored value, surfaced as a `Date`. */
export const storedTimestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

export const storedInt = z.number().int().min(GRAPHQL_INT_MIN).max(GRAPHQL_INT_MAX);

function describeKey(key: Buffer): string {
  return JSON.stringify(key.toString('utf8'));
}

/** Parse a stored JSON value against its schema; any mismatch is a `DecodeError`. */
export function decodeStoredValue<T extends z.ZodTypeAny>(
  schema: T,
  key: Buffer,
  value: Buffer,
): z.output<T> {
  let json: unknown;
  try {
    json = JSON.parse(value.toString('utf8'));
  } catch (error: unknown) {
    throw new DecodeError(`invalid value in database for key ${describeKey(key)}: not JSON`, {
      cause: error,
    });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new DecodeError(`invalid value in database for key ${describeKey(key)}: ${details}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** Validate a record on the write path and serialise it as stored JSON. */
export function encodeStoredValue<T extends z.ZodTypeAny>(schema: T, stored: z.input<T>): Buffer {
  schema.parse(stored);
  return Buffer.from(JSON.stringify(stored), 'utf8');
}
