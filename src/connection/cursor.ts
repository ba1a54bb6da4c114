import { InvalidCursorError } from './connection.errors.js';

/** Opaque cursor handed to clients: standard base64 of a record's display key. */
export function encodeCursor(displayKey: string): string {
  return Buffer.from(displayKey, 'utf8').toString('base64');
}

/**
 * Decode a cursor back into the raw key bytes it was minted from.
 * Node's base64 decoder skips characters it does not know, so the input is
 * accepted only if it re-encodes to exactly itself.
 */
export function decodeCursor(cursor: string): Buffer {
  const bytes = Buffer.from(cursor, 'base64');
  if (bytes.toString('base64') !== cursor) {
    throw new InvalidCursorError(cursor);
  }
  return bytes;
}
