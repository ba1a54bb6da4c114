import { InvalidCursorError } from '../connection.errors.js';
import { decodeCursor, encodeCursor } from '../cursor.js';

describe('cursor codec', () => {
  it('encodes the display key as padded standard base64', () => {
    expect(encodeCursor('octo/app#1')).toBe('b2N0by9hcHAjMQ==');
    expect(encodeCursor('octo/hello#42')).toBe('b2N0by9oZWxsbyM0Mg==');
  });

  it('decodes back to the key bytes', () => {
    expect(decodeCursor('b2N0by9hcHAjMjU=')).toEqual(Buffer.from('octo/app#25', 'utf8'));
  });

  it('keeps non-ASCII keys intact', () => {
    const key = 'zoë/ünïcode#7';
    expect(decodeCursor(encodeCursor(key)).toString('utf8')).toBe(key);
  });

  it.each([
    ['characters outside the alphabet', 'not base64!'],
    ['missing padding', 'YQ'],
    ['the URL-safe alphabet', 'a-_b'],
  ])('rejects %s', (_label, cursor) => {
    expect(() => decodeCursor(cursor)).toThrow(InvalidCursorError);
    expect(() => decodeCursor(cursor)).toThrow(`invalid cursor: ${JSON.stringify(cursor)}`);
  });
});
