import { IntegerOverflowError } from '../../common/checked-int.js';
import { displayKey, parseRecordKey, recordKeyBytes } from '../record-key.js';
import { DecodeError } from '../store.errors.js';

const key = (text: string) => Buffer.from(text, 'utf8');

describe('record keys', () => {
  it('renders owner/repo#number', () => {
    expect(displayKey({ owner: 'octo', repo: 'hello', number: 42 })).toBe('octo/hello#42');
    expect(recordKeyBytes({ owner: 'octo', repo: 'hello', number: 42 })).toEqual(key('octo/hello#42'));
  });

  it('parses a stored key', () => {
    expect(parseRecordKey(key('octo/hello-world#7'))).toEqual({
      owner: 'octo',
      repo: 'hello-world',
      number: 7,
    });
  });

  it('splits at the last # and the first /', () => {
    expect(parseRecordKey(key('octo/c#sharp#3'))).toEqual({ owner: 'octo', repo: 'c#sharp', number: 3 });
    expect(parseRecordKey(key('a/b/c#1'))).toEqual({ owner: 'a', repo: 'b/c', number: 1 });
  });

  it.each([
    ['no-hash', '6e6f2d68617368'],
    ['/repo#1', '2f7265706f2331'],
  ])('rejects %s', (text, hex) => {
    expect(() => parseRecordKey(key(text))).toThrow(DecodeError);
    expect(() => parseRecordKey(key(text))).toThrow(`invalid key in database: ${hex}`);
  });

  it('rejects a number that is not decimal digits', () => {
    expect(() => parseRecordKey(key('octo/hello#x1'))).toThrow(DecodeError);
    expect(() => parseRecordKey(key('octo/hello#-1'))).toThrow(DecodeError);
  });

  it('rejects keys that do not render back to the same bytes', () => {
    expect(() => parseRecordKey(key('octo/app#01'))).toThrow(
      'invalid key in database: 6f63746f2f617070233031',
    );

    const invalidUtf8 = Buffer.from([0x6f, 0x2f, 0x61, 0xff, 0x70, 0x23, 0x31]);
    expect(() => parseRecordKey(invalidUtf8)).toThrow(DecodeError);
    expect(() => parseRecordKey(invalidUtf8)).toThrow('invalid key in database: 6f2f61ff702331');
  });

  it('rejects a number above the GraphQL Int range', () => {
    expect(() => parseRecordKey(key('octo/hello#3000000000'))).toThrow(IntegerOverflowError);
    expect(parseRecordKey(key('octo/hello#2147483647')).number).toBe(2147483647);
  });
});
