import { DecodeError } from './store.errors.js';
import { toGraphQLInt } from '../common/checked-int.js';

/** The parts every stored record is keyed by. */
export interface RecordKeyParts {
  owner: string;
  repo: string;
  number: number;
}

const NUMBER_RE = /^\d+$/;

/**
 * Render the canonical `owner/repo#number` key.
 * The same string is the storage key and the cursor payload, so changing this
 * format invalidates every cursor a client holds.
 */
export function displayKey(parts: RecordKeyParts): string {
  return `${parts.owner}/${parts.repo}#${parts.number}`;
}

export function recordKeyBytes(parts: RecordKeyParts): Buffer {
  return Buffer.from(displayKey(parts), 'utf8');
}

/**
 * Split a stored key into owner, repo and number. Keys that do not render
 * back to the same bytes (leading zeros, invalid UTF-8) are rejected.
 */
export function parseRecordKey(key: Buffer): RecordKeyParts {
  const text = key.toString('utf8');
  const hash = text.lastIndexOf('#');
  const slash = text.indexOf('/');

  if (hash < 0 || slash <= 0 || slash > hash) {
    throw new DecodeError(`invalid key in database: ${key.toString('hex')}`);
  }

  const owner = text.slice(0, slash);
  const repo = text.slice(slash + 1, hash);
  const digits = text.slice(hash + 1);

  if (!repo || !NUMBER_RE.test(digits)) {
    throw new DecodeError(`invalid key in database: ${key.toString('hex')}`);
  }

  const parts = { owner, repo, number: toGraphQLInt(Number(digits), `record number in ${text}`) };

  // cursors are minted from the rendered key, so it must be the stored bytes
  if (!recordKeyBytes(parts).equals(key)) {
    throw new DecodeError(`invalid key in database: ${key.toString('hex')}`);
  }
  return parts;
}
