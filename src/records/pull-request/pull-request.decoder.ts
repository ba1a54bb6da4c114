import { z } from 'zod';
import type { RecordDecoder } from '../../store/record-decoder.js';
import { parseRecordKey } from '../../store/record-key.js';
import { decodeStoredValue, encodeStoredValue, storedInt, storedTimestamp } from '../stored-value.js';
import { PullRequestState, type PullRequest } from './pull-request.model.js';

const count = storedInt.nonnegative().default(0);

export const storedPullRequestSchema = z.object({
  id: z.string().default(''),
  number: storedInt.nonnegative(),
  title: z.string().default(''),
  body: z.string().default(''),
  state: z.nativeEnum(PullRequestState).default(PullRequestState.OPEN),
  author: z.string().default(''),
  assignees: z.array(z.string()).default([]),
  reviewers: z.array(z.string()).default([]),
  labels: z.array(z.string()).default([]),
  url: z.string().default(''),
  commentCount: count,
  reviewCount: count,
  additions: count,
  deletions: count,
  createdAt: storedTimestamp,
  updatedAt: storedTimestamp,
  closedAt: storedTimestamp.nullable().default(null),
  mergedAt: storedTimestamp.nullable().default(null),
});

export type StoredPullRequest = z.input<typeof storedPullRequestSchema>;

export const pullRequestDecoder: RecordDecoder<PullRequest, StoredPullRequest> = {
  decode(key, value) {
    const { owner, repo, number } = parseRecordKey(key);
    return { ...decodeStoredValue(storedPullRequestSchema, key, value), owner, repo, number };
  },

  encode(stored) {
    return encodeStoredValue(storedPullRequestSchema, stored);
  },
};
