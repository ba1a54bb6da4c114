import { z } from 'zod';
import type { RecordDecoder } from '../../store/record-decoder.js';
import { parseRecordKey } from '../../store/record-key.js';
import { decodeStoredValue, encodeStoredValue, storedInt, storedTimestamp } from '../stored-value.js';
import type { Discussion } from './discussion.model.js';

export const storedDiscussionSchema = z.object({
  id: z.string().default(''),
  number: storedInt.nonnegative(),
  title: z.string().default(''),
  body: z.string().default(''),
  author: z.string().default(''),
  url: z.string().default(''),
  category: z.string().default(''),
  labels: z.array(z.string()).default([]),
  isAnswered: z.boolean().default(false),
  answerChosenAt: storedTimestamp.nullable().default(null),
  commentCount: storedInt.nonnegative().default(0),
  upvoteCount: storedInt.nonnegative().default(0),
  createdAt: storedTimestamp,
  updatedAt: storedTimestamp,
});

export type StoredDiscussion = z.input<typeof storedDiscussionSchema>;

export const discussionDecoder: RecordDecoder<Discussion, StoredDiscussion> = {
  decode(key, value) {
    const { owner, repo, number } = parseRecordKey(key);
    return { ...decodeStoredValue(storedDiscussionSchema, key, value), owner, repo, number };
  },

  encode(stored) {
    return encodeStoredValue(storedDiscussionSchema, stored);
  },
};
