import { z } from 'zod';
import type { RecordDecoder } from '../../store/record-decoder.js';
import { parseRecordKey } from '../../store/record-key.js';
import { decodeStoredValue, encodeStoredValue, storedInt, storedTimestamp } from '../stored-value.js';
import { PullRequestState } from '../pull-request/pull-request.model.js';
import { IssueState, type Issue } from './issue.model.js';

const storedCommentSchema = z.object({
  id: z.string(),
  author: z.string(),
  body: z.string(),
  url: z.string().default(''),
  createdAt: storedTimestamp,
  updatedAt: storedTimestamp,
});

const storedProjectItemSchema = z.object({
  id: z.string(),
  projectId: z.string(),
  projectTitle: z.string(),
  todoStatus: z.string().nullable().default(null),
  todoPriority: z.string().nullable().default(null),
  todoSize: z.string().nullable().default(null),
  todoInitiationOption: z.string().nullable().default(null),
  todoPendingDays: z.number().nullable().default(null),
});

const storedSubIssueSchema = z.object({
  id: z.string(),
  number: storedInt.nonnegative(),
  title: z.string(),
  state: z.nativeEnum(IssueState),
  author: z.string().default(''),
  assignees: z.array(z.string()).default([]),
  createdAt: storedTimestamp,
  updatedAt: storedTimestamp,
  closedAt: storedTimestamp.nullable().default(null),
});

const storedPullRequestRefSchema = z.object({
  number: storedInt.nonnegative(),
  state: z.nativeEnum(PullRequestState),
  author: z.string().default(''),
  url: z.string().default(''),
  createdAt: storedTimestamp,
  updatedAt: storedTimestamp,
  closedAt: storedTimestamp.nullable().default(null),
});

const emptyConnection = () => ({ totalCount: 0, nodes: [] });

export const storedIssueSchema = z.object({
  id: z.string().default(''),
  number: storedInt.nonnegative(),
  title: z.string().default(''),
  body: z.string().default(''),
  state: z.nativeEnum(IssueState).default(IssueState.OPEN),
  author: z.string().default(''),
  assignees: z.array(z.string()).default([]),
  labels: z.array(z.string()).default([]),
  url: z.string().default(''),
  comments: z
    .object({
      totalCount: storedInt.nonnegative(),
      nodes: z.array(storedCommentSchema),
    })
    .default(emptyConnection),
  projectItems: z
    .object({ totalCount: storedInt.nonnegative(), nodes: z.array(storedProjectItemSchema) })
    .default(emptyConnection),
  subIssues: z
    .object({ totalCount: storedInt.nonnegative(), nodes: z.array(storedSubIssueSchema) })
    .default(emptyConnection),
  parent: z
    .object({ id: z.string(), number: storedInt, title: z.string() })
    .nullable()
    .default(null),
  closedByPullRequests: z.array(storedPullRequestRefSchema).default([]),
  createdAt: storedTimestamp,
  updatedAt: storedTimestamp,
  closedAt: storedTimestamp.nullable().default(null),
});

/** Issue as written to the `issue` partition; owner and repo live in the key. */
export type StoredIssue = z.input<typeof storedIssueSchema>;

export const issueDecoder: RecordDecoder<Issue, StoredIssue> = {
  decode(key, value) {
    const { owner, repo, number } = parseRecordKey(key);
    return { ...decodeStoredValue(storedIssueSchema, key, value), owner, repo, number };
  },

  encode(stored) {
    return encodeStoredValue(storedIssueSchema, stored);
  },
};
