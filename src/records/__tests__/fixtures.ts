import type { StoredDiscussion } from '../discussion/discussion.decoder.js';
import type { StoredIssue } from '../issue/issue.decoder.js';
import type { StoredPullRequest } from '../pull-request/pull-request.decoder.js';

/** Midnight UTC on the given day of January 2025. */
export const jan = (day: number, time = '00:00:00') =>
  `2025-01-${String(day).padStart(2, '0')}T${time}Z`;

export function storedIssue(number: number, overrides: Partial<StoredIssue> = {}): StoredIssue {
  return {
    id: `I_${number}`,
    number,
    title: `Issue ${number}`,
    author: 'alice',
    createdAt: jan(1),
    updatedAt: jan(1),
    ...overrides,
  };
}

export function storedPullRequest(
  number: number,
  overrides: Partial<StoredPullRequest> = {},
): StoredPullRequest {
  return {
    id: `PR_${number}`,
    number,
    title: `Pull request ${number}`,
    author: 'alice',
    createdAt: jan(1),
    updatedAt: jan(1),
    ...overrides,
  };
}

export function storedDiscussion(
  number: number,
  overrides: Partial<StoredDiscussion> = {},
): StoredDiscussion {
  return {
    id: `D_${number}`,
    number,
    title: `Discussion ${number}`,
    author: 'alice',
    createdAt: jan(1),
    updatedAt: jan(1),
    ...overrides,
  };
}
