import { z } from 'zod';
import { storedDiscussionSchema } from './discussion/discussion.decoder.js';
import type { DiscussionRecordRepo } from './discussion/discussion.repo.js';
import { storedIssueSchema } from './issue/issue.decoder.js';
import type { IssueRecordRepo } from './issue/issue.repo.js';
import { storedPullRequestSchema } from './pull-request/pull-request.decoder.js';
import type { PullRequestRecordRepo } from './pull-request/pull-request.repo.js';

/** Accepts what `schema` accepts, but keeps the unparsed input for storage. */
function storedRecord<T extends z.ZodTypeAny>(schema: T, kind: string) {
  return z.custom<z.input<T>>((value) => schema.safeParse(value).success, {
    message: `invalid ${kind} record`,
  });
}

const recordBundleSchema = z.object({
  owner: z.string().min(1),
  repo: z.string().min(1),
  issues: z.array(storedRecord(storedIssueSchema, 'issue')).default([]),
  pullRequests: z.array(storedRecord(storedPullRequestSchema, 'pull request')).default([]),
  discussions: z.array(storedRecord(storedDiscussionSchema, 'discussion')).default([]),
});

export type RecordBundle = z.output<typeof recordBundleSchema>;

const recordFileSchema = z.preprocess(
  (json) => (Array.isArray(json) ? json : [json]),
  z.array(recordBundleSchema),
);

/** A record file holds one `{owner, repo, ...}` bundle or an array of them. */
export function parseRecordFile(json: unknown): RecordBundle[] {
  const parsed = recordFileSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid record file (${details})`);
  }
  return parsed.data;
}

export interface RecordRepos {
  issues: IssueRecordRepo;
  pullRequests: PullRequestRecordRepo;
  discussions: DiscussionRecordRepo;
}

export interface ImportSummary {
  issues: number;
  pullRequests: number;
  discussions: number;
}

export async function importRecords(repos: RecordRepos, bundles: RecordBundle[]): Promise<ImportSummary> {
  const summary: ImportSummary = { issues: 0, pullRequests: 0, discussions: 0 };
  for (const { owner, repo, issues, pullRequests, discussions } of bundles) {
    await repos.issues.insertIssues(owner, repo, issues);
    await repos.pullRequests.insertPullRequests(owner, repo, pullRequests);
    await repos.discussions.insertDiscussions(owner, repo, discussions);
    summary.issues += issues.length;
    summary.pullRequests += pullRequests.length;
    summary.discussions += discussions.length;
  }
  return summary;
}
