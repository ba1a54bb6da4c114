import { Field, Float, InputType, Int, ObjectType } from '@nestjs/graphql';
import { StatFilter, matchesStatFilter } from '../stat-filter.js';
import { PullRequestState, type PullRequest } from './pull-request.model.js';

const DAY_MS = 24 * 60 * 60 * 1000;

@InputType()
export class PullRequestStatFilter extends StatFilter {}

@ObjectType()
export class PullRequestStat {
  @Field(() => Int, { description: 'The number of open pull requests.' })
  openPrCount!: number;

  @Field(() => Int, { description: 'The number of merged pull requests.' })
  mergedPrCount!: number;

  @Field(() => Float, {
    nullable: true,
    description: 'Average of comments plus reviews per merged pull request.',
  })
  avgReviewCommentCount!: number | null;

  @Field(() => Float, {
    nullable: true,
    description: 'Average days from creation to merge.',
  })
  avgMergeDays!: number | null;
}

export interface PullRequestTotals {
  openPrCount: number;
  mergedPrCount: number;
  avgReviewCommentCount: number | null;
  avgMergeDays: number | null;
}

export function filterPullRequests(pulls: PullRequest[], filter: PullRequestStatFilter): PullRequest[] {
  return pulls.filter((pull) => matchesStatFilter(pull, filter));
}

export function summarizePullRequests(pulls: PullRequest[]): PullRequestTotals {
  const merged = pulls.filter((pull) => pull.state === PullRequestState.MERGED);
  const openPrCount = pulls.filter((pull) => pull.state === PullRequestState.OPEN).length;

  const activity = merged.reduce((sum, pull) => sum + pull.commentCount + pull.reviewCount, 0);
  const avgReviewCommentCount = merged.length === 0 ? null : activity / merged.length;

  const mergeDays = merged.flatMap((pull) =>
    pull.mergedAt ? [(pull.mergedAt.getTime() - pull.createdAt.getTime()) / DAY_MS] : [],
  );
  const avgMergeDays =
    mergeDays.length === 0 ? null : mergeDays.reduce((sum, days) => sum + days, 0) / mergeDays.length;

  return { openPrCount, mergedPrCount: merged.length, avgReviewCommentCount, avgMergeDays };
}
