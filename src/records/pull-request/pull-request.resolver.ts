import { Inject } from '@nestjs/common';
import { Args, Query, Resolver } from '@nestjs/graphql';
import type { Connection } from '../../connection/connection.loader.js';
import { ConnectionArgs } from '../../connection/connection.types.js';
import { PullRequest, PullRequestConnection } from './pull-request.model.js';
import { PullRequestStat, PullRequestStatFilter } from './pull-request-stat.js';
import { PullRequestService } from './pull-request.service.js';

@Resolver(() => PullRequest)
export class PullRequestResolver {
  constructor(@Inject(PullRequestService) private readonly pullRequestService: PullRequestService) {}

  @Query(() => PullRequestConnection)
  pullRequests(@Args() args: ConnectionArgs): Promise<Connection<PullRequest>> {
    return this.pullRequestService.pullRequests(args);
  }

  @Query(() => PullRequestStat)
  pullRequestStat(
    @Args('filter', { type: () => PullRequestStatFilter }) filter: PullRequestStatFilter,
  ): Promise<PullRequestStat> {
    return this.pullRequestService.pullRequestStat(filter);
  }
}
