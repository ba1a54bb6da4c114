import { Inject } from '@nestjs/common';
import { Args, Query, Resolver } from '@nestjs/graphql';
import { ConnectionArgs } from '../../connection/connection.types.js';
import type { Connection } from '../../connection/connection.loader.js';
import { IssueStat, IssueStatFilter } from './issue-stat.js';
import { Issue, IssueConnection } from './issue.model.js';
import { IssueService } from './issue.service.js';

@Resolver(() => Issue)
export class IssueResolver {
  constructor(@Inject(IssueService) private readonly issueService: IssueService) {}

  @Query(() => IssueConnection, { description: 'Issues in `owner/repo#number` order.' })
  issues(@Args() args: ConnectionArgs): Promise<Connection<Issue>> {
    return this.issueService.issues(args);
  }

  @Query(() => IssueStat)
  issueStat(
    @Args('filter', { type: () => IssueStatFilter }) filter: IssueStatFilter,
  ): Promise<IssueStat> {
    return this.issueService.issueStat(filter);
  }
}
