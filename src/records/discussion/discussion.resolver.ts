import { Inject } from '@nestjs/common';
import { Args, Query, Resolver } from '@nestjs/graphql';
import type { Connection } from '../../connection/connection.loader.js';
import { ConnectionArgs } from '../../connection/connection.types.js';
import { DiscussionStat, DiscussionStatFilter } from './discussion-stat.js';
import { Discussion, DiscussionConnection } from './discussion.model.js';
import { DiscussionService } from './discussion.service.js';

@Resolver(() => Discussion)
export class DiscussionResolver {
  constructor(@Inject(DiscussionService) private readonly discussionService: DiscussionService) {}

  @Query(() => DiscussionConnection)
  discussions(@Args() args: ConnectionArgs): Promise<Connection<Discussion>> {
    return this.discussionService.discussions(args);
  }

  @Query(() => DiscussionStat)
  discussionStat(
    @Args('filter', { type: () => DiscussionStatFilter }) filter: DiscussionStatFilter,
  ): Promise<DiscussionStat> {
    return this.discussionService.discussionStat(filter);
  }
}
