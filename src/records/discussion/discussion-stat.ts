import { Field, InputType, Int, ObjectType } from '@nestjs/graphql';
import { StatFilter, matchesStatFilter } from '../stat-filter.js';
import type { Discussion } from './discussion.model.js';

@InputType()
export class DiscussionStatFilter extends StatFilter {}

@ObjectType()
export class DiscussionStat {
  @Field(() => Int, { description: 'The number of discussions.' })
  totalCount!: number;
}

export function filterDiscussions(discussions: Discussion[], filter: DiscussionStatFilter): Discussion[] {
  return discussions.filter((discussion) => matchesStatFilter(discussion, filter));
}
