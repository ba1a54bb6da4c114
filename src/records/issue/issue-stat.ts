import { Field, InputType, Int, ObjectType } from '@nestjs/graphql';
import { IsOptional, IsString } from 'class-validator';
import { StatFilter, matchesStatFilter } from '../stat-filter.js';
import { IssueState, type Issue } from './issue.model.js';

@InputType()
export class IssueStatFilter extends StatFilter {
  @Field(() => String, { nullable: true, description: 'Filter by assignee login.' })
  @IsOptional()
  @IsString()
  assignee?: string | null;
}

@ObjectType()
export class IssueStat {
  @Field(() => Int, { description: 'The number of open issues.' })
  openIssueCount!: number;
}

export function filterIssues(issues: Issue[], filter: IssueStatFilter): Issue[] {
  const { assignee } = filter;
  return issues.filter(
    (issue) =>
      matchesStatFilter(issue, filter) &&
      (assignee == null || issue.assignees.includes(assignee)),
  );
}

export function countOpenIssues(issues: Issue[]): number {
  return issues.filter((issue) => issue.state === IssueState.OPEN).length;
}
