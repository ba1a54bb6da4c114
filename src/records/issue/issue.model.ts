import { Field, Float, GraphQLISODateTime, Int, ObjectType, registerEnumType } from '@nestjs/graphql';
import { Paginated } from '../../connection/connection.types.js';
import type { RecordKeyParts } from '../../store/record-key.js';
import { PullRequestState } from '../pull-request/pull-request.model.js';

export enum IssueState {
  OPEN = 'OPEN',
  CLOSED = 'CLOSED',
}

registerEnumType(IssueState, { name: 'IssueState' });

@ObjectType()
export class IssueComment {
  @Field(() => String)
  id!: string;

  @Field(() => String)
  author!: string;

  @Field(() => String)
  body!: string;

  @Field(() => String)
  url!: string;

  @Field(() => GraphQLISODateTime)
  createdAt!: Date;

  @Field(() => GraphQLISODateTime)
  updatedAt!: Date;
}

@ObjectType()
export class IssueCommentConnection {
  @Field(() => Int)
  totalCount!: number;

  @Field(() => [IssueComment])
  nodes!: IssueComment[];
}

@ObjectType()
export class ParentIssue {
  @Field(() => String)
  id!: string;

  @Field(() => Int)
  number!: number;

  @Field(() => String)
  title!: string;
}

/** The issue's entry on a Projects (v2) board and its custom field values. */
@ObjectType()
export class IssueProjectItem {
  @Field(() => String)
  id!: string;

  @Field(() => String)
  projectId!: string;

  @Field(() => String)
  projectTitle!: string;

  @Field(() => String, { nullable: true })
  todoStatus!: string | null;

  @Field(() => String, { nullable: true })
  todoPriority!: string | null;

  @Field(() => String, { nullable: true })
  todoSize!: string | null;

  @Field(() => String, { nullable: true })
  todoInitiationOption!: string | null;

  @Field(() => Float, { nullable: true })
  todoPendingDays!: number | null;
}

@ObjectType()
export class IssueProjectItemConnection {
  @Field(() => Int)
  totalCount!: number;

  @Field(() => [IssueProjectItem])
  nodes!: IssueProjectItem[];
}

@ObjectType()
export class SubIssue {
  @Field(() => String)
  id!: string;

  @Field(() => Int)
  number!: number;

  @Field(() => String)
  title!: string;

  @Field(() => IssueState)
  state!: IssueState;

  @Field(() => String)
  author!: string;

  @Field(() => [String])
  assignees!: string[];

  @Field(() => GraphQLISODateTime)
  createdAt!: Date;

  @Field(() => GraphQLISODateTime)
  updatedAt!: Date;

  @Field(() => GraphQLISODateTime, { nullable: true })
  closedAt!: Date | null;
}

@ObjectType()
export class SubIssueConnection {
  @Field(() => Int)
  totalCount!: number;

  @Field(() => [SubIssue])
  nodes!: SubIssue[];
}

/** A pull request that closes the issue when merged. */
@ObjectType()
export class PullRequestRef {
  @Field(() => Int)
  number!: number;

  @Field(() => PullRequestState)
  state!: PullRequestState;

  @Field(() => String)
  author!: string;

  @Field(() => String)
  url!: string;

  @Field(() => GraphQLISODateTime)
  createdAt!: Date;

  @Field(() => GraphQLISODateTime)
  updatedAt!: Date;

  @Field(() => GraphQLISODateTime, { nullable: true })
  closedAt!: Date | null;
}

@ObjectType()
export class Issue implements RecordKeyParts {
  @Field(() => String)
  id!: string;

  @Field(() => String)
  owner!: string;

  @Field(() => String)
  repo!: string;

  @Field(() => Int)
  number!: number;

  @Field(() => String)
  title!: string;

  @Field(() => String)
  body!: string;

  @Field(() => IssueState)
  state!: IssueState;

  @Field(() => String)
  author!: string;

  @Field(() => [String])
  assignees!: string[];

  @Field(() => [String])
  labels!: string[];

  @Field(() => String)
  url!: string;

  @Field(() => IssueCommentConnection)
  comments!: IssueCommentConnection;

  @Field(() => IssueProjectItemConnection)
  projectItems!: IssueProjectItemConnection;

  @Field(() => SubIssueConnection)
  subIssues!: SubIssueConnection;

  @Field(() => ParentIssue, { nullable: true })
  parent!: ParentIssue | null;

  @Field(() => [PullRequestRef])
  closedByPullRequests!: PullRequestRef[];

  @Field(() => GraphQLISODateTime)
  createdAt!: Date;

  @Field(() => GraphQLISODateTime)
  updatedAt!: Date;

  @Field(() => GraphQLISODateTime, { nullable: true })
  closedAt!: Date | null;
}

@ObjectType()
export class IssueConnection extends Paginated(Issue, 'Issue') {}
