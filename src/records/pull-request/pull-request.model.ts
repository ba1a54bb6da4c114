import { Field, GraphQLISODateTime, Int, ObjectType, registerEnumType } from '@nestjs/graphql';
import { Paginated } from '../../connection/connection.types.js';
import type { RecordKeyParts } from '../../store/record-key.js';

export enum PullRequestState {
  OPEN = 'OPEN',
  CLOSED = 'CLOSED',
  MERGED = 'MERGED',
}

registerEnumType(PullRequestState, { name: 'PullRequestState' });

@ObjectType()
export class PullRequest implements RecordKeyParts {
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

  @Field(() => PullRequestState)
  state!: PullRequestState;

  @Field(() => String)
  author!: string;

  @Field(() => [String])
  assignees!: string[];

  @Field(() => [String])
  reviewers!: string[];

  @Field(() => [String])
  labels!: string[];

  @Field(() => String)
  url!: string;

  @Field(() => Int)
  commentCount!: number;

  @Field(() => Int)
  reviewCount!: number;

  @Field(() => Int)
  additions!: number;

  @Field(() => Int)
  deletions!: number;

  @Field(() => GraphQLISODateTime)
  createdAt!: Date;

  @Field(() => GraphQLISODateTime)
  updatedAt!: Date;

  @Field(() => GraphQLISODateTime, { nullable: true })
  closedAt!: Date | null;

  @Field(() => GraphQLISODateTime, { nullable: true })
  mergedAt!: Date | null;
}

@ObjectType()
export class PullRequestConnection extends Paginated(PullRequest, 'PullRequest') {}
