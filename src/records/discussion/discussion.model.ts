import { Field, GraphQLISODateTime, Int, ObjectType } from '@nestjs/graphql';
import { Paginated } from '../../connection/connection.types.js';
import type { RecordKeyParts } from '../../store/record-key.js';

@ObjectType()
export class Discussion implements RecordKeyParts {
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

  @Field(() => String)
  author!: string;

  @Field(() => String)
  url!: string;

  @Field(() => String, { description: 'Discussion category name.' })
  category!: string;

  @Field(() => [String])
  labels!: string[];

  @Field(() => Boolean)
  isAnswered!: boolean;

  @Field(() => GraphQLISODateTime, { nullable: true })
  answerChosenAt!: Date | null;

  @Field(() => Int)
  commentCount!: number;

  @Field(() => Int)
  upvoteCount!: number;

  @Field(() => GraphQLISODateTime)
  createdAt!: Date;

  @Field(() => GraphQLISODateTime)
  updatedAt!: Date;
}

@ObjectType()
export class DiscussionConnection extends Paginated(Discussion, 'Discussion') {}
