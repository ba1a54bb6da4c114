import { Type } from '@nestjs/common';
import { ArgsType, Field, Int, ObjectType } from '@nestjs/graphql';
import { IsInt, IsOptional, IsString } from 'class-validator';
import type { Connection, Edge, PageInfo, PaginationArgs } from './connection.loader.js';

@ObjectType('PageInfo')
export class PageInfoType implements PageInfo {
  @Field(() => Boolean)
  hasPreviousPage!: boolean;

  @Field(() => Boolean)
  hasNextPage!: boolean;

  @Field(() => String, { nullable: true })
  startCursor!: string | null;

  @Field(() => String, { nullable: true })
  endCursor!: string | null;
}

/**
 * `after`/`before`/`first`/`last` as Relay connection fields accept them.
 * Ranges and combinations are checked by `loadConnection`.
 */
@ArgsType()
export class ConnectionArgs implements PaginationArgs {
  @Field(() => String, {
    nullable: true,
    description: 'Cursor of the last edge of the previous page; pass back verbatim.',
  })
  @IsOptional()
  @IsString()
  after?: string | null;

  @Field(() => String, {
    nullable: true,
    description: 'Cursor of the first edge of the next page; pass back verbatim.',
  })
  @IsOptional()
  @IsString()
  before?: string | null;

  @Field(() => Int, { nullable: true })
  @IsOptional()
  @IsInt()
  first?: number | null;

  @Field(() => Int, { nullable: true })
  @IsOptional()
  @IsInt()
  last?: number | null;
}

/**
 * Base class for a record type's connection; registers `<name>Edge` as well.
 *
 *   @ObjectType()
 *   export class IssueConnection extends Paginated(Issue, 'Issue') {}
 */
export function Paginated<R>(nodeRef: Type<R>, name: string): Type<Connection<R>> {
  @ObjectType(`${name}Edge`)
  class EdgeType implements Edge<R> {
    @Field(() => String)
    cursor!: string;

    @Field(() => nodeRef)
    node!: R;
  }

  @ObjectType({ isAbstract: true })
  class ConnectionType implements Connection<R> {
    @Field(() => [EdgeType])
    edges!: EdgeType[];

    @Field(() => PageInfoType)
    pageInfo!: PageInfoType;
  }

  return ConnectionType;
}
