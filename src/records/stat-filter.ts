import { Field, GraphQLISODateTime, InputType } from '@nestjs/graphql';
import { IsDate, IsOptional, IsString } from 'class-validator';

/** Filter fields shared by every `*Stat` query. */
@InputType({ isAbstract: true })
export class StatFilter {
  @Field(() => String, { nullable: true, description: 'Filter by author login.' })
  @IsOptional()
  @IsString()
  author?: string | null;

  @Field(() => String, { nullable: true, description: 'Filter by repository name.' })
  @IsOptional()
  @IsString()
  repo?: string | null;

  @Field(() => GraphQLISODateTime, {
    nullable: true,
    description: 'Start of the creation datetime range (inclusive), e.g. "2025-01-05T00:00:00Z".',
  })
  @IsOptional()
  @IsDate()
  begin?: Date | null;

  @Field(() => GraphQLISODateTime, {
    nullable: true,
    description: 'End of the creation datetime range (exclusive), e.g. "2025-01-06T00:00:00Z".',
  })
  @IsOptional()
  @IsDate()
  end?: Date | null;
}

interface Filterable {
  author: string;
  repo: string;
  createdAt: Date;
}

export function matchesStatFilter(record: Filterable, filter: StatFilter): boolean {
  return (
    (filter.author == null || record.author === filter.author) &&
    (filter.repo == null || record.repo === filter.repo) &&
    (filter.begin == null || record.createdAt.getTime() >= filter.begin.getTime()) &&
    (filter.end == null || record.createdAt.getTime() < filter.end.getTime())
  );
}
