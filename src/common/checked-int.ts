import { InternalServerErrorException } from '@nestjs/common';

/** Largest value a GraphQL `Int` can carry. */
export const GRAPHQL_INT_MAX = 2_147_483_647;
export const GRAPHQL_INT_MIN = -2_147_483_648;

export class IntegerOverflowError extends InternalServerErrorException {
  constructor(label: string, value: number) {
    super(`${label} (${value}) does not fit in a GraphQL Int`);
  }
}

/** Convert a count or number into a GraphQL `Int`, failing instead of wrapping. */
export function toGraphQLInt(value: number, label = 'value'): number {
  if (
    !Number.isSafeInteger(value) ||
    value > GRAPHQL_INT_MAX ||
    value < GRAPHQL_INT_MIN
  ) {
    throw new IntegerOverflowError(label, value);
  }
  return value;
}
