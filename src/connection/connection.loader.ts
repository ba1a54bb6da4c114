// src/connection/connection.loader.ts
import { HttpException } from '@nestjs/common';
import type { BidirectionalIterator } from '../store/range-iterator.js';
import { displayKey, type RecordKeyParts } from '../store/record-key.js';
import { ConnectionArgumentError, StoreReadError } from './connection.errors.js';
import { decodeCursor, encodeCursor } from './cursor.js';

/** Page size used when neither `first` nor `last` is given. */
export const DEFAULT_PAGE_SIZE = 100;

export interface PaginationArgs {
  after?: string | null;
  before?: string | null;
  first?: number | null;
  last?: number | null;
}

export interface PageInfo {
  hasPreviousPage: boolean;
  hasNextPage: boolean;
  startCursor: string | null;
  endCursor: string | null;
}

export interface Edge<R> {
  cursor: string;
  node: R;
}

export interface Connection<R> {
  edges: Edge<R>[];
  pageInfo: PageInfo;
}

/** Opens a lazy scan over `[low, high)`; `undefined` bounds are open. */
export type RangeFactory<R> = (
  low: Buffer | undefined,
  high: Buffer | undefined,
) => BidirectionalIterator<R>;

type Step<R> = () => Promise<R | undefined>;

/**
 * Resolve Relay pagination arguments into one bounded scan and build the
 * connection. Arguments are checked before the store is touched, and page
 * boundaries are found by reading one record past the requested size.
 */
export async function loadConnection<R extends RecordKeyParts>(
  args: PaginationArgs,
  rangeFactory: RangeFactory<R>,
): Promise<Connection<R>> {
  const after = args.after ?? undefined;
  const before = args.before ?? undefined;
  const first = args.first ?? undefined;
  const last = args.last ?? undefined;

  validateArgs(after, before, first, last);

  let nodes: R[];
  let hasPreviousPage = false;
  let hasNextPage = false;

  if (before !== undefined) {
    const upper = decodeCursor(before);
    const iter = rangeFactory(undefined, upper);
    ({ nodes, hasMore: hasPreviousPage } = await collectNodes(
      () => iter.nextFromEnd(),
      last ?? DEFAULT_PAGE_SIZE,
    ));
    nodes.reverse();
  } else if (after !== undefined) {
    const lower = decodeCursor(after);
    const iter = rangeFactory(lower, undefined);
    ({ nodes, hasMore: hasNextPage } = await collectNodes(
      skipLeading(() => iter.next(), lower),
      first ?? DEFAULT_PAGE_SIZE,
    ));
  } else if (last !== undefined) {
    const iter = rangeFactory(undefined, undefined);
    ({ nodes, hasMore: hasPreviousPage } = await collectNodes(() => iter.nextFromEnd(), last));
    nodes.reverse();
  } else {
    const iter = rangeFactory(undefined, undefined);
    ({ nodes, hasMore: hasNextPage } = await collectNodes(
      () => iter.next(),
      first ?? DEFAULT_PAGE_SIZE,
    ));
  }

  return connectCursor(nodes, hasPreviousPage, hasNextPage);
}

function validateArgs(
  after: string | undefined,
  before: string | undefined,
  first: number | undefined,
  last: number | undefined,
): void {
  if (before !== undefined && after !== undefined) {
    throw ConnectionArgumentError.conflict('ConflictingCursors');
  }
  if (before !== undefined && first !== undefined) {
    throw ConnectionArgumentError.conflict('BeforeWithFirst');
  }
  if (after !== undefined && last !== undefined) {
    throw ConnectionArgumentError.conflict('AfterWithLast');
  }
  if (before === undefined && after === undefined && first !== undefined && last !== undefined) {
    throw ConnectionArgumentError.conflict('FirstAndLastTogether');
  }
  if (first !== undefined && first < 0) throw ConnectionArgumentError.negativePageSize('first');
  if (last !== undefined && last < 0) throw ConnectionArgumentError.negativePageSize('last');
}

/**
 * The scan for `after` starts at the cursor's own key (inclusive), so the
 * record the cursor was minted from is dropped if it is still stored.
 */
function skipLeading<R extends RecordKeyParts>(step: Step<R>, key: Buffer): Step<R> {
  let checked = false;
  return async () => {
    const node = await step();
    if (checked || node === undefined) return node;
    checked = true;
    return Buffer.from(displayKey(node), 'utf8').equals(key) ? step() : node;
  };
}

async function collectNodes<R>(
  step: Step<R>,
  size: number,
): Promise<{ nodes: R[]; hasMore: boolean }> {
  const nodes: R[] = [];
  try {
    while (nodes.length < size) {
      const node = await step();
      if (node === undefined) return { nodes, hasMore: false };
      nodes.push(node);
    }
    return { nodes, hasMore: (await step()) !== undefined };
  } catch (error: unknown) {
    if (error instanceof HttpException) throw error;
    throw new StoreReadError(error);
  }
}

function connectCursor<R extends RecordKeyParts>(
  nodes: R[],
  hasPreviousPage: boolean,
  hasNextPage: boolean,
): Connection<R> {
  const edges = nodes.map((node) => ({ cursor: encodeCursor(displayKey(node)), node }));
  return {
    edges,
    pageInfo: {
      hasPreviousPage,
      hasNextPage,
      startCursor: edges.length > 0 ? edges[0].cursor : null,
      endCursor: edges.length > 0 ? edges[edges.length - 1].cursor : null,
    },
  };
}
