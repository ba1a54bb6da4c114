import { Column, Entity, PrimaryColumn } from 'typeorm';

/**
 * Shared shape of every partition table: raw key bytes and raw value bytes.
 * SQLite orders BLOB columns with memcmp, which gives the bytewise key order
 * range scans rely on.
 */
export abstract class KeyValueRow {
  @PrimaryColumn({ type: 'blob' })
  key!: Buffer;

  @Column({ type: 'blob' })
  value!: Buffer;
}

@Entity({ name: 'issue' })
export class IssueRow extends KeyValueRow {}

@Entity({ name: 'pull_request' })
export class PullRequestRow extends KeyValueRow {}

@Entity({ name: 'discussion' })
export class DiscussionRow extends KeyValueRow {}

export type Partition = 'issue' | 'pull_request' | 'discussion';

export const PARTITIONS: readonly Partition[] = ['issue', 'pull_request', 'discussion'];

export const PARTITION_ENTITIES = {
  issue: IssueRow,
  pull_request: PullRequestRow,
  discussion: DiscussionRow,
} as const satisfies Record<Partition, new () => KeyValueRow>;
