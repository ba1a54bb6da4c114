import { Logger } from '@nestjs/common';
import type { DataSource, Repository } from 'typeorm';
import { KeyValueStore } from './key-value.store.js';
import { PARTITION_ENTITIES, type KeyValueRow, type Partition } from './partition.entity.js';
import type { KeyValueEntry, RangeQuery } from './range-iterator.js';

/** Partition tables in a SQLite file, accessed through TypeORM. */
export class SqliteKeyValueStore extends KeyValueStore {
  private readonly log = new Logger(SqliteKeyValueStore.name);

  constructor(
    private readonly ds: DataSource,
    scanBatchSize?: number,
  ) {
    super();
    if (scanBatchSize) this.scanBatchSize = scanBatchSize;
  }

  async put(partition: Partition, key: Buffer, value: Buffer): Promise<void> {
    await this.repository(partition).upsert({ key, value }, ['key']);
  }

  async get(partition: Partition, key: Buffer): Promise<Buffer | null> {
    const row = await this.repository(partition).findOne({ where: { key } });
    return row ? row.value : null;
  }

  async delete(partition: Partition, key: Buffer): Promise<boolean> {
    const result = await this.repository(partition).delete({ key });
    return (result.affected ?? 0) > 0;
  }

  async clear(partition: Partition): Promise<void> {
    await this.repository(partition).clear();
    this.log.debug(`cleared partition ${partition}`);
  }

  async read(
    partition: Partition,
    { lower, upper, direction, limit }: RangeQuery,
  ): Promise<KeyValueEntry[]> {
    const qb = this.repository(partition)
      .createQueryBuilder('kv')
      .orderBy('kv.key', direction)
      .limit(limit);

    if (lower) {
      qb.andWhere(`kv.key ${lower.inclusive ? '>=' : '>'} :lower`, { lower: lower.key });
    }
    if (upper) {
      qb.andWhere(`kv.key ${upper.inclusive ? '<=' : '<'} :upper`, { upper: upper.key });
    }

    const rows = await qb.getMany();
    return rows.map(({ key, value }) => ({ key, value }));
  }

  private repository(partition: Partition): Repository<KeyValueRow> {
    return this.ds.getRepository<KeyValueRow>(PARTITION_ENTITIES[partition]);
  }
}
