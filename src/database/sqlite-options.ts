import fs from 'fs';
import path from 'path';
import type { DataSourceOptions } from 'typeorm';
import type { AppConfig } from '../config/app.config.js';
import { DiscussionRow, IssueRow, PullRequestRow } from '../store/partition.entity.js';
import { CreateRecordPartitions1760000000000 } from './migrations/1760000000000-CreateRecordPartitions.js';

export const IN_MEMORY_DATABASE = ':memory:';

/** TypeORM options for the embedded record store; the schema comes from migrations. */
export function sqliteOptions(config: Pick<AppConfig, 'databasePath'>): DataSourceOptions {
  if (config.databasePath !== IN_MEMORY_DATABASE) {
    fs.mkdirSync(path.dirname(path.resolve(config.databasePath)), { recursive: true });
  }

  return {
    type: 'better-sqlite3',
    database: config.databasePath,
    entities: [IssueRow, PullRequestRow, DiscussionRow],
    migrations: [CreateRecordPartitions1760000000000],
    migrationsTableName: 'typeorm_migrations',
    migrationsRun: true,
    synchronize: false,
    logging: false,
  };
}
