import 'reflect-metadata';
import { readFile } from 'node:fs/promises';
import { Logger, Module } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { loadAppConfig } from '../config/app.config.js';
import { DiscussionRecordRepo } from '../records/discussion/discussion.repo.js';
import { IssueRecordRepo } from '../records/issue/issue.repo.js';
import { PullRequestRecordRepo } from '../records/pull-request/pull-request.repo.js';
import { importRecords, parseRecordFile } from '../records/record-import.js';
import { RecordsModule } from '../records/records.module.js';
import { StoreModule } from '../store/store.module.js';

@Module({})
class RecordImportModule {}

// Usage: node dist/scripts/import-records.js <records.json>
async function main() {
  const [file] = process.argv.slice(2);
  if (!file) {
    throw new Error('Usage: import-records <records.json>');
  }

  const config = loadAppConfig();
  const bundles = parseRecordFile(JSON.parse(await readFile(file, 'utf8')));

  const app = await NestFactory.createApplicationContext({
    module: RecordImportModule,
    imports: [StoreModule.forRoot(config), RecordsModule],
  });

  try {
    const summary = await importRecords(
      {
        issues: app.get(IssueRecordRepo),
        pullRequests: app.get(PullRequestRecordRepo),
        discussions: app.get(DiscussionRecordRepo),
      },
      bundles,
    );
    new Logger('ImportRecords').log(
      `Imported ${summary.issues} issues, ${summary.pullRequests} pull requests, ` +
        `${summary.discussions} discussions from ${file}`,
    );
  } finally {
    await app.close();
  }
}

main().catch((err: unknown) => {
  new Logger('ImportRecords').error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
