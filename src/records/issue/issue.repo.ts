import { Inject, Injectable, Logger } from '@nestjs/common';
import { KeyValueStore } from '../../store/key-value.store.js';
import { RecordRepo } from '../record.repo.js';
import { issueDecoder, type StoredIssue } from './issue.decoder.js';
import type { Issue } from './issue.model.js';

@Injectable()
export class IssueRecordRepo extends RecordRepo<Issue, StoredIssue> {
  protected readonly log = new Logger(IssueRecordRepo.name);

  constructor(@Inject(KeyValueStore) store: KeyValueStore) {
    super(store, 'issue', issueDecoder);
  }

  /** Store issues of one repository, keyed `owner/repo#number`. */
  insertIssues(owner: string, repo: string, issues: StoredIssue[]): Promise<void> {
    return this.insertMany(owner, repo, issues);
  }
}
