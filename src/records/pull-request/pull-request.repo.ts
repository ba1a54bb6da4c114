import { Inject, Injectable, Logger } from '@nestjs/common';
import { KeyValueStore } from '../../store/key-value.store.js';
import { RecordRepo } from '../record.repo.js';
import { pullRequestDecoder, type StoredPullRequest } from './pull-request.decoder.js';
import type { PullRequest } from './pull-request.model.js';

@Injectable()
export class PullRequestRecordRepo extends RecordRepo<PullRequest, StoredPullRequest> {
  protected readonly log = new Logger(PullRequestRecordRepo.name);

  constructor(@Inject(KeyValueStore) store: KeyValueStore) {
    super(store, 'pull_request', pullRequestDecoder);
  }

  insertPullRequests(owner: string, repo: string, pulls: StoredPullRequest[]): Promise<void> {
    return this.insertMany(owner, repo, pulls);
  }
}
