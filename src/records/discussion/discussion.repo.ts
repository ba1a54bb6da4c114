import { Inject, Injectable, Logger } from '@nestjs/common';
import { KeyValueStore } from '../../store/key-value.store.js';
import { RecordRepo } from '../record.repo.js';
import { discussionDecoder, type StoredDiscussion } from './discussion.decoder.js';
import type { Discussion } from './discussion.model.js';

@Injectable()
export class DiscussionRecordRepo extends RecordRepo<Discussion, StoredDiscussion> {
  protected readonly log = new Logger(DiscussionRecordRepo.name);

  constructor(@Inject(KeyValueStore) store: KeyValueStore) {
    super(store, 'discussion', discussionDecoder);
  }

  insertDiscussions(owner: string, repo: string, discussions: StoredDiscussion[]): Promise<void> {
    return this.insertMany(owner, repo, discussions);
  }
}
