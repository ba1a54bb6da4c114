import { Module } from '@nestjs/common';
import { DiscussionRecordRepo } from './discussion/discussion.repo.js';
import { DiscussionResolver } from './discussion/discussion.resolver.js';
import { DiscussionService } from './discussion/discussion.service.js';
import { IssueRecordRepo } from './issue/issue.repo.js';
import { IssueResolver } from './issue/issue.resolver.js';
import { IssueService } from './issue/issue.service.js';
import { PullRequestRecordRepo } from './pull-request/pull-request.repo.js';
import { PullRequestResolver } from './pull-request/pull-request.resolver.js';
import { PullRequestService } from './pull-request/pull-request.service.js';

@Module({
  providers: [
    IssueRecordRepo,
    IssueService,
    IssueResolver,
    PullRequestRecordRepo,
    PullRequestService,
    PullRequestResolver,
    DiscussionRecordRepo,
    DiscussionService,
    DiscussionResolver,
  ],
  exports: [IssueRecordRepo, PullRequestRecordRepo, DiscussionRecordRepo],
})
export class RecordsModule {}
