import { Inject, Injectable, Logger } from '@nestjs/common';
import { loadConnection, type Connection, type PaginationArgs } from '../../connection/connection.loader.js';
import { toGraphQLInt } from '../../common/checked-int.js';
import { PullRequestRecordRepo } from './pull-request.repo.js';
import {
  filterPullRequests,
  summarizePullRequests,
  type PullRequestStat,
  type PullRequestStatFilter,
} from './pull-request-stat.js';
import type { PullRequest } from './pull-request.model.js';

@Injectable()
export class PullRequestService {
  private readonly log = new Logger(PullRequestService.name);
  constructor(@Inject(PullRequestRecordRepo) private readonly repo: PullRequestRecordRepo) {}

  //----------------------- LIST --------------------\\
  async pullRequests(args: PaginationArgs): Promise<Connection<PullRequest>> {
    const connection = await loadConnection(args, (low, high) => this.repo.range(low, high));
    this.log.debug(`pull_request ${JSON.stringify(args)}: ${connection.edges.length} edges`);
    return connection;
  }

  //----------------------- STATS --------------------\\
  /** Open and merged counts plus review and merge-time averages over merged pull requests. */
  async pullRequestStat(filter: PullRequestStatFilter): Promise<PullRequestStat> {
    const all = await this.repo.all();
    const filtered = filterPullRequests(all, filter);
    this.log.debug(`pullRequestStat: ${filtered.length} of ${all.length} pull requests match`);
    const totals = summarizePullRequests(filtered);
    return {
      ...totals,
      openPrCount: toGraphQLInt(totals.openPrCount, 'openPrCount'),
      mergedPrCount: toGraphQLInt(totals.mergedPrCount, 'mergedPrCount'),
    };
  }
}
