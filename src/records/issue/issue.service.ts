import { Inject, Injectable, Logger } from '@nestjs/common';
import { loadConnection, type Connection, type PaginationArgs } from '../../connection/connection.loader.js';
import { toGraphQLInt } from '../../common/checked-int.js';
import { IssueRecordRepo } from './issue.repo.js';
import { countOpenIssues, filterIssues, type IssueStat, type IssueStatFilter } from './issue-stat.js';
import type { Issue } from './issue.model.js';

@Injectable()
export class IssueService {
  private readonly log = new Logger(IssueService.name);
  constructor(@Inject(IssueRecordRepo) private readonly repo: IssueRecordRepo) {}

  //----------------------- LIST --------------------\\
  async issues(args: PaginationArgs): Promise<Connection<Issue>> {
    const connection = await loadConnection(args, (low, high) => this.repo.range(low, high));
    this.log.debug(`issue ${JSON.stringify(args)}: ${connection.edges.length} edges`);
    return connection;
  }

  //----------------------- STATS --------------------\\
  /**
   * Open-issue count over a full scan filtered in memory.
   * The filter is never turned into range bounds.
   */
  async issueStat(filter: IssueStatFilter): Promise<IssueStat> {
    const all = await this.repo.all();
    const filtered = filterIssues(all, filter);
    this.log.debug(`issueStat: ${filtered.length} of ${all.length} issues match`);
    return { openIssueCount: toGraphQLInt(countOpenIssues(filtered), 'openIssueCount') };
  }
}
