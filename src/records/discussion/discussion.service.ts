import { Inject, Injectable, Logger } from '@nestjs/common';
import { loadConnection, type Connection, type PaginationArgs } from '../../connection/connection.loader.js';
import { toGraphQLInt } from '../../common/checked-int.js';
import { DiscussionRecordRepo } from './discussion.repo.js';
import { filterDiscussions, type DiscussionStat, type DiscussionStatFilter } from './discussion-stat.js';
import type { Discussion } from './discussion.model.js';

@Injectable()
export class DiscussionService {
  private readonly log = new Logger(DiscussionService.name);
  constructor(@Inject(DiscussionRecordRepo) private readonly repo: DiscussionRecordRepo) {}

  //----------------------- LIST --------------------\\
  async discussions(args: PaginationArgs): Promise<Connection<Discussion>> {
    const connection = await loadConnection(args, (low, high) => this.repo.range(low, high));
    this.log.debug(`discussion ${JSON.stringify(args)}: ${connection.edges.length} edges`);
    return connection;
  }

  //----------------------- STATS --------------------\\
  async discussionStat(filter: DiscussionStatFilter): Promise<DiscussionStat> {
    const all = await this.repo.all();
    const filtered = filterDiscussions(all, filter);
    this.log.debug(`discussionStat: ${filtered.length} of ${all.length} discussions match`);
    return { totalCount: toGraphQLInt(filtered.length, 'totalCount') };
  }
}
