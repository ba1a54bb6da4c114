import { jest } from '@jest/globals';
import { Logger } from '@nestjs/common';
import { StoreReadError } from '../../connection/connection.errors.js';
import { encodeCursor } from '../../connection/cursor.js';
import { MemoryKeyValueStore } from '../../store/memory-key-value.store.js';
import { IssueState } from '../issue/issue.model.js';
import { IssueRecordRepo } from '../issue/issue.repo.js';
import { IssueService } from '../issue/issue.service.js';
import { jan, storedIssue } from './fixtures.js';

describe('IssueService', () => {
  let store: MemoryKeyValueStore;
  let service: IssueService;

  beforeEach(async () => {
    store = new MemoryKeyValueStore(2);
    const repo = new IssueRecordRepo(store);
    service = new IssueService(repo);

    await repo.insertIssues('octo', 'app', [
      storedIssue(1, { assignees: ['bob'], createdAt: jan(5) }),
      storedIssue(2, { state: IssueState.CLOSED, createdAt: jan(6) }),
      storedIssue(3, { author: 'carol', assignees: ['bob', 'dave'], createdAt: jan(7) }),
    ]);
    await repo.insertIssues('octo', 'lib', [storedIssue(1, { createdAt: jan(5) })]);
  });

  describe('issues', () => {
    it('pages in key order across repositories', async () => {
      const page = await service.issues({ first: 3 });
      expect(page.edges.map((e) => `${e.node.repo}#${e.node.number}`)).toEqual([
        'app#1',
        'app#2',
        'app#3',
      ]);
      expect(page.pageInfo.hasNextPage).toBe(true);

      const next = await service.issues({ after: page.pageInfo.endCursor, first: 3 });
      expect(next.edges.map((e) => e.cursor)).toEqual([encodeCursor('octo/lib#1')]);
      expect(next.pageInfo.hasNextPage).toBe(false);
    });

    it('serves the decoded record on each edge', async () => {
      const page = await service.issues({ last: 1 });
      expect(page.edges[0].node).toMatchObject({
        owner: 'octo',
        repo: 'lib',
        number: 1,
        title: 'Issue 1',
        state: IssueState.OPEN,
      });
    });
  });

  describe('issueStat', () => {
    it.each([
      ['no filter', {}, 3],
      ['author', { author: 'alice' }, 2],
      ['repository', { repo: 'app' }, 2],
      ['assignee', { assignee: 'bob' }, 2],
      ['begin only', { begin: new Date(jan(6)) }, 1],
      ['a one-day window', { begin: new Date(jan(6)), end: new Date(jan(7)) }, 0],
      ['end only', { end: new Date(jan(6)) }, 2],
    ])('counts open issues by %s', async (_label, filter, expected) => {
      await expect(service.issueStat(filter)).resolves.toEqual({ openIssueCount: expected });
    });

    it('logs how many issues matched the filter', async () => {
      const debug = jest.spyOn(Logger.prototype, 'debug');
      await service.issueStat({ author: 'alice' });
      expect(debug).toHaveBeenCalledWith('issueStat: 3 of 4 issues match');
      debug.mockRestore();
    });

    it('fails instead of skipping a record that does not decode', async () => {
      await store.put('issue', Buffer.from('octo/app#9', 'utf8'), Buffer.from('not json', 'utf8'));
      await expect(service.issueStat({})).rejects.toThrow(StoreReadError);
      await expect(service.issueStat({})).rejects.toThrow(
        'failed to read database: invalid value in database for key "octo/app#9": not JSON',
      );
    });
  });
});
