import { describe, expect, it, vi } from 'vitest';
import { fetchFreshIssues } from '../src/fetcher';
import type { IssueSource } from '../src/github';
import { createLogger, httpError } from './helpers';

const now = new Date('2024-06-20T12:00:00Z');

function rawIssue(number: number, createdAt: string) {
  return {
    url: `https://api.github.com/repos/octo/widgets/issues/${number}`,
    html_url: `https://github.com/octo/widgets/issues/${number}`,
    title: `Issue ${number}`,
    created_at: createdAt,
    updated_at: createdAt,
    repository_url: 'https://api.github.com/repos/octo/widgets',
    state: 'open',
    comments: 2,
  };
}

function sourceReturning(search: () => Promise<unknown[]>): IssueSource {
  return { searchIssues: vi.fn(search), listRepoLanguages: vi.fn(async () => ({})) };
}

describe('fetchFreshIssues', () => {
  it('keeps only issues inside the age window', async () => {
    const source = sourceReturning(async () => [
      rawIssue(1, '2024-06-18T12:00:00Z'),
      rawIssue(2, '2024-05-01T00:00:00Z'),
      rawIssue(3, 'not a date'),
    ]);

    const result = await fetchFreshIssues(source, 'good first issue', 15, createLogger(), now);

    expect(result).toEqual({
      ok: true,
      label: 'good first issue',
      issues: [
        {
          url: 'https://api.github.com/repos/octo/widgets/issues/1',
          html_url: 'https://github.com/octo/widgets/issues/1',
          title: 'Issue 1',
          created_at: '2024-06-18T12:00:00Z',
          updated_at: '2024-06-18T12:00:00Z',
          repository_url: 'https://api.github.com/repos/octo/widgets',
        },
      ],
    });
    expect(source.searchIssues).toHaveBeenCalledWith('good first issue');
  });

  it('skips results without an issue URL', async () => {
    const log = createLogger();
    const source = sourceReturning(async () => [{ title: 'no url' }, 'junk', rawIssue(4, '2024-06-19T00:00:00Z')]);

    const result = await fetchFreshIssues(source, 'help', 15, log, now);

    expect(result.issues.map(i => i.title)).toEqual(['Issue 4']);
    expect(log.warning).toHaveBeenCalledTimes(2);
  });

  it('degrades to an empty list when the request fails', async () => {
    const log = createLogger();
    const source = sourceReturning(async () => {
      throw httpError(422);
    });

    const result = await fetchFreshIssues(source, 'beginner-friendly', 15, log, now);

    expect(result).toEqual({ ok: false, label: 'beginner-friendly', issues: [], error: 'HTTP 422' });
    expect(log.error).toHaveBeenCalledWith('❌ Error fetching issues for label "beginner-friendly": HTTP 422');
  });
});
