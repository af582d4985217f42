import * as github from '@actions/github';
import { GitHub } from '@actions/github/lib/utils';
import type { Issue } from './types';

export const SEARCH_PAGE_SIZE = 30;

export interface IssueSource {
  // Raw search results; callers validate each item with parseIssue.
  searchIssues(label: string): Promise<unknown[]>;
  listRepoLanguages(repositoryUrl: string): Promise<Record<string, number>>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(raw: Record<string, unknown>, key: string): string {
  const value = raw[key];
  return typeof value === 'string' ? value : '';
}

export function parseLanguages(raw: unknown): Record<string, number> {
  const languages: Record<string, number> = {};
  if (!isRecord(raw)) return languages;
  for (const [name, bytes] of Object.entries(raw)) {
    if (typeof bytes === 'number' && Number.isFinite(bytes)) languages[name] = bytes;
  }
  return languages;
}

/**
 * Validate an issue payload from the search API (or a history entry read back from disk).
 * Returns null when there is no usable identity URL.
 */
export function parseIssue(raw: unknown): Issue | null {
  if (!isRecord(raw)) return null;
  const url = raw.url;
  if (typeof url !== 'string' || !url) return null;

  const issue: Issue = {
    url,
    title: stringField(raw, 'title'),
    created_at: stringField(raw, 'created_at'),
    updated_at: stringField(raw, 'updated_at'),
    repository_url: stringField(raw, 'repository_url'),
  };
  if (typeof raw.html_url === 'string') issue.html_url = raw.html_url;
  if (raw.languages !== undefined) issue.languages = parseLanguages(raw.languages);
  return issue;
}

export class GitHubClient implements IssueSource {
  private octokit: InstanceType<typeof GitHub>;
  private apiCalls = 0;

  constructor(token?: string) {
    // Search works anonymously, just with a much lower rate limit.
    this.octokit = token ? github.getOctokit(token) : new GitHub();
  }

  getApiCallCount(): number {
    return this.apiCalls;
  }

  async searchIssues(label: string): Promise<unknown[]> {
    this.apiCalls++;
    const { data } = await this.octokit.request('GET /search/issues', {
      q: `label:"${label}"`,
      per_page: SEARCH_PAGE_SIZE,
      page: 1,
      state: 'open',
      sort: 'updated',
      order: 'desc',
    });
    const items: unknown = isRecord(data) ? data.items : undefined;
    if (!Array.isArray(items)) {
      throw new Error(`No 'items' in search response for label "${label}"`);
    }
    return items;
  }

  async listRepoLanguages(repositoryUrl: string): Promise<Record<string, number>> {
    this.apiCalls++;
    const { data } = await this.octokit.request(`GET ${repositoryUrl}/languages`);
    return parseLanguages(data);
  }
}

// Octokit request errors carry the HTTP status; anything else (network, parsing) has none.
export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  const status = error.status;
  return typeof status === 'number' ? status : undefined;
}
