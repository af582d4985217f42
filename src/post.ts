import type { Issue } from './types';

export const MAX_POST_LENGTH = 280;
// Width of a wrapped link; the title budget reserves this much for the URL.
export const SHORT_URL_LENGTH = 23;
export const BASE_HASHTAGS = '#github #opensource';
export const MAX_LANGUAGE_TAGS = 2;
export const ELLIPSIS = '…';

const GITHUB_API_ISSUE = /^https:\/\/api\.github\.com\/repos\/([^/]+)\/([^/]+)\/issues\/(\d+)/;
const ENTERPRISE_API_ISSUE = /^https:\/\/([^/]+)\/api\/v3\/repos\/([^/]+)\/([^/]+)\/issues\/(\d+)/;
const API_REPOSITORY = /\/repos\/([^/]+)\/([^/]+)\/?$/;

export class FormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FormatError';
  }
}

/**
 * Map an API issue URL to the page a person would open.
 * Throws FormatError when the URL does not look like an API issue URL, since that
 * means GitHub changed its URL scheme rather than that one issue is odd.
 */
export function humanizeUrl(apiUrl: string): string {
  const github = GITHUB_API_ISSUE.exec(apiUrl);
  if (github) {
    const [, owner, repo, number] = github;
    return `https://github.com/${owner}/${repo}/issues/${number}`;
  }
  const enterprise = ENTERPRISE_API_ISSUE.exec(apiUrl);
  if (enterprise) {
    const [, host, owner, repo, number] = enterprise;
    return `https://${host}/${owner}/${repo}/issues/${number}`;
  }
  throw new FormatError(`Format of API URLs has changed: ${apiUrl}`);
}

// `owner/repo` for display; unrecognised URLs are returned unchanged.
export function humanizeRepoUrl(repositoryUrl: string): string {
  const match = API_REPOSITORY.exec(repositoryUrl);
  return match ? `${match[1]}/${match[2]}` : repositoryUrl;
}

function length(text: string): number {
  return Array.from(text).length;
}

function truncate(text: string, maxLength: number): string {
  return Array.from(text).slice(0, Math.max(0, maxLength - 1)).join('') + ELLIPSIS;
}

export function languageHashtags(languages?: Record<string, number>): string[] {
  if (!languages) return [];
  return Object.keys(languages)
    .slice(0, MAX_LANGUAGE_TAGS)
    .map(name => name.replace(/[^a-zA-Z0-9]/g, ''))
    .filter(Boolean)
    .map(name => `#${name}`);
}

export function buildHashtags(languages?: Record<string, number>): string {
  return [BASE_HASHTAGS, ...languageHashtags(languages)].join(' ');
}

function titleBudget(hashtags: string): number {
  return MAX_POST_LENGTH - (SHORT_URL_LENGTH + 1) - (length(hashtags) + 1);
}

export function formatPost(issue: Issue): string {
  const allHashtags = buildHashtags(issue.languages);

  let title = issue.title;
  const available = titleBudget(allHashtags);
  if (length(title) > available) title = truncate(title, available);

  const url = humanizeUrl(issue.url);
  const full = `${title} ${url} ${allHashtags}`;
  if (length(full) <= MAX_POST_LENGTH) return full;

  // Over the limit once the real link is counted; drop the language tags.
  const base = `${title} ${url} ${BASE_HASHTAGS}`;
  if (length(base) <= MAX_POST_LENGTH) return base;

  title = truncate(title, titleBudget(BASE_HASHTAGS));
  return `${title} ${url} ${BASE_HASHTAGS}`;
}
