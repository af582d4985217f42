import type { Issue } from './types';

// Candidates whose URL is not already in history, in their original order.
export function freshOf(history: Issue[], candidates: Issue[]): Issue[] {
  if (history.length === 0) return candidates;
  const seen = new Set(history.map(issue => issue.url));
  return candidates.filter(issue => !seen.has(issue.url));
}

// Merges batches from several labels; the first occurrence of a URL wins.
export function uniqueByUrl(issues: Issue[]): Issue[] {
  const seen = new Set<string>();
  const unique: Issue[] = [];
  for (const issue of issues) {
    if (seen.has(issue.url)) continue;
    seen.add(issue.url);
    unique.push(issue);
  }
  return unique;
}
