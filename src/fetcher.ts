import { isFresh } from './freshness';
import { IssueSource, parseIssue } from './github';
import { getErrorMessage, Logger } from './log';
import type { Issue } from './types';

export type FetchResult =
  | { ok: true; label: string; issues: Issue[] }
  | { ok: false; label: string; issues: Issue[]; error: string };

/**
 * Fetch open issues carrying `label` and keep those created inside the window.
 * Never throws: a failed fetch yields an empty list with `ok: false`.
 */
export async function fetchFreshIssues(
  source: IssueSource,
  label: string,
  windowDays: number,
  log: Logger,
  now: Date = new Date()
): Promise<FetchResult> {
  try {
    const items = await source.searchIssues(label);
    const issues: Issue[] = [];
    for (const item of items) {
      const issue = parseIssue(item);
      if (!issue) {
        log.warning(`⚠️ Skipping search result without an issue URL for label "${label}"`);
        continue;
      }
      if (isFresh(issue.created_at, windowDays, now, log)) issues.push(issue);
    }
    log.info(`🔎 Found ${issues.length} fresh issue(s) for label "${label}"`);
    return { ok: true, label, issues };
  } catch (err) {
    const error = getErrorMessage(err);
    log.error(`❌ Error fetching issues for label "${label}": ${error}`);
    return { ok: false, label, issues: [], error };
  }
}
