import { getErrorStatus, IssueSource } from './github';
import { getErrorMessage, Logger } from './log';
import { sleep as defaultSleep } from './sleep';
import type { Issue, Sleep } from './types';

export const MAX_LANGUAGES = 3;
export const RATE_LIMIT_PAUSE_MS = 60_000;

export interface EnrichResult {
  issues: Issue[];
  // Set when a 403 cut the pass short; later issues carry no `languages`.
  rateLimited: boolean;
}

export interface EnrichOptions {
  sleep?: Sleep;
  rateLimitPauseMs?: number;
}

export function topLanguages(languages: Record<string, number>, limit = MAX_LANGUAGES): Record<string, number> {
  const sorted = Object.entries(languages).sort(([, a], [, b]) => b - a);
  return Object.fromEntries(sorted.slice(0, limit));
}

export async function enrichLanguages(
  source: IssueSource,
  issues: Issue[],
  log: Logger,
  options: EnrichOptions = {}
): Promise<EnrichResult> {
  const sleep = options.sleep ?? defaultSleep;
  const pauseMs = options.rateLimitPauseMs ?? RATE_LIMIT_PAUSE_MS;
  const enriched = issues.map(issue => ({ ...issue }));

  for (const issue of enriched) {
    const endpoint = `${issue.repository_url}/languages`;
    try {
      const languages = await source.listRepoLanguages(issue.repository_url);
      issue.languages = topLanguages(languages);
    } catch (err) {
      const status = getErrorStatus(err);
      if (status === 403) {
        log.warning(`⏳ Rate limit reached getting languages; pausing ${Math.round(pauseMs / 1000)}s`);
        await sleep(pauseMs);
        return { issues: enriched, rateLimited: true };
      }
      if (status === 404) {
        log.warning(`⚠️ Repository not found: ${endpoint}`);
      } else if (status !== undefined) {
        log.warning(`⚠️ Could not get languages for ${endpoint}: ${status}`);
      } else {
        log.error(`❌ Error getting languages for ${endpoint}: ${getErrorMessage(err)}`);
      }
      issue.languages = {};
    }
  }

  return { issues: enriched, rateLimited: false };
}
