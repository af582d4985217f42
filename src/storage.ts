import * as fs from 'fs';
import * as path from 'path';
import { parseIssue } from './github';
import { getErrorMessage, Logger } from './log';
import type { Issue } from './types';

export const DEFAULT_MAX_HISTORY = 100;

export function backupPath(dbPath: string): string {
  return `${dbPath}.backup`;
}

export function loadHistory(dbPath: string, log: Logger): Issue[] {
  try {
    if (!fs.existsSync(dbPath)) return [];

    const contents = fs.readFileSync(dbPath, 'utf8');
    const data: unknown = contents ? JSON.parse(contents) : [];
    if (!Array.isArray(data)) {
      log.warning(`⚠️ ${dbPath} does not contain a list; treating it as empty`);
      return [];
    }

    const issues: Issue[] = [];
    for (const entry of data) {
      const issue = parseIssue(entry);
      if (issue) issues.push(issue);
      else log.warning(`⚠️ Dropping history entry without an issue URL from ${dbPath}`);
    }
    log.info(`📊 Loaded ${dbPath} with ${issues.length} entries`);
    return issues;
  } catch (err) {
    log.error(`⚠️ Failed to load ${dbPath}: ${getErrorMessage(err)}. Starting with empty history.`);
    return [];
  }
}

// Most recently updated first, capped at `limit`.
export function limitIssues(issues: Issue[], limit = DEFAULT_MAX_HISTORY): Issue[] {
  return [...issues]
    .sort((a, b) => (a.updated_at < b.updated_at ? 1 : a.updated_at > b.updated_at ? -1 : 0))
    .slice(0, limit);
}

/**
 * Replace the history file with the newest `limit` issues. The previous file is copied
 * to `<dbPath>.backup` first, and the new content is renamed into place so the file is
 * never left half-written.
 */
export function saveHistory(issues: Issue[], dbPath: string, limit: number, log: Logger): Issue[] {
  const tmpPath = `${dbPath}.tmp`;
  try {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });

    if (fs.existsSync(dbPath)) {
      fs.copyFileSync(dbPath, backupPath(dbPath));
      log.debug(`Created backup: ${backupPath(dbPath)}`);
    }

    const limited = limitIssues(issues, limit);
    fs.writeFileSync(tmpPath, JSON.stringify(limited, null, 2), 'utf8');
    fs.renameSync(tmpPath, dbPath);

    log.info(`💾 Saved ${limited.length} issue(s) to ${dbPath}`);
    return limited;
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    log.error(`⚠️ Failed to save ${dbPath}: ${getErrorMessage(err)}`);
    throw err;
  }
}
