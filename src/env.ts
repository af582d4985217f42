import * as core from '@actions/core';
import { DEFAULT_MAX_AGE_DAYS } from './freshness';
import { DEFAULT_MAX_HISTORY } from './storage';
import type { Config } from './types';

export const DEFAULT_LABELS = ['good first issue', 'good-first-issue', 'beginner-friendly'];

// Parse a comma separated label list; blank fragments are ignored.
export function parseLabels(input?: string): string[] | undefined {
  if (!input) return undefined;
  const labels = input.split(',').map(s => s.trim()).filter(Boolean);
  return labels.length ? labels : undefined;
}

function parseBoolean(input: string): boolean {
  return input.trim().toLowerCase() === 'true';
}

function parsePositiveInt(input: string, fallback: number): number {
  const value = Number(input);
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback;
}

/**
 * Resolve runtime config from action inputs (or INPUT_* variables when run locally).
 * The GitHub token is optional: search works anonymously at a lower rate limit.
 */
export function getConfig(): Config {
  const token = core.getInput('github-token') || process.env.GITHUB_TOKEN || '';
  if (token) core.setSecret(token);

  return {
    labels: parseLabels(core.getInput('labels')) ?? DEFAULT_LABELS,
    ...(token ? { token } : {}),
    dbPath: core.getInput('db-path') || 'data/db.json',
    create: parseBoolean(core.getInput('create')),
    credentialsPath: core.getInput('credentials-path') || 'credentials.json',
    dryRun: parseBoolean(core.getInput('dry-run')),
    onlySave: parseBoolean(core.getInput('only-save')),
    maxAgeDays: parsePositiveInt(core.getInput('max-age-days'), DEFAULT_MAX_AGE_DAYS),
    maxHistory: parsePositiveInt(core.getInput('max-history'), DEFAULT_MAX_HISTORY),
  };
}
