import { vi } from 'vitest';
import type { Issue } from '../src/types';

export function makeIssue(number: number, overrides: Partial<Issue> = {}): Issue {
  return {
    url: `https://api.github.com/repos/octo/widgets/issues/${number}`,
    title: `Issue ${number}`,
    created_at: '2024-06-18T12:00:00Z',
    updated_at: '2024-06-19T12:00:00Z',
    repository_url: 'https://api.github.com/repos/octo/widgets',
    ...overrides,
  };
}

export function createLogger() {
  return {
    debug: vi.fn<(message: string) => void>(),
    info: vi.fn<(message: string) => void>(),
    warning: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
  };
}

// Shaped like an Octokit RequestError as far as status handling is concerned.
export function httpError(status: number): Error & { status: number } {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}
