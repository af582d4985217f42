import type { PublishOutcome } from './types';

export function formatPublishSummary(outcomes: PublishOutcome[]): string[] {
  const lines: string[] = [];

  for (const outcome of outcomes) {
    if (outcome.error === null) {
      lines.push(`✓ ${outcome.text}`);
    } else {
      lines.push(`✗ ${outcome.text}`);
      lines.push(`    Error: ${outcome.error}`);
    }
  }

  return lines;
}

export function countOutcomes(outcomes: PublishOutcome[]): { posted: number; failed: number } {
  const failed = outcomes.filter(o => o.error !== null).length;
  return { posted: outcomes.length - failed, failed };
}
