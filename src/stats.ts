import chalk from 'chalk';
import type { Logger } from './log';

export class RunStatistics {
  private startTime: number;
  private endTime: number | null = null;
  private labelsTotal = 0;
  private labelsFetched = 0;
  private found = 0;
  private fresh = 0;
  private posted = 0;
  private failed = 0;
  private historySize = 0;
  private githubApiCalls = 0;

  constructor(now: number = Date.now()) {
    this.startTime = now;
  }

  trackLabel(ok: boolean): void {
    this.labelsTotal++;
    if (ok) this.labelsFetched++;
  }

  trackFound(count: number): void {
    this.found = count;
  }

  trackFresh(count: number): void {
    this.fresh = count;
  }

  trackOutcomes(posted: number, failed: number): void {
    this.posted += posted;
    this.failed += failed;
  }

  trackHistorySize(count: number): void {
    this.historySize = count;
  }

  incrementGithubApiCalls(count: number = 1): void {
    this.githubApiCalls += count;
  }

  finish(now: number = Date.now()): void {
    this.endTime = now;
  }

  get labelsSucceeded(): number {
    return this.labelsFetched;
  }

  private formatDuration(ms: number): string {
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
    const minutes = Math.floor(ms / 60000);
    const seconds = Math.floor((ms % 60000) / 1000);
    return `${minutes}m${seconds}s`;
  }

  summaryLines(): string[] {
    const lines: string[] = [];
    lines.push(`Labels processed: ${this.labelsFetched}/${this.labelsTotal}`);
    lines.push(`Unique issues found: ${this.found} • Fresh: ${this.fresh}`);

    const postParts: string[] = [];
    if (this.posted > 0) postParts.push(`✅ ${this.posted} posted`);
    if (this.failed > 0) postParts.push(`❌ ${this.failed} failed`);
    if (postParts.length > 0) lines.push(`Posts: ${postParts.join(', ')}`);

    lines.push(`Issues in history: ${this.historySize}`);
    if (this.githubApiCalls > 0) lines.push(`GitHub API calls: ${this.githubApiCalls}`);
    if (this.endTime !== null) lines.push(`Duration: ${this.formatDuration(this.endTime - this.startTime)}`);
    return lines;
  }

  printSummary(log: Logger): void {
    log.info('\n' + chalk.bold('📊 Run Statistics:'));
    for (const line of this.summaryLines()) {
      log.info(`  ${line}`);
    }
  }
}
