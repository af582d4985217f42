import * as fs from 'fs';
import chalk from 'chalk';
import { loadCredentials } from './credentials';
import { freshOf, uniqueByUrl } from './dedupe';
import { fetchFreshIssues } from './fetcher';
import type { IssueSource } from './github';
import { enrichLanguages } from './languages';
import { getErrorMessage, Logger } from './log';
import { humanizeRepoUrl, humanizeUrl } from './post';
import { PosterFactory, publishIssues } from './publisher';
import { RunStatistics } from './stats';
import { loadHistory, saveHistory } from './storage';
import { countOutcomes, formatPublishSummary } from './summary';
import type { Config, Credentials, Issue, PublishOutcome, Sleep } from './types';

// Conditions that end the run with a failure status before the history is touched.
export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineError';
  }
}

export interface PipelineDeps {
  source: IssueSource;
  log: Logger;
  createPoster?: PosterFactory;
  sleep?: Sleep;
  now?: () => Date;
  stats?: RunStatistics;
}

export interface RunReport {
  fresh: Issue[];
  outcomes: PublishOutcome[];
  history: Issue[];
  labelsFetched: number;
  rateLimited: boolean;
  stats: RunStatistics;
}

export async function runPipeline(cfg: Config, deps: PipelineDeps): Promise<RunReport> {
  const { source, log } = deps;
  const now = deps.now ?? (() => new Date());
  const stats = deps.stats ?? new RunStatistics(now().getTime());

  const dbExists = fs.existsSync(cfg.dbPath);
  if (!dbExists && !cfg.create) {
    throw new PipelineError(`Database file "${cfg.dbPath}" does not exist. Set create to true to create it.`);
  }
  if (dbExists && cfg.create) {
    log.warning(`⚠️ Database file "${cfg.dbPath}" already exists but create was set; continuing with it.`);
  }

  const history = dbExists ? loadHistory(cfg.dbPath, log) : [];
  log.info(`📚 Loaded ${history.length} existing issue(s)`);
  log.info(`🏷️ Searching for labels: ${cfg.labels.map(l => `"${l}"`).join(', ')}`);

  const fetched: Issue[] = [];
  let labelsFetched = 0;
  for (const label of cfg.labels) {
    const result = await fetchFreshIssues(source, label, cfg.maxAgeDays, log, now());
    stats.trackLabel(result.ok);
    if (!result.ok) continue;
    labelsFetched++;
    fetched.push(...result.issues);
  }

  if (labelsFetched === 0) {
    throw new PipelineError('No issues could be fetched from any label.');
  }

  const unique = uniqueByUrl(fetched);
  stats.trackFound(unique.length);
  log.info(`🔢 Total unique issues found: ${unique.length}`);

  let fresh = freshOf(history, unique);
  stats.trackFresh(fresh.length);
  log.info(`🆕 Fresh issues (not in history): ${fresh.length}`);

  let outcomes: PublishOutcome[] = [];
  let rateLimited = false;

  if (fresh.length > 0 && !cfg.onlySave) {
    let credentials: Credentials;
    try {
      credentials = loadCredentials(cfg.credentialsPath);
    } catch (err) {
      throw new PipelineError(`Error loading credentials: ${getErrorMessage(err)}`);
    }

    try {
      log.info('🌐 Adding repository language information...');
      const enriched = await enrichLanguages(source, fresh, log, { sleep: deps.sleep });
      fresh = enriched.issues;
      rateLimited = enriched.rateLimited;

      previewPosts(fresh, log);
      if (cfg.dryRun) log.info(chalk.yellow.bold('🧪 [dry-run] No posts will be sent'));

      outcomes = await publishIssues(fresh, credentials, {
        dryRun: cfg.dryRun,
        log,
        createPoster: deps.createPoster,
        sleep: deps.sleep,
      });

      const { posted, failed } = countOutcomes(outcomes);
      stats.trackOutcomes(posted, failed);
      log.info('\n' + chalk.bold.cyan('📋 Posting Results:'));
      for (const line of formatPublishSummary(outcomes)) {
        log.info(`  ${line.startsWith('✓') ? chalk.green(line) : chalk.red(line)}`);
      }
    } catch (err) {
      // History is saved below regardless of posting errors.
      log.error(`❌ Error while posting: ${getErrorMessage(err)}`);
    }
  } else if (fresh.length > 0) {
    log.info('⏭️ Skipping posts (only-save)');
  } else {
    log.info('⏭️ No fresh issues to process');
  }

  let saved: Issue[];
  try {
    saved = saveHistory([...fresh, ...history], cfg.dbPath, cfg.maxHistory, log);
  } catch (err) {
    throw new PipelineError(`Error updating database: ${getErrorMessage(err)}`);
  }
  stats.trackHistorySize(saved.length);
  stats.finish(now().getTime());

  return { fresh, outcomes, history: saved, labelsFetched, rateLimited, stats };
}

function previewPosts(issues: Issue[], log: Logger): void {
  log.info(chalk.bold.cyan(`\nPreparing to post ${issues.length} issue(s):`));
  issues.forEach((issue, i) => {
    log.info(`  ${i + 1}. ${issue.title || 'No title'} (${humanizeRepoUrl(issue.repository_url)})`);
    try {
      log.info(chalk.dim(`     URL: ${humanizeUrl(issue.url)}`));
    } catch (err) {
      log.warning(`     ⚠️ ${getErrorMessage(err)}`);
    }
  });
}
