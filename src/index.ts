import * as core from '@actions/core';
import chalk from 'chalk';
import { getConfig } from './env';
import { GitHubClient } from './github';
import { actionsLogger, getErrorMessage } from './log';
import { runPipeline } from './pipeline';
import { createTwitterPoster } from './publisher';
import { RunStatistics } from './stats';
import { countOutcomes } from './summary';

chalk.level = 3;

async function run(): Promise<void> {
  const cfg = getConfig();
  const gh = new GitHubClient(cfg.token);
  const stats = new RunStatistics();

  console.log(chalk.bold.cyan('🚀 Starting first-timers bot'));
  console.log(`⚙️ Posting: ${cfg.onlySave ? 'off (only-save)' : cfg.dryRun ? 'dry-run' : 'yes'}`);

  const report = await runPipeline(cfg, {
    source: gh,
    log: actionsLogger,
    createPoster: createTwitterPoster,
    stats,
  });

  const { posted, failed } = countOutcomes(report.outcomes);
  core.setOutput('fresh-count', report.fresh.length);
  core.setOutput('published-count', posted);
  core.setOutput('failed-count', failed);

  stats.incrementGithubApiCalls(gh.getApiCallCount());
  stats.printSummary(actionsLogger);
  console.log(chalk.green.bold('🎉 Completed'));
}

run().catch(err => core.setFailed(getErrorMessage(err)));
