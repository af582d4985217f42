import { TwitterApi } from 'twitter-api-v2';
import { formatPost } from './post';
import { missingCredentialFields } from './credentials';
import { getErrorMessage, Logger } from './log';
import { sleep as defaultSleep } from './sleep';
import type { Credentials, Issue, PublishOutcome, Sleep } from './types';

export const COURTESY_DELAY_MS = 1000;

export interface SocialPoster {
  // Confirms the credentials work and returns the account handle.
  verify(): Promise<string>;
  // Publishes one post and returns the id the platform assigned to it.
  post(text: string): Promise<string>;
}

export type PosterFactory = (credentials: Credentials) => SocialPoster;

export class TwitterPoster implements SocialPoster {
  private client: TwitterApi;

  constructor(credentials: Credentials) {
    this.client = new TwitterApi({
      appKey: credentials['Consumer Key'],
      appSecret: credentials['Consumer Secret'],
      accessToken: credentials['Access Token'],
      accessSecret: credentials['Access Token Secret'],
    });
  }

  async verify(): Promise<string> {
    const { data } = await this.client.v2.me();
    return data.username;
  }

  async post(text: string): Promise<string> {
    const { data } = await this.client.v2.tweet(text);
    return data.id;
  }
}

export const createTwitterPoster: PosterFactory = credentials => new TwitterPoster(credentials);

export interface PublishOptions {
  dryRun: boolean;
  log: Logger;
  createPoster?: PosterFactory;
  sleep?: Sleep;
  courtesyDelayMs?: number;
}

/**
 * Format and post each issue in order. One issue failing (bad URL, rejected post)
 * is recorded in its outcome and does not stop the batch. Returns an empty list
 * when credentials are incomplete or the account cannot be verified.
 */
export async function publishIssues(
  issues: Issue[],
  credentials: Credentials,
  options: PublishOptions
): Promise<PublishOutcome[]> {
  const { dryRun, log } = options;
  const createPoster = options.createPoster ?? createTwitterPoster;
  const sleep = options.sleep ?? defaultSleep;
  const delayMs = options.courtesyDelayMs ?? COURTESY_DELAY_MS;

  if (issues.length === 0) {
    log.info('ℹ️ No issues to post');
    return [];
  }

  const missing = missingCredentialFields(credentials);
  if (missing.length > 0) {
    log.error(`❌ Missing credential(s): ${missing.join(', ')}`);
    return [];
  }

  let poster: SocialPoster;
  try {
    poster = createPoster(credentials);
    const handle = await poster.verify();
    log.info(`🔑 Authenticated as @${handle}`);
  } catch (err) {
    log.error(`❌ Authentication failed: ${getErrorMessage(err)}`);
    return [];
  }

  const outcomes: PublishOutcome[] = [];
  for (const issue of issues) {
    let text: string | undefined;
    try {
      text = formatPost(issue);
      if (dryRun) {
        log.info(`🧪 [dry-run] would post: ${text}`);
      } else {
        const id = await poster.post(text);
        log.info(`📣 Posted "${issue.title}" (id ${id})`);
        await sleep(delayMs);
      }
      outcomes.push({ error: null, text, issueUrl: issue.url });
    } catch (err) {
      const error = getErrorMessage(err);
      log.error(`❌ Error posting issue "${issue.title}": ${error}`);
      outcomes.push({ error, text: text ?? 'Failed to create post', issueUrl: issue.url });
    }
  }
  return outcomes;
}
