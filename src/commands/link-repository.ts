import chalk from 'chalk';
import { linkRepositoryComponent } from '../component-ensurer.js';
import { readLastCommitMessage } from '../git.js';
import { GitHubClient } from '../github-client.js';
import { harvestIssueKeys, loadEventPayload, PullRequestCommitSource } from '../issue-keys.js';
import { JiraClient } from '../jira-client.js';
import { createLogger } from '../logger.js';
import { writeOutputs } from '../status-output.js';
import type { IssueTracker, LinkOutcome, LinkRepositoryConfig } from '../types.js';

const log = createLogger('link-repository');

export interface LinkRepositoryDeps {
  tracker?: IssueTracker;
  github?: PullRequestCommitSource;
  readLastCommitMessage?: () => Promise<string>;
}

export interface LinkRepositoryReport {
  issueKeys: string[];
  outcomes: LinkOutcome[];
}

/**
 * Harvest issue keys from the CI event and attach the repository
 * component to each. Per-issue failures are reported, never fatal.
 */
export async function linkRepository(
  config: LinkRepositoryConfig,
  deps: LinkRepositoryDeps = {}
): Promise<LinkRepositoryReport> {
  const payload = await loadEventPayload(config.eventPath);
  const issueKeys = await harvestIssueKeys(
    { name: config.eventName, payload },
    {
      github: deps.github ?? new GitHubClient(config.github),
      pullRequest: config.pullRequest,
      readLastCommitMessage: deps.readLastCommitMessage ?? (() => readLastCommitMessage())
    }
  );

  if (issueKeys.length === 0) {
    log.info('No Jira issue keys found. Nothing to do.');
    return { issueKeys, outcomes: [] };
  }
  log.info(`Found issue keys: ${issueKeys.join(', ')}`);

  const tracker = deps.tracker ?? new JiraClient(config.jira);
  const outcomes = await linkRepositoryComponent(tracker, issueKeys, config.repoName, {
    componentLeadAccountId: config.componentLeadAccountId,
    dryRun: config.dryRun
  });

  return { issueKeys, outcomes };
}

export async function runLinkRepository(config: LinkRepositoryConfig, deps: LinkRepositoryDeps = {}): Promise<number> {
  const { issueKeys, outcomes } = await linkRepository(config, deps);

  const linked = outcomes.filter(o => o.status === 'linked').length;
  const failed = outcomes.length - linked;
  if (outcomes.length > 0) {
    const summary = `${linked} linked, ${failed} failed`;
    console.log(failed > 0 ? chalk.yellow(`⚠ ${summary}`) : chalk.green(`✓ ${summary}`));
  }

  await writeOutputs(config.outputPath, ['status=processed', `issue_keys=${issueKeys.join(',')}`]);
  return 0;
}
