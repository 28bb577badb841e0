import chalk from 'chalk';
import { ensureIssueComponent } from '../component-ensurer.js';
import { JiraClient } from '../jira-client.js';
import { createLogger } from '../logger.js';
import { statusLines, writeOutputs } from '../status-output.js';
import type { AddComponentConfig, IssueTracker, RunResult } from '../types.js';

const log = createLogger('add-component');

export interface AddComponentDeps {
  tracker?: IssueTracker;
}

function printResult(result: RunResult, config: AddComponentConfig): void {
  switch (result.status) {
    case 'processed':
      console.log(chalk.green(`✓ Component '${config.componentName}' is on ${config.issueKey}`));
      break;
    case 'skipped':
      console.log(chalk.yellow(`⊘ Skipped ${config.issueKey} (${result.reason})`));
      break;
    case 'failed':
      console.error(chalk.red(`✗ Error: ${result.message}`));
      break;
  }
}

/**
 * Ensure the configured component is on the configured issue.
 * Resolves to the process exit code: 1 on failure, 0 otherwise.
 */
export async function runAddComponent(config: AddComponentConfig, deps: AddComponentDeps = {}): Promise<number> {
  const tracker = deps.tracker ?? new JiraClient(config.jira);
  log.info(`Connecting to Jira at ${config.jira.baseUrl} as ${config.jira.email}`);

  const result = await ensureIssueComponent(
    tracker,
    config.issueKey,
    config.componentName,
    config.projectFilter,
    {
      attachStrategy: config.attachStrategy,
      componentLeadAccountId: config.componentLeadAccountId,
      dryRun: config.dryRun
    }
  );

  printResult(result, config);
  await writeOutputs(config.outputPath, statusLines(result));

  return result.status === 'failed' ? 1 : 0;
}
