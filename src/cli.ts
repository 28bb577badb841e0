#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { loadAddComponentConfig, loadLinkRepositoryConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { runAddComponent } from './commands/add-component.js';
import { runLinkRepository } from './commands/link-repository.js';
import logger, { setLogLevel } from './logger.js';

type Env = Record<string, string | undefined>;

interface AddComponentOptions {
  issueKey?: string;
  component?: string;
  projects?: string;
  attachStrategy?: string;
  dryRun?: boolean;
}

interface LinkRepositoryOptions {
  repoName?: string;
  eventName?: string;
  eventPath?: string;
  dryRun?: boolean;
}

const ADD_COMPONENT_VARS = ['JIRA_BASE_URL', 'JIRA_USER_EMAIL', 'JIRA_API_TOKEN', 'ISSUE_KEY', 'COMPONENT_NAME'];
const LINK_REPOSITORY_VARS = ['JIRA_BASE_URL', 'JIRA_EMAIL', 'JIRA_API_TOKEN', 'REPO_NAME', 'GITHUB_EVENT_NAME'];

/**
 * Flags take precedence over the environment
 */
function withOverrides(overrides: Env): Env {
  const env: Env = { ...process.env };
  for (const [name, value] of Object.entries(overrides)) {
    if (value !== undefined) env[name] = value;
  }
  return env;
}

function reportConfigurationError(error: ConfigurationError, required: string[]): void {
  console.error(chalk.red(`Error: ${error.message}`));
  if (error.missing.length === 0) return;
  for (const name of required) {
    const mark = error.missing.includes(name) ? chalk.red('✗') : chalk.green('✓');
    console.error(`  ${name}: ${mark}`);
  }
}

async function guard(required: string[], run: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await run();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      reportConfigurationError(error, required);
    } else {
      logger.error('Command failed', error);
      console.error(chalk.red(`✗ Error: ${error instanceof Error ? error.message : String(error)}`));
    }
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name('jira-component-sync')
  .description('Keep Jira components in sync with commits and pull requests')
  .version('1.0.0')
  .option('-v, --verbose', 'Enable debug logging')
  .hook('preAction', (command) => {
    if (command.opts<{ verbose?: boolean }>().verbose) {
      setLogLevel('debug');
    }
  });

program
  .command('add-component')
  .description('Ensure a component exists in an issue\'s project and is attached to the issue')
  .option('-i, --issue-key <key>', 'Issue key (ISSUE_KEY)')
  .option('-c, --component <name>', 'Component name (COMPONENT_NAME)')
  .option('-p, --projects <keys>', 'Comma-separated allowed project keys (JIRA_PROJECT)')
  .option('-s, --attach-strategy <strategy>', 'add or replace (JIRA_ATTACH_STRATEGY)')
  .option('--dry-run', 'Show what would change without creating or attaching anything')
  .action(async (options: AddComponentOptions) => {
    await guard(ADD_COMPONENT_VARS, async () => {
      const env = withOverrides({
        ISSUE_KEY: options.issueKey,
        COMPONENT_NAME: options.component,
        JIRA_PROJECT: options.projects,
        JIRA_ATTACH_STRATEGY: options.attachStrategy
      });
      const config = loadAddComponentConfig(env, { dryRun: options.dryRun });
      return runAddComponent(config);
    });
  });

program
  .command('link-repository')
  .description('Attach a component named after the repository to every issue mentioned by the CI event')
  .option('-r, --repo-name <name>', 'Repository name used as the component name (REPO_NAME)')
  .option('-e, --event-name <name>', 'push or pull_request (GITHUB_EVENT_NAME)')
  .option('--event-path <path>', 'Event payload JSON file (GITHUB_EVENT_PATH)')
  .option('--dry-run', 'Show what would change without creating or attaching anything')
  .action(async (options: LinkRepositoryOptions) => {
    await guard(LINK_REPOSITORY_VARS, async () => {
      const env = withOverrides({
        REPO_NAME: options.repoName,
        GITHUB_EVENT_NAME: options.eventName,
        GITHUB_EVENT_PATH: options.eventPath
      });
      const config = loadLinkRepositoryConfig(env, { dryRun: options.dryRun });
      return runLinkRepository(config);
    });
  });

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason });
  process.exit(1);
});

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', error);
  process.exit(1);
});

program.parseAsync().catch(error => {
  console.error(chalk.red('Fatal error:'), error);
  process.exit(1);
});
