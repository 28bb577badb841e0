export { JiraClient } from './jira-client.js';
export { GitHubClient } from './github-client.js';
export {
  ISSUE_KEY_PATTERN,
  extractIssueKeys,
  harvestIssueKeys,
  loadEventPayload,
  parseEventPayload,
} from './issue-keys.js';
export type { CiEvent, EventPayload, HarvestSources, PullRequestCommitSource } from './issue-keys.js';
export { ensureIssueComponent, linkRepositoryComponent, componentDescription } from './component-ensurer.js';
export type { EnsureOptions } from './component-ensurer.js';
export { loadAddComponentConfig, loadLinkRepositoryConfig, parseProjectFilter } from './config.js';
export { runAddComponent } from './commands/add-component.js';
export { linkRepository, runLinkRepository } from './commands/link-repository.js';
export { statusLines, writeOutputs } from './status-output.js';
export { ApiError, ConfigurationError } from './errors.js';
export * from './types.js';
