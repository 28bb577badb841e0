import type { ApiError } from './errors.js';

export interface JiraComponent {
  id: string;
  name: string;
  description?: string;
}

export interface IssueSummary {
  key: string;
  projectKey: string;
  projectId: string;
  components: JiraComponent[];
}

export interface CreateComponentPayload {
  name: string;
  project: string;
  description?: string;
  leadAccountId?: string;
}

export type ApiResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ApiError };

/**
 * The handful of Jira operations the sync commands need.
 * JiraClient implements it against the REST API; tests provide fakes.
 */
export interface IssueTracker {
  getIssue(issueKey: string): Promise<ApiResult<IssueSummary>>;
  listProjectComponents(projectKey: string): Promise<ApiResult<JiraComponent[]>>;
  createComponent(payload: CreateComponentPayload): Promise<ApiResult<JiraComponent>>;
  addComponentToIssue(issueKey: string, componentId: string): Promise<ApiResult<void>>;
  setIssueComponents(issueKey: string, componentNames: string[]): Promise<ApiResult<void>>;
}

export type AttachStrategy = 'add' | 'replace';

export type SkipReason =
  | 'missing_project_filter'
  | 'invalid_project_filter'
  | 'project_not_allowed';

export type RunResult =
  | {
      status: 'processed';
      issueKey: string;
      component: JiraComponent;
      created: boolean;
      attached: boolean;
    }
  | { status: 'skipped'; reason: SkipReason }
  | { status: 'failed'; reason: 'api_error'; message: string };

export type LinkOutcome =
  | { issueKey: string; status: 'linked'; componentId: string; created: boolean }
  | { issueKey: string; status: 'failed'; message: string };

export interface JiraConfig {
  baseUrl: string;
  email: string;
  apiToken: string;
  timeoutMs: number;
}

export interface GitHubConfig {
  apiUrl: string;
  token?: string;
  timeoutMs: number;
}

export interface PullRequestRef {
  owner: string;
  repo: string;
  number: number;
}

export interface AddComponentConfig {
  jira: JiraConfig;
  issueKey: string;
  componentName: string;
  projectFilter?: string;
  attachStrategy: AttachStrategy;
  componentLeadAccountId?: string;
  outputPath?: string;
  dryRun: boolean;
}

export interface LinkRepositoryConfig {
  jira: JiraConfig;
  github: GitHubConfig;
  repoName: string;
  eventName: string;
  eventPath?: string;
  pullRequest?: PullRequestRef;
  componentLeadAccountId?: string;
  outputPath?: string;
  dryRun: boolean;
}
