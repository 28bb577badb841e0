import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { ConfigurationError } from './errors.js';
import type {
  AddComponentConfig,
  GitHubConfig,
  JiraConfig,
  LinkRepositoryConfig,
  PullRequestRef,
} from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load environment variables
dotenv.config({ path: join(__dirname, '../.env') });

type Env = Record<string, string | undefined>;

export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

const timeoutSchema = z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS);

const jiraSchema = z.object({
  baseUrl: z.string().url().transform(url => url.replace(/\/+$/, '')),
  email: z.string().min(1),
  apiToken: z.string().min(1),
  timeoutMs: timeoutSchema,
});

const githubSchema = z.object({
  apiUrl: z.string().url().transform(url => url.replace(/\/+$/, '')),
  token: z.string().min(1).optional(),
  timeoutMs: timeoutSchema,
});

const attachStrategySchema = z.enum(['add', 'replace']).default('add');

const pullRequestSchema = z.object({
  owner: z.string().min(1),
  repo: z.string().min(1),
  number: z.coerce.number().int().positive(),
});

export interface LoadOptions {
  dryRun?: boolean;
}

function value(env: Env, name: string): string | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * Throws a ConfigurationError naming every variable that is unset or blank.
 */
function requireVars(env: Env, names: string[]): void {
  const missing = names.filter(name => value(env, name) === undefined);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(', ')}`,
      missing
    );
  }
}

function parse<T extends z.ZodTypeAny>(schema: T, input: unknown, label: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || label}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${label} configuration: ${details}`);
  }
  return result.data;
}

function jiraConfig(env: Env, email: string | undefined): JiraConfig {
  return parse(jiraSchema, {
    baseUrl: value(env, 'JIRA_BASE_URL'),
    email,
    apiToken: value(env, 'JIRA_API_TOKEN'),
    timeoutMs: value(env, 'HTTP_TIMEOUT_MS'),
  }, 'jira');
}

/**
 * Split a comma-separated project filter into upper-cased keys.
 * "ca, Dev ," gives ["CA", "DEV"].
 */
export function parseProjectFilter(raw: string | undefined): string[] {
  if (!raw) return [];
  const keys = raw
    .split(',')
    .map(key => key.trim().toUpperCase())
    .filter(key => key.length > 0);
  return [...new Set(keys)];
}

// JIRA_USER_EMAIL and JIRA_EMAIL are interchangeable
function withEmailAlias(env: Env, preferred: 'JIRA_USER_EMAIL' | 'JIRA_EMAIL'): Env {
  const email = value(env, 'JIRA_USER_EMAIL') ?? value(env, 'JIRA_EMAIL');
  return { ...env, [preferred]: email };
}

export function loadAddComponentConfig(source: Env = process.env, options: LoadOptions = {}): AddComponentConfig {
  const env = withEmailAlias(source, 'JIRA_USER_EMAIL');
  requireVars(env, ['JIRA_BASE_URL', 'JIRA_USER_EMAIL', 'JIRA_API_TOKEN', 'ISSUE_KEY', 'COMPONENT_NAME']);

  return {
    jira: jiraConfig(env, value(env, 'JIRA_USER_EMAIL')),
    issueKey: value(env, 'ISSUE_KEY') ?? '',
    componentName: value(env, 'COMPONENT_NAME') ?? '',
    // Kept raw: a blank or keyless filter is a skip, not a configuration error
    projectFilter: env.JIRA_PROJECT,
    attachStrategy: parse(attachStrategySchema, value(env, 'JIRA_ATTACH_STRATEGY'), 'JIRA_ATTACH_STRATEGY'),
    componentLeadAccountId: value(env, 'JIRA_COMPONENT_LEAD'),
    outputPath: value(env, 'GITHUB_OUTPUT'),
    dryRun: options.dryRun ?? false,
  };
}

export function loadLinkRepositoryConfig(source: Env = process.env, options: LoadOptions = {}): LinkRepositoryConfig {
  const env = withEmailAlias(source, 'JIRA_EMAIL');
  requireVars(env, ['JIRA_BASE_URL', 'JIRA_EMAIL', 'JIRA_API_TOKEN', 'REPO_NAME', 'GITHUB_EVENT_NAME']);

  const github: GitHubConfig = parse(githubSchema, {
    apiUrl: value(env, 'GITHUB_API_URL') ?? DEFAULT_GITHUB_API_URL,
    token: value(env, 'GITHUB_TOKEN'),
    timeoutMs: value(env, 'HTTP_TIMEOUT_MS'),
  }, 'github');

  // PR coordinates are optional; an incomplete or malformed set disables the commit lookup
  const pr = pullRequestSchema.safeParse({
    owner: value(env, 'OWNER'),
    repo: value(env, 'REPO'),
    number: value(env, 'PR_NUMBER'),
  });
  const pullRequest: PullRequestRef | undefined = pr.success ? pr.data : undefined;

  return {
    jira: jiraConfig(env, value(env, 'JIRA_EMAIL')),
    github,
    repoName: value(env, 'REPO_NAME') ?? '',
    eventName: value(env, 'GITHUB_EVENT_NAME') ?? '',
    eventPath: value(env, 'GITHUB_EVENT_PATH'),
    pullRequest,
    componentLeadAccountId: value(env, 'JIRA_COMPONENT_LEAD'),
    outputPath: value(env, 'GITHUB_OUTPUT'),
    dryRun: options.dryRun ?? false,
  };
}
