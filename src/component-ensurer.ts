import { parseProjectFilter } from './config.js';
import { createLogger } from './logger.js';
import type {
  ApiResult,
  AttachStrategy,
  IssueTracker,
  JiraComponent,
  LinkOutcome,
  RunResult,
} from './types.js';

const log = createLogger('component-ensurer');

export interface EnsureOptions {
  attachStrategy?: AttachStrategy;
  componentLeadAccountId?: string;
  dryRun?: boolean;
}

interface ResolvedComponent {
  component: JiraComponent;
  created: boolean;
}

export function componentDescription(componentName: string): string {
  return `Component for ${componentName} repository`;
}

const DRY_RUN_COMPONENT_ID = 'DRY-RUN';

/**
 * Find the component by name in the project, creating it when absent
 */
async function resolveComponent(
  tracker: IssueTracker,
  projectKey: string,
  componentName: string,
  options: EnsureOptions
): Promise<ApiResult<ResolvedComponent>> {
  const listed = await tracker.listProjectComponents(projectKey);
  if (!listed.ok) return listed;

  const existing = listed.value.find(c => c.name === componentName);
  if (existing) {
    log.info(`Component '${componentName}' already exists in project ${projectKey}`);
    return { ok: true, value: { component: existing, created: false } };
  }

  if (options.dryRun) {
    log.info(`[DRY-RUN] Would create component '${componentName}' in project ${projectKey}`);
    return {
      ok: true,
      value: { component: { id: DRY_RUN_COMPONENT_ID, name: componentName }, created: true }
    };
  }

  log.info(`Component '${componentName}' does not exist in project ${projectKey}. Creating it...`);
  const created = await tracker.createComponent({
    name: componentName,
    project: projectKey,
    description: componentDescription(componentName),
    ...(options.componentLeadAccountId ? { leadAccountId: options.componentLeadAccountId } : {})
  });
  if (!created.ok) return created;

  log.info(`Component '${componentName}' ready (ID: ${created.value.id})`);
  return { ok: true, value: { component: created.value, created: true } };
}

function describeFilter(allowed: string[]): void {
  if (allowed.length === 1) {
    log.info(`Project filter configured: ${allowed[0]}`);
    log.info(`Only issues from project '${allowed[0]}' will have components added`);
  } else {
    log.info(`Project filter configured: ${allowed.join(', ')}`);
    log.info(`Only issues from projects ${allowed.join(', ')} will have components added`);
  }
}

function failed(message: string): RunResult {
  log.error(message);
  return { status: 'failed', reason: 'api_error', message };
}

/**
 * Ensure a named component exists in the issue's project and is on the
 * issue, for issues whose project is in the comma-separated filter.
 *
 * A blank filter, a filter with no keys and an issue from another project
 * are all skips; any Jira failure is reported as failed(api_error).
 */
export async function ensureIssueComponent(
  tracker: IssueTracker,
  issueKey: string,
  componentName: string,
  projectFilter: string | undefined,
  options: EnsureOptions = {}
): Promise<RunResult> {
  try {
    return await ensure(tracker, issueKey, componentName, projectFilter, options);
  } catch (error) {
    return failed(error instanceof Error ? error.message : String(error));
  }
}

async function ensure(
  tracker: IssueTracker,
  issueKey: string,
  componentName: string,
  projectFilter: string | undefined,
  options: EnsureOptions
): Promise<RunResult> {
  if (!projectFilter || projectFilter.trim() === '') {
    log.warn('Skipping: JIRA_PROJECT is not configured or is empty');
    log.warn('Configure JIRA_PROJECT with one or more project keys, e.g. JIRA_PROJECT=CA or JIRA_PROJECT=DEV,QA,PROD');
    return { status: 'skipped', reason: 'missing_project_filter' };
  }

  const allowed = parseProjectFilter(projectFilter);
  if (allowed.length === 0) {
    log.warn(`Skipping: JIRA_PROJECT contains no valid project keys (current value: '${projectFilter}')`);
    return { status: 'skipped', reason: 'invalid_project_filter' };
  }
  describeFilter(allowed);

  log.info(`Fetching issue ${issueKey}...`);
  const issue = await tracker.getIssue(issueKey);
  if (!issue.ok) return failed(issue.error.describe());

  const { projectKey } = issue.value;
  log.info(`Issue found in project: ${projectKey}`);

  if (!allowed.includes(projectKey.toUpperCase())) {
    log.warn(`Skipping: issue ${issueKey} is from project '${projectKey}' (allowed: ${allowed.join(', ')})`);
    return { status: 'skipped', reason: 'project_not_allowed' };
  }

  const resolved = await resolveComponent(tracker, projectKey, componentName, options);
  if (!resolved.ok) return failed(resolved.error.describe());
  const { component, created } = resolved.value;

  const existingNames = issue.value.components.map(c => c.name);
  log.info(`Existing components on issue: ${existingNames.length > 0 ? existingNames.join(', ') : '(none)'}`);

  if (existingNames.includes(componentName)) {
    log.info(`Component '${componentName}' is already added to issue ${issueKey}`);
    return { status: 'processed', issueKey, component, created, attached: false };
  }

  const strategy = options.attachStrategy ?? 'add';
  if (options.dryRun) {
    log.info(`[DRY-RUN] Would add component '${componentName}' to issue ${issueKey} (${strategy})`);
    return { status: 'processed', issueKey, component, created, attached: true };
  }

  log.info(`Adding component '${componentName}' to issue ${issueKey}...`);
  const attached = strategy === 'replace'
    ? await tracker.setIssueComponents(issueKey, [...new Set([...existingNames, componentName])])
    : await tracker.addComponentToIssue(issueKey, component.id);
  if (!attached.ok) return failed(attached.error.describe());

  log.info(`Successfully added component '${componentName}' to issue ${issueKey}`);
  return { status: 'processed', issueKey, component, created, attached: true };
}

async function linkOne(
  tracker: IssueTracker,
  issueKey: string,
  componentName: string,
  options: EnsureOptions
): Promise<LinkOutcome> {
  const issue = await tracker.getIssue(issueKey);
  if (!issue.ok) {
    return { issueKey, status: 'failed', message: issue.error.describe() };
  }

  const resolved = await resolveComponent(tracker, issue.value.projectKey, componentName, options);
  if (!resolved.ok) {
    return { issueKey, status: 'failed', message: resolved.error.describe() };
  }
  const { component, created } = resolved.value;

  if (options.dryRun) {
    log.info(`[DRY-RUN] Would add component '${componentName}' to ${issueKey}`);
    return { issueKey, status: 'linked', componentId: component.id, created };
  }

  const attached = await tracker.addComponentToIssue(issueKey, component.id);
  if (!attached.ok) {
    return { issueKey, status: 'failed', message: attached.error.describe() };
  }

  return { issueKey, status: 'linked', componentId: component.id, created };
}

/**
 * Attach the repository component to every issue key, one at a time.
 * A failing issue is logged and skipped; the rest are still processed.
 */
export async function linkRepositoryComponent(
  tracker: IssueTracker,
  issueKeys: string[],
  componentName: string,
  options: EnsureOptions = {}
): Promise<LinkOutcome[]> {
  const outcomes: LinkOutcome[] = [];

  for (const issueKey of issueKeys) {
    let outcome: LinkOutcome;
    try {
      outcome = await linkOne(tracker, issueKey, componentName, options);
    } catch (error) {
      outcome = {
        issueKey,
        status: 'failed',
        message: error instanceof Error ? error.message : String(error)
      };
    }

    if (outcome.status === 'linked') {
      log.info(`[OK] ${issueKey} + component '${componentName}'`);
    } else {
      log.warn(`[WARN] ${issueKey}: ${outcome.message}`);
    }
    outcomes.push(outcome);
  }

  return outcomes;
}
