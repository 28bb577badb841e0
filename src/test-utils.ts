import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { ApiError } from './errors.js';
import type {
  ApiResult,
  CreateComponentPayload,
  IssueSummary,
  IssueTracker,
  JiraComponent,
} from './types.js';

export interface StubReply {
  status: number;
  data?: unknown;
}

export type StubHandler = (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>;

/**
 * Axios transport that answers from a handler and records every request.
 */
export function stubAdapter(handler: StubHandler): { adapter: AxiosAdapter; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const reply = await handler(config);
    const response: AxiosResponse = {
      data: reply.data ?? '',
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
      request: {}
    };
    return response;
  };
  return { adapter, requests };
}

export function requestBody(config: InternalAxiosRequestConfig): unknown {
  return typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
}

type Operation = keyof IssueTracker;

/**
 * In-memory Jira: projects with components and issues that reference them.
 */
export class FakeTracker implements IssueTracker {
  readonly calls: Record<Operation, number> = {
    getIssue: 0,
    listProjectComponents: 0,
    createComponent: 0,
    addComponentToIssue: 0,
    setIssueComponents: 0
  };
  readonly created: CreateComponentPayload[] = [];
  private readonly issues = new Map<string, IssueSummary>();
  private readonly projects = new Map<string, JiraComponent[]>();
  private readonly failures = new Map<string, Operation>();
  private readonly throwing = new Set<string>();
  private nextId = 100;

  addProject(projectKey: string, components: JiraComponent[] = []): this {
    this.projects.set(projectKey, [...components]);
    return this;
  }

  addIssue(key: string, projectKey: string, componentNames: string[] = []): this {
    const projectComponents = this.projects.get(projectKey) ?? [];
    const components = componentNames.map(name => {
      const found = projectComponents.find(c => c.name === name);
      return found ?? { id: String(this.nextId++), name };
    });
    this.issues.set(key, { key, projectKey, projectId: `${projectKey}-ID`, components });
    return this;
  }

  /** Make `operation` return an HTTP 500 for the given issue or project key. */
  failWith(key: string, operation: Operation): this {
    this.failures.set(key, operation);
    return this;
  }

  /** Make every call about the given issue key throw. */
  throwFor(key: string): this {
    this.throwing.add(key);
    return this;
  }

  componentNamesOf(issueKey: string): string[] {
    return this.issues.get(issueKey)?.components.map(c => c.name) ?? [];
  }

  private check(operation: Operation, key: string): ApiError | undefined {
    this.calls[operation]++;
    if (this.throwing.has(key)) {
      throw new Error(`connection reset while calling ${operation} for ${key}`);
    }
    if (this.failures.get(key) === operation) {
      return ApiError.fromResponse(`${operation} ${key}`, 500, { errorMessages: ['Internal server error'] });
    }
    return undefined;
  }

  async getIssue(issueKey: string): Promise<ApiResult<IssueSummary>> {
    const error = this.check('getIssue', issueKey);
    if (error) return { ok: false, error };

    const issue = this.issues.get(issueKey);
    if (!issue) {
      return { ok: false, error: ApiError.fromResponse(`getIssue ${issueKey}`, 404, { errorMessages: ['Issue does not exist'] }) };
    }
    return { ok: true, value: { ...issue, components: [...issue.components] } };
  }

  async listProjectComponents(projectKey: string): Promise<ApiResult<JiraComponent[]>> {
    const error = this.check('listProjectComponents', projectKey);
    if (error) return { ok: false, error };
    return { ok: true, value: [...(this.projects.get(projectKey) ?? [])] };
  }

  async createComponent(payload: CreateComponentPayload): Promise<ApiResult<JiraComponent>> {
    const error = this.check('createComponent', payload.project);
    if (error) return { ok: false, error };

    this.created.push(payload);
    const component = { id: String(this.nextId++), name: payload.name, description: payload.description };
    const components = this.projects.get(payload.project) ?? [];
    components.push(component);
    this.projects.set(payload.project, components);
    return { ok: true, value: component };
  }

  async addComponentToIssue(issueKey: string, componentId: string): Promise<ApiResult<void>> {
    const error = this.check('addComponentToIssue', issueKey);
    if (error) return { ok: false, error };

    const issue = this.issues.get(issueKey);
    const component = issue && this.projects.get(issue.projectKey)?.find(c => c.id === componentId);
    if (!issue || !component) {
      return { ok: false, error: ApiError.fromResponse(`addComponentToIssue ${issueKey}`, 400, 'Component not found') };
    }
    if (!issue.components.some(c => c.id === componentId)) {
      issue.components.push(component);
    }
    return { ok: true, value: undefined };
  }

  async setIssueComponents(issueKey: string, componentNames: string[]): Promise<ApiResult<void>> {
    const error = this.check('setIssueComponents', issueKey);
    if (error) return { ok: false, error };

    const issue = this.issues.get(issueKey);
    if (!issue) {
      return { ok: false, error: ApiError.fromResponse(`setIssueComponents ${issueKey}`, 404, 'Issue does not exist') };
    }
    const projectComponents = this.projects.get(issue.projectKey) ?? [];
    issue.components = componentNames.map(name =>
      projectComponents.find(c => c.name === name) ?? issue.components.find(c => c.name === name) ?? { id: String(this.nextId++), name }
    );
    return { ok: true, value: undefined };
  }
}
