import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig } from 'axios';
import { ApiError } from './errors.js';
import { createLogger } from './logger.js';
import type {
  ApiResult,
  CreateComponentPayload,
  IssueSummary,
  IssueTracker,
  JiraComponent,
  JiraConfig,
} from './types.js';

const log = createLogger('jira-client');

interface JiraIssueResponse {
  id: string;
  key: string;
  fields: {
    project?: { id: string; key: string };
    components?: JiraComponent[];
  };
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export class JiraClient implements IssueTracker {
  private client: AxiosInstance;

  /**
   * @param adapter - replaces axios' HTTP transport, used by tests
   */
  constructor(config: JiraConfig, adapter?: AxiosAdapter) {
    this.client = axios.create({
      baseURL: `${config.baseUrl}/rest/api/3`,
      auth: {
        username: config.email,
        password: config.apiToken
      },
      headers: {
        'Content-Type': 'application/json',
        'Accept': 'application/json'
      },
      timeout: config.timeoutMs,
      // Statuses are mapped to ApiResult below instead of thrown
      validateStatus: () => true,
      adapter
    });
  }

  private async request<T>(operation: string, config: AxiosRequestConfig): Promise<ApiResult<{ status: number; data: T }>> {
    try {
      const response = await this.client.request<T>(config);
      log.debug(`${operation}: HTTP ${response.status}`);
      if (!isSuccess(response.status)) {
        return { ok: false, error: ApiError.fromResponse(operation, response.status, response.data) };
      }
      return { ok: true, value: { status: response.status, data: response.data } };
    } catch (error) {
      return { ok: false, error: ApiError.fromError(operation, error) };
    }
  }

  /**
   * Fetch an issue's project and its current components
   */
  async getIssue(issueKey: string): Promise<ApiResult<IssueSummary>> {
    const operation = `Fetch issue ${issueKey}`;
    const result = await this.request<JiraIssueResponse>(operation, {
      method: 'GET',
      url: `/issue/${encodeURIComponent(issueKey)}`,
      params: { fields: 'project,components' }
    });
    if (!result.ok) return result;

    const { data } = result.value;
    const project = data.fields?.project;
    if (!project) {
      return { ok: false, error: new ApiError(operation, `${operation} returned no project`) };
    }

    return {
      ok: true,
      value: {
        key: data.key,
        projectKey: project.key,
        projectId: String(project.id),
        components: data.fields.components ?? []
      }
    };
  }

  async listProjectComponents(projectKey: string): Promise<ApiResult<JiraComponent[]>> {
    const result = await this.request<JiraComponent[]>(`List components of ${projectKey}`, {
      method: 'GET',
      url: `/project/${encodeURIComponent(projectKey)}/components`
    });
    if (!result.ok) return result;

    const components = Array.isArray(result.value.data) ? result.value.data : [];
    return {
      ok: true,
      value: components.map(c => ({ ...c, id: String(c.id) }))
    };
  }

  /**
   * Create a component. A 409 means another run created it first, so the
   * project's components are listed again and the existing one returned.
   */
  async createComponent(payload: CreateComponentPayload): Promise<ApiResult<JiraComponent>> {
    const operation = `Create component ${payload.name} in ${payload.project}`;
    const result = await this.request<JiraComponent>(operation, {
      method: 'POST',
      url: '/component',
      data: payload
    });

    if (!result.ok && result.error.status === 409) {
      log.info(`Component '${payload.name}' already exists in ${payload.project}, re-fetching`);
      const listed = await this.listProjectComponents(payload.project);
      if (!listed.ok) return listed;

      const existing = listed.value.find(c => c.name === payload.name);
      if (!existing) {
        return { ok: false, error: result.error };
      }
      return { ok: true, value: existing };
    }
    if (!result.ok) return result;

    return { ok: true, value: { ...result.value.data, id: String(result.value.data.id) } };
  }

  /**
   * Add a component without touching the ones already on the issue
   */
  async addComponentToIssue(issueKey: string, componentId: string): Promise<ApiResult<void>> {
    const result = await this.request<unknown>(`Add component ${componentId} to ${issueKey}`, {
      method: 'PUT',
      url: `/issue/${encodeURIComponent(issueKey)}`,
      data: {
        update: {
          components: [{ add: { id: componentId } }]
        }
      }
    });
    if (!result.ok) return result;
    return { ok: true, value: undefined };
  }

  /**
   * Replace the issue's whole component field with the given names
   */
  async setIssueComponents(issueKey: string, componentNames: string[]): Promise<ApiResult<void>> {
    const result = await this.request<unknown>(`Set components of ${issueKey}`, {
      method: 'PUT',
      url: `/issue/${encodeURIComponent(issueKey)}`,
      data: {
        fields: {
          components: componentNames.map(name => ({ name }))
        }
      }
    });
    if (!result.ok) return result;
    return { ok: true, value: undefined };
  }
}
