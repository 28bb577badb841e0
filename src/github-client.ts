import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { createLogger } from './logger.js';
import type { GitHubConfig, PullRequestRef } from './types.js';

const log = createLogger('github-client');

const commitListSchema = z.array(
  z.object({
    commit: z.object({
      message: z.string().nullish()
    }).nullish()
  }).passthrough()
);

/**
 * Read-only GitHub REST access. Every lookup is best-effort: without a
 * token, or on any failure, it resolves to null instead of throwing.
 */
export class GitHubClient {
  private client: AxiosInstance;
  private token?: string;

  constructor(config: GitHubConfig, adapter?: AxiosAdapter) {
    this.token = config.token;
    this.client = axios.create({
      baseURL: config.apiUrl,
      headers: {
        'Accept': 'application/vnd.github+json',
        ...(config.token ? { 'Authorization': `Bearer ${config.token}` } : {})
      },
      timeout: config.timeoutMs,
      validateStatus: () => true,
      adapter
    });
  }

  get hasToken(): boolean {
    return Boolean(this.token);
  }

  /**
   * Commit messages of a pull request, in the order GitHub lists them
   */
  async listPullRequestCommitMessages(pr: PullRequestRef): Promise<string[] | null> {
    if (!this.token) {
      return null;
    }

    const url = `/repos/${encodeURIComponent(pr.owner)}/${encodeURIComponent(pr.repo)}/pulls/${pr.number}/commits`;
    try {
      const response = await this.client.get<unknown>(url);
      if (response.status !== 200) {
        log.debug(`GET ${url} returned HTTP ${response.status}, ignoring PR commits`);
        return null;
      }

      const parsed = commitListSchema.safeParse(response.data);
      if (!parsed.success) {
        log.debug(`GET ${url} did not return a commit list, ignoring PR commits`);
        return null;
      }

      return parsed.data
        .map(entry => entry.commit?.message)
        .filter((message): message is string => typeof message === 'string' && message.length > 0);
    } catch (error) {
      log.debug(`GET ${url} failed: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }
}
