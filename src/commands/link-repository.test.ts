import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { FakeTracker } from '../test-utils.js';
import type { LinkRepositoryConfig } from '../types.js';
import { linkRepository, runLinkRepository } from './link-repository.js';

describe('link-repository', () => {
  let dir: string;
  let eventPath: string;
  let outputPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'link-repository-'));
    eventPath = join(dir, 'event.json');
    outputPath = join(dir, 'github-output');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function configFor(overrides: Partial<LinkRepositoryConfig> = {}): LinkRepositoryConfig {
    return {
      jira: { baseUrl: 'https://jira.example.com', email: 'ci@example.com', apiToken: 'test-token', timeoutMs: 1000 },
      github: { apiUrl: 'https://api.github.com', token: 'test-github-token', timeoutMs: 1000 },
      repoName: 'payments-service',
      eventName: 'pull_request',
      eventPath,
      pullRequest: { owner: 'acme', repo: 'payments-service', number: 3 },
      outputPath,
      dryRun: false,
      ...overrides,
    };
  }

  it('links every key found in the pull request and its commits', async () => {
    await writeFile(eventPath, JSON.stringify({
      pull_request: { title: 'CA-2 Checkout', body: 'See DEV-1', head: { ref: 'feature/CA-2' } },
    }));
    const tracker = new FakeTracker()
      .addProject('CA')
      .addProject('DEV')
      .addIssue('CA-2', 'CA')
      .addIssue('CA-9', 'CA')
      .addIssue('DEV-1', 'DEV');
    const github = { listPullRequestCommitMessages: vi.fn(async () => ['CA-9 wip']) };

    const report = await linkRepository(configFor(), { tracker, github });

    expect(report.issueKeys).toEqual(['CA-2', 'CA-9', 'DEV-1']);
    expect(report.outcomes.map(o => o.status)).toEqual(['linked', 'linked', 'linked']);
    expect(tracker.componentNamesOf('DEV-1')).toEqual(['payments-service']);
  });

  it('does nothing when no keys are found', async () => {
    await writeFile(eventPath, JSON.stringify({ commits: [{ message: 'chore: bump deps' }], ref: 'refs/heads/main' }));
    const tracker = new FakeTracker();

    const report = await linkRepository(configFor({ eventName: 'push' }), {
      tracker,
      readLastCommitMessage: async () => 'chore: bump deps',
    });

    expect(report).toEqual({ issueKeys: [], outcomes: [] });
    expect(tracker.calls.getIssue).toBe(0);
  });

  it('exits 0 even when an issue fails and records the keys', async () => {
    await writeFile(eventPath, JSON.stringify({
      commits: [{ message: 'CA-1' }, { message: 'CA-2' }, { message: 'CA-3' }],
      ref: 'refs/heads/main',
    }));
    const tracker = new FakeTracker()
      .addProject('CA')
      .addIssue('CA-1', 'CA')
      .addIssue('CA-2', 'CA')
      .addIssue('CA-3', 'CA')
      .throwFor('CA-2');

    const code = await runLinkRepository(configFor({ eventName: 'push' }), {
      tracker,
      readLastCommitMessage: async () => '',
    });

    expect(code).toBe(0);
    expect(tracker.componentNamesOf('CA-1')).toEqual(['payments-service']);
    expect(tracker.componentNamesOf('CA-3')).toEqual(['payments-service']);
    expect(await readFile(outputPath, 'utf-8')).toBe('status=processed\nissue_keys=CA-1,CA-2,CA-3\n');
  });
});
