import { readFile } from 'fs/promises';
import { z } from 'zod';
import { createLogger } from './logger.js';
import type { PullRequestRef } from './types.js';

const log = createLogger('issue-keys');

/** Classic Jira issue key such as ABC-123; lower-case keys never match. */
export const ISSUE_KEY_PATTERN = /\b([A-Z][A-Z0-9]+-\d+)\b/g;

const text = z.string().nullish().catch(null);

// Wrong-typed fields degrade to empty instead of failing the run
const eventPayloadSchema = z.object({
  ref: text,
  commits: z.array(z.object({ message: text }).passthrough()).catch([]),
  pull_request: z.object({
    title: text,
    body: text,
    head: z.object({ ref: text }).passthrough().nullish().catch(null)
  }).passthrough().nullish().catch(null)
}).passthrough();

export type EventPayload = z.infer<typeof eventPayloadSchema>;

export interface CiEvent {
  name: string;
  payload: EventPayload;
}

export interface PullRequestCommitSource {
  listPullRequestCommitMessages(pr: PullRequestRef): Promise<string[] | null>;
}

export interface HarvestSources {
  github?: PullRequestCommitSource;
  pullRequest?: PullRequestRef;
  readLastCommitMessage?: () => Promise<string>;
}

export function parseEventPayload(raw: unknown): EventPayload {
  const parsed = eventPayloadSchema.safeParse(raw);
  return parsed.success ? parsed.data : eventPayloadSchema.parse({});
}

/**
 * Read the GitHub Actions event file. A missing path or file gives an
 * empty payload; unreadable JSON is an error.
 */
export async function loadEventPayload(path: string | undefined): Promise<EventPayload> {
  if (!path) {
    return parseEventPayload({});
  }

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      log.warn(`Event payload ${path} not found, continuing without it`);
      return parseEventPayload({});
    }
    throw error;
  }

  try {
    return parseEventPayload(JSON.parse(content));
  } catch (error) {
    throw new Error(`Failed to parse event payload ${path}: ${error instanceof Error ? error.message : error}`);
  }
}

export function extractIssueKeys(texts: Array<string | null | undefined>): string[] {
  const keys = new Set<string>();
  for (const t of texts) {
    if (!t) continue;
    for (const match of t.matchAll(ISSUE_KEY_PATTERN)) {
      keys.add(match[1]);
    }
  }
  return [...keys].sort();
}

async function collectTexts(event: CiEvent, sources: HarvestSources): Promise<Array<string | null | undefined>> {
  const { payload } = event;
  const texts: Array<string | null | undefined> = [];

  if (event.name === 'push') {
    for (const commit of payload.commits) {
      texts.push(commit.message);
    }
    // Branch names sometimes carry the key
    texts.push(payload.ref);

    if (sources.readLastCommitMessage) {
      try {
        texts.push(await sources.readLastCommitMessage());
      } catch (error) {
        log.debug(`Could not read last commit message: ${error instanceof Error ? error.message : error}`);
      }
    }
  } else if (event.name === 'pull_request') {
    const pr = payload.pull_request;
    texts.push(pr?.title, pr?.body, pr?.head?.ref);

    if (sources.github && sources.pullRequest) {
      const messages = await sources.github.listPullRequestCommitMessages(sources.pullRequest);
      if (messages) {
        log.debug(`Fetched ${messages.length} commit message(s) from PR #${sources.pullRequest.number}`);
        texts.push(...messages);
      }
    }
  } else {
    log.info(`Event '${event.name}' carries no issue keys`);
  }

  return texts;
}

/**
 * Collect the issue keys mentioned by a push or pull_request event, sorted
 * and without duplicates.
 */
export async function harvestIssueKeys(event: CiEvent, sources: HarvestSources = {}): Promise<string[]> {
  const texts = await collectTexts(event, sources);
  return extractIssueKeys(texts);
}
