import { appendFile } from 'fs/promises';
import type { RunResult } from './types.js';

/**
 * `key=value` lines a workflow step can branch on through `steps.<id>.outputs`.
 */
export function statusLines(result: RunResult): string[] {
  switch (result.status) {
    case 'processed':
      return ['status=processed'];
    case 'skipped':
      return ['status=skipped', `skip_reason=${result.reason}`];
    case 'failed':
      return ['status=failed', `failure_reason=${result.reason}`];
  }
}

/**
 * Append lines to the step output file. Without a path (outside GitHub
 * Actions) nothing is written.
 */
export async function writeOutputs(outputPath: string | undefined, lines: string[]): Promise<void> {
  if (!outputPath || lines.length === 0) {
    return;
  }
  await appendFile(outputPath, lines.map(line => `${line}\n`).join(''), 'utf-8');
}
