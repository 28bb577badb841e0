import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

/**
 * Full message of HEAD in the current working directory
 */
export async function readLastCommitMessage(cwd: string = process.cwd()): Promise<string> {
  const { stdout } = await execFileAsync('git', ['log', '-1', '--pretty=%B'], {
    cwd,
    encoding: 'utf-8',
    timeout: 10000
  });
  return stdout;
}
