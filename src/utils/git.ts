import { resolve } from 'path';

import { TOOLS } from '../constants/index.js';
import { logger } from './logger.js';
import type { CommandRunner } from './shell.js';

/**
 * Find the root of the git working tree containing `cwd`.
 * Falls back to `cwd` itself when git is missing or `cwd` is not inside a repository.
 */
export async function getRepositoryRoot(runner: CommandRunner, cwd: string): Promise<string> {
  const { stdout, success } = await runner.execute(TOOLS.GIT, ['rev-parse', '--show-toplevel'], {
    cwd,
    allowFailure: true
  });

  if (!success || stdout.length === 0) {
    logger.debug(`No git repository found at ${cwd}, using it as the repository root`);
    return resolve(cwd);
  }

  return resolve(stdout);
}
