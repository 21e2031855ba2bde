/**
 * Execution Context Module
 *
 * Resolves and validates the project directory a command works on.
 */

import { resolve } from 'path';

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import type { OutputPort } from './ports/output.js';
import { consoleOutput } from './ports/console-output.js';
import { isDirectory } from '../utils/fs.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from command options.
 *
 * projectRoot = resolve(process.cwd(), --cwd) when given, else process.cwd().
 *
 * @throws ValidationError if the project directory does not exist
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const sourceCwd = process.cwd();
  const projectRoot = options.cwd ? resolve(sourceCwd, options.cwd) : sourceCwd;

  if (!(await isDirectory(projectRoot))) {
    throw new ValidationError(`Project directory does not exist: ${projectRoot}`, { projectRoot });
  }

  logger.debug('Created execution context', { sourceCwd, projectRoot });
  return { sourceCwd, projectRoot, interactive: false };
}

/**
 * Resolve the OutputPort from an ExecutionContext, falling back to plain console output.
 */
export function resolveOutput(ctx?: { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}
