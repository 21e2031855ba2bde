/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with the CLI's output port injected:
 * Clack in interactive terminals, plain console everywhere else.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';
import { createClackOutput } from './clack-output-adapter.js';

export interface CliContextOptions extends ExecutionOptions {
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}

let cachedClackOutput: OutputPort | undefined;

/** Interactive when stdout is a terminal and we are not running in CI. */
export function detectInteractive(override?: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  if (override !== undefined) return override;
  return process.stdout.isTTY === true && env.CI !== 'true';
}

export async function createCliExecutionContext(options: CliContextOptions = {}): Promise<ExecutionContext> {
  const ctx = await createExecutionContext(options);
  const interactive = detectInteractive(options.interactive);

  if (interactive) {
    cachedClackOutput ??= createClackOutput();
    ctx.output = cachedClackOutput;
  } else {
    ctx.output = consoleOutput;
  }
  ctx.interactive = interactive;

  return ctx;
}
