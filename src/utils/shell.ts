import { execFile } from 'child_process';
import { promisify } from 'util';

import { logger } from './logger.js';
import { CommandError, describeError } from './errors.js';

const execFileAsync = promisify(execFile);

/** ghc-pkg can print large `depends` lists for big package sets */
const MAX_BUFFER_BYTES = 16 * 1024 * 1024;

export interface ExecuteOptions {
  /**
   * When set, any failure (missing binary, non-zero exit, timeout) resolves to
   * `{ stdout: '', success: false }` instead of throwing a CommandError.
   */
  allowFailure?: boolean;
  cwd?: string;
  timeoutMs?: number;
}

export interface ExecuteResult {
  stdout: string;
  success: boolean;
}

/**
 * Process-execution primitive the cabal source talks to ghc, ghc-pkg and git through.
 * Tests substitute an in-process fake.
 */
export interface CommandRunner {
  execute(command: string, args: readonly string[], options?: ExecuteOptions): Promise<ExecuteResult>;
}

function stderrOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const { stderr } = error;
    if (typeof stderr === 'string' && stderr.trim().length > 0) {
      return stderr.trim();
    }
  }
  return undefined;
}

export class ShellCommandRunner implements CommandRunner {
  async execute(command: string, args: readonly string[], options: ExecuteOptions = {}): Promise<ExecuteResult> {
    try {
      const { stdout } = await execFileAsync(command, [...args], {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        encoding: 'utf8',
        maxBuffer: MAX_BUFFER_BYTES
      });
      return { stdout: stdout.trim(), success: true };
    } catch (error) {
      const reason = stderrOf(error) ?? describeError(error);
      if (options.allowFailure) {
        logger.debug(`Allowed failure: ${command} ${args.join(' ')}`, { reason });
        return { stdout: '', success: false };
      }
      throw new CommandError(command, [...args], reason);
    }
  }
}

export interface ToolDetection {
  available: boolean;
  /** First line printed by `<tool> --numeric-version` */
  version?: string;
}

/**
 * Check whether a tool is on the PATH by asking it for its version.
 */
export async function detectTool(runner: CommandRunner, tool: string): Promise<ToolDetection> {
  const { stdout, success } = await runner.execute(tool, ['--numeric-version'], { allowFailure: true });
  if (!success) {
    return { available: false };
  }
  const version = stdout.split('\n')[0]?.trim();
  return { available: true, version: version ? version : undefined };
}

export const defaultCommandRunner: CommandRunner = new ShellCommandRunner();
