import { Command } from 'commander';

import type { CommandResult, StatusOptions } from '../types/index.js';
import type { ExecutionContext } from '../types/execution-context.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatPathForDisplay } from '../utils/formatters.js';
import { loadConfig } from '../core/config.js';
import { resolveOutput } from '../core/execution-context.js';
import { CabalSource, type CabalSourceStatus } from '../core/cabal/index.js';
import type { CommandRunner } from '../utils/shell.js';
import { createCliExecutionContext } from '../cli/context.js';

export async function statusCommand(
  ctx: ExecutionContext,
  deps: { runner?: CommandRunner } = {}
): Promise<CommandResult<CabalSourceStatus>> {
  const config = await loadConfig(ctx.projectRoot);
  const source = new CabalSource({ config, runner: deps.runner });
  return { success: true, data: await source.status() };
}

/**
 * Human-readable summary of a source status, one fact per line.
 */
export function formatStatus(status: CabalSourceStatus, cwd: string): string[] {
  const manifests = status.manifests.map(path => formatPathForDisplay(path, cwd));
  return [
    `cabal files: ${manifests.length > 0 ? manifests.join(', ') : 'none'}`,
    `top-level dependencies: ${status.topLevelDependencies.length}`,
    `ghc: ${status.ghc.available ? status.ghc.version ?? 'available' : 'not found'}`,
    `enabled: ${status.enabled ? 'yes' : 'no'}`
  ];
}

export function setupStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show whether the cabal source is enabled for a project and why')
    .option('--cwd <dir>', 'project directory containing the *.cabal files')
    .action(withErrorHandling(async (options: StatusOptions) => {
      const ctx = await createCliExecutionContext({ cwd: options.cwd });
      const output = resolveOutput(ctx);
      const result = await statusCommand(ctx);
      if (result.data) {
        output.note(formatStatus(result.data, ctx.projectRoot).join('\n'), 'cabal source');
      }
    }));
}
