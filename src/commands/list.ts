import { Command } from 'commander';

import type { CommandResult, ListOptions, PackageRecord } from '../types/index.js';
import type { ExecutionContext } from '../types/execution-context.js';
import { withErrorHandling } from '../utils/errors.js';
import { parseOutputFormat, parsePositiveIntegerOption, renderRecords } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';
import { loadConfig, type ConfigOverrides } from '../core/config.js';
import { resolveOutput } from '../core/execution-context.js';
import { CabalSource } from '../core/cabal/index.js';
import type { CommandRunner } from '../utils/shell.js';
import { createCliExecutionContext } from '../cli/context.js';

export interface ListCommandDeps {
  runner?: CommandRunner;
  /** Command-line settings applied over the project configuration */
  overrides?: ConfigOverrides;
}

/**
 * Resolve and describe every cabal dependency of the project in `ctx`.
 */
export async function listCommand(
  ctx: ExecutionContext,
  deps: ListCommandDeps = {}
): Promise<CommandResult<PackageRecord[]>> {
  const config = await loadConfig(ctx.projectRoot, deps.overrides);
  const source = new CabalSource({ config, runner: deps.runner });
  const warnings: string[] = [];

  if (!(await source.enabled())) {
    warnings.push(`cabal source is disabled for ${ctx.projectRoot} (no declared dependencies or ghc not installed)`);
    return { success: true, data: [], warnings };
  }

  const records = await source.dependencies();
  logger.debug(`Listed ${records.length} cabal dependencies`);
  return { success: true, data: records, warnings };
}

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('Resolve the transitive cabal dependencies of a project and print their metadata')
    .option('--cwd <dir>', 'project directory containing the *.cabal files')
    .option('--format <format>', 'output format: text, json or yaml', 'text')
    .option('--concurrency <n>', 'maximum number of ghc-pkg queries running at once')
    .option('--timeout <ms>', 'time limit for each ghc-pkg query, in milliseconds')
    .action(withErrorHandling(async (options: { cwd?: string; format?: string; concurrency?: string; timeout?: string }) => {
      const listOptions: ListOptions = {
        cwd: options.cwd,
        format: parseOutputFormat(options.format),
        concurrency: parsePositiveIntegerOption(options.concurrency, '--concurrency'),
        timeoutMs: parsePositiveIntegerOption(options.timeout, '--timeout')
      };
      const ctx = await createCliExecutionContext({ cwd: listOptions.cwd });
      const output = resolveOutput(ctx);
      const showProgress = ctx.interactive && listOptions.format === 'text';

      const spinner = output.spinner();
      if (showProgress) spinner.start('Resolving cabal dependencies');
      const result = await listCommand(ctx, {
        overrides: { concurrency: listOptions.concurrency, queryTimeoutMs: listOptions.timeoutMs }
      });
      if (showProgress) spinner.stop(`Resolved ${result.data?.length ?? 0} packages`);

      for (const warning of result.warnings ?? []) {
        output.warn(warning);
      }
      output.message(renderRecords(result.data ?? [], listOptions.format ?? 'text', ctx.projectRoot));
    }));
}
