import { mkdtemp, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import type { CommandRunner, ExecuteOptions, ExecuteResult } from '../src/utils/shell.js';
import { CommandError } from '../src/utils/errors.js';
import type { InventoryConfig } from '../src/types/index.js';

export interface RecordedCall {
  command: string;
  args: string[];
  options: ExecuteOptions;
}

type Handler = (command: string, args: readonly string[]) => string | undefined;

/**
 * In-process CommandRunner. The handler returns stdout for a successful call
 * or undefined for a failing one.
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly handler: Handler;

  constructor(handler: Handler) {
    this.handler = handler;
  }

  async execute(command: string, args: readonly string[], options: ExecuteOptions = {}): Promise<ExecuteResult> {
    this.calls.push({ command, args: [...args], options });
    const stdout = this.handler(command, args);
    if (stdout === undefined) {
      if (options.allowFailure) {
        return { stdout: '', success: false };
      }
      throw new CommandError(command, [...args], 'exit code 1');
    }
    return { stdout, success: true };
  }

  callsTo(command: string): RecordedCall[] {
    return this.calls.filter(call => call.command === command);
  }
}

export interface FakeToolchain {
  /** Bare package name -> installed id */
  names?: Record<string, string>;
  /** Installed id -> field values */
  packages?: Record<string, Record<string, string>>;
  /** Omit to simulate a missing ghc */
  ghcVersion?: string;
  /** Omit to simulate a directory outside any git repository */
  gitRoot?: string;
}

/**
 * Fake ghc / ghc-pkg / git answering like the real tools do for `field`,
 * `--numeric-version` and `rev-parse --show-toplevel`.
 */
export function createFakeToolchain(toolchain: FakeToolchain): FakeCommandRunner {
  const names = toolchain.names ?? {};
  const packages = toolchain.packages ?? {};

  return new FakeCommandRunner((command, args) => {
    if (command === 'ghc') {
      return toolchain.ghcVersion;
    }
    if (command === 'git') {
      return toolchain.gitRoot;
    }
    if (command !== 'ghc-pkg' || args[0] !== 'field') {
      return undefined;
    }

    const [, target, fieldList, ...rest] = args;
    const fields = fieldList.split(',');

    let info: Record<string, string> | undefined;
    if (rest.includes('--ipid')) {
      info = packages[target];
    } else {
      const id = names[target];
      info = id === undefined ? undefined : { ...(packages[id] ?? {}), id };
    }
    if (!info) {
      return undefined;
    }

    const found = info;
    return fields
      .filter(field => field in found)
      .map(field => `${field}: ${found[field]}`)
      .join('\n');
  });
}

export async function createTempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(tmpdir(), `cabal-inventory-${prefix}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeProjectFile(root: string, relativePath: string, content: string): Promise<string> {
  const filePath = path.join(root, relativePath);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content, 'utf8');
  return filePath;
}

export function makeConfig(projectRoot: string, overrides: Partial<InventoryConfig> = {}): InventoryConfig {
  return {
    projectRoot,
    cabal: { ghcPackageDb: [], cabalFileTargets: [] },
    concurrency: 2,
    ...overrides
  };
}
