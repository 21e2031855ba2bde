import { homedir } from 'os';
import { isAbsolute, join, resolve } from 'path';

import { GHC_PKG, TOOLS } from '../../constants/index.js';
import type { PackageId } from '../../types/index.js';
import type { CommandRunner } from '../../utils/shell.js';
import { exists } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('ghc-pkg');

export type PackageFields = Map<string, string>;

export interface GhcPkgClientOptions {
  runner: CommandRunner;
  /** Package database selectors from configuration, in order */
  packageDbs: readonly string[];
  /** Lazily supplies the ghc version substituted for `<ghc_version>` in database paths */
  ghcVersion: () => Promise<string | undefined>;
  /** Lazily supplies the directory relative database paths are resolved against */
  repositoryRoot: () => Promise<string>;
  timeoutMs?: number;
}

/**
 * Parse `ghc-pkg field` output into a field map.
 *
 * Each field is `key: value`, split at the first colon. Indented lines continue
 * the previous field's value (ghc-pkg wraps long `depends` lists). When a key
 * repeats, as happens when a bare name matches several installed versions,
 * the first value wins. Fields with an empty value are left out.
 */
export function parseFieldOutput(output: string): PackageFields {
  const collected: Array<{ key: string; parts: string[] }> = [];
  let current: { key: string; parts: string[] } | undefined;

  for (const line of output.split(/\r?\n/)) {
    if (line.trim() === '') continue;

    if (/^\s/.test(line)) {
      current?.parts.push(line.trim());
      continue;
    }

    const separator = line.indexOf(':');
    if (separator <= 0) {
      current = undefined;
      continue;
    }

    current = { key: line.slice(0, separator).trim(), parts: [line.slice(separator + 1).trim()] };
    collected.push(current);
  }

  const fields: PackageFields = new Map();
  for (const { key, parts } of collected) {
    const value = parts.filter(Boolean).join(' ');
    if (value.length > 0 && !fields.has(key)) {
      fields.set(key, value);
    }
  }
  return fields;
}

/**
 * `~` and `~/rest` name the current user's home directory.
 */
function expandHome(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Client for the package database query tool.
 *
 * Every query spawns one ghc-pkg process and is allowed to fail: a failed or
 * empty query means "unknown", never an error.
 */
export class GhcPkgClient {
  private readonly options: GhcPkgClientOptions;
  private dbArgs?: Promise<string[]>;

  constructor(options: GhcPkgClientOptions) {
    this.options = options;
  }

  /**
   * Map a bare package name to its installed package id.
   */
  async resolveId(name: string): Promise<PackageId | undefined> {
    const fields = await this.fields(name, [GHC_PKG.ID_FIELD], false);
    const id = fields.get(GHC_PKG.ID_FIELD);
    if (!id) {
      log.debug(`ghc-pkg has no installed id for '${name}'`);
    }
    return id;
  }

  /**
   * Look up `fieldNames` for a package. With `useIdAsInstalledId`, `id` is
   * passed as an installed package id (`--ipid`) rather than a package name.
   */
  async fields(id: string, fieldNames: readonly string[], useIdAsInstalledId: boolean): Promise<PackageFields> {
    const args = ['field', id, fieldNames.join(',')];
    if (useIdAsInstalledId) {
      args.push(GHC_PKG.IPID_FLAG);
    }
    args.push(...(await this.packageDbArgs()));

    const { stdout, success } = await this.options.runner.execute(TOOLS.GHC_PKG, args, {
      allowFailure: true,
      timeoutMs: this.options.timeoutMs
    });
    if (!success) {
      return new Map();
    }
    return parseFieldOutput(stdout);
  }

  /**
   * Installed ids `id` depends on, as listed in its `depends` field.
   */
  async dependsOf(id: PackageId): Promise<PackageId[]> {
    const fields = await this.fields(id, [GHC_PKG.DEPENDS_FIELD], true);
    const depends = fields.get(GHC_PKG.DEPENDS_FIELD);
    return depends ? depends.split(/\s+/).filter(Boolean) : [];
  }

  /**
   * Database selector arguments shared by every query, computed on first use.
   */
  packageDbArgs(): Promise<string[]> {
    if (!this.dbArgs) {
      this.dbArgs = this.computePackageDbArgs();
    }
    return this.dbArgs;
  }

  private async computePackageDbArgs(): Promise<string[]> {
    const args: string[] = [];
    const namedDbs: readonly string[] = GHC_PKG.NAMED_DBS;

    for (const entry of this.options.packageDbs) {
      if (namedDbs.includes(entry)) {
        args.push(`--${entry}`);
        continue;
      }

      const realized = await this.realizePackageDbPath(entry);
      if (await exists(realized)) {
        args.push(`--package-db=${realized}`);
      } else {
        log.debug(`Ignoring missing package database ${realized}`);
      }
    }

    return args;
  }

  private async realizePackageDbPath(template: string): Promise<string> {
    let path = template;
    if (path.includes(GHC_PKG.VERSION_PLACEHOLDER)) {
      const version = await this.options.ghcVersion();
      if (version) {
        path = path.split(GHC_PKG.VERSION_PLACEHOLDER).join(version);
      }
    }
    path = expandHome(path);
    return isAbsolute(path) ? path : resolve(await this.options.repositoryRoot(), path);
  }
}
