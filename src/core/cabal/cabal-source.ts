import { CABAL_SOURCE_TYPE, TOOLS } from '../../constants/index.js';
import type { DependencySet, InventoryConfig, PackageRecord } from '../../types/index.js';
import { defaultCommandRunner, detectTool, type CommandRunner, type ToolDetection } from '../../utils/shell.js';
import { getRepositoryRoot } from '../../utils/git.js';
import { logger } from '../../utils/logger.js';
import { ClosureResolver } from './closure-resolver.js';
import { GhcPkgClient } from './ghc-pkg-client.js';
import { findManifestFiles, scanManifestDependencies } from './manifest-scanner.js';
import { PackageDescriber } from './package-describer.js';

const log = logger.child('cabal');

export interface CabalSourceOptions {
  config: InventoryConfig;
  runner?: CommandRunner;
}

export interface CabalSourceStatus {
  manifests: string[];
  topLevelDependencies: string[];
  ghc: ToolDetection;
  enabled: boolean;
}

/**
 * Dependency source for cabal projects.
 *
 * The ghc detection, the manifest scan and the final record list are each computed
 * once per instance; create a new source to pick up changes on disk.
 */
export class CabalSource {
  static readonly type = CABAL_SOURCE_TYPE;

  private readonly config: InventoryConfig;
  private readonly runner: CommandRunner;
  private readonly client: GhcPkgClient;

  private ghc?: Promise<ToolDetection>;
  private repositoryRoot?: Promise<string>;
  private topLevel?: Promise<Set<string>>;
  private records?: Promise<PackageRecord[]>;

  constructor(options: CabalSourceOptions) {
    this.config = options.config;
    this.runner = options.runner ?? defaultCommandRunner;
    this.client = new GhcPkgClient({
      runner: this.runner,
      packageDbs: this.config.cabal.ghcPackageDb,
      ghcVersion: async () => (await this.detectGhc()).version,
      repositoryRoot: () => this.repoRoot(),
      timeoutMs: this.config.queryTimeoutMs
    });
  }

  get type(): typeof CABAL_SOURCE_TYPE {
    return CabalSource.type;
  }

  detectGhc(): Promise<ToolDetection> {
    if (!this.ghc) {
      this.ghc = detectTool(this.runner, TOOLS.GHC);
    }
    return this.ghc;
  }

  topLevelDependencies(): Promise<Set<string>> {
    if (!this.topLevel) {
      this.topLevel = scanManifestDependencies(this.config.projectRoot, this.config.cabal.cabalFileTargets);
    }
    return this.topLevel;
  }

  /**
   * Enabled when the cabal files declare dependencies and ghc is installed.
   */
  async enabled(): Promise<boolean> {
    const declared = await this.topLevelDependencies();
    if (declared.size === 0) {
      log.info(`No cabal dependencies declared in ${this.config.projectRoot}`);
      return false;
    }
    const ghc = await this.detectGhc();
    if (!ghc.available) {
      log.info(`${TOOLS.GHC} is not available; skipping cabal dependencies`);
      return false;
    }
    return true;
  }

  /**
   * Installed ids of every package reachable from the declared dependencies.
   */
  async packageIds(): Promise<DependencySet> {
    const resolver = new ClosureResolver(this.client, { concurrency: this.config.concurrency });
    return resolver.resolve(await this.topLevelDependencies());
  }

  /**
   * Records for every dependency, or an empty list when the source is disabled.
   */
  dependencies(): Promise<PackageRecord[]> {
    if (!this.records) {
      this.records = this.computeDependencies();
    }
    return this.records;
  }

  async status(): Promise<CabalSourceStatus> {
    const [manifests, declared, ghc, enabled] = await Promise.all([
      findManifestFiles(this.config.projectRoot),
      this.topLevelDependencies(),
      this.detectGhc(),
      this.enabled()
    ]);
    return {
      manifests,
      topLevelDependencies: [...declared].sort(),
      ghc,
      enabled
    };
  }

  private async computeDependencies(): Promise<PackageRecord[]> {
    if (!(await this.enabled())) {
      return [];
    }
    const ids = await this.packageIds();
    const describer = new PackageDescriber(this.client, {
      projectRoot: this.config.projectRoot,
      concurrency: this.config.concurrency
    });
    return describer.describeAll(ids);
  }

  private repoRoot(): Promise<string> {
    if (!this.repositoryRoot) {
      this.repositoryRoot = getRepositoryRoot(this.runner, this.config.projectRoot);
    }
    return this.repositoryRoot;
  }
}
