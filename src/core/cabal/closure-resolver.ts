import type { DependencySet, PackageId } from '../../types/index.js';
import { DEFAULT_CONCURRENCY } from '../../constants/index.js';
import { runWithConcurrency } from '../../utils/concurrency-pool.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('closure');

/**
 * The slice of the package database the resolver needs.
 */
export interface DependencyLookup {
  resolveId(name: string): Promise<PackageId | undefined>;
  dependsOf(id: PackageId): Promise<PackageId[]>;
}

export interface ClosureResolverOptions {
  /** Upper bound on concurrent lookups within one round */
  concurrency?: number;
}

/**
 * Computes the transitive closure of the `depends` relation, starting from
 * the package names declared in the cabal files.
 *
 * Works in rounds: every id first seen in a round has its `depends` queried,
 * all queries of the round run (bounded) in parallel, and the next frontier is
 * built only once the whole round has settled. The seen set only grows, so
 * cycles in the relation end the loop instead of extending it.
 */
export class ClosureResolver {
  private readonly lookup: DependencyLookup;
  private readonly concurrency: number;

  constructor(lookup: DependencyLookup, options: ClosureResolverOptions = {}) {
    this.lookup = lookup;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  }

  async resolve(rawNames: Iterable<string>): Promise<DependencySet> {
    const names = [...new Set(rawNames)];
    const seen = new Set<PackageId>();
    if (names.length === 0) {
      return seen;
    }

    let frontier = await this.resolveNames(names);
    let round = 0;

    while (true) {
      const added = [...new Set(frontier)].filter(id => !seen.has(id));
      if (added.length === 0) break;

      round++;
      for (const id of added) {
        seen.add(id);
      }
      log.debug(`Closure round ${round}: ${added.length} new package(s), ${seen.size} total`);

      const discovered = await this.dependsOfAll(added);
      frontier = discovered.filter(id => !seen.has(id));
    }

    log.info(`Resolved ${seen.size} cabal package(s) in ${round} round(s)`);
    return seen;
  }

  private async resolveNames(names: string[]): Promise<PackageId[]> {
    const { results } = await runWithConcurrency(
      names.map(name => () => this.lookup.resolveId(name)),
      this.concurrency
    );

    const ids: PackageId[] = [];
    results.forEach((entry, index) => {
      if (entry.status === 'fulfilled' && entry.value) {
        ids.push(entry.value);
      } else {
        log.debug(`Dropping unresolved dependency '${names[index]}'`);
      }
    });
    return ids;
  }

  private async dependsOfAll(ids: PackageId[]): Promise<PackageId[]> {
    const { results } = await runWithConcurrency(
      ids.map(id => () => this.lookup.dependsOf(id)),
      this.concurrency
    );

    const discovered: PackageId[] = [];
    results.forEach((entry, index) => {
      if (entry.status === 'fulfilled') {
        discovered.push(...entry.value);
      } else {
        log.debug(`Could not read dependencies of ${ids[index]}: ${entry.error.message}`);
      }
    });
    return discovered;
  }
}
