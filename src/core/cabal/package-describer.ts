import { isAbsolute, join, relative, sep } from 'path';

import { CABAL_SOURCE_TYPE, DEFAULT_CONCURRENCY, DIR_PATTERNS, GHC_PKG } from '../../constants/index.js';
import type { PackageId, PackageRecord } from '../../types/index.js';
import { runWithConcurrency } from '../../utils/concurrency-pool.js';
import { logger } from '../../utils/logger.js';
import type { PackageFields } from './ghc-pkg-client.js';
import { sanitizeHomepage } from './homepage.js';

const log = logger.child('describe');

export interface PackageFieldLookup {
  fields(id: string, fieldNames: readonly string[], useIdAsInstalledId: boolean): Promise<PackageFields>;
}

export interface PackageDescriberOptions {
  projectRoot: string;
  concurrency?: number;
}

export interface DocDirs {
  docDir: string;
  searchRoot?: string;
}

/**
 * True when `child` lies strictly below `ancestor`.
 */
export function isPathWithin(child: string, ancestor: string): boolean {
  const rel = relative(ancestor, child);
  return rel !== '' && !isAbsolute(rel) && rel.split(sep)[0] !== '..';
}

/**
 * Documentation directory and license search root for a package.
 *
 * Without haddock-html the package is expected under `<projectRoot>/vendor/<name>`.
 * A data-dir is only trusted as search root when the documentation lives inside it.
 */
export function resolveDocDirs(
  projectRoot: string,
  name: string,
  haddockHtml: string | undefined,
  dataDir: string | undefined
): DocDirs {
  if (!haddockHtml) {
    return { docDir: join(projectRoot, DIR_PATTERNS.VENDOR, name) };
  }
  if (!dataDir) {
    return { docDir: haddockHtml };
  }
  if (!isPathWithin(haddockHtml, dataDir)) {
    log.debug(`Ignoring data-dir ${dataDir}: it does not contain ${haddockHtml}`);
    return { docDir: haddockHtml };
  }
  return { docDir: haddockHtml, searchRoot: dataDir };
}

/**
 * Builds report records for resolved package ids.
 */
export class PackageDescriber {
  private readonly lookup: PackageFieldLookup;
  private readonly projectRoot: string;
  private readonly concurrency: number;

  constructor(lookup: PackageFieldLookup, options: PackageDescriberOptions) {
    this.lookup = lookup;
    this.projectRoot = options.projectRoot;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  }

  async describe(id: PackageId): Promise<PackageRecord> {
    const info = await this.lookup.fields(id, GHC_PKG.INFO_FIELDS, true);
    const name = info.get('name');
    const { docDir, searchRoot } = resolveDocDirs(
      this.projectRoot,
      name ?? id,
      info.get('haddock-html'),
      info.get('data-dir')
    );

    const record: PackageRecord = {
      type: CABAL_SOURCE_TYPE,
      id,
      name,
      version: info.get('version'),
      summary: info.get('synopsis'),
      homepage: sanitizeHomepage(info.get('homepage')),
      docDir,
      searchRoot
    };
    return Object.freeze(record);
  }

  /**
   * Describe every id, sorted by name then id so listings are stable between runs.
   */
  async describeAll(ids: Iterable<PackageId>): Promise<PackageRecord[]> {
    const all = [...ids];
    const { results } = await runWithConcurrency(
      all.map(id => () => this.describe(id)),
      this.concurrency
    );

    const records: PackageRecord[] = [];
    results.forEach((entry, index) => {
      if (entry.status === 'fulfilled') {
        records.push(entry.value);
      } else {
        log.debug(`Could not describe ${all[index]}: ${entry.error.message}`);
      }
    });

    return records.sort(compareRecords);
  }
}

function compareRecords(a: PackageRecord, b: PackageRecord): number {
  const byName = (a.name ?? a.id).localeCompare(b.name ?? b.id);
  return byName !== 0 ? byName : a.id.localeCompare(b.id);
}
