import { join, resolve } from 'path';
import * as yaml from 'js-yaml';

import { DEFAULT_CONCURRENCY, FILE_PATTERNS } from '../constants/index.js';
import type { InventoryConfig } from '../types/index.js';
import { exists, readTextFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError, describeError } from '../utils/errors.js';

/**
 * Configuration loading for cabal-inventory.
 *
 * Reads `.cabal-inventory.yml` (or `.yaml`) from the project root:
 *
 *   cabal:
 *     ghc_package_db: [global, user, .stack-work/install/lts/<ghc_version>/pkgdb]
 *     cabal_file_targets: [library, executable]
 *   concurrency: 4
 *   query_timeout_ms: 30000
 *
 * Scalars are accepted wherever a list is expected.
 */

/** Command-line values that take precedence over the file */
export type ConfigOverrides = Partial<Pick<InventoryConfig, 'concurrency' | 'queryTimeoutMs'>>;

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toStringList(value: unknown, key: string): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  const items = Array.isArray(value) ? value : [value];
  return items.map(item => {
    if (typeof item !== 'string' && typeof item !== 'number') {
      throw new ConfigError(`Configuration '${key}' must be a string or a list of strings`, { key });
    }
    return String(item);
  });
}

function toPositiveInteger(value: unknown, key: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`Configuration '${key}' must be a positive integer`, { key, value });
  }
  return value;
}

/**
 * Find the existing config file in `projectRoot`, if any
 */
export async function findConfigFile(projectRoot: string): Promise<string | null> {
  for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
    const path = join(projectRoot, fileName);
    if (await exists(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Validate and normalize a parsed configuration document.
 */
export function normalizeConfig(projectRoot: string, raw: unknown): InventoryConfig {
  let document: RawRecord = {};
  if (isRecord(raw)) {
    document = raw;
  } else if (raw !== undefined && raw !== null) {
    throw new ConfigError('Configuration must be a mapping');
  }

  const cabal: unknown = document.cabal ?? {};
  if (!isRecord(cabal)) {
    throw new ConfigError("Configuration 'cabal' must be a mapping");
  }

  return {
    projectRoot: resolve(projectRoot),
    cabal: {
      ghcPackageDb: toStringList(cabal.ghc_package_db, 'cabal.ghc_package_db'),
      cabalFileTargets: toStringList(cabal.cabal_file_targets, 'cabal.cabal_file_targets')
    },
    concurrency: toPositiveInteger(document.concurrency, 'concurrency') ?? DEFAULT_CONCURRENCY,
    queryTimeoutMs: toPositiveInteger(document.query_timeout_ms, 'query_timeout_ms')
  };
}

/**
 * Load the configuration for a project, falling back to defaults when no file exists.
 * Values in `overrides` win over the file.
 */
export async function loadConfig(projectRoot: string, overrides: ConfigOverrides = {}): Promise<InventoryConfig> {
  const configPath = await findConfigFile(projectRoot);

  let raw: unknown;
  if (configPath) {
    logger.debug(`Loading config from: ${configPath}`);
    try {
      raw = yaml.load(await readTextFile(configPath));
    } catch (error) {
      throw new ConfigError(`Failed to load configuration ${configPath}: ${describeError(error)}`, { configPath });
    }
  } else {
    logger.debug('Config file not found, using defaults');
  }

  const config = normalizeConfig(projectRoot, raw);
  return {
    ...config,
    concurrency: overrides.concurrency ?? config.concurrency,
    queryTimeoutMs: overrides.queryTimeoutMs ?? config.queryTimeoutMs
  };
}
