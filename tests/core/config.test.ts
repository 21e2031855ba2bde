import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { findConfigFile, loadConfig, normalizeConfig } from '../../src/core/config.js';
import { ConfigError } from '../../src/utils/errors.js';
import { createTempDir, removeTempDir, writeProjectFile } from '../test-helpers.js';

describe('normalizeConfig', () => {
  it('fills in defaults for an empty document', () => {
    assert.deepEqual(normalizeConfig('/proj', undefined), {
      projectRoot: '/proj',
      cabal: { ghcPackageDb: [], cabalFileTargets: [] },
      concurrency: 4,
      queryTimeoutMs: undefined
    });
  });

  it('maps snake_case keys onto the config', () => {
    const config = normalizeConfig('/proj', {
      cabal: { ghc_package_db: ['global', 'db/<ghc_version>'], cabal_file_targets: ['library'] },
      concurrency: 8,
      query_timeout_ms: 5000
    });
    assert.deepEqual(config.cabal, { ghcPackageDb: ['global', 'db/<ghc_version>'], cabalFileTargets: ['library'] });
    assert.equal(config.concurrency, 8);
    assert.equal(config.queryTimeoutMs, 5000);
  });

  it('accepts a scalar where a list is expected', () => {
    const config = normalizeConfig('/proj', { cabal: { ghc_package_db: 'user', cabal_file_targets: 'executable' } });
    assert.deepEqual(config.cabal, { ghcPackageDb: ['user'], cabalFileTargets: ['executable'] });
  });

  it('resolves the project root', () => {
    assert.equal(normalizeConfig('/proj/sub/..', null).projectRoot, '/proj');
  });

  it('rejects a document that is not a mapping', () => {
    assert.throws(() => normalizeConfig('/proj', ['global']), {
      name: 'ConfigError',
      message: 'Configuration must be a mapping'
    });
  });

  it('rejects a cabal section that is not a mapping', () => {
    assert.throws(() => normalizeConfig('/proj', { cabal: 'global' }), {
      message: "Configuration 'cabal' must be a mapping"
    });
  });

  it('rejects list entries that are not strings', () => {
    assert.throws(() => normalizeConfig('/proj', { cabal: { ghc_package_db: [{ path: 'db' }] } }), {
      message: "Configuration 'cabal.ghc_package_db' must be a string or a list of strings"
    });
  });

  it('rejects a concurrency that is not a positive integer', () => {
    for (const concurrency of [0, -2, 1.5, 'four']) {
      assert.throws(() => normalizeConfig('/proj', { concurrency }), ConfigError);
    }
  });
});

describe('loadConfig', () => {
  let projectRoot: string;

  beforeEach(async () => {
    projectRoot = await createTempDir('config');
  });

  afterEach(async () => {
    await removeTempDir(projectRoot);
  });

  it('uses defaults when there is no config file', async () => {
    assert.equal(await findConfigFile(projectRoot), null);
    const config = await loadConfig(projectRoot);
    assert.deepEqual(config.cabal, { ghcPackageDb: [], cabalFileTargets: [] });
    assert.equal(config.concurrency, 4);
  });

  it('reads .cabal-inventory.yml', async () => {
    await writeProjectFile(
      projectRoot,
      '.cabal-inventory.yml',
      [
        'cabal:',
        '  ghc_package_db:',
        '    - global',
        '    - .stack-work/install/<ghc_version>/pkgdb',
        '  cabal_file_targets: library',
        'concurrency: 2',
        'query_timeout_ms: 10000',
        ''
      ].join('\n')
    );

    const config = await loadConfig(projectRoot);
    assert.deepEqual(config, {
      projectRoot,
      cabal: {
        ghcPackageDb: ['global', '.stack-work/install/<ghc_version>/pkgdb'],
        cabalFileTargets: ['library']
      },
      concurrency: 2,
      queryTimeoutMs: 10000
    });
  });

  it('prefers .yml over .yaml', async () => {
    await writeProjectFile(projectRoot, '.cabal-inventory.yaml', 'concurrency: 3\n');
    await writeProjectFile(projectRoot, '.cabal-inventory.yml', 'concurrency: 5\n');
    assert.equal((await loadConfig(projectRoot)).concurrency, 5);
  });

  it('falls back to .yaml', async () => {
    await writeProjectFile(projectRoot, '.cabal-inventory.yaml', 'concurrency: 3\n');
    assert.equal((await loadConfig(projectRoot)).concurrency, 3);
  });

  it('treats an empty file as defaults', async () => {
    await writeProjectFile(projectRoot, '.cabal-inventory.yml', '');
    assert.equal((await loadConfig(projectRoot)).concurrency, 4);
  });

  it('lets overrides win over the file', async () => {
    await writeProjectFile(
      projectRoot,
      '.cabal-inventory.yml',
      'cabal:\n  ghc_package_db: user\n  cabal_file_targets: library\nconcurrency: 2\n'
    );
    const config = await loadConfig(projectRoot, { concurrency: 7, queryTimeoutMs: 1500 });
    assert.deepEqual(config.cabal, { ghcPackageDb: ['user'], cabalFileTargets: ['library'] });
    assert.equal(config.concurrency, 7);
    assert.equal(config.queryTimeoutMs, 1500);
  });

  it('keeps file values for overrides left undefined', async () => {
    await writeProjectFile(projectRoot, '.cabal-inventory.yml', 'concurrency: 2\nquery_timeout_ms: 9000\n');
    const config = await loadConfig(projectRoot, { concurrency: undefined, queryTimeoutMs: undefined });
    assert.equal(config.concurrency, 2);
    assert.equal(config.queryTimeoutMs, 9000);
  });

  it('reports malformed yaml as a ConfigError naming the file', async () => {
    const file = await writeProjectFile(projectRoot, '.cabal-inventory.yml', 'cabal: [unclosed\n');
    await assert.rejects(loadConfig(projectRoot), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.ok(error.message.startsWith(`Failed to load configuration ${file}: `));
      assert.deepEqual(error.details, { configPath: file });
      return true;
    });
  });
});
