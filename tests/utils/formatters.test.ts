import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import type { PackageRecord } from '../../src/types/index.js';
import {
  formatPackageLabel,
  formatPathForDisplay,
  parseOutputFormat,
  parsePositiveIntegerOption,
  renderRecordTable,
  renderRecords,
  toPlainRecord
} from '../../src/utils/formatters.js';
import { ValidationError } from '../../src/utils/errors.js';

const BASE: PackageRecord = {
  type: 'cabal',
  id: 'base-4',
  name: 'base',
  version: '4.18',
  summary: undefined,
  homepage: undefined,
  docDir: '/proj/vendor/base',
  searchRoot: undefined
};

const TEXT: PackageRecord = {
  type: 'cabal',
  id: 'text-2',
  name: 'text',
  version: '2.0',
  homepage: 'https://example.org/text',
  docDir: '/usr/share/doc/text'
};

describe('parseOutputFormat', () => {
  it('defaults to text', () => {
    assert.equal(parseOutputFormat(undefined), 'text');
  });

  it('accepts known formats in any case', () => {
    assert.equal(parseOutputFormat('json'), 'json');
    assert.equal(parseOutputFormat('YAML'), 'yaml');
  });

  it('rejects unknown formats', () => {
    assert.throws(() => parseOutputFormat('xml'), (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.equal(error.message, "Validation error: Invalid --format value 'xml'. Use one of: text, json, yaml.");
      return true;
    });
  });
});

describe('parsePositiveIntegerOption', () => {
  it('leaves an absent flag undefined', () => {
    assert.equal(parsePositiveIntegerOption(undefined, '--concurrency'), undefined);
  });

  it('parses whole numbers', () => {
    assert.equal(parsePositiveIntegerOption('8', '--concurrency'), 8);
    assert.equal(parsePositiveIntegerOption(' 1500 ', '--timeout'), 1500);
  });

  it('rejects zero, fractions and words', () => {
    for (const value of ['0', '2.5', '-3', 'many', '']) {
      assert.throws(() => parsePositiveIntegerOption(value, '--timeout'), {
        message: `Validation error: Invalid --timeout value '${value}'. Use a positive integer.`
      });
    }
  });
});

describe('formatPathForDisplay', () => {
  it('shortens paths inside the working directory', () => {
    assert.equal(formatPathForDisplay('/work/proj/vendor/text', '/work/proj'), 'vendor/text');
  });

  it('keeps paths outside the working directory absolute', () => {
    assert.equal(formatPathForDisplay('/usr/share/doc/text', '/work/proj'), '/usr/share/doc/text');
  });

  it('keeps relative paths as given', () => {
    assert.equal(formatPathForDisplay('vendor/text', '/work/proj'), 'vendor/text');
  });
});

describe('formatPackageLabel', () => {
  it('joins name and version', () => {
    assert.equal(formatPackageLabel(TEXT), 'text@2.0');
  });

  it('falls back to the id', () => {
    assert.equal(formatPackageLabel({ type: 'cabal', id: 'ghost-1' }), 'ghost-1');
  });
});

describe('toPlainRecord', () => {
  it('drops unset keys', () => {
    assert.deepEqual(toPlainRecord(BASE), {
      type: 'cabal',
      id: 'base-4',
      name: 'base',
      version: '4.18',
      docDir: '/proj/vendor/base'
    });
  });
});

describe('renderRecordTable', () => {
  it('aligns columns and totals the packages', () => {
    assert.deepEqual(renderRecordTable([BASE, TEXT], '/proj'), [
      'PACKAGE' + ' '.repeat(4) + 'HOMEPAGE' + ' '.repeat(18) + 'DOCS',
      'base@4.18' + ' '.repeat(2) + '-' + ' '.repeat(25) + 'vendor/base',
      'text@2.0' + ' '.repeat(3) + 'https://example.org/text' + ' '.repeat(2) + '/usr/share/doc/text',
      '',
      'Total: 2 packages'
    ]);
  });

  it('uses the singular for one package', () => {
    const lines = renderRecordTable([TEXT], '/proj');
    assert.equal(lines[lines.length - 1], 'Total: 1 package');
  });

  it('says so when there is nothing to show', () => {
    assert.deepEqual(renderRecordTable([]), ['No cabal dependencies found.']);
  });
});

describe('renderRecords', () => {
  it('renders json with the unset keys left out', () => {
    assert.equal(
      renderRecords([{ type: 'cabal', id: 'base-4', name: 'base' }], 'json'),
      '[\n  {\n    "type": "cabal",\n    "id": "base-4",\n    "name": "base"\n  }\n]'
    );
  });

  it('renders yaml as a list of mappings', () => {
    assert.equal(
      renderRecords([{ type: 'cabal', id: 'base-4', name: 'base', docDir: '/proj/vendor/base' }], 'yaml'),
      '- type: cabal\n  id: base-4\n  name: base\n  docDir: /proj/vendor/base'
    );
  });

  it('renders text as the table', () => {
    assert.equal(renderRecords([TEXT], 'text', '/proj'), renderRecordTable([TEXT], '/proj').join('\n'));
  });
});
