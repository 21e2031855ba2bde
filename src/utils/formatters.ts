import * as yaml from 'js-yaml';
import { relative, isAbsolute } from 'path';

import type { OutputFormat, PackageRecord } from '../types/index.js';
import { ValidationError } from './errors.js';

/**
 * Formatting utilities for consistent display across commands
 */

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'yaml'];

export function parseOutputFormat(value: string | undefined): OutputFormat {
  const normalized = (value ?? 'text').toLowerCase();
  const match = OUTPUT_FORMATS.find(format => format === normalized);
  if (!match) {
    throw new ValidationError(`Invalid --format value '${value}'. Use one of: ${OUTPUT_FORMATS.join(', ')}.`);
  }
  return match;
}

/**
 * Parse a numeric flag such as `--concurrency 8`; absent stays undefined.
 */
export function parsePositiveIntegerOption(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new ValidationError(`Invalid ${flag} value '${value}'. Use a positive integer.`);
  }
  return parsed;
}

/**
 * Show paths inside `cwd` relative to it, everything else as given.
 *
 * @example
 * formatPathForDisplay('/work/proj/vendor/text', '/work/proj') // => 'vendor/text'
 * formatPathForDisplay('/usr/share/doc/text', '/work/proj')    // => '/usr/share/doc/text'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd()): string {
  if (!isAbsolute(path)) {
    return path;
  }
  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }
  return path;
}

/**
 * `name@version`, degrading to the installed id when ghc-pkg reported no name.
 */
export function formatPackageLabel(record: PackageRecord): string {
  const name = record.name ?? record.id;
  return record.version ? `${name}@${record.version}` : name;
}

/**
 * Copy of a record without the keys ghc-pkg left unset, ready for serializers.
 */
export function toPlainRecord(record: PackageRecord): Record<string, string> {
  const plain: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === 'string') {
      plain[key] = value;
    }
  }
  return plain;
}

/**
 * Render records as an aligned text table.
 */
export function renderRecordTable(records: readonly PackageRecord[], cwd: string = process.cwd()): string[] {
  if (records.length === 0) {
    return ['No cabal dependencies found.'];
  }

  const rows = records.map(record => [
    formatPackageLabel(record),
    record.homepage ?? '-',
    record.docDir ? formatPathForDisplay(record.docDir, cwd) : '-'
  ]);
  const headers = ['PACKAGE', 'HOMEPAGE', 'DOCS'];
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map(row => row[column].length))
  );
  const formatRow = (cells: string[]): string =>
    cells.map((cell, column) => (column === cells.length - 1 ? cell : cell.padEnd(widths[column] + 2))).join('');

  return [
    formatRow(headers),
    ...rows.map(formatRow),
    '',
    `Total: ${records.length} package${records.length === 1 ? '' : 's'}`
  ];
}

export function renderRecords(records: readonly PackageRecord[], format: OutputFormat, cwd?: string): string {
  switch (format) {
    case 'json':
      return JSON.stringify(records.map(toPlainRecord), null, 2);
    case 'yaml':
      return yaml.dump(records.map(toPlainRecord), { indent: 2, noArrayIndent: true, sortKeys: false }).trimEnd();
    case 'text':
      return renderRecordTable(records, cwd).join('\n');
  }
}
