import { join } from 'path';

import { DEFAULT_CABAL_FILE_TARGETS, FILE_PATTERNS } from '../../constants/index.js';
import { listFiles, readTextFile } from '../../utils/fs.js';
import { describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('manifest');

const BUILD_DEPENDS_FIELD = /^build-depends\s*:(.*)$/i;
const PACKAGE_NAME = /^[A-Za-z0-9][A-Za-z0-9-]*/;

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

function isComment(trimmed: string): boolean {
  return trimmed.startsWith('--');
}

function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * `executable` selects every executable stanza; `executable my-exe` only that one.
 */
function selectsStanza(header: string, targets: readonly string[]): boolean {
  const normalized = normalizeHeader(header);
  return targets.some(target => normalized === target || normalized.startsWith(`${target} `));
}

/**
 * Targets to scan, falling back to executables and libraries when none are configured.
 */
export function resolveTargets(targets?: readonly string[]): string[] {
  const configured = (targets ?? []).map(normalizeHeader).filter(Boolean);
  return configured.length > 0 ? configured : [...DEFAULT_CABAL_FILE_TARGETS];
}

/**
 * Strip any version constraint from a single build-depends entry.
 * `text >=1.2 && <2` -> `text`; `  , aeson` -> `aeson`; `>= 1` -> undefined
 */
export function dependencyName(specifier: string): string | undefined {
  const match = PACKAGE_NAME.exec(specifier.trim());
  return match ? match[0] : undefined;
}

/**
 * Collect the dependency names declared in `build-depends` fields of the
 * stanzas selected by `targets`.
 *
 * A stanza starts at a non-indented line (`library`, `executable my-exe`, ...)
 * and is selected when its header starts with one of the targets, word for
 * word. A `build-depends:` list continues on lines indented deeper than the
 * field and stops at a blank line or at the next line that is not indented deeper.
 */
export function parseManifestDependencies(content: string, targets?: readonly string[]): Set<string> {
  const wanted = resolveTargets(targets);
  const names = new Set<string>();

  let inTarget = false;
  let field: { indent: number; body: string[] } | null = null;

  const flush = (): void => {
    if (!field) return;
    for (const specifier of field.body.join(' ').split(',')) {
      const name = dependencyName(specifier);
      if (name) names.add(name);
    }
    field = null;
  };

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();

    if (field) {
      if (trimmed === '') {
        flush();
        continue;
      }
      if (isComment(trimmed)) continue;
      if (indentOf(line) > field.indent) {
        field.body.push(trimmed);
        continue;
      }
      flush();
    }

    if (trimmed === '' || isComment(trimmed)) continue;

    const indent = indentOf(line);
    if (indent === 0) {
      inTarget = selectsStanza(trimmed, wanted);
      continue;
    }
    if (!inTarget) continue;

    const match = BUILD_DEPENDS_FIELD.exec(trimmed);
    if (match) {
      field = { indent, body: [match[1]] };
    }
  }
  flush();

  return names;
}

/**
 * Absolute paths of the *.cabal files directly inside `projectRoot`, sorted.
 */
export async function findManifestFiles(projectRoot: string): Promise<string[]> {
  try {
    const files = await listFiles(projectRoot, FILE_PATTERNS.CABAL_EXTENSION);
    return files
      .sort()
      .map(file => join(projectRoot, file));
  } catch (error) {
    log.debug(`Unable to list cabal files in ${projectRoot}: ${describeError(error)}`);
    return [];
  }
}

/**
 * Union of top-level dependency names over every cabal file in the project root.
 * Unreadable and empty manifests contribute nothing.
 */
export async function scanManifestDependencies(
  projectRoot: string,
  targets?: readonly string[]
): Promise<Set<string>> {
  const names = new Set<string>();

  for (const manifestPath of await findManifestFiles(projectRoot)) {
    let content: string;
    try {
      content = await readTextFile(manifestPath);
    } catch (error) {
      log.debug(`Skipping unreadable cabal file ${manifestPath}: ${describeError(error)}`);
      continue;
    }
    if (content.trim().length === 0) {
      log.debug(`Skipping empty cabal file ${manifestPath}`);
      continue;
    }

    const declared = parseManifestDependencies(content, targets);
    log.debug(`Found ${declared.size} top-level dependencies in ${manifestPath}`);
    for (const name of declared) {
      names.add(name);
    }
  }

  return names;
}
