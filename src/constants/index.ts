/**
 * Shared constants for the cabal-inventory application
 */

export const FILE_PATTERNS = {
  CABAL_EXTENSION: '.cabal',
  CONFIG_FILES: ['.cabal-inventory.yml', '.cabal-inventory.yaml'],
} as const;

export const DIR_PATTERNS = {
  /** Fallback documentation root when ghc-pkg reports no haddock-html */
  VENDOR: 'vendor'
} as const;

export const CABAL_SOURCE_TYPE = 'cabal' as const;

export const DEFAULT_CABAL_FILE_TARGETS = ['executable', 'library'] as const;

export const TOOLS = {
  GHC: 'ghc',
  GHC_PKG: 'ghc-pkg',
  GIT: 'git'
} as const;

export const GHC_PKG = {
  ID_FIELD: 'id',
  DEPENDS_FIELD: 'depends',
  INFO_FIELDS: ['name', 'version', 'synopsis', 'homepage', 'haddock-html', 'data-dir'],
  IPID_FLAG: '--ipid',
  /** Database selectors passed through as `--global` / `--user` */
  NAMED_DBS: ['global', 'user'],
  VERSION_PLACEHOLDER: '<ghc_version>'
} as const;

export const DEFAULT_CONCURRENCY = 4;
