/**
 * Common types and interfaces for the cabal-inventory application
 */

// Core package types

/**
 * Installed package id as issued by ghc-pkg, e.g. `text-1.2.4.1-3Hb9VnyUvFh6wHWxBkDP2z`.
 * Compared by exact string equality.
 */
export type PackageId = string;

export type DependencySet = ReadonlySet<PackageId>;

/**
 * Metadata describing one resolved package, as handed to report builders.
 */
export interface PackageRecord {
  readonly type: 'cabal';
  readonly id: PackageId;
  readonly name?: string;
  readonly version?: string;
  readonly summary?: string;
  /** Always https, never carries a fragment */
  readonly homepage?: string;
  /** Directory holding the package documentation (or the local vendor fallback) */
  readonly docDir?: string;
  /** Ancestor of docDir used when searching for shipped license files */
  readonly searchRoot?: string;
}

// Configuration types

export interface CabalSourceConfig {
  /** Package database selectors: `global`, `user` or a path template containing `<ghc_version>` */
  ghcPackageDb: string[];
  /** Stanza keywords whose build-depends contribute top-level dependencies */
  cabalFileTargets: string[];
}

export interface InventoryConfig {
  /** Absolute project root containing the *.cabal manifests */
  projectRoot: string;
  cabal: CabalSourceConfig;
  /** Upper bound on concurrently running ghc-pkg processes */
  concurrency: number;
  /** Per-query timeout; a timed-out query counts as an allowed failure */
  queryTimeoutMs?: number;
}

// Command option types

export interface ListOptions {
  cwd?: string;
  format?: OutputFormat;
  /** Overrides `concurrency` from the config file */
  concurrency?: number;
  /** Overrides `query_timeout_ms` from the config file */
  timeoutMs?: number;
}

export interface StatusOptions {
  cwd?: string;
}

export type OutputFormat = 'text' | 'json' | 'yaml';

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class InventoryError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'InventoryError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  COMMAND_FAILED = 'COMMAND_FAILED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
