/**
 * Common types and interfaces for the volcano-installer CLI and library
 */

/**
 * Paths declared for one namespace prefix: a single relative path or a list.
 */
export type AutoloadPaths = string | string[];

/**
 * psr-4 / psr-0 declaration: namespace prefix -> relative source path(s).
 * Object key order is declaration order.
 */
export type AutoloadPathMap = Record<string, AutoloadPaths>;

/**
 * Autoload section of a package manifest, keyed by loader type
 * ("psr-4", "psr-0", "classmap", "files", ...).
 */
export type AutoloadDeclaration = Record<string, AutoloadPathMap | string[]>;

/**
 * A package as seen by the installer, either supplied by the host's
 * installed repository or parsed from a local package manifest.
 */
export interface PackageDescriptor {
  name: string;
  type: string;
  version: string;
  autoload: AutoloadDeclaration;
}

/**
 * The subset of the host's root manifest (composer.json) the installer reads.
 */
export interface RootManifest {
  name?: string;
  type?: string;
  scripts: Record<string, string[]>;
  config: Record<string, unknown>;
  extra: Record<string, unknown>;
}

/**
 * One line of the generated package map: namespace key -> install path.
 */
export interface PackageMapEntry {
  namespace: string;
  path: string;
}

export interface InstallerConfig {
  /** Project root (directory holding the root manifest) */
  projectRoot: string;
  /** Absolute vendor directory */
  vendorDir: string;
  /** Directory scanned for in-repository plugin packages */
  packagesDir: string;
  /** Package type handled by this installer */
  packageType: string;
  /** Absolute path of the generated package map */
  outputFile: string;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class InstallerError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'InstallerError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  RESOLUTION_ERROR = 'RESOLUTION_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  MALFORMED_PACKAGE_MAP = 'MALFORMED_PACKAGE_MAP',
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

export type { ExecutionContext, ExecutionOptions, UsageCheckState } from './execution-context.js';
