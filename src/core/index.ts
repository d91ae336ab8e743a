/**
 * volcano-installer core library
 *
 * Everything the CLI does, for hosts that call the installer in-process.
 * No terminal dependencies: user-facing output goes through OutputPort.
 */

// ============================================================================
// Port Interfaces
// ============================================================================

export type { OutputPort } from './ports/output.js';
export { consoleOutput } from './ports/console-output.js';
export { resolveOutput } from './ports/resolve.js';

// ============================================================================
// Context & Configuration
// ============================================================================

export { createExecutionContext } from './execution-context.js';
export { buildInstallerConfig, loadInstallerConfig, type ConfigOverrides } from './config.js';

// ============================================================================
// Namespace Resolution
// ============================================================================

export {
  resolvePrimaryNamespace,
  matchPrimaryNamespace,
  toNamespaceKey,
  trimNamespace,
  type NamespaceMatch,
  type NamespaceRuleName,
} from './namespace-resolver.js';

// ============================================================================
// Package Map
// ============================================================================

export { regeneratePackageMap, type RegenerateOptions, type RegenerateResult } from './package-map/regenerate.js';
export { discoverPlugins, type DiscoveredPlugin, type PluginSource } from './package-map/plugin-discovery.js';
export { upsertPackagePath, ensurePackageMapFile } from './package-map/incremental-updater.js';
export {
  renderPackageMap,
  parsePackageMap,
  readPackageMap,
  writePackageMap,
  getPackageMapPath,
} from './package-map/package-map-file.js';
export { runDumpPipeline, type DumpPipelineResult } from './dump/dump-pipeline.js';

// ============================================================================
// Installer Hooks
// ============================================================================

export {
  PackageInstaller,
  createPackageInstaller,
  type HostInstaller,
  type InstalledRepository,
  type PackageInstallerOptions,
} from './installer/package-installer.js';
export { checkUsage, createUsageCheckState, formatUsageWarning } from './usage-check.js';

// ============================================================================
// Host Adapter
// ============================================================================

export { readRootManifest, readInstalledPackages, readPackageManifest, resolveVendorDir } from './host/composer-host.js';

// ============================================================================
// Types & Errors
// ============================================================================

export type {
  AutoloadDeclaration,
  AutoloadPathMap,
  AutoloadPaths,
  ExecutionContext,
  InstallerConfig,
  PackageDescriptor,
  PackageMapEntry,
  RootManifest,
  UsageCheckState,
} from '../types/index.js';
export { InstallerError, ErrorCodes } from '../types/index.js';
export {
  ResolutionError,
  FileSystemError,
  MalformedPackageMapError,
  ValidationError,
  ConfigError,
} from '../utils/errors.js';
