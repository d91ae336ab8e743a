/**
 * Per-package installer hooks.
 *
 * Wraps the host's own installer: the host downloads, extracts and removes
 * packages; this class keeps the package map in step afterwards. These
 * hooks predate the bulk regeneration run by `volcano-installer dump` and
 * are kept for hosts that drive installs one package at a time.
 */

import type { ExecutionContext, InstallerConfig, PackageDescriptor, RootManifest } from '../../types/index.js';
import { resolvePrimaryNamespace } from '../namespace-resolver.js';
import { upsertPackagePath } from '../package-map/incremental-updater.js';
import { checkUsage } from '../usage-check.js';
import { resolveOutput } from '../ports/resolve.js';
import { buildInstallerConfig, type ConfigOverrides } from '../config.js';
import { readRootManifest } from '../host/composer-host.js';
import { logger } from '../../utils/logger.js';

/**
 * The host's view of installed packages, passed through to the host
 * installer untouched.
 */
export interface InstalledRepository {
  getPackages(): readonly PackageDescriptor[];
}

/**
 * Operations supplied by the host package manager.
 */
export interface HostInstaller {
  install(repo: InstalledRepository, pkg: PackageDescriptor): Promise<void>;
  update(repo: InstalledRepository, initial: PackageDescriptor, target: PackageDescriptor): Promise<void>;
  uninstall(repo: InstalledRepository, pkg: PackageDescriptor): Promise<void>;
  getInstallPath(pkg: PackageDescriptor): string;
}

export interface PackageInstallerOptions {
  host: HostInstaller;
  config: InstallerConfig;
  rootManifest: RootManifest | null;
  context: Pick<ExecutionContext, 'usageCheck' | 'output'>;
}

export class PackageInstaller {
  private readonly host: HostInstaller;
  private readonly config: InstallerConfig;

  constructor(options: PackageInstallerOptions) {
    this.host = options.host;
    this.config = options.config;

    checkUsage(options.rootManifest, options.context.usageCheck, resolveOutput(options.context));
  }

  /**
   * Only packages of the configured plugin type are handled here.
   */
  supports(packageType: string): boolean {
    return packageType === this.config.packageType;
  }

  async install(repo: InstalledRepository, pkg: PackageDescriptor): Promise<void> {
    await this.host.install(repo, pkg);

    const path = this.host.getInstallPath(pkg);
    const namespace = resolvePrimaryNamespace(pkg);
    logger.debug(`Registering ${pkg.name}@${pkg.version} as ${namespace}`, { path });

    await upsertPackagePath(this.config.outputFile, namespace, path);
  }

  async update(repo: InstalledRepository, initial: PackageDescriptor, target: PackageDescriptor): Promise<void> {
    await this.host.update(repo, initial, target);

    await upsertPackagePath(this.config.outputFile, resolvePrimaryNamespace(initial), null);

    const path = this.host.getInstallPath(target);
    const namespace = resolvePrimaryNamespace(target);
    logger.debug(`Registering ${target.name}@${target.version} as ${namespace}`, { path });

    await upsertPackagePath(this.config.outputFile, namespace, path);
  }

  async uninstall(repo: InstalledRepository, pkg: PackageDescriptor): Promise<void> {
    await this.host.uninstall(repo, pkg);

    const namespace = resolvePrimaryNamespace(pkg);
    logger.debug(`Unregistering ${pkg.name} (${namespace})`);

    await upsertPackagePath(this.config.outputFile, namespace, null);
  }
}

/**
 * Build an installer for the context's project, reading its root manifest
 * and configuration.
 */
export async function createPackageInstaller(
  context: ExecutionContext,
  host: HostInstaller,
  overrides: ConfigOverrides = {}
): Promise<PackageInstaller> {
  const rootManifest = await readRootManifest(context.projectRoot);
  const config = await buildInstallerConfig(context.projectRoot, rootManifest, overrides);
  return new PackageInstaller({ host, config, rootManifest, context });
}
