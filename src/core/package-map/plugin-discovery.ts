/**
 * Plugin discovery: finds every package of the plugin type, both in the
 * host's installed repository and in the local packages directory, and
 * resolves its namespace key and install path.
 */

import { join } from 'path';
import type { PackageDescriptor, PackageMapEntry } from '../../types/index.js';
import { PACKAGE_TYPES } from '../../constants/index.js';
import { isDirectory, listDirectories } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { resolvePrimaryNamespace, toNamespaceKey } from '../namespace-resolver.js';
import { readPackageManifest } from '../host/composer-host.js';

export type PluginSource = 'vendor' | 'local';

export interface DiscoveredPlugin extends PackageMapEntry {
  packageName: string;
  source: PluginSource;
}

export interface DiscoveryOptions {
  vendorDir: string;
  packagesDir: string;
  packageType?: string;
}

/**
 * Plugins among the installed packages; each lives at `<vendorDir>/<name>`.
 */
export function collectInstalledPlugins(
  packages: readonly PackageDescriptor[],
  vendorDir: string,
  packageType: string = PACKAGE_TYPES.PLUGIN
): DiscoveredPlugin[] {
  return packages
    .filter(pkg => pkg.type === packageType)
    .map((pkg): DiscoveredPlugin => ({
      packageName: pkg.name,
      namespace: toNamespaceKey(resolvePrimaryNamespace(pkg)),
      path: join(vendorDir, pkg.name),
      source: 'vendor'
    }));
}

/**
 * Plugins in the immediate subdirectories of `packagesDir`. A subdirectory
 * without a readable, valid manifest of the plugin type is not a plugin.
 */
export async function scanLocalPlugins(
  packagesDir: string,
  packageType: string = PACKAGE_TYPES.PLUGIN
): Promise<DiscoveredPlugin[]> {
  if (!(await isDirectory(packagesDir))) {
    logger.debug(`No local packages directory at ${packagesDir}`);
    return [];
  }

  const plugins: DiscoveredPlugin[] = [];
  for (const dirName of (await listDirectories(packagesDir)).sort()) {
    const path = join(packagesDir, dirName);
    const manifest = await readPackageManifest(path, dirName);

    if (!manifest || manifest.type !== packageType) {
      logger.debug(`Skipping ${path}: not a ${packageType}`);
      continue;
    }

    plugins.push({
      packageName: manifest.name,
      namespace: toNamespaceKey(resolvePrimaryNamespace(manifest)),
      path,
      source: 'local'
    });
  }
  return plugins;
}

/**
 * All plugins keyed by namespace; a local package replaces an installed
 * one with the same namespace.
 */
export async function discoverPlugins(
  packages: readonly PackageDescriptor[],
  options: DiscoveryOptions
): Promise<Map<string, DiscoveredPlugin>> {
  const packageType = options.packageType ?? PACKAGE_TYPES.PLUGIN;
  const installed = collectInstalledPlugins(packages, options.vendorDir, packageType);
  const local = await scanLocalPlugins(options.packagesDir, packageType);

  const plugins = new Map<string, DiscoveredPlugin>();
  for (const plugin of [...installed, ...local]) {
    const previous = plugins.get(plugin.namespace);
    if (previous) {
      logger.debug(`Namespace ${plugin.namespace} of ${plugin.packageName} replaces ${previous.packageName}`);
    }
    plugins.set(plugin.namespace, plugin);
  }
  return plugins;
}
