import type { PackageDescriptor, PackageMapEntry } from '../../types/index.js';
import { PACKAGE_TYPES } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import { discoverPlugins, type DiscoveredPlugin } from './plugin-discovery.js';
import { getPackageMapPath, sortPackageMapEntries, writePackageMap } from './package-map-file.js';

export interface RegenerateOptions {
  /** Packages recorded by the host */
  packages: readonly PackageDescriptor[];
  /** Local packages directory; skipped when it does not exist */
  packagesDir: string;
  vendorDir: string;
  packageType?: string;
  /** Map file to write; defaults to `<vendorDir>/volcano-packages.php` */
  outputFile?: string;
}

export interface RegenerateResult {
  outputFile: string;
  entries: PackageMapEntry[];
  plugins: DiscoveredPlugin[];
}

/**
 * Rebuild the package map from scratch: every plugin currently installed or
 * present locally, nothing else. The file is always written, even when no
 * plugin remains.
 */
export async function regeneratePackageMap(options: RegenerateOptions): Promise<RegenerateResult> {
  const outputFile = options.outputFile ?? getPackageMapPath(options.vendorDir);
  const plugins = await discoverPlugins(options.packages, {
    vendorDir: options.vendorDir,
    packagesDir: options.packagesDir,
    packageType: options.packageType ?? PACKAGE_TYPES.PLUGIN
  });

  const entries = sortPackageMapEntries(
    Array.from(plugins.values(), ({ namespace, path }) => ({ namespace, path }))
  );

  await writePackageMap(outputFile, entries);
  logger.debug(`Regenerated ${outputFile} with ${entries.length} package(s)`);

  return {
    outputFile,
    entries,
    plugins: Array.from(plugins.values())
  };
}
