/**
 * Dump pipeline: the work behind the host's post-autoload-dump hook.
 *
 * Reads the root manifest and the installed repository, then rebuilds the
 * package map from scratch.
 */

import type { ExecutionContext, InstallerConfig } from '../../types/index.js';
import { buildInstallerConfig, type ConfigOverrides } from '../config.js';
import { readInstalledPackages, readRootManifest } from '../host/composer-host.js';
import { regeneratePackageMap, type RegenerateResult } from '../package-map/regenerate.js';
import { logger } from '../../utils/logger.js';

export interface DumpPipelineResult extends RegenerateResult {
  config: InstallerConfig;
}

export async function runDumpPipeline(
  context: ExecutionContext,
  overrides: ConfigOverrides = {}
): Promise<DumpPipelineResult> {
  const manifest = await readRootManifest(context.projectRoot);
  const config = await buildInstallerConfig(context.projectRoot, manifest, overrides);
  const packages = await readInstalledPackages(config.vendorDir);

  logger.debug(`Read ${packages.length} installed package(s) from ${config.vendorDir}`);

  const result = await regeneratePackageMap({
    packages,
    packagesDir: config.packagesDir,
    vendorDir: config.vendorDir,
    packageType: config.packageType,
    outputFile: config.outputFile
  });

  return { ...result, config };
}
