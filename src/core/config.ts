import { dirname, join, resolve } from 'path';
import type { InstallerConfig, RootManifest } from '../types/index.js';
import { DEFAULT_DIRS, EXTRA_CONFIG_KEY, FILE_PATTERNS, PACKAGE_TYPES } from '../constants/index.js';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { isRecord } from './host/manifest.js';
import { readRootManifest, resolveVendorDir } from './host/composer-host.js';

/**
 * Installer configuration.
 *
 * Settings live in the root manifest under `extra["volcano-installer"]`:
 *
 *   "extra": {
 *     "volcano-installer": {
 *       "package-type": "volcano-package",
 *       "packages-dir": "packages",
 *       "output-file": "volcano-packages.php"
 *     }
 *   }
 *
 * CLI overrides take precedence over the manifest.
 */

export interface ConfigOverrides {
  vendorDir?: string;
  packagesDir?: string;
  env?: NodeJS.ProcessEnv;
}

interface ExtraSettings {
  packageType?: string;
  packagesDir?: string;
  outputFile?: string;
}

function readStringSetting(settings: Record<string, unknown>, key: string): string | undefined {
  const value = settings[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value === '') {
    throw new ConfigError(`extra.${EXTRA_CONFIG_KEY}.${key} must be a non-empty string`, { key, value });
  }
  return value;
}

export function readExtraSettings(manifest: RootManifest | null): ExtraSettings {
  const raw = manifest?.extra[EXTRA_CONFIG_KEY];
  if (raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`extra.${EXTRA_CONFIG_KEY} must be an object`);
  }

  return {
    packageType: readStringSetting(raw, 'package-type'),
    packagesDir: readStringSetting(raw, 'packages-dir'),
    outputFile: readStringSetting(raw, 'output-file')
  };
}

/**
 * Build the configuration from an already loaded root manifest.
 */
export async function buildInstallerConfig(
  projectRoot: string,
  manifest: RootManifest | null,
  overrides: ConfigOverrides = {}
): Promise<InstallerConfig> {
  const settings = readExtraSettings(manifest);
  const vendorDir = await resolveVendorDir(projectRoot, manifest, {
    override: overrides.vendorDir,
    env: overrides.env
  });

  const packagesDir = overrides.packagesDir ?? settings.packagesDir;

  const config: InstallerConfig = {
    projectRoot,
    vendorDir,
    packagesDir: packagesDir
      ? resolve(projectRoot, packagesDir)
      : join(dirname(vendorDir), DEFAULT_DIRS.PACKAGES),
    packageType: settings.packageType ?? PACKAGE_TYPES.PLUGIN,
    outputFile: join(vendorDir, settings.outputFile ?? FILE_PATTERNS.PACKAGE_MAP)
  };

  logger.debug('Installer configuration resolved', config);
  return config;
}

/**
 * Load the root manifest of `projectRoot` and build the configuration.
 */
export async function loadInstallerConfig(projectRoot: string, overrides: ConfigOverrides = {}): Promise<InstallerConfig> {
  const manifest = await readRootManifest(projectRoot);
  return buildInstallerConfig(projectRoot, manifest, overrides);
}
