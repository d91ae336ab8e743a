/**
 * Composer host adapter
 *
 * Reads what the host package manager has already produced: the root
 * manifest, the installed repository, and the manifests of local packages.
 * Nothing here installs or fetches anything.
 */

import { join, resolve } from 'path';
import type { PackageDescriptor, RootManifest } from '../../types/index.js';
import { DEFAULT_DIRS, ENV_VARS, FILE_PATTERNS } from '../../constants/index.js';
import { exists, isReadable, readJsonOrJsoncFile, realpathIfExists } from '../../utils/fs.js';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { isRecord, toPackageDescriptor, toRootManifest } from './manifest.js';

export interface VendorDirOptions {
  /** Explicit vendor directory (e.g. --vendor-dir), relative to the project root */
  override?: string;
  env?: NodeJS.ProcessEnv;
}

export function getRootManifestPath(projectRoot: string): string {
  return join(projectRoot, FILE_PATTERNS.COMPOSER_JSON);
}

/**
 * Load the project's root manifest, or null when the project has none.
 */
export async function readRootManifest(projectRoot: string): Promise<RootManifest | null> {
  const manifestPath = getRootManifestPath(projectRoot);
  if (!(await exists(manifestPath))) {
    logger.debug(`No root manifest at ${manifestPath}`);
    return null;
  }

  const manifest = toRootManifest(await readJsonOrJsoncFile(manifestPath));
  if (!manifest) {
    throw new ValidationError(`${manifestPath} must contain a JSON object`, { manifestPath });
  }
  return manifest;
}

/**
 * Vendor directory the host installs into, in order of precedence:
 * explicit override, COMPOSER_VENDOR_DIR, config.vendor-dir, "vendor".
 * Symlinks are resolved when the directory exists.
 */
export async function resolveVendorDir(
  projectRoot: string,
  manifest: RootManifest | null,
  options: VendorDirOptions = {}
): Promise<string> {
  const env = options.env ?? process.env;
  const fromEnv = env[ENV_VARS.VENDOR_DIR];
  const fromConfig = manifest?.config['vendor-dir'];

  const configured = options.override
    ?? (fromEnv ? fromEnv : undefined)
    ?? (typeof fromConfig === 'string' && fromConfig !== '' ? fromConfig : undefined)
    ?? DEFAULT_DIRS.VENDOR;

  return realpathIfExists(resolve(projectRoot, configured));
}

/**
 * Packages recorded in the host's installed repository.
 * Accepts both the `{ "packages": [...] }` layout and a bare list.
 */
export async function readInstalledPackages(vendorDir: string): Promise<PackageDescriptor[]> {
  const installedPath = join(vendorDir, FILE_PATTERNS.INSTALLED_JSON);
  if (!(await exists(installedPath))) {
    logger.debug(`No installed repository at ${installedPath}`);
    return [];
  }

  const raw = await readJsonOrJsoncFile(installedPath);
  const list = Array.isArray(raw)
    ? raw
    : isRecord(raw) && Array.isArray(raw.packages)
      ? raw.packages
      : null;

  if (!list) {
    throw new ValidationError(`${installedPath} does not list any packages`, { installedPath });
  }

  const packages: PackageDescriptor[] = [];
  for (const entry of list) {
    const descriptor = toPackageDescriptor(entry);
    if (descriptor) {
      packages.push(descriptor);
    } else {
      logger.debug('Skipping installed entry without a name', { entry });
    }
  }
  return packages;
}

/**
 * Read the manifest inside a package directory. Missing, unreadable or
 * invalid manifests yield null: such a directory is not a package.
 */
export async function readPackageManifest(packageDir: string, fallbackName: string): Promise<PackageDescriptor | null> {
  const manifestPath = join(packageDir, FILE_PATTERNS.COMPOSER_JSON);
  if (!(await isReadable(manifestPath))) {
    return null;
  }

  try {
    return toPackageDescriptor(await readJsonOrJsoncFile(manifestPath), fallbackName);
  } catch (error) {
    logger.debug(`Ignoring unparsable manifest: ${manifestPath}`, error);
    return null;
  }
}
