/**
 * Incremental package map updates, used by the per-package install,
 * update and uninstall hooks. The bulk regeneration run after the host's
 * autoload dump is the canonical writer; both go through the same renderer
 * so they converge on the same file.
 */

import type { PackageMapEntry } from '../../types/index.js';
import { exists } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { toNamespaceKey } from '../namespace-resolver.js';
import { readPackageMap, writePackageMap } from './package-map-file.js';

/**
 * Create an empty package map when none exists yet.
 *
 * @returns true when the file was created
 */
export async function ensurePackageMapFile(packageMapPath: string): Promise<boolean> {
  if (await exists(packageMapPath)) {
    logger.debug(`${packageMapPath} exists.`);
    return false;
  }

  await writePackageMap(packageMapPath, []);
  logger.debug(`Created ${packageMapPath}`);
  return true;
}

/**
 * Set (`path` given) or remove (`path` null) one namespace in the package
 * map, keeping every other entry. A map that cannot be parsed is left
 * untouched and the call rejects with MalformedPackageMapError.
 */
export async function upsertPackagePath(
  packageMapPath: string,
  namespace: string,
  path: string | null
): Promise<PackageMapEntry[]> {
  const key = toNamespaceKey(namespace);

  await ensurePackageMapFile(packageMapPath);
  const current = new Map(
    (await readPackageMap(packageMapPath)).map(entry => [entry.namespace, entry.path] as const)
  );

  if (path === null) {
    current.delete(key);
  } else {
    current.set(key, path);
  }

  const entries = Array.from(current, ([entryNamespace, entryPath]) => ({ namespace: entryNamespace, path: entryPath }));
  await writePackageMap(packageMapPath, entries);
  return entries;
}
