import { isAbsolute, relative } from 'path';
import type { PackageMapEntry } from '../types/index.js';

/**
 * Formats a path for display: relative to `cwd` when inside it, otherwise unchanged.
 *
 * @example
 * formatPathForDisplay('/proj/vendor/volcano-packages.php', '/proj') // => 'vendor/volcano-packages.php'
 * formatPathForDisplay('/elsewhere/file.txt', '/proj') // => '/elsewhere/file.txt'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd()): string {
  if (!isAbsolute(path)) {
    return path;
  }

  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }
  return path;
}

export function formatPackageCount(count: number): string {
  return `${count} package${count === 1 ? '' : 's'}`;
}

/**
 * Two-column table of package map entries; the namespace column is as wide
 * as the longest namespace plus two spaces.
 */
export function formatPackageMapTable(entries: readonly PackageMapEntry[], cwd: string = process.cwd()): string[] {
  if (entries.length === 0) {
    return ['No packages registered.'];
  }

  const header = 'NAMESPACE';
  const width = Math.max(header.length, ...entries.map(entry => entry.namespace.length)) + 2;

  return [
    `${header.padEnd(width)}PATH`,
    `${'-'.repeat(header.length).padEnd(width)}----`,
    ...entries.map(entry => `${entry.namespace.padEnd(width)}${formatPathForDisplay(entry.path, cwd)}`),
    '',
    `Total: ${formatPackageCount(entries.length)}`
  ];
}
